import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_RULESET } from '../../src/engine/data.js';
import type { Ruleset } from '../../src/engine/types.js';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  CORS_ORIGIN: z.string().default(''),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(1000 * 60 * 60),
  BOARD_SIZE: z.coerce.number().int().min(4).max(26).optional(),
  RULESET_PATH: z.string().min(1).optional(),
});

export const ShipTemplateSchema = z.object({
  name: z.string().min(1).max(40),
  length: z.number().int().min(1),
});

export const RulesetSchema = z
  .object({
    boardSize: z.number().int().min(4).max(26),
    ships: z.array(ShipTemplateSchema).min(1).max(12),
  })
  .superRefine((ruleset, ctx) => {
    const seen = new Set<string>();
    ruleset.ships.forEach((ship, i) => {
      if (seen.has(ship.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ships', i, 'name'], message: `Duplicate ship ${ship.name}` });
      }
      seen.add(ship.name);
      if (ship.length > ruleset.boardSize) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ships', i, 'length'],
          message: `${ship.name} is longer than the board`,
        });
      }
    });
    const cells = ruleset.ships.reduce((sum, ship) => sum + ship.length, 0);
    if (cells > ruleset.boardSize ** 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ships'],
        message: `Fleet needs ${cells} cells, board has ${ruleset.boardSize ** 2}`,
      });
    }
  });

export interface ServerConfig {
  port: number;
  corsOrigins: string[];
  sessionTtlMs: number;
  ruleset: Ruleset;
}

function issues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join(', ');
}

export function parseRuleset(raw: unknown): Ruleset {
  const r = RulesetSchema.safeParse(raw);
  if (!r.success) {
    throw new Error(`Invalid ruleset: ${issues(r.error)}`);
  }
  return r.data;
}

export function loadRuleset(path: string): Ruleset {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseRuleset(raw);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const r = EnvSchema.safeParse(env);
  if (!r.success) {
    throw new Error(`Invalid environment: ${issues(r.error)}`);
  }
  const base = r.data.RULESET_PATH ? loadRuleset(r.data.RULESET_PATH) : DEFAULT_RULESET;
  const ruleset = r.data.BOARD_SIZE ? parseRuleset({ ...base, boardSize: r.data.BOARD_SIZE }) : base;
  return {
    port: r.data.PORT,
    corsOrigins: r.data.CORS_ORIGIN.split(',')
      .map((s) => s.trim())
      .filter(Boolean),
    sessionTtlMs: r.data.SESSION_TTL_MS,
    ruleset,
  };
}
