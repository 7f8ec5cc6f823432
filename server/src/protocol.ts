import { z } from 'zod';

const CellIndex = z.number().int().min(0);

export const NewGameSchema = z.object({
  name: z.string().min(1).max(40).optional(),
  seed: z.number().int().min(0).max(0xffffffff).optional(),
});

export const PlaceShipSchema = z.object({
  ship: z.string().min(1).max(40),
  row: CellIndex,
  col: CellIndex,
  orientation: z.enum(['H', 'V']),
});

export const FireSchema = z.object({
  row: CellIndex,
  col: CellIndex,
});

export type NewGame = z.infer<typeof NewGameSchema>;
export type PlaceShip = z.infer<typeof PlaceShipSchema>;
export type Fire = z.infer<typeof FireSchema>;

export function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.infer<S> {
  const r = schema.safeParse(payload);
  if (!r.success) {
    throw new Error(r.error.issues.map((i) => i.message).join(', '));
  }
  return r.data;
}
