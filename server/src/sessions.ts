import { randomBytes } from 'node:crypto';
import { GameRuleError } from '../../src/engine/errors.js';
import { TurnCoordinator } from '../../src/engine/match.js';
import { ComputerOpponent, HumanOpponent } from '../../src/engine/opponents.js';
import { randomSeed, SeededRng } from '../../src/engine/rng.js';
import { placeShip, randomFleetPlacement, unplacedShips } from '../../src/engine/setup.js';
import { createMatchState, type MatchState } from '../../src/engine/state.js';
import type { CellState, Coord, Orientation, Phase, PlayerId, Ruleset, ShotResult } from '../../src/engine/types.js';

export const HUMAN: PlayerId = 0;
export const COMPUTER: PlayerId = 1;

export interface GameSession {
  id: string;
  title: string;
  createdAt: number;
  updatedAt: number;
  phase: Phase;
  seed: number;
  rng: SeededRng;
  state: MatchState;
  human: HumanOpponent;
  computer: ComputerOpponent;
  // Settles once the turn loop ends, by a win or by the session closing.
  done: Promise<void> | null;
}

export interface SessionPublicInfo {
  id: string;
  title: string;
  createdAt: number;
  updatedAt: number;
  phase: Phase;
  turn: number;
}

/** The human player's view of a session. Enemy ship positions are never included. */
export interface SessionSnapshot {
  id: string;
  phase: Phase;
  boardSize: number;
  turn: number;
  active: PlayerId;
  winner?: PlayerId;
  ships: CellState[][];
  attacks: CellState[][];
  fleet: string[];
  enemyFleet: string[];
  unplaced: string[];
}

export interface SessionEvents {
  onShot?: (session: GameSession, result: ShotResult) => void;
  onGameOver?: (session: GameSession, winner: PlayerId) => void;
  onAborted?: (session: GameSession, error: Error) => void;
}

function id8(): string {
  return randomBytes(4).toString('hex');
}

export class SessionStore {
  private sessions = new Map<string, GameSession>();

  constructor(
    private readonly ruleset: Ruleset,
    private readonly ttlMs = 1000 * 60 * 60,
    private readonly events: SessionEvents = {}
  ) {}

  listPublic(): SessionPublicInfo[] {
    const list: SessionPublicInfo[] = [];
    for (const s of this.sessions.values()) {
      list.push({
        id: s.id,
        title: s.title,
        createdAt: s.createdAt,
        updatedAt: s.updatedAt,
        phase: s.phase,
        turn: s.state.turn,
      });
    }
    return list.sort((a, b) => b.updatedAt - a.updatedAt);
  }

  get(id: string): GameSession | undefined {
    return this.sessions.get(id);
  }

  /** New session with the computer's fleet already deployed. */
  create(playerName: string, seed: number = randomSeed()): GameSession {
    let id = id8();
    while (this.sessions.has(id)) {
      id = id8();
    }
    const name = playerName.trim() || 'Player';
    const rng = new SeededRng(seed);
    const state = createMatchState(this.ruleset, [name, 'Computer']);
    randomFleetPlacement(state.sides[COMPUTER], this.ruleset.ships, rng);

    const now = Date.now();
    const session: GameSession = {
      id,
      title: `${name} vs Computer`,
      createdAt: now,
      updatedAt: now,
      phase: 'placement',
      seed,
      rng,
      state,
      human: new HumanOpponent(name),
      computer: new ComputerOpponent('Computer', rng),
      done: null,
    };
    this.sessions.set(id, session);
    return session;
  }

  touch(session: GameSession): void {
    session.updatedAt = Date.now();
  }

  placeShip(session: GameSession, shipName: string, origin: Coord, orientation: Orientation): void {
    this.requirePhase(session, 'placement');
    const template = this.ruleset.ships.find((s) => s.name === shipName);
    if (!template) {
      throw new GameRuleError('IllegalPlacement', `Unknown ship ${shipName}`);
    }
    placeShip(session.state.sides[HUMAN], template, origin, orientation);
    this.touch(session);
  }

  autoPlace(session: GameSession): void {
    this.requirePhase(session, 'placement');
    randomFleetPlacement(session.state.sides[HUMAN], this.ruleset.ships, session.rng);
    this.touch(session);
  }

  /** Starts the turn loop in the background; the human shoots first. */
  start(session: GameSession): void {
    this.requirePhase(session, 'placement');
    const missing = unplacedShips(session.state.sides[HUMAN], this.ruleset.ships);
    if (missing.length) {
      throw new GameRuleError('IllegalPlacement', `Place ${missing.map((s) => s.name).join(', ')} first`);
    }
    const coordinator = new TurnCoordinator(session.state, [session.human, session.computer], {
      onShot: (result) => {
        this.touch(session);
        this.events.onShot?.(session, result);
      },
    });
    session.phase = 'battle';
    session.done = coordinator.run().then(
      (winner) => {
        session.phase = 'game_over';
        this.touch(session);
        this.events.onGameOver?.(session, winner);
      },
      (error: unknown) => {
        session.phase = 'game_over';
        this.touch(session);
        this.events.onAborted?.(session, error instanceof Error ? error : new Error(String(error)));
      }
    );
    this.touch(session);
  }

  fire(session: GameSession, target: Coord): void {
    this.requirePhase(session, 'battle');
    session.human.submit(target);
    this.touch(session);
  }

  snapshot(session: GameSession): SessionSnapshot {
    const me = session.state.sides[HUMAN];
    const enemy = session.state.sides[COMPUTER];
    const snap: SessionSnapshot = {
      id: session.id,
      phase: session.phase,
      boardSize: this.ruleset.boardSize,
      turn: session.state.turn,
      active: session.state.active,
      ships: me.shipBoard.rows(),
      attacks: me.attackBoard.rows(),
      fleet: me.fleet.remaining().map((s) => s.name),
      enemyFleet: enemy.fleet.remaining().map((s) => s.name),
      unplaced: session.phase === 'placement' ? unplacedShips(me, this.ruleset.ships).map((s) => s.name) : [],
    };
    if (session.state.winner !== undefined) {
      snap.winner = session.state.winner;
    }
    return snap;
  }

  close(id: string, reason = 'Session closed'): void {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }
    this.sessions.delete(id);
    session.human.abort(reason);
  }

  cleanup(): void {
    const now = Date.now();
    for (const [id, s] of this.sessions) {
      if (now - s.updatedAt > this.ttlMs) {
        this.close(id, 'Session expired');
      }
    }
  }

  private requirePhase(session: GameSession, phase: Phase): void {
    if (session.phase !== phase) {
      throw new GameRuleError('OutOfTurn', `Game ${session.id} is in ${session.phase}, not ${phase}`);
    }
  }
}
