import type { Board } from './board';
import { GameRuleError } from './errors';
import type { RandomSource } from './rng';
import { checkShot } from './rules';
import { TargetingEngine } from './targeting';
import type { Coord, ShipTemplate, ShotResult } from './types';

export interface TurnView {
  board: Board;
  remaining: ShipTemplate[];
}

export interface Opponent {
  readonly name: string;
  readonly kind: 'human' | 'computer';
  chooseMove(view: TurnView): Promise<Coord>;
  notifyResult(result: ShotResult, view: TurnView): void;
  onRejected?(error: GameRuleError): void;
}

export class ComputerOpponent implements Opponent {
  readonly kind = 'computer';
  readonly engine: TargetingEngine;

  constructor(readonly name: string, rng: RandomSource) {
    this.engine = new TargetingEngine(rng);
  }

  async chooseMove(view: TurnView): Promise<Coord> {
    return this.engine.nextTarget(
      view.board,
      view.remaining.map((s) => s.length)
    );
  }

  notifyResult(result: ShotResult, view: TurnView): void {
    this.engine.recordResult(view.board, result.target, result.outcome, result.sunk !== undefined);
  }
}

interface PendingMove {
  view: TurnView;
  resolve: (target: Coord) => void;
  reject: (error: Error) => void;
}

/** A player whose moves arrive from outside through `submit`. */
export class HumanOpponent implements Opponent {
  readonly kind = 'human';
  private pending: PendingMove | null = null;

  constructor(readonly name: string) {}

  get awaitingMove(): boolean {
    return this.pending !== null;
  }

  chooseMove(view: TurnView): Promise<Coord> {
    if (this.pending) {
      return Promise.reject(new Error(`${this.name} is already choosing a move`));
    }
    return new Promise<Coord>((resolve, reject) => {
      this.pending = { view, resolve, reject };
    });
  }

  submit(target: Coord): void {
    const pending = this.pending;
    if (!pending) {
      throw new GameRuleError('OutOfTurn', `It is not ${this.name}'s turn`);
    }
    checkShot(pending.view.board, target);
    this.pending = null;
    pending.resolve({ row: target.row, col: target.col });
  }

  // Results reach the display through the match listener.
  notifyResult(): void {}

  abort(reason: string): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    pending.reject(new Error(reason));
  }
}
