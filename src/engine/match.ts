import { GameRuleError, isGameRuleError } from './errors';
import type { Opponent, TurnView } from './opponents';
import { resolveShot } from './rules';
import { other, type MatchState } from './state';
import type { Coord, PlayerId, ShotResult } from './types';

export interface MatchOptions {
  onShot?: (result: ShotResult) => void;
}

/**
 * Alternates turns between two opponents until one fleet is gone. Sides are
 * indexed the same way in `state.sides` and `opponents`.
 */
export class TurnCoordinator {
  constructor(
    readonly state: MatchState,
    private readonly opponents: [Opponent, Opponent],
    private readonly options: MatchOptions = {}
  ) {
    if (state.sides.some((s) => s.fleet.allSunk())) {
      throw new GameRuleError('IllegalPlacement', 'Both fleets must be deployed before the battle starts');
    }
  }

  get active(): PlayerId {
    return this.state.active;
  }

  get winner(): PlayerId | undefined {
    return this.state.winner;
  }

  view(id: PlayerId): TurnView {
    return {
      board: this.state.sides[id].attackBoard,
      remaining: this.state.sides[other(id)].fleet.remaining(),
    };
  }

  fire(target: Coord): ShotResult {
    const attacker = this.state.active;
    return this.report(attacker, resolveShot(this.state, attacker, target));
  }

  /** Asks the active opponent for a move; a human is asked again after a rejected one. */
  async playTurn(): Promise<ShotResult> {
    if (this.state.winner !== undefined) {
      throw new GameRuleError('OutOfTurn', 'The game is already over');
    }
    const attacker = this.state.active;
    const opponent = this.opponents[attacker];
    for (;;) {
      const target = await opponent.chooseMove(this.view(attacker));
      let result: ShotResult;
      try {
        result = resolveShot(this.state, attacker, target);
      } catch (error) {
        if (opponent.kind === 'human' && isGameRuleError(error) && error.code !== 'OutOfTurn') {
          opponent.onRejected?.(error);
          continue;
        }
        throw error;
      }
      return this.report(attacker, result);
    }
  }

  private report(attacker: PlayerId, result: ShotResult): ShotResult {
    this.opponents[attacker].notifyResult(result, this.view(attacker));
    this.options.onShot?.(result);
    return result;
  }

  async run(): Promise<PlayerId> {
    let winner = this.state.winner;
    while (winner === undefined) {
      const result = await this.playTurn();
      winner = result.winner;
    }
    return winner;
  }
}
