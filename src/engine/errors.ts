export type GameRuleCode = 'InvalidCoordinate' | 'AlreadyAttacked' | 'IllegalPlacement' | 'OutOfTurn';

/**
 * A move or placement that breaks the rules of the game.
 *
 * Raised at the boundary before any board or fleet is touched, so the caller can
 * reject the input and ask again.
 */
export class GameRuleError extends Error {
  readonly code: GameRuleCode;

  constructor(code: GameRuleCode, message: string) {
    super(message);
    this.name = 'GameRuleError';
    this.code = code;
  }
}

export function isGameRuleError(error: unknown): error is GameRuleError {
  return error instanceof GameRuleError;
}
