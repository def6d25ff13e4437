export type GameErrorCode =
  | 'GAME_OVER'
  | 'NOT_YOUR_TURN'
  | 'WRONG_PHASE'
  | 'INSUFFICIENT_RESOURCES'
  | 'ILLEGAL_PLACEMENT'
  | 'INVALID_CARD'
  | 'INVALID_CARD_ARGUMENTS'
  | 'EMPTY_DECK'
  | 'INVALID_TRADE'
  | 'INVALID_DISCARD'
  | 'INVALID_TARGET'
  | 'INVALID_ARGUMENT';

/**
 * A rejected command. Every engine error is recoverable: the game state is
 * unchanged and the caller may retry with corrected input.
 */
export class GameRuleError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string) {
    super(message);
    this.name = 'GameRuleError';
    this.code = code;
  }
}

export function isGameRuleError(error: unknown): error is GameRuleError {
  return error instanceof GameRuleError;
}
