/**
 * Raised while building a game from its configuration: impossible role
 * counts, an empty model pool and the like. Never raised once play starts.
 */
export class GameSetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GameSetupError';
  }
}

/** Internal state the engine should never reach. Not recovered from. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
