/**
 * Invalid player count, role list or configuration. The only error that
 * escapes a game; it is thrown before any phase runs.
 */
export class SetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SetupError';
  }
}

/** A deck could not serve a draw even after folding its discard pile back in. */
export class ResourceExhaustionError extends Error {
  constructor(
    message: string,
    readonly requested: number,
    readonly available: number
  ) {
    super(message);
    this.name = 'ResourceExhaustionError';
  }
}
