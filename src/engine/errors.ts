export class GameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GameError';
  }
}

/** Raised when a game cannot be constructed from the requested settings. */
export class ConfigurationError extends GameError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
