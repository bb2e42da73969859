import { ConfigurationError } from './errors';

export interface GameConfig {
  boardSize: number;
  piecesPerType: number;
  turnDurationSeconds: number;
}

export const DEFAULT_GAME_CONFIG: Readonly<GameConfig> = {
  boardSize: 6,
  piecesPerType: 4,
  turnDurationSeconds: 30,
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ConfigurationError rather than clamping bad values.
 */
export function resolveConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  const config: GameConfig = { ...DEFAULT_GAME_CONFIG, ...overrides };

  if (!Number.isInteger(config.boardSize) || config.boardSize < 2) {
    throw new ConfigurationError(`Board size must be an integer of at least 2 (got ${config.boardSize})`);
  }
  if (!Number.isInteger(config.piecesPerType) || config.piecesPerType < 1) {
    throw new ConfigurationError(`Pieces per type must be a positive integer (got ${config.piecesPerType})`);
  }
  if (!Number.isFinite(config.turnDurationSeconds) || config.turnDurationSeconds <= 0) {
    throw new ConfigurationError(`Turn duration must be a positive number of seconds (got ${config.turnDurationSeconds})`);
  }

  return config;
}
