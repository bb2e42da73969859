import type { GameState, PlayerId, PlayerState } from './types';
import { ALL_PIECE_TYPES } from './types';
import type { GameConfig } from './config';
import { resolveConfig } from './config';
import { ConfigurationError } from './errors';
import { createBoard } from './board/board';
import { createInventory } from './utils/piece-utils';
import { getStartingRegions, validateRegions } from './rules/setup';
import { MIN_PLAYERS, MAX_PLAYERS } from './constants';

const PLAYER_IDS: readonly PlayerId[] = [1, 2, 3];

export interface NewGameOptions {
  names?: string[];
  seed?: number;
  config?: Partial<GameConfig>;
}

function createPlayer(id: PlayerId, name: string, piecesPerType: number): PlayerState {
  return {
    id,
    name,
    inventory: createInventory(id, piecesPerType),
  };
}

/**
 * Create a game in the SETUP phase. Pieces are still in the players'
 * inventories; call `setupBoard` to deal them onto the board.
 */
export function newGame(numPlayers: number, options: NewGameOptions = {}): GameState {
  if (!Number.isInteger(numPlayers) || numPlayers < MIN_PLAYERS || numPlayers > MAX_PLAYERS) {
    throw new ConfigurationError(`Number of players must be ${MIN_PLAYERS} or ${MAX_PLAYERS} (got ${numPlayers})`);
  }
  if (options.names && options.names.length !== numPlayers) {
    throw new ConfigurationError(`Expected ${numPlayers} player names, got ${options.names.length}`);
  }

  const config = resolveConfig(options.config);
  validateRegions(
    getStartingRegions(config.boardSize, numPlayers),
    config.piecesPerType * ALL_PIECE_TYPES.length,
  );

  const seed = options.seed ?? Date.now();
  const players = PLAYER_IDS.slice(0, numPlayers).map((id, i) =>
    createPlayer(id, options.names?.[i]?.trim() || `Player ${id}`, config.piecesPerType),
  );

  return {
    config,
    phase: 'SETUP',
    board: createBoard(config.boardSize),
    players,
    currentPlayerIndex: 0,
    winner: null,

    turnNumber: 0,
    turnTimeRemaining: config.turnDurationSeconds,

    log: [],

    seed,
    prngState: seed,
  };
}
