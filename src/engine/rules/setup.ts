import type { GameState, Coord, PlayerState } from '../types';
import { ALL_PIECE_TYPES } from '../types';
import { placePiece } from '../board/board';
import { createPRNG, shuffle } from '../utils/random';
import { ConfigurationError } from '../errors';

function band(rows: [number, number], cols: [number, number]): Coord[] {
  const cells: Coord[] = [];
  for (let row = rows[0]; row <= rows[1]; row++) {
    for (let col = cols[0]; col <= cols[1]; col++) {
      cells.push({ row, col });
    }
  }
  return cells;
}

/**
 * Starting region per player, indexed like `state.players`.
 *
 * - 2 players: top two rows, bottom two rows.
 * - 3 players: top band and bottom band over all but the last two columns,
 *   and a right band over those two columns. On 6x6 each band has 12 cells
 *   and together they cover the board.
 */
export function getStartingRegions(boardSize: number, numPlayers: number): Coord[][] {
  const last = boardSize - 1;
  if (numPlayers === 2) {
    return [
      band([0, 1], [0, last]),
      band([boardSize - 2, last], [0, last]),
    ];
  }
  const split = Math.floor(boardSize / 2);
  return [
    band([0, split - 1], [0, boardSize - 3]),
    band([split, last], [0, boardSize - 3]),
    band([0, last], [boardSize - 2, last]),
  ];
}

/** Throws unless every region is large enough and no two regions share a cell. */
export function validateRegions(regions: Coord[][], piecesPerPlayer: number): void {
  const seen = new Set<string>();
  regions.forEach((region, i) => {
    if (region.length < piecesPerPlayer) {
      throw new ConfigurationError(
        `Starting region for player ${i + 1} has ${region.length} cells but ${piecesPerPlayer} pieces must be placed`,
      );
    }
    for (const { row, col } of region) {
      const key = `${row},${col}`;
      if (seen.has(key)) {
        throw new ConfigurationError(`Starting regions overlap at (${row},${col}); the board is too small`);
      }
      seen.add(key);
    }
  });
}

/**
 * Place every player's inventory into its region in random cell order.
 * Only valid during SETUP; any other phase returns the state unchanged.
 */
export function setupBoard(state: GameState): GameState {
  if (state.phase !== 'SETUP') return state;

  const prng = createPRNG(state.prngState);
  const regions = getStartingRegions(state.config.boardSize, state.players.length);
  let board = state.board;

  const players: PlayerState[] = state.players.map((player, i) => {
    const cells = shuffle(regions[i], prng.next);
    const pieces = shuffle(player.inventory, prng.next);
    pieces.forEach((piece, j) => {
      const { row, col } = cells[j];
      board = placePiece(board, row, col, piece).board;
    });
    return { ...player, inventory: [] };
  });

  const first = players[0];
  const perPlayer = state.config.piecesPerType * ALL_PIECE_TYPES.length;

  return {
    ...state,
    phase: 'IN_PROGRESS',
    board,
    players,
    currentPlayerIndex: 0,
    turnNumber: 1,
    turnTimeRemaining: state.config.turnDurationSeconds,
    log: [
      ...state.log,
      `Board set up with ${perPlayer} pieces per player.`,
      `${first.name}'s turn`,
    ],
    prngState: state.prngState + 1,
  };
}
