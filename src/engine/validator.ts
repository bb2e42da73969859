import type { GameState, Coord } from './types';
import { getCell, isInBounds } from './board/board';
import { manhattanDistance } from './board/coords';

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

function ok(): ValidationResult {
  return { valid: true };
}

function fail(reason: string): ValidationResult {
  return { valid: false, reason };
}

/** Whether the current player may move the piece at `from` onto `to`. */
export function validateMove(state: GameState, from: Coord, to: Coord): ValidationResult {
  if (state.phase !== 'IN_PROGRESS') {
    return fail('Game is not in progress');
  }

  const { board } = state;
  if (!isInBounds(board, from.row, from.col)) {
    return fail('Source is off the board');
  }

  const piece = getCell(board, from.row, from.col);
  if (piece === null) {
    return fail('No piece at source');
  }

  const current = state.players[state.currentPlayerIndex];
  if (piece.owner !== current.id) {
    return fail(`That piece belongs to player ${piece.owner}`);
  }

  if (!isInBounds(board, to.row, to.col)) {
    return fail('Destination is off the board');
  }

  if (manhattanDistance(from, to) !== 1) {
    return fail('Pieces move one step up, down, left or right');
  }

  const target = getCell(board, to.row, to.col);
  if (target !== null && target.owner === piece.owner) {
    return fail('Destination holds your own piece');
  }

  return ok();
}
