import type { Piece, PieceCount, PlayerId, Board } from '../types';
import { ALL_PIECE_TYPES } from '../types';

export function emptyPieceCount(): PieceCount {
  return { rock: 0, paper: 0, scissors: 0 };
}

/** Per-type tally of one owner's pieces on the board. */
export function countPieceTypes(board: Board, owner: PlayerId): PieceCount {
  const count = emptyPieceCount();
  for (const cell of board.cells) {
    if (cell !== null && cell.owner === owner) count[cell.type]++;
  }
  return count;
}

/** True when every piece type has at least one piece. */
export function hasAllTypes(count: PieceCount): boolean {
  return ALL_PIECE_TYPES.every((t) => count[t] > 0);
}

export function minTypeCount(count: PieceCount): number {
  return Math.min(...ALL_PIECE_TYPES.map((t) => count[t]));
}

/** Starting inventory: `perType` pieces of each type, grouped by type. */
export function createInventory(owner: PlayerId, perType: number): Piece[] {
  const pieces: Piece[] = [];
  for (const type of ALL_PIECE_TYPES) {
    for (let i = 0; i < perType; i++) {
      pieces.push({ type, owner });
    }
  }
  return pieces;
}
