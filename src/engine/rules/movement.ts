import type { GameState, Coord, PlayerId } from '../types';
import { getCell, getPlayerPieces } from '../board/board';
import { orthogonalNeighbors, isWithin } from '../board/coords';

/**
 * Legal destinations for the piece at (row, col): in-bounds orthogonal
 * neighbors that are empty or hold another player's piece. Combat outcome
 * is not considered.
 */
export function getValidMoves(state: GameState, row: number, col: number): Coord[] {
  const { board } = state;
  if (!isWithin(board.size, row, col)) return [];
  const piece = getCell(board, row, col);
  if (piece === null) return [];

  return orthogonalNeighbors(board.size, row, col).filter((dest) => {
    const target = getCell(board, dest.row, dest.col);
    return target === null || target.owner !== piece.owner;
  });
}

export function hasAnyValidMove(state: GameState, player: PlayerId): boolean {
  return getPlayerPieces(state.board, player).some(
    ({ row, col }) => getValidMoves(state, row, col).length > 0,
  );
}
