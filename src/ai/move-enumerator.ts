/**
 * The search frontier shared by every strategy: owned pieces that can
 * move, paired with where they can go. Delegates legality to the engine.
 */
import type { GameState, PlayerId, Coord, Piece } from '@engine/types';
import { getPlayerPieces } from '@engine/board/board';
import { getValidMoves } from '@engine/rules/movement';
import type { MoveChoice } from './types';

export interface MovablePiece {
  from: Coord;
  piece: Piece;
  destinations: Coord[];
}

/** Pieces with at least one legal destination, row-major. */
export function getMovablePieces(state: GameState, player: PlayerId): MovablePiece[] {
  if (state.phase !== 'IN_PROGRESS') return [];

  const result: MovablePiece[] = [];
  for (const { row, col, piece } of getPlayerPieces(state.board, player)) {
    const destinations = getValidMoves(state, row, col);
    if (destinations.length > 0) {
      result.push({ from: { row, col }, piece, destinations });
    }
  }
  return result;
}

/** Every legal move of a player, pieces row-major and destinations right/down/left/up. */
export function enumerateMoves(state: GameState, player: PlayerId): MoveChoice[] {
  return getMovablePieces(state, player).flatMap(({ from, destinations }) =>
    destinations.map((to) => ({ from, to })),
  );
}
