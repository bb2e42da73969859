/**
 * One-ply move scoring for the advanced strategy: combat result, how
 * central the destination is, whether all three types survive, and what
 * the mover threatens (or is threatened by) from its new cell.
 */
import type { Board, PlayerId } from '@engine/types';
import { getCell, movePiece } from '@engine/board/board';
import { beats } from '@engine/rules/combat';
import { manhattanDistance, orthogonalNeighbors } from '@engine/board/coords';
import { countPieceTypes, hasAllTypes } from '@engine/utils/piece-utils';
import type { MoveChoice } from '../types';

export const COMBAT_WIN_SCORE = 10;
export const COMBAT_LOSS_SCORE = -15;
export const COMBAT_DRAW_SCORE = -5;
export const BALANCE_BONUS = 5;
export const THREAT_BONUS = 3;
export const EXPOSURE_PENALTY = -5;

/** N-1 minus Manhattan distance to the geometric center; 0..N-2 on even boards. */
export function centralityScore(size: number, row: number, col: number): number {
  const center = (size - 1) / 2;
  return size - 1 - manhattanDistance({ row, col }, { row: center, col: center });
}

export function scoreMove(board: Board, player: PlayerId, move: MoveChoice): number {
  const mover = getCell(board, move.from.row, move.from.col);
  if (mover === null) return Number.NEGATIVE_INFINITY;

  const result = movePiece(board, move.from.row, move.from.col, move.to.row, move.to.col);
  if (!result.success) return Number.NEGATIVE_INFINITY;

  let score = 0;

  switch (result.outcome) {
    case 'attacker_wins':
      score += COMBAT_WIN_SCORE;
      break;
    case 'defender_wins':
      score += COMBAT_LOSS_SCORE;
      break;
    case 'draw':
      score += COMBAT_DRAW_SCORE;
      break;
    case null:
      break;
  }

  score += centralityScore(board.size, move.to.row, move.to.col);

  if (hasAllTypes(countPieceTypes(result.board, player))) {
    score += BALANCE_BONUS;
  }

  const landed = result.outcome === null || result.outcome === 'attacker_wins';
  if (landed) {
    for (const n of orthogonalNeighbors(board.size, move.to.row, move.to.col)) {
      const neighbor = getCell(result.board, n.row, n.col);
      if (neighbor === null || neighbor.owner === player) continue;
      if (beats(mover.type, neighbor.type)) score += THREAT_BONUS;
      else if (beats(neighbor.type, mover.type)) score += EXPOSURE_PENALTY;
    }
  }

  return score;
}
