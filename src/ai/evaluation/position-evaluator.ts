/**
 * Static score of a snapshot from one player's perspective.
 * Higher score = better position for this player.
 */
import type { PlayerId } from '@engine/types';
import { ALL_PIECE_TYPES } from '@engine/types';
import { beats } from '@engine/rules/combat';
import { centerCells, orthogonalNeighbors } from '@engine/board/coords';
import { emptyPieceCount, minTypeCount } from '@engine/utils/piece-utils';
import type { BoardSnapshot } from './board-snapshot';
import { snapshotCell } from './board-snapshot';

export const MATERIAL_WEIGHT = 10;
export const BALANCE_WEIGHT = 5;
export const CENTER_CONTROL_BONUS = 3;
export const ADJACENCY_WEIGHT = 2;

export function evaluatePosition(
  snapshot: BoardSnapshot,
  player: PlayerId,
  playerIds: readonly PlayerId[],
): number {
  let score = 0;

  // Material: own pieces against every opponent's combined
  const own = emptyPieceCount();
  let opponents = 0;
  for (const cell of snapshot.cells) {
    if (cell === null) continue;
    if (cell.owner === player) own[cell.type]++;
    else if (playerIds.includes(cell.owner)) opponents++;
  }
  const ownTotal = ALL_PIECE_TYPES.reduce((sum, t) => sum + own[t], 0);
  score += (ownTotal - opponents) * MATERIAL_WEIGHT;

  // Balance: the scarcest type limits what we can answer
  score += minTypeCount(own) * BALANCE_WEIGHT;

  for (const { row, col } of centerCells(snapshot.size)) {
    if (snapshotCell(snapshot, row, col)?.owner === player) {
      score += CENTER_CONTROL_BONUS;
    }
  }

  // Adjacency matchups, each own/enemy pair counted once
  for (let row = 0; row < snapshot.size; row++) {
    for (let col = 0; col < snapshot.size; col++) {
      const cell = snapshotCell(snapshot, row, col);
      if (cell === null || cell.owner !== player) continue;
      for (const n of orthogonalNeighbors(snapshot.size, row, col)) {
        const enemy = snapshotCell(snapshot, n.row, n.col);
        if (enemy === null || enemy.owner === player) continue;
        if (beats(cell.type, enemy.type)) score += ADJACENCY_WEIGHT;
        else if (beats(enemy.type, cell.type)) score -= ADJACENCY_WEIGHT;
      }
    }
  }

  return score;
}
