/**
 * Detached, behavior-free copy of board contents for search. Shares no
 * objects with the engine board, so search can never alter a live game.
 */
import type { Board, PieceType, PlayerId } from '@engine/types';
import { resolveCombat } from '@engine/rules/combat';
import { orthogonalNeighbors } from '@engine/board/coords';
import type { MoveChoice } from '../types';

export interface SnapshotCell {
  type: PieceType;
  owner: PlayerId;
}

export interface BoardSnapshot {
  size: number;
  cells: (SnapshotCell | null)[];
}

export function takeSnapshot(board: Board): BoardSnapshot {
  return {
    size: board.size,
    cells: board.cells.map((cell) => (cell === null ? null : { type: cell.type, owner: cell.owner })),
  };
}

export function cloneSnapshot(snapshot: BoardSnapshot): BoardSnapshot {
  return { size: snapshot.size, cells: [...snapshot.cells] };
}

export function snapshotCell(snapshot: BoardSnapshot, row: number, col: number): SnapshotCell | null {
  return snapshot.cells[row * snapshot.size + col];
}

export function snapshotCount(snapshot: BoardSnapshot, owner: PlayerId): number {
  let count = 0;
  for (const cell of snapshot.cells) {
    if (cell !== null && cell.owner === owner) count++;
  }
  return count;
}

/** Legal moves for `owner`, derived from the snapshot alone. */
export function snapshotMoves(snapshot: BoardSnapshot, owner: PlayerId): MoveChoice[] {
  const moves: MoveChoice[] = [];
  for (let row = 0; row < snapshot.size; row++) {
    for (let col = 0; col < snapshot.size; col++) {
      const cell = snapshotCell(snapshot, row, col);
      if (cell === null || cell.owner !== owner) continue;
      for (const to of orthogonalNeighbors(snapshot.size, row, col)) {
        const target = snapshotCell(snapshot, to.row, to.col);
        if (target === null || target.owner !== owner) {
          moves.push({ from: { row, col }, to });
        }
      }
    }
  }
  return moves;
}

/** New snapshot with a legal move applied, combat included. */
export function applySnapshotMove(snapshot: BoardSnapshot, move: MoveChoice): BoardSnapshot {
  const next = cloneSnapshot(snapshot);
  const from = move.from.row * snapshot.size + move.from.col;
  const to = move.to.row * snapshot.size + move.to.col;
  const mover = next.cells[from];
  const target = next.cells[to];
  if (mover === null) return next;

  next.cells[from] = null;
  if (target === null) {
    next.cells[to] = mover;
    return next;
  }

  switch (resolveCombat(mover.type, target.type)) {
    case 'attacker_wins':
      next.cells[to] = mover;
      break;
    case 'defender_wins':
      break;
    case 'draw':
      next.cells[to] = null;
      break;
  }
  return next;
}
