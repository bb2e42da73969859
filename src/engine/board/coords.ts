import type { Coord } from '../types';

/** Right, down, left, up. Move enumeration everywhere follows this order. */
export const ORTHOGONAL_DIRECTIONS: readonly Coord[] = [
  { row: 0, col: 1 },
  { row: 1, col: 0 },
  { row: 0, col: -1 },
  { row: -1, col: 0 },
];

export function manhattanDistance(a: Coord, b: Coord): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function coordsEqual(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}

export function isWithin(size: number, row: number, col: number): boolean {
  return (
    Number.isInteger(row) && Number.isInteger(col) &&
    row >= 0 && row < size && col >= 0 && col < size
  );
}

/** In-bounds orthogonal neighbors of a cell, in ORTHOGONAL_DIRECTIONS order. */
export function orthogonalNeighbors(size: number, row: number, col: number): Coord[] {
  const result: Coord[] = [];
  for (const dir of ORTHOGONAL_DIRECTIONS) {
    const r = row + dir.row;
    const c = col + dir.col;
    if (isWithin(size, r, c)) result.push({ row: r, col: c });
  }
  return result;
}

/** Cells in rows floor((n-1)/2)..ceil((n-1)/2) and the same columns: 4 on even boards, 1 on odd. */
export function centerCells(size: number): Coord[] {
  const lo = Math.floor((size - 1) / 2);
  const hi = Math.ceil((size - 1) / 2);
  const result: Coord[] = [];
  for (let row = lo; row <= hi; row++) {
    for (let col = lo; col <= hi; col++) {
      result.push({ row, col });
    }
  }
  return result;
}

export function formatCoord(coord: Coord): string {
  return `(${coord.row},${coord.col})`;
}
