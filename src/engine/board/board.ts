/**
 * Square grid of optional pieces. Every operation returns a new Board and
 * leaves its input untouched; a rejected operation hands back the same board.
 */
import type { Board, Cell, Piece, PlayerId, PlacedPiece, MoveResult } from '../types';
import { resolveCombat, combatCategory } from '../rules/combat';
import { isWithin } from './coords';

export function createBoard(size: number): Board {
  return { size, cells: new Array<Cell>(size * size).fill(null) };
}

export function cellIndex(board: Board, row: number, col: number): number {
  return row * board.size + col;
}

export function isInBounds(board: Board, row: number, col: number): boolean {
  return isWithin(board.size, row, col);
}

/** Piece at a cell; null when empty or out of bounds. */
export function getCell(board: Board, row: number, col: number): Cell {
  if (!isInBounds(board, row, col)) return null;
  return board.cells[cellIndex(board, row, col)];
}

export function placePiece(
  board: Board,
  row: number,
  col: number,
  piece: Piece,
): { success: boolean; board: Board } {
  if (!isInBounds(board, row, col) || getCell(board, row, col) !== null) {
    return { success: false, board };
  }
  const cells = [...board.cells];
  cells[cellIndex(board, row, col)] = piece;
  return { success: true, board: { ...board, cells } };
}

function rejected(board: Board): MoveResult {
  return { success: false, board, outcome: null, captured: null, removed: [], category: 'none' };
}

/**
 * Single orthogonal step, resolving combat when the destination holds an enemy.
 * On a draw both cells are cleared.
 */
export function movePiece(
  board: Board,
  fromRow: number,
  fromCol: number,
  toRow: number,
  toCol: number,
): MoveResult {
  if (!isInBounds(board, fromRow, fromCol) || !isInBounds(board, toRow, toCol)) {
    return rejected(board);
  }

  const mover = getCell(board, fromRow, fromCol);
  if (mover === null) return rejected(board);

  if (Math.abs(toRow - fromRow) + Math.abs(toCol - fromCol) !== 1) {
    return rejected(board);
  }

  const target = getCell(board, toRow, toCol);
  const from = cellIndex(board, fromRow, fromCol);
  const to = cellIndex(board, toRow, toCol);
  const cells = [...board.cells];

  if (target === null) {
    cells[to] = mover;
    cells[from] = null;
    return {
      success: true,
      board: { ...board, cells },
      outcome: null,
      captured: null,
      removed: [],
      category: 'none',
    };
  }

  // Friendly fire
  if (target.owner === mover.owner) return rejected(board);

  const outcome = resolveCombat(mover.type, target.type);
  const category = combatCategory(mover.type, target.type, outcome);

  switch (outcome) {
    case 'attacker_wins':
      cells[to] = mover;
      cells[from] = null;
      return { success: true, board: { ...board, cells }, outcome, captured: target, removed: [target], category };
    case 'defender_wins':
      cells[from] = null;
      return { success: true, board: { ...board, cells }, outcome, captured: mover, removed: [mover], category };
    case 'draw':
      cells[from] = null;
      cells[to] = null;
      return { success: true, board: { ...board, cells }, outcome, captured: mover, removed: [mover, target], category };
  }
}

/** All pieces of one owner in row-major order. */
export function getPlayerPieces(board: Board, owner: PlayerId): PlacedPiece[] {
  const pieces: PlacedPiece[] = [];
  for (let row = 0; row < board.size; row++) {
    for (let col = 0; col < board.size; col++) {
      const piece = board.cells[cellIndex(board, row, col)];
      if (piece !== null && piece.owner === owner) {
        pieces.push({ row, col, piece });
      }
    }
  }
  return pieces;
}

/** Piece total, optionally restricted to one owner. */
export function countPieces(board: Board, owner?: PlayerId): number {
  let count = 0;
  for (const cell of board.cells) {
    if (cell === null) continue;
    if (owner === undefined || cell.owner === owner) count++;
  }
  return count;
}
