import { describe, it, expect } from 'vitest';
import type { Board } from '@engine/types';
import {
  createBoard,
  getCell,
  placePiece,
  movePiece,
  getPlayerPieces,
  countPieces,
} from '@engine/board/board';
import { centerCells, orthogonalNeighbors, formatCoord, coordsEqual } from '@engine/board/coords';
import { countPieceTypes, minTypeCount } from '@engine/utils/piece-utils';

function boardWith(...pieces: [number, number, 'rock' | 'paper' | 'scissors', 1 | 2 | 3][]): Board {
  let board = createBoard(6);
  for (const [row, col, type, owner] of pieces) {
    board = placePiece(board, row, col, { type, owner }).board;
  }
  return board;
}

describe('Board basics', () => {
  it('creates an empty square board', () => {
    const board = createBoard(6);
    expect(board.size).toBe(6);
    expect(board.cells).toHaveLength(36);
    expect(board.cells.every((c) => c === null)).toBe(true);
  });

  it('returns null for out-of-bounds cells', () => {
    const board = boardWith([0, 0, 'rock', 1]);
    expect(getCell(board, -1, 0)).toBeNull();
    expect(getCell(board, 0, 6)).toBeNull();
    expect(getCell(board, 0, 0)).toEqual({ type: 'rock', owner: 1 });
  });

  it('refuses to place onto an occupied cell', () => {
    const board = boardWith([1, 1, 'paper', 1]);
    const result = placePiece(board, 1, 1, { type: 'rock', owner: 2 });
    expect(result.success).toBe(false);
    expect(result.board).toBe(board);
  });

  it('lists a player\'s pieces in row-major order', () => {
    const board = boardWith([3, 0, 'rock', 1], [0, 4, 'paper', 1], [0, 2, 'scissors', 1], [1, 1, 'rock', 2]);
    expect(getPlayerPieces(board, 1).map(({ row, col }) => [row, col])).toEqual([[0, 2], [0, 4], [3, 0]]);
    expect(countPieces(board, 1)).toBe(3);
    expect(countPieces(board, 2)).toBe(1);
    expect(countPieces(board)).toBe(4);
  });
});

describe('movePiece', () => {
  it('relocates onto an empty cell', () => {
    const board = boardWith([2, 2, 'rock', 1]);
    const result = movePiece(board, 2, 2, 2, 3);
    expect(result.success).toBe(true);
    expect(result.outcome).toBeNull();
    expect(result.category).toBe('none');
    expect(result.removed).toEqual([]);
    expect(getCell(result.board, 2, 2)).toBeNull();
    expect(getCell(result.board, 2, 3)).toEqual({ type: 'rock', owner: 1 });
  });

  it('leaves the input board untouched', () => {
    const board = boardWith([2, 2, 'rock', 1], [2, 3, 'scissors', 2]);
    const before = [...board.cells];
    movePiece(board, 2, 2, 2, 3);
    expect(board.cells).toEqual(before);
  });

  it.each([
    ['diagonal step', 2, 2, 3, 3],
    ['two cells away', 2, 2, 2, 4],
    ['off the board', 0, 0, -1, 0],
    ['empty source', 4, 4, 4, 5],
    ['onto own piece', 2, 2, 1, 2],
  ])('rejects %s', (_label, fr, fc, tr, tc) => {
    const board = boardWith([2, 2, 'rock', 1], [1, 2, 'paper', 1], [0, 0, 'scissors', 1]);
    const result = movePiece(board, fr, fc, tr, tc);
    expect(result.success).toBe(false);
    expect(result.board).toBe(board);
  });

  it('attacker wins: defender is captured and attacker advances', () => {
    const board = boardWith([2, 2, 'rock', 1], [2, 3, 'scissors', 2]);
    const result = movePiece(board, 2, 2, 2, 3);
    expect(result.outcome).toBe('attacker_wins');
    expect(result.category).toBe('rock');
    expect(result.captured).toEqual({ type: 'scissors', owner: 2 });
    expect(result.removed).toEqual([{ type: 'scissors', owner: 2 }]);
    expect(getCell(result.board, 2, 2)).toBeNull();
    expect(getCell(result.board, 2, 3)).toEqual({ type: 'rock', owner: 1 });
  });

  it('defender wins: attacker is removed and defender stays', () => {
    const board = boardWith([2, 2, 'scissors', 1], [2, 3, 'rock', 2]);
    const result = movePiece(board, 2, 2, 2, 3);
    expect(result.outcome).toBe('defender_wins');
    expect(result.category).toBe('rock');
    expect(result.captured).toEqual({ type: 'scissors', owner: 1 });
    expect(getCell(result.board, 2, 2)).toBeNull();
    expect(getCell(result.board, 2, 3)).toEqual({ type: 'rock', owner: 2 });
  });

  it('draw removes both pieces', () => {
    const board = boardWith([2, 2, 'paper', 1], [3, 2, 'paper', 2]);
    const result = movePiece(board, 2, 2, 3, 2);
    expect(result.success).toBe(true);
    expect(result.outcome).toBe('draw');
    expect(result.category).toBe('paper');
    expect(result.removed).toHaveLength(2);
    expect(getCell(result.board, 2, 2)).toBeNull();
    expect(getCell(result.board, 3, 2)).toBeNull();
    expect(countPieces(result.board)).toBe(0);
  });
});

describe('Coordinates', () => {
  it('center is the middle 2x2 on even boards and one cell on odd boards', () => {
    expect(centerCells(6)).toEqual([
      { row: 2, col: 2 }, { row: 2, col: 3 },
      { row: 3, col: 2 }, { row: 3, col: 3 },
    ]);
    expect(centerCells(5)).toEqual([{ row: 2, col: 2 }]);
  });

  it('neighbors follow right, down, left, up order', () => {
    expect(orthogonalNeighbors(6, 2, 2)).toEqual([
      { row: 2, col: 3 }, { row: 3, col: 2 }, { row: 2, col: 1 }, { row: 1, col: 2 },
    ]);
    expect(orthogonalNeighbors(6, 0, 0)).toEqual([{ row: 0, col: 1 }, { row: 1, col: 0 }]);
  });

  it('compares coordinates by value', () => {
    expect(coordsEqual({ row: 1, col: 2 }, { row: 1, col: 2 })).toBe(true);
    expect(coordsEqual({ row: 1, col: 2 }, { row: 2, col: 1 })).toBe(false);
  });

  it('formats coordinates', () => {
    expect(formatCoord({ row: 4, col: 1 })).toBe('(4,1)');
  });
});

describe('Piece counts', () => {
  it('the scarcest type sets the minimum', () => {
    const board = boardWith([0, 0, 'rock', 1], [0, 1, 'rock', 1], [0, 2, 'paper', 1], [5, 5, 'scissors', 2]);
    const counts = countPieceTypes(board, 1);
    expect(counts).toEqual({ rock: 2, paper: 1, scissors: 0 });
    expect(minTypeCount(counts)).toBe(0);
    expect(minTypeCount({ rock: 3, paper: 2, scissors: 4 })).toBe(2);
  });
});
