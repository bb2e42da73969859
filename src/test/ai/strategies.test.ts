import { describe, it, expect } from 'vitest';
import type { GameState } from '@engine/types';
import { newGame } from '@engine/state';
import { setupBoard } from '@engine/rules/setup';
import { validateMove } from '@engine/validator';
import { createBoard, placePiece } from '@engine/board/board';
import { createPRNG } from '@engine/utils/random';
import { ALL_STRATEGIES } from '@ai/types';
import { createStrategy } from '@ai/controller/ai-controller';
import { RandomStrategy } from '@ai/strategies/random-strategy';
import { BasicStrategy, partitionDestinations } from '@ai/strategies/basic-strategy';
import { getMovablePieces } from '@ai/move-enumerator';
import { customGame } from '../fixtures';

function boxedIn(): GameState {
  let board = createBoard(2);
  for (const [row, col] of [[0, 0], [0, 1], [1, 0], [1, 1]]) {
    board = placePiece(board, row, col, { type: 'paper', owner: 1 }).board;
  }
  return { ...customGame([]), board };
}

describe.each(ALL_STRATEGIES)('%s strategy', (type) => {
  it.each([1, 5, 9])('picks a legal move (seed %d)', (seed) => {
    const state = setupBoard(newGame(3, { seed }));
    const move = createStrategy(type).chooseMove(state, 1);
    expect(move).not.toBeNull();
    if (move) expect(validateMove(state, move.from, move.to).valid).toBe(true);
  });

  it('returns null for a player without pieces', () => {
    const state = customGame([[5, 5, 'rock', 2]]);
    expect(createStrategy(type).chooseMove(state, 1)).toBeNull();
  });

  it('returns null when every piece is boxed in', () => {
    expect(createStrategy(type).chooseMove(boxedIn(), 1)).toBeNull();
  });
});

describe('RandomStrategy', () => {
  it('repeats itself under the same seed', () => {
    const state = setupBoard(newGame(2, { seed: 21 }));
    const a = new RandomStrategy(createPRNG(5).next).chooseMove(state, 1);
    const b = new RandomStrategy(createPRNG(5).next).chooseMove(state, 1);
    expect(a).toEqual(b);
  });
});

describe('BasicStrategy', () => {
  it('sorts destinations into capturing, safe and risky', () => {
    const state = customGame([
      [2, 2, 'rock', 1],
      [2, 3, 'scissors', 2],
      [2, 1, 'paper', 2],
      [1, 2, 'rock', 2],
    ]);
    const [piece] = getMovablePieces(state, 1);
    expect(partitionDestinations(state, piece)).toEqual({
      capturing: [{ row: 2, col: 3 }],
      safe: [{ row: 3, col: 2 }],
      risky: [{ row: 2, col: 1 }, { row: 1, col: 2 }],
    });
  });

  it('captures whenever it can', () => {
    const state = customGame([[2, 2, 'rock', 1], [2, 3, 'scissors', 2]]);
    const strategy = new BasicStrategy({ random: () => 0.5 });
    expect(strategy.chooseMove(state, 1)).toEqual({ from: { row: 2, col: 2 }, to: { row: 2, col: 3 } });
  });

  it('prefers a safe step over a risky attack', () => {
    const state = customGame([[0, 0, 'rock', 1], [0, 1, 'paper', 2]]);
    const strategy = new BasicStrategy({ random: () => 0, riskyMoveChance: 1 });
    expect(strategy.chooseMove(state, 1)).toEqual({ from: { row: 0, col: 0 }, to: { row: 1, col: 0 } });
  });

  it('gambles on a risky attack when nothing else is left', () => {
    const state = customGame([[0, 0, 'rock', 1], [0, 1, 'paper', 2], [1, 0, 'rock', 2]]);
    const strategy = new BasicStrategy({ random: () => 0, riskyMoveChance: 1 });
    expect(strategy.chooseMove(state, 1)).toEqual({ from: { row: 0, col: 0 }, to: { row: 0, col: 1 } });
  });

  it('falls back to any legal move after declining every risk', () => {
    const state = customGame([[0, 0, 'rock', 1], [0, 1, 'paper', 2], [1, 0, 'rock', 2]]);
    const strategy = new BasicStrategy({ random: () => 0.99, riskyMoveChance: 0 });
    expect(strategy.chooseMove(state, 1)).toEqual({ from: { row: 0, col: 0 }, to: { row: 1, col: 0 } });
  });
});
