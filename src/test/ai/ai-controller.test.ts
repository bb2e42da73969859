import { describe, it, expect, afterEach } from 'vitest';
import type { GameState } from '@engine/types';
import { newGame } from '@engine/state';
import { setupBoard } from '@engine/rules/setup';
import { playTurn } from '@engine/game';
import { passTurn } from '@engine/rules/turn';
import { countPieces } from '@engine/board/board';
import { chooseMove, getStrategy, createStrategy, clearStrategyCache } from '@ai/controller/ai-controller';
import type { StrategyType } from '@ai/types';
import { RandomStrategy } from '@ai/strategies/random-strategy';
import { BasicStrategy } from '@ai/strategies/basic-strategy';
import { AdvancedStrategy } from '@ai/strategies/advanced-strategy';
import { MinimaxStrategy } from '@ai/strategies/minimax-strategy';

function runAIGame(
  seed: number,
  strategies: StrategyType[],
  maxTurns: number,
): { state: GameState; turns: number } {
  let state = setupBoard(newGame(strategies.length, { seed }));
  let turns = 0;

  while (state.phase === 'IN_PROGRESS' && turns < maxTurns) {
    const player = state.players[state.currentPlayerIndex].id;
    const move = chooseMove(state, player, strategies[state.currentPlayerIndex]);

    if (move === null) {
      state = passTurn(state, 'has no legal move');
    } else {
      const before = countPieces(state.board);
      const result = playTurn(state, move.from, move.to);
      if (!result.accepted) {
        throw new Error(`AI produced an illegal move on turn ${state.turnNumber}: ${result.reason}`);
      }
      expect(countPieces(result.state.board)).toBe(before - result.removed.length);
      state = result.state;
    }
    turns++;
  }

  return { state, turns };
}

describe('AI controller', () => {
  afterEach(() => clearStrategyCache());

  it('creates the requested strategy', () => {
    expect(createStrategy('random')).toBeInstanceOf(RandomStrategy);
    expect(createStrategy('basic')).toBeInstanceOf(BasicStrategy);
    expect(createStrategy('advanced')).toBeInstanceOf(AdvancedStrategy);
    expect(createStrategy('minimax')).toBeInstanceOf(MinimaxStrategy);
  });

  it('caches strategies until cleared', () => {
    const first = getStrategy('basic');
    expect(getStrategy('basic')).toBe(first);
    clearStrategyCache();
    expect(getStrategy('basic')).not.toBe(first);
  });

  it('builds a fresh strategy when options are given', () => {
    const tuned = getStrategy('minimax', { depth: 1 });
    expect(tuned).toBeInstanceOf(MinimaxStrategy);
    expect(tuned).not.toBe(getStrategy('minimax'));
  });
});

describe('AI vs AI games', () => {
  it.each<[StrategyType, number]>([
    ['random', 400],
    ['basic', 400],
    ['advanced', 300],
    ['minimax', 120],
  ])('%s against itself plays only legal moves', (type, maxTurns) => {
    const { state, turns } = runAIGame(31, [type, type], maxTurns);
    expect(turns).toBeGreaterThan(0);
    if (state.phase === 'GAME_OVER') {
      // Every surviving piece belongs to the winner
      const survivors = state.winner === null ? 0 : countPieces(state.board, state.winner);
      expect(countPieces(state.board)).toBe(survivors);
    } else {
      expect(turns).toBe(maxTurns);
    }
  }, 30_000);

  it('mixed three-player game stays consistent', () => {
    const { state } = runAIGame(77, ['advanced', 'basic', 'minimax'], 120);
    const active = state.players.filter((p) => countPieces(state.board, p.id) > 0);
    if (state.phase === 'GAME_OVER') {
      expect(active.length).toBeLessThanOrEqual(1);
    } else {
      expect(active.length).toBeGreaterThan(1);
    }
  }, 30_000);
});
