/**
 * AI Controller: factory that creates strategies and answers AI turns.
 */
import type { GameState, PlayerId } from '@engine/types';
import type { RandomSource } from '@engine/utils/random';
import type { AIStrategy, MoveChoice, StrategyType } from '../types';
import { RandomStrategy } from '../strategies/random-strategy';
import { BasicStrategy } from '../strategies/basic-strategy';
import { AdvancedStrategy } from '../strategies/advanced-strategy';
import { MinimaxStrategy } from '../strategies/minimax-strategy';

/** Tuning knobs; each strategy reads the ones that apply to it. */
export interface StrategyOptions {
  random?: RandomSource;
  riskyMoveChance?: number;
  depth?: number;
  alphaBeta?: boolean;
}

const strategyCache = new Map<StrategyType, AIStrategy>();

export function createStrategy(strategyType: StrategyType, options: StrategyOptions = {}): AIStrategy {
  switch (strategyType) {
    case 'random':
      return new RandomStrategy(options.random);
    case 'basic':
      return new BasicStrategy({ random: options.random, riskyMoveChance: options.riskyMoveChance });
    case 'advanced':
      return new AdvancedStrategy();
    case 'minimax':
      return new MinimaxStrategy({ depth: options.depth, alphaBeta: options.alphaBeta });
  }
}

/**
 * Get or create an AI strategy instance. Only default-configured
 * strategies are cached; passing options always builds a new one.
 */
export function getStrategy(strategyType: StrategyType, options?: StrategyOptions): AIStrategy {
  if (options) return createStrategy(strategyType, options);

  let strategy = strategyCache.get(strategyType);
  if (!strategy) {
    strategy = createStrategy(strategyType);
    strategyCache.set(strategyType, strategy);
  }
  return strategy;
}

/**
 * Choose a move for an AI player. null means no legal move: pass the turn.
 */
export function chooseMove(
  state: GameState,
  player: PlayerId,
  strategyType: StrategyType,
): MoveChoice | null {
  return getStrategy(strategyType).chooseMove(state, player);
}

/**
 * Clear the strategy cache.
 */
export function clearStrategyCache(): void {
  strategyCache.clear();
}
