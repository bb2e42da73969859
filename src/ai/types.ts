import type { GameState, PlayerId, Coord } from '@engine/types';

export type StrategyType = 'random' | 'basic' | 'advanced' | 'minimax';

export const ALL_STRATEGIES: readonly StrategyType[] = ['random', 'basic', 'advanced', 'minimax'];

export interface PlayerConfig {
  isAI: boolean;
  strategyType: StrategyType;
}

export interface MoveChoice {
  from: Coord;
  to: Coord;
}

export interface ScoredMove {
  move: MoveChoice;
  score: number;
}

export interface AIStrategy {
  /** null when the player has no legal move; the caller then passes the turn. */
  chooseMove(state: GameState, player: PlayerId): MoveChoice | null;
}
