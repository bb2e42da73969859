import type { GameState, PlayerId } from '@engine/types';
import type { AIStrategy, MoveChoice, ScoredMove } from '../types';
import { enumerateMoves } from '../move-enumerator';
import { scoreMove } from '../evaluation/move-scorer';

/**
 * Single-ply scored heuristic: score every legal move and play the best.
 * Ties go to the first move reached in enumeration order.
 */
export class AdvancedStrategy implements AIStrategy {
  chooseMove(state: GameState, player: PlayerId): MoveChoice | null {
    let best: ScoredMove | null = null;
    for (const move of this.scoreMoves(state, player)) {
      if (best === null || move.score > best.score) best = move;
    }
    return best?.move ?? null;
  }

  scoreMoves(state: GameState, player: PlayerId): ScoredMove[] {
    return enumerateMoves(state, player).map((move) => ({
      move,
      score: scoreMove(state.board, player, move),
    }));
  }
}
