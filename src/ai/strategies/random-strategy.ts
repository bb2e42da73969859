import type { GameState, PlayerId } from '@engine/types';
import type { RandomSource } from '@engine/utils/random';
import { pickRandom } from '@engine/utils/random';
import type { AIStrategy, MoveChoice } from '../types';
import { getMovablePieces } from '../move-enumerator';

/** Uniform piece, then uniform destination. No look-ahead. */
export class RandomStrategy implements AIStrategy {
  private random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  chooseMove(state: GameState, player: PlayerId): MoveChoice | null {
    const piece = pickRandom(getMovablePieces(state, player), this.random);
    if (!piece) return null;
    const to = pickRandom(piece.destinations, this.random);
    if (!to) return null;
    return { from: piece.from, to };
  }
}
