/**
 * Greedy heuristic: capture if possible, otherwise step somewhere safe,
 * occasionally gamble on a losing or drawn attack, and as a last resort
 * move at random.
 */
import type { GameState, PlayerId, Coord } from '@engine/types';
import { getCell } from '@engine/board/board';
import { resolveCombat } from '@engine/rules/combat';
import type { RandomSource } from '@engine/utils/random';
import { pickRandom, shuffle } from '@engine/utils/random';
import type { AIStrategy, MoveChoice } from '../types';
import type { MovablePiece } from '../move-enumerator';
import { getMovablePieces } from '../move-enumerator';

export interface BasicStrategyOptions {
  /** Chance of taking a risky move when a piece has nothing better. */
  riskyMoveChance?: number;
  random?: RandomSource;
}

export interface PartitionedDestinations {
  capturing: Coord[];
  safe: Coord[];
  risky: Coord[];
}

export function partitionDestinations(state: GameState, piece: MovablePiece): PartitionedDestinations {
  const capturing: Coord[] = [];
  const safe: Coord[] = [];
  const risky: Coord[] = [];

  for (const to of piece.destinations) {
    const target = getCell(state.board, to.row, to.col);
    if (target === null) {
      safe.push(to);
    } else if (resolveCombat(piece.piece.type, target.type) === 'attacker_wins') {
      capturing.push(to);
    } else {
      risky.push(to);
    }
  }

  return { capturing, safe, risky };
}

export class BasicStrategy implements AIStrategy {
  private riskyMoveChance: number;
  private random: RandomSource;

  constructor(options: BasicStrategyOptions = {}) {
    this.riskyMoveChance = options.riskyMoveChance ?? 0.2;
    this.random = options.random ?? Math.random;
  }

  chooseMove(state: GameState, player: PlayerId): MoveChoice | null {
    const candidates = getMovablePieces(state, player);
    if (candidates.length === 0) return null;

    for (const piece of shuffle(candidates, this.random)) {
      const { capturing, safe, risky } = partitionDestinations(state, piece);

      const to =
        pickRandom(capturing, this.random) ??
        pickRandom(safe, this.random) ??
        (risky.length > 0 && this.random() < this.riskyMoveChance
          ? pickRandom(risky, this.random)
          : undefined);

      if (to) return { from: piece.from, to };
    }

    // Every piece declined its risky options
    const moves = candidates.flatMap(({ from, destinations }) =>
      destinations.map((to) => ({ from, to })),
    );
    return pickRandom(moves, this.random) ?? null;
  }
}
