/**
 * Depth-limited adversarial search with alpha-beta pruning.
 *
 * Search runs on detached BoardSnapshots only. The searching player
 * maximizes; every other mover minimizes. After each move the turn passes
 * to the next player in seat order who still has pieces, as in the live game.
 */
import type { GameState, PlayerId } from '@engine/types';
import { ConfigurationError } from '@engine/errors';
import type { AIStrategy, MoveChoice } from '../types';
import { enumerateMoves } from '../move-enumerator';
import type { BoardSnapshot } from '../evaluation/board-snapshot';
import {
  takeSnapshot,
  applySnapshotMove,
  snapshotMoves,
  snapshotCount,
} from '../evaluation/board-snapshot';
import { evaluatePosition } from '../evaluation/position-evaluator';

export interface MinimaxOptions {
  /** Plies searched, own move included. */
  depth?: number;
  /** Plain minimax when false; the chosen move is the same either way. */
  alphaBeta?: boolean;
}

interface SearchContext {
  root: PlayerId;
  order: readonly PlayerId[];
}

export function nextMover(
  snapshot: BoardSnapshot,
  lastMover: PlayerId,
  order: readonly PlayerId[],
): PlayerId | null {
  const start = order.indexOf(lastMover);
  for (let step = 1; step <= order.length; step++) {
    const candidate = order[(start + step) % order.length];
    if (snapshotCount(snapshot, candidate) > 0) return candidate;
  }
  return null;
}

export class MinimaxStrategy implements AIStrategy {
  private depth: number;
  private alphaBeta: boolean;
  /** Static evaluations performed by the most recent search. */
  leafEvaluations = 0;

  constructor(options: MinimaxOptions = {}) {
    const depth = options.depth ?? 2;
    if (!Number.isInteger(depth) || depth < 1) {
      throw new ConfigurationError(`Search depth must be a positive integer (got ${depth})`);
    }
    this.depth = depth;
    this.alphaBeta = options.alphaBeta ?? true;
  }

  chooseMove(state: GameState, player: PlayerId): MoveChoice | null {
    this.leafEvaluations = 0;
    const moves = enumerateMoves(state, player);
    if (moves.length === 0) return null;

    const ctx: SearchContext = { root: player, order: state.players.map((p) => p.id) };
    const snapshot = takeSnapshot(state.board);

    let best: MoveChoice | null = null;
    let bestScore = Number.NEGATIVE_INFINITY;
    let alpha = Number.NEGATIVE_INFINITY;

    for (const move of moves) {
      const child = applySnapshotMove(snapshot, move);
      const score = this.search(
        child,
        this.depth - 1,
        alpha,
        Number.POSITIVE_INFINITY,
        nextMover(child, player, ctx.order),
        ctx,
      );
      // Strict comparison keeps the first of equal moves
      if (best === null || score > bestScore) {
        best = move;
        bestScore = score;
      }
      if (this.alphaBeta) alpha = Math.max(alpha, bestScore);
    }

    return best;
  }

  private search(
    snapshot: BoardSnapshot,
    depth: number,
    alpha: number,
    beta: number,
    mover: PlayerId | null,
    ctx: SearchContext,
  ): number {
    const remaining = ctx.order.filter((id) => snapshotCount(snapshot, id) > 0);
    if (depth <= 0 || mover === null || remaining.length <= 1) {
      return this.evaluate(snapshot, ctx);
    }

    const moves = snapshotMoves(snapshot, mover);
    if (moves.length === 0) return this.evaluate(snapshot, ctx);

    if (mover === ctx.root) {
      let value = Number.NEGATIVE_INFINITY;
      for (const move of moves) {
        const child = applySnapshotMove(snapshot, move);
        value = Math.max(
          value,
          this.search(child, depth - 1, alpha, beta, nextMover(child, mover, ctx.order), ctx),
        );
        if (this.alphaBeta) {
          alpha = Math.max(alpha, value);
          if (beta <= alpha) break;
        }
      }
      return value;
    }

    let value = Number.POSITIVE_INFINITY;
    for (const move of moves) {
      const child = applySnapshotMove(snapshot, move);
      value = Math.min(
        value,
        this.search(child, depth - 1, alpha, beta, nextMover(child, mover, ctx.order), ctx),
      );
      if (this.alphaBeta) {
        beta = Math.min(beta, value);
        if (beta <= alpha) break;
      }
    }
    return value;
  }

  private evaluate(snapshot: BoardSnapshot, ctx: SearchContext): number {
    this.leafEvaluations++;
    return evaluatePosition(snapshot, ctx.root, ctx.order);
  }
}
