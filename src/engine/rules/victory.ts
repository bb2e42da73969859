import type { GameState, PlayerState } from '../types';
import { countPieces } from '../board/board';

/** Players with at least one piece on the board, in turn order. */
export function getActivePlayers(state: GameState): PlayerState[] {
  return state.players.filter((p) => countPieces(state.board, p.id) > 0);
}

export function isGameOver(state: GameState): boolean {
  return state.phase === 'GAME_OVER';
}

/**
 * End the game once at most one player has pieces left. With a single
 * survivor that player wins; with none (mutual elimination) it is a draw.
 */
export function checkGameOver(state: GameState): GameState {
  if (state.phase !== 'IN_PROGRESS') return state;

  const active = getActivePlayers(state);
  if (active.length > 1) return state;

  if (active.length === 1) {
    const winner = active[0];
    return {
      ...state,
      phase: 'GAME_OVER',
      winner: winner.id,
      log: [...state.log, `${winner.name} wins!`],
    };
  }

  return {
    ...state,
    phase: 'GAME_OVER',
    winner: null,
    log: [...state.log, 'No pieces remain. The game is a draw.'],
  };
}
