import type { GameState } from '../types';
import { countPieces } from '../board/board';
import { checkGameOver } from './victory';

/**
 * Hand the turn to the next player who still has pieces, resetting the
 * turn timer. Game over is checked first so that a finished game never
 * cycles looking for a mover.
 */
export function nextTurn(state: GameState): GameState {
  const checked = checkGameOver(state);
  if (checked.phase !== 'IN_PROGRESS') return checked;

  const count = checked.players.length;
  let index = checked.currentPlayerIndex;
  for (let step = 0; step < count; step++) {
    index = (index + 1) % count;
    if (countPieces(checked.board, checked.players[index].id) > 0) break;
  }

  return {
    ...checked,
    currentPlayerIndex: index,
    turnNumber: checked.turnNumber + 1,
    turnTimeRemaining: checked.config.turnDurationSeconds,
    log: [...checked.log, `${checked.players[index].name}'s turn`],
  };
}

/** Forfeit the current player's turn. */
export function passTurn(state: GameState, reason = 'passes'): GameState {
  if (state.phase !== 'IN_PROGRESS') return state;
  const player = state.players[state.currentPlayerIndex];
  return nextTurn({
    ...state,
    log: [...state.log, `${player.name} ${reason}.`],
  });
}

export interface TimerResult {
  expired: boolean;
  state: GameState;
}

/**
 * Count the turn clock down. When it runs out the current player loses the
 * turn and the caller is told so it can signal it.
 */
export function updateTimer(state: GameState, deltaSeconds: number): TimerResult {
  if (state.phase !== 'IN_PROGRESS') return { expired: false, state };

  // Clock never runs backwards
  const elapsed = Number.isFinite(deltaSeconds) && deltaSeconds > 0 ? deltaSeconds : 0;
  const remaining = state.turnTimeRemaining - elapsed;
  if (remaining > 0) {
    return { expired: false, state: { ...state, turnTimeRemaining: remaining } };
  }

  return { expired: true, state: passTurn(state, 'ran out of time') };
}
