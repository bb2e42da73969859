import type { GameState, Coord, CombatOutcome, CombatCategory, Piece } from './types';
import { PIECE_LABELS } from './constants';
import { getCell, movePiece, countPieces } from './board/board';
import { formatCoord } from './board/coords';
import { validateMove } from './validator';
import { nextTurn } from './rules/turn';

export interface TurnResult {
  accepted: boolean;
  state: GameState;
  reason?: string;
  outcome: CombatOutcome | null;
  captured: Piece | null;
  removed: Piece[];
  category: CombatCategory;
}

function describeMove(
  state: GameState,
  mover: Piece,
  defender: Piece | null,
  from: Coord,
  to: Coord,
  outcome: CombatOutcome | null,
): string {
  const name = state.players[state.currentPlayerIndex].name;
  const label = PIECE_LABELS[mover.type];
  const path = `${formatCoord(from)} -> ${formatCoord(to)}`;
  if (defender === null || outcome === null) {
    return `${name} moves ${label} ${path}`;
  }
  const enemy = `${PIECE_LABELS[defender.type]} of player ${defender.owner}`;
  switch (outcome) {
    case 'attacker_wins':
      return `${name}'s ${label} captures ${enemy} ${path}`;
    case 'defender_wins':
      return `${name}'s ${label} is lost attacking ${enemy} ${path}`;
    case 'draw':
      return `${name}'s ${label} and ${enemy} eliminate each other ${path}`;
  }
}

/**
 * Submit a move for the current player. Illegal moves are reported, never
 * thrown, and leave the state untouched. An accepted move (a draw included)
 * always hands the turn on.
 */
export function playTurn(state: GameState, from: Coord, to: Coord): TurnResult {
  const validation = validateMove(state, from, to);
  if (!validation.valid) {
    return {
      accepted: false,
      state,
      reason: validation.reason,
      outcome: null,
      captured: null,
      removed: [],
      category: 'none',
    };
  }

  const mover = getCell(state.board, from.row, from.col);
  const defender = getCell(state.board, to.row, to.col);
  const result = movePiece(state.board, from.row, from.col, to.row, to.col);
  if (!result.success || mover === null) {
    return {
      accepted: false,
      state,
      reason: 'Move rejected by the board',
      outcome: null,
      captured: null,
      removed: [],
      category: 'none',
    };
  }

  const log = [...state.log, describeMove(state, mover, defender, from, to, result.outcome)];
  for (const player of state.players) {
    const before = countPieces(state.board, player.id);
    if (before > 0 && countPieces(result.board, player.id) === 0) {
      log.push(`${player.name} has been eliminated.`);
    }
  }

  return {
    accepted: true,
    state: nextTurn({ ...state, board: result.board, log }),
    outcome: result.outcome,
    captured: result.captured,
    removed: result.removed,
    category: result.category,
  };
}
