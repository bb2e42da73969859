import type { PieceType, CombatOutcome } from '../types';

const BEATS: Record<PieceType, PieceType> = {
  rock: 'scissors',
  paper: 'rock',
  scissors: 'paper',
};

/** Rock beats Scissors, Paper beats Rock, Scissors beats Paper. */
export function beats(a: PieceType, b: PieceType): boolean {
  return BEATS[a] === b;
}

/** Outcome depends on the two types only; ownership plays no part. */
export function resolveCombat(attacker: PieceType, defender: PieceType): CombatOutcome {
  if (attacker === defender) return 'draw';
  return beats(attacker, defender) ? 'attacker_wins' : 'defender_wins';
}

/** The prevailing type of a combat (the shared type on a draw). */
export function combatCategory(
  attacker: PieceType,
  defender: PieceType,
  outcome: CombatOutcome,
): PieceType {
  return outcome === 'defender_wins' ? defender : attacker;
}
