import { describe, it, expect } from 'vitest';
import type { PieceType, CombatOutcome } from '@engine/types';
import { ALL_PIECE_TYPES } from '@engine/types';
import { beats, resolveCombat, combatCategory } from '@engine/rules/combat';

const TABLE: [PieceType, PieceType, CombatOutcome][] = [
  ['rock', 'rock', 'draw'],
  ['rock', 'paper', 'defender_wins'],
  ['rock', 'scissors', 'attacker_wins'],
  ['paper', 'rock', 'attacker_wins'],
  ['paper', 'paper', 'draw'],
  ['paper', 'scissors', 'defender_wins'],
  ['scissors', 'rock', 'defender_wins'],
  ['scissors', 'paper', 'attacker_wins'],
  ['scissors', 'scissors', 'draw'],
];

describe('Combat resolution', () => {
  it.each(TABLE)('%s attacking %s: %s', (attacker, defender, expected) => {
    expect(resolveCombat(attacker, defender)).toBe(expected);
  });

  it('is antisymmetric for different types', () => {
    for (const a of ALL_PIECE_TYPES) {
      for (const b of ALL_PIECE_TYPES) {
        if (a === b) continue;
        const forward = resolveCombat(a, b);
        const backward = resolveCombat(b, a);
        expect(forward === 'attacker_wins').toBe(backward === 'defender_wins');
      }
    }
  });

  it('each type beats exactly one other type', () => {
    for (const a of ALL_PIECE_TYPES) {
      expect(ALL_PIECE_TYPES.filter((b) => beats(a, b))).toHaveLength(1);
    }
  });
});

describe('Combat category', () => {
  it('is the winning type', () => {
    expect(combatCategory('rock', 'scissors', 'attacker_wins')).toBe('rock');
    expect(combatCategory('scissors', 'rock', 'defender_wins')).toBe('rock');
    expect(combatCategory('paper', 'rock', 'attacker_wins')).toBe('paper');
  });

  it('is the shared type on a draw', () => {
    expect(combatCategory('scissors', 'scissors', 'draw')).toBe('scissors');
  });
});
