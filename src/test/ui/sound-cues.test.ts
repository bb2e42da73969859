import { describe, it, expect } from 'vitest';
import { soundForEvent } from '@ui/audio/sound-cues';

describe('Sound cues', () => {
  it('a plain step plays the step cue', () => {
    expect(soundForEvent({ kind: 'move', outcome: null, category: 'none' })).toBe('step');
  });

  it('combat plays the winning type', () => {
    expect(soundForEvent({ kind: 'move', outcome: 'attacker_wins', category: 'rock' })).toBe('rock');
    expect(soundForEvent({ kind: 'move', outcome: 'defender_wins', category: 'scissors' })).toBe('scissors');
  });

  it('a draw clashes', () => {
    expect(soundForEvent({ kind: 'move', outcome: 'draw', category: 'paper' })).toBe('clash');
  });

  it('maps turn and game events', () => {
    expect(soundForEvent({ kind: 'pass' })).toBeNull();
    expect(soundForEvent({ kind: 'timeout' })).toBe('timeout');
    expect(soundForEvent({ kind: 'game_over', winner: 2 })).toBe('victory');
    expect(soundForEvent({ kind: 'game_over', winner: null })).toBe('draw');
  });
});
