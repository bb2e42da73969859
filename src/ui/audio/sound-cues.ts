import type { CombatOutcome, CombatCategory, PlayerId } from '@engine/types';

export type GameEvent =
  | { kind: 'move'; outcome: CombatOutcome | null; category: CombatCategory }
  | { kind: 'pass' }
  | { kind: 'timeout' }
  | { kind: 'game_over'; winner: PlayerId | null };

export type SoundCue =
  | 'step'
  | 'rock'
  | 'paper'
  | 'scissors'
  | 'clash'
  | 'timeout'
  | 'victory'
  | 'draw';

/** Which cue an engine event should play; null for silent events. */
export function soundForEvent(event: GameEvent): SoundCue | null {
  switch (event.kind) {
    case 'move':
      if (event.outcome === null || event.category === 'none') return 'step';
      if (event.outcome === 'draw') return 'clash';
      return event.category;
    case 'pass':
      return null;
    case 'timeout':
      return 'timeout';
    case 'game_over':
      return event.winner === null ? 'draw' : 'victory';
  }
}
