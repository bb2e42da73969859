import { useEffect } from 'react';
import type { EventBatch } from '../context/GameContext';
import { soundForEvent } from '../audio/sound-cues';
import { soundManager } from '../audio/sound-manager';

export function useSoundCues(batch: EventBatch | null): void {
  useEffect(() => {
    if (!batch) return;
    for (const event of batch.events) {
      const cue = soundForEvent(event);
      if (cue) soundManager.play(cue);
    }
  }, [batch]);
}
