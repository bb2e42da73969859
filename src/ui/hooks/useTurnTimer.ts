import { useEffect } from 'react';
import type { GamePhase } from '@engine/types';

const TICK_MS = 250;

/** Feeds elapsed wall-clock time into the engine's turn timer while a game is running. */
export function useTurnTimer(phase: GamePhase | undefined, tick: (deltaSeconds: number) => void): void {
  useEffect(() => {
    if (phase !== 'IN_PROGRESS') return;

    let last = performance.now();
    const interval = setInterval(() => {
      const now = performance.now();
      tick((now - last) / 1000);
      last = now;
    }, TICK_MS);

    return () => clearInterval(interval);
  }, [phase, tick]);
}
