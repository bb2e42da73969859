/**
 * Hook that watches game state and plays AI turns after a short delay.
 * The delay is pacing only; it never changes which move is chosen.
 */
import { useState, useEffect, useRef, useCallback } from 'react';
import type { GameState, Coord } from '@engine/types';
import type { PlayerConfig } from '@ai/types';
import { chooseMove } from '@ai/controller/ai-controller';

export type AISpeed = 'slow' | 'normal' | 'fast';

const SPEED_DELAYS: Record<AISpeed, [number, number]> = {
  slow: [900, 1500],
  normal: [400, 800],
  fast: [50, 150],
};

export function useAITurn(
  state: GameState | null,
  playerConfigs: PlayerConfig[],
  submitMove: (from: Coord, to: Coord) => boolean,
  passTurn: (reason?: string) => void,
  speed: AISpeed = 'normal',
): { isAIThinking: boolean } {
  const [isAIThinking, setIsAIThinking] = useState(false);
  const timerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

  const getDelay = useCallback(() => {
    const [min, max] = SPEED_DELAYS[speed];
    return min + Math.random() * (max - min);
  }, [speed]);

  const phase = state?.phase;
  const turnNumber = state?.turnNumber;
  const currentIndex = state?.currentPlayerIndex;

  useEffect(() => {
    if (!state || state.phase !== 'IN_PROGRESS') {
      setIsAIThinking(false);
      return;
    }

    const config = playerConfigs[state.currentPlayerIndex];
    if (!config?.isAI) {
      setIsAIThinking(false);
      return;
    }

    const player = state.players[state.currentPlayerIndex];
    setIsAIThinking(true);

    timerRef.current = setTimeout(() => {
      try {
        const move = chooseMove(state, player.id, config.strategyType);
        if (move === null) {
          passTurn('has no legal move');
        } else if (!submitMove(move.from, move.to)) {
          console.error(`AI produced an illegal move for ${player.name}:`, move);
          passTurn('passes');
        }
      } catch (e) {
        console.error(`AI error for ${player.name}:`, e);
        passTurn('passes');
      } finally {
        setIsAIThinking(false);
      }
    }, getDelay());

    return () => {
      if (timerRef.current !== null) {
        clearTimeout(timerRef.current);
        timerRef.current = null;
      }
    };
    // Re-run per turn, not per timer tick
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [phase, turnNumber, currentIndex, playerConfigs, submitMove, passTurn, getDelay]);

  return { isAIThinking };
}
