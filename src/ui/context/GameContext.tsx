import { createContext, useContext, useState, useRef, useCallback } from 'react';
import type { ReactNode } from 'react';
import type { GameState, Coord } from '@engine/types';
import { newGame } from '@engine/state';
import { setupBoard } from '@engine/rules/setup';
import { playTurn } from '@engine/game';
import { passTurn as enginePassTurn, updateTimer } from '@engine/rules/turn';
import { GameError } from '@engine/errors';
import type { PlayerConfig } from '@ai/types';
import type { GameEvent } from '../audio/sound-cues';

export interface GameSetup {
  names: string[];
  playerConfigs: PlayerConfig[];
  turnDurationSeconds: number;
  seed?: number;
}

export interface EventBatch {
  seq: number;
  events: GameEvent[];
}

interface GameContextValue {
  state: GameState | null;
  playerConfigs: PlayerConfig[];
  error: string | null;
  lastEvents: EventBatch | null;
  startGame: (setup: GameSetup) => void;
  submitMove: (from: Coord, to: Coord) => boolean;
  passTurn: (reason?: string) => void;
  tick: (deltaSeconds: number) => void;
  exitToMenu: () => void;
  clearError: () => void;
}

const GameContext = createContext<GameContextValue | null>(null);

export function GameProvider({ children }: { children: ReactNode }) {
  const [state, setState] = useState<GameState | null>(null);
  const [playerConfigs, setPlayerConfigs] = useState<PlayerConfig[]>([]);
  const [error, setError] = useState<string | null>(null);
  const [lastEvents, setLastEvents] = useState<EventBatch | null>(null);
  // Mirrors `state` so callbacks always act on the latest value
  const stateRef = useRef<GameState | null>(null);
  const seqRef = useRef(0);

  const commit = useCallback((next: GameState | null, events: GameEvent[] = []) => {
    const previous = stateRef.current;
    stateRef.current = next;
    setState(next);

    if (next && previous?.phase !== 'GAME_OVER' && next.phase === 'GAME_OVER') {
      events = [...events, { kind: 'game_over', winner: next.winner }];
    }
    if (events.length > 0) {
      seqRef.current += 1;
      setLastEvents({ seq: seqRef.current, events });
    }
  }, []);

  const startGame = useCallback(
    (setup: GameSetup) => {
      try {
        const created = newGame(setup.names.length, {
          names: setup.names,
          seed: setup.seed,
          config: { turnDurationSeconds: setup.turnDurationSeconds },
        });
        setPlayerConfigs(setup.playerConfigs);
        commit(setupBoard(created));
        setError(null);
      } catch (e) {
        if (e instanceof GameError) {
          setError(e.message);
        } else {
          console.error('Unexpected error starting game:', e);
          setError(e instanceof Error ? `Unexpected error: ${e.message}` : 'An unexpected error occurred');
        }
      }
    },
    [commit],
  );

  const submitMove = useCallback(
    (from: Coord, to: Coord): boolean => {
      const current = stateRef.current;
      if (!current) return false;

      const result = playTurn(current, from, to);
      if (!result.accepted) {
        setError(result.reason ?? 'Illegal move');
        return false;
      }
      setError(null);
      commit(result.state, [{ kind: 'move', outcome: result.outcome, category: result.category }]);
      return true;
    },
    [commit],
  );

  const passTurn = useCallback(
    (reason?: string) => {
      const current = stateRef.current;
      if (!current) return;
      commit(enginePassTurn(current, reason), [{ kind: 'pass' }]);
    },
    [commit],
  );

  const tick = useCallback(
    (deltaSeconds: number) => {
      const current = stateRef.current;
      if (!current) return;
      const result = updateTimer(current, deltaSeconds);
      commit(result.state, result.expired ? [{ kind: 'timeout' }] : []);
    },
    [commit],
  );

  const exitToMenu = useCallback(() => {
    commit(null);
    setPlayerConfigs([]);
    setError(null);
  }, [commit]);

  const clearError = useCallback(() => setError(null), []);

  return (
    <GameContext.Provider
      value={{
        state,
        playerConfigs,
        error,
        lastEvents,
        startGame,
        submitMove,
        passTurn,
        tick,
        exitToMenu,
        clearError,
      }}
    >
      {children}
    </GameContext.Provider>
  );
}

export function useGame(): GameContextValue {
  const ctx = useContext(GameContext);
  if (!ctx) throw new Error('useGame must be used within GameProvider');
  return ctx;
}
