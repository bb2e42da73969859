import { useState, useCallback, useEffect } from 'react';
import type { Coord } from '@engine/types';
import { PLAYER_COLORS } from '@engine/constants';
import { getCell } from '@engine/board/board';
import { isGameOver } from '@engine/rules/victory';
import { BoardGrid } from './Board/BoardGrid';
import { PlayerPanel } from './PlayerPanel/PlayerPanel';
import { GameLog } from './Status/GameLog';
import { TurnTimer } from './Status/TurnTimer';
import { WinnerDialog } from './Dialogs/WinnerDialog';
import { AIThinkingIndicator } from './AIThinkingIndicator';
import { useGame } from '../context/GameContext';
import { useValidMoves, coordKey } from '../hooks/useValidMoves';
import { useAITurn } from '../hooks/useAITurn';
import { useTurnTimer } from '../hooks/useTurnTimer';
import { useSoundCues } from '../hooks/useSoundCues';
import { soundManager } from '../audio/sound-manager';
import type { AISpeed } from '../hooks/useAITurn';
import type { GameState } from '@engine/types';

interface GameProps {
  state: GameState;
}

const AI_SPEEDS: readonly AISpeed[] = ['slow', 'normal', 'fast'];

export function Game({ state }: GameProps) {
  const { playerConfigs, error, lastEvents, submitMove, passTurn, tick, exitToMenu, clearError } = useGame();
  const [selected, setSelected] = useState<Coord | null>(null);
  const [aiSpeed, setAiSpeed] = useState<AISpeed>('normal');
  const [soundOn, setSoundOn] = useState(soundManager.isEnabled());

  const moves = useValidMoves(state, selected);
  const { isAIThinking } = useAITurn(state, playerConfigs, submitMove, passTurn, aiSpeed);
  useTurnTimer(state.phase, tick);
  useSoundCues(lastEvents);

  const current = state.players[state.currentPlayerIndex];
  const currentColor = PLAYER_COLORS[current.id];
  const currentConfig = playerConfigs[state.currentPlayerIndex];
  const isCurrentPlayerAI = currentConfig?.isAI ?? false;

  const toggleSound = () => {
    soundManager.setEnabled(!soundOn);
    setSoundOn(!soundOn);
  };

  // Selection belongs to a single turn
  useEffect(() => {
    setSelected(null);
  }, [state.turnNumber]);

  const handleCellClick = useCallback(
    (coord: Coord) => {
      if (isCurrentPlayerAI || state.phase !== 'IN_PROGRESS') return;

      if (selected && moves.destinations.has(coordKey(coord))) {
        submitMove(selected, coord);
        setSelected(null);
        return;
      }

      const piece = getCell(state.board, coord.row, coord.col);
      if (piece?.owner === current.id) {
        clearError();
        setSelected(coord);
      } else {
        setSelected(null);
      }
    },
    [isCurrentPlayerAI, state.phase, state.board, selected, moves, submitMove, current.id, clearError],
  );

  return (
    <div style={{ display: 'flex', minHeight: '100vh', fontFamily: 'system-ui, sans-serif' }}>
      {/* Left side: Board */}
      <div style={{ flex: 1, padding: 16, display: 'flex', flexDirection: 'column', alignItems: 'center' }}>
        <div style={{
          display: 'flex', justifyContent: 'space-between', alignItems: 'center',
          width: '100%', maxWidth: 520, marginBottom: 8, padding: '8px 12px', borderRadius: 8,
          backgroundColor: `${currentColor}20`, border: `2px solid ${currentColor}`,
        }}>
          <div>
            <span style={{ color: '#666', fontSize: 14 }}>Turn {state.turnNumber}: </span>
            <span style={{ fontWeight: 'bold', color: currentColor }}>{current.name}</span>
          </div>
          {state.phase === 'IN_PROGRESS' && (
            <TurnTimer
              remaining={state.turnTimeRemaining}
              total={state.config.turnDurationSeconds}
              color={currentColor}
            />
          )}
        </div>

        {isAIThinking && currentConfig && (
          <AIThinkingIndicator
            playerName={current.name}
            strategyType={currentConfig.strategyType}
            color={currentColor}
          />
        )}

        {error && (
          <div style={{
            padding: '8px 12px', backgroundColor: '#fdedec',
            border: '1px solid #e74c3c', borderRadius: 6, marginBottom: 8,
            color: '#c0392b', fontSize: 13,
          }}>
            {error}
          </div>
        )}

        <BoardGrid
          board={state.board}
          selected={selected}
          validDestinations={isCurrentPlayerAI ? new Set<string>() : moves.destinations}
          onCellClick={isCurrentPlayerAI ? undefined : handleCellClick}
        />

        {!isCurrentPlayerAI && moves.canPass && (
          <button
            onClick={() => passTurn('has no legal move')}
            style={{
              marginTop: 12, padding: '10px 24px', fontSize: 14,
              backgroundColor: '#e67e22', color: 'white',
              border: 'none', borderRadius: 6, cursor: 'pointer',
            }}
          >
            No legal move: pass turn
          </button>
        )}
      </div>

      {/* Right side: Status */}
      <div style={{
        width: 320, padding: 16, backgroundColor: '#f8f9fa',
        borderLeft: '1px solid #ddd', overflowY: 'auto',
      }}>
        <div style={{ marginBottom: 12, display: 'flex', alignItems: 'center', gap: 6 }}>
          <span style={{ fontSize: 11, color: '#999' }}>AI Speed:</span>
          {AI_SPEEDS.map((s) => (
            <button
              key={s}
              onClick={() => setAiSpeed(s)}
              style={{
                padding: '2px 8px', fontSize: 10,
                backgroundColor: aiSpeed === s ? '#8e44ad' : '#f0f0f0',
                color: aiSpeed === s ? 'white' : '#666',
                border: 'none', borderRadius: 3, cursor: 'pointer',
                textTransform: 'capitalize',
              }}
            >
              {s}
            </button>
          ))}
          <button
            onClick={toggleSound}
            style={{
              marginLeft: 'auto', padding: '2px 8px', fontSize: 10,
              backgroundColor: '#f0f0f0', color: '#666',
              border: 'none', borderRadius: 3, cursor: 'pointer',
            }}
          >
            {soundOn ? 'Sound on' : 'Muted'}
          </button>
          <button
            onClick={exitToMenu}
            style={{
              padding: '2px 8px', fontSize: 10,
              backgroundColor: '#f0f0f0', color: '#666',
              border: 'none', borderRadius: 3, cursor: 'pointer',
            }}
          >
            Menu
          </button>
        </div>

        {state.players.map((p, i) => (
          <PlayerPanel
            key={p.id}
            player={p}
            isCurrentPlayer={i === state.currentPlayerIndex && state.phase === 'IN_PROGRESS'}
            state={state}
            config={playerConfigs[i]}
          />
        ))}

        <h4 style={{ margin: '16px 0 6px', color: '#2c3e50' }}>Game Log</h4>
        <GameLog log={state.log} />
      </div>

      {isGameOver(state) && (
        <WinnerDialog state={state} onNewGame={exitToMenu} />
      )}
    </div>
  );
}
