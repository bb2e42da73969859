import { useState } from 'react';
import type { PlayerId } from '@engine/types';
import { PLAYER_COLORS, MIN_PLAYERS, MAX_PLAYERS } from '@engine/constants';
import { DEFAULT_GAME_CONFIG } from '@engine/config';
import type { PlayerConfig, StrategyType } from '@ai/types';
import { ALL_STRATEGIES } from '@ai/types';
import type { GameSetup } from '../../context/GameContext';

interface SetupScreenProps {
  onStart: (setup: GameSetup) => void;
  error?: string | null;
}

const SEAT_IDS: readonly PlayerId[] = [1, 2, 3];
const PLAYER_COUNTS = [MIN_PLAYERS, MAX_PLAYERS];
const TURN_DURATIONS = [15, 30, 60];

const DEFAULT_CONFIG: PlayerConfig = { isAI: false, strategyType: 'basic' };

const STRATEGY_LABELS: Record<StrategyType, string> = {
  random: 'Random',
  basic: 'Basic',
  advanced: 'Advanced',
  minimax: 'Minimax',
};

export function SetupScreen({ onStart, error }: SetupScreenProps) {
  const [playerCount, setPlayerCount] = useState(MIN_PLAYERS);
  const [names, setNames] = useState(['', '', '']);
  const [turnDuration, setTurnDuration] = useState(DEFAULT_GAME_CONFIG.turnDurationSeconds);
  const [configs, setConfigs] = useState<PlayerConfig[]>([
    { ...DEFAULT_CONFIG },
    { ...DEFAULT_CONFIG, isAI: true, strategyType: 'advanced' },
    { ...DEFAULT_CONFIG, isAI: true, strategyType: 'minimax' },
  ]);

  const updateConfig = (idx: number, patch: Partial<PlayerConfig>) => {
    setConfigs((prev) => prev.map((c, i) => (i === idx ? { ...c, ...patch } : c)));
  };

  const handleNameChange = (idx: number, name: string) => {
    setNames((prev) => prev.map((n, i) => (i === idx ? name : n)));
  };

  const handleStart = (allAI: boolean) => {
    const seats = configs
      .slice(0, playerCount)
      .map((c) => (allAI ? { ...c, isAI: true } : c));
    const finalNames = names.slice(0, playerCount).map((n, i) => {
      if (n.trim()) return n.trim();
      return seats[i].isAI ? `${STRATEGY_LABELS[seats[i].strategyType]} AI ${i + 1}` : `Player ${i + 1}`;
    });
    onStart({ names: finalNames, playerConfigs: seats, turnDurationSeconds: turnDuration });
  };

  return (
    <div style={{
      display: 'flex', flexDirection: 'column', alignItems: 'center',
      justifyContent: 'center', minHeight: '100vh', padding: 20,
      background: 'linear-gradient(135deg, #4b3b2a 0%, #a1887f 100%)',
    }}>
      <div style={{
        background: 'white', borderRadius: 16, padding: 32,
        boxShadow: '0 8px 40px rgba(0,0,0,0.2)', maxWidth: 440, width: '100%',
      }}>
        <h1 style={{ textAlign: 'center', margin: '0 0 8px', color: '#2c3e50' }}>
          Rock Paper Scissors Capture
        </h1>
        <p style={{ textAlign: 'center', color: '#7f8c8d', marginBottom: 24 }}>
          Rock beats Scissors, Paper beats Rock, Scissors beats Paper
        </p>

        <OptionRow
          label="Number of players:"
          options={PLAYER_COUNTS}
          value={playerCount}
          format={(n) => `${n} Players`}
          onChange={setPlayerCount}
        />

        <OptionRow
          label="Time per turn:"
          options={TURN_DURATIONS}
          value={turnDuration}
          format={(s) => `${s}s`}
          onChange={setTurnDuration}
        />

        {SEAT_IDS.slice(0, playerCount).map((id, i) => (
          <div key={id} style={{ marginBottom: 14 }}>
            <div style={{ display: 'flex', alignItems: 'center', gap: 8, marginBottom: 4 }}>
              <label style={{ fontSize: 13, color: PLAYER_COLORS[id], fontWeight: 'bold', flex: 1 }}>
                Player {id}:
              </label>
              <button
                onClick={() => updateConfig(i, { isAI: !configs[i].isAI })}
                style={{
                  padding: '3px 10px', fontSize: 11, fontWeight: 'bold',
                  backgroundColor: configs[i].isAI ? '#8e44ad' : '#ecf0f1',
                  color: configs[i].isAI ? 'white' : '#666',
                  border: 'none', borderRadius: 4, cursor: 'pointer',
                }}
              >
                {configs[i].isAI ? 'AI' : 'Human'}
              </button>
            </div>

            <input
              type="text"
              value={names[i]}
              onChange={(e) => handleNameChange(i, e.target.value)}
              placeholder={`Player ${id}`}
              style={{
                width: '100%', padding: '8px 12px', fontSize: 14, marginBottom: 4,
                border: `2px solid ${PLAYER_COLORS[id]}40`,
                borderRadius: 6, outline: 'none', boxSizing: 'border-box',
              }}
            />

            {configs[i].isAI && (
              <div style={{ display: 'flex', gap: 4 }}>
                {ALL_STRATEGIES.map((s) => (
                  <button
                    key={s}
                    onClick={() => updateConfig(i, { strategyType: s })}
                    style={{
                      flex: 1, padding: '6px 4px', fontSize: 11,
                      backgroundColor: configs[i].strategyType === s ? '#2980b9' : '#f5f5f5',
                      color: configs[i].strategyType === s ? 'white' : '#666',
                      border: configs[i].strategyType === s ? 'none' : '1px solid #ddd',
                      borderRadius: 4, cursor: 'pointer',
                    }}
                  >
                    {STRATEGY_LABELS[s]}
                  </button>
                ))}
              </div>
            )}
          </div>
        ))}

        {error && (
          <div style={{ color: '#c0392b', fontSize: 13, marginBottom: 8 }}>{error}</div>
        )}

        <button
          onClick={() => handleStart(false)}
          style={{
            width: '100%', padding: '14px', fontSize: 18,
            backgroundColor: '#27ae60', color: 'white',
            border: 'none', borderRadius: 8, cursor: 'pointer',
            fontWeight: 'bold', marginTop: 12,
          }}
        >
          Play
        </button>

        <button
          onClick={() => handleStart(true)}
          style={{
            width: '100%', padding: '12px', fontSize: 15,
            backgroundColor: '#8e44ad', color: 'white',
            border: 'none', borderRadius: 8, cursor: 'pointer',
            fontWeight: 'bold', marginTop: 8,
          }}
        >
          Watch AI Game
        </button>
      </div>
    </div>
  );
}

interface OptionRowProps {
  label: string;
  options: number[];
  value: number;
  format: (value: number) => string;
  onChange: (value: number) => void;
}

function OptionRow({ label, options, value, format, onChange }: OptionRowProps) {
  return (
    <div style={{ marginBottom: 20 }}>
      <label style={{ display: 'block', marginBottom: 6, fontWeight: 'bold', color: '#2c3e50' }}>
        {label}
      </label>
      <div style={{ display: 'flex', gap: 8 }}>
        {options.map((n) => (
          <button
            key={n}
            onClick={() => onChange(n)}
            style={{
              flex: 1, padding: '10px', fontSize: 16,
              backgroundColor: value === n ? '#3498db' : '#ecf0f1',
              color: value === n ? 'white' : '#2c3e50',
              border: 'none', borderRadius: 6, cursor: 'pointer',
              fontWeight: 'bold',
            }}
          >
            {format(n)}
          </button>
        ))}
      </div>
    </div>
  );
}
