import type { GameState, PlayerState } from '@engine/types';
import { ALL_PIECE_TYPES } from '@engine/types';
import { PLAYER_COLORS, PIECE_ICONS, PIECE_LABELS } from '@engine/constants';
import { countPieceTypes } from '@engine/utils/piece-utils';
import type { PlayerConfig } from '@ai/types';

interface PlayerPanelProps {
  player: PlayerState;
  isCurrentPlayer: boolean;
  state: GameState;
  config?: PlayerConfig;
}

export function PlayerPanel({ player, isCurrentPlayer, state, config }: PlayerPanelProps) {
  const color = PLAYER_COLORS[player.id];
  const counts = countPieceTypes(state.board, player.id);
  const total = ALL_PIECE_TYPES.reduce((s, t) => s + counts[t], 0);
  const eliminated = total === 0;

  return (
    <div
      style={{
        border: `3px solid ${isCurrentPlayer ? color : '#ddd'}`,
        borderRadius: 8,
        padding: '8px 12px',
        marginBottom: 8,
        backgroundColor: isCurrentPlayer ? `${color}15` : '#fff',
        opacity: eliminated ? 0.5 : 1,
      }}
    >
      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center', marginBottom: 4 }}>
        <strong style={{ color, textDecoration: eliminated ? 'line-through' : 'none' }}>
          {player.name}
          {config?.isAI && (
            <span style={{
              marginLeft: 6, padding: '1px 6px', fontSize: 10,
              backgroundColor: '#8e44ad', color: 'white',
              borderRadius: 3, textTransform: 'capitalize',
            }}>
              {config.strategyType}
            </span>
          )}
        </strong>
        <span style={{ fontSize: 14, fontWeight: 'bold' }}>
          {eliminated ? 'Eliminated' : `${total} pieces`}
        </span>
      </div>

      <div style={{ display: 'flex', gap: 12, fontSize: 13 }}>
        {ALL_PIECE_TYPES.map((t) => (
          <span key={t} title={PIECE_LABELS[t]} style={{ whiteSpace: 'nowrap' }}>
            {PIECE_ICONS[t]} {counts[t]}
          </span>
        ))}
      </div>
    </div>
  );
}
