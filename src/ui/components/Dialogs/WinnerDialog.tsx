import type { GameState } from '@engine/types';
import { PLAYER_COLORS } from '@engine/constants';
import { countPieces } from '@engine/board/board';

interface WinnerDialogProps {
  state: GameState;
  onNewGame: () => void;
}

export function WinnerDialog({ state, onNewGame }: WinnerDialogProps) {
  const winner = state.players.find((p) => p.id === state.winner) ?? null;
  const color = winner ? PLAYER_COLORS[winner.id] : '#555';

  return (
    <div style={{
      position: 'fixed', top: 0, left: 0, right: 0, bottom: 0,
      backgroundColor: 'rgba(0,0,0,0.6)', display: 'flex',
      alignItems: 'center', justifyContent: 'center', zIndex: 100,
    }}>
      <div style={{
        background: 'white', borderRadius: 16, padding: 32,
        textAlign: 'center', boxShadow: '0 8px 40px rgba(0,0,0,0.3)',
      }}>
        <div style={{ fontSize: 48, marginBottom: 8 }}>
          {winner ? '\u{1F3C6}' : '\u{1F91D}'}
        </div>
        <h2 style={{ color, margin: '0 0 8px' }}>
          {winner ? `${winner.name} Wins!` : "It's a draw!"}
        </h2>
        <p style={{ fontSize: 18, color: '#555' }}>
          {winner
            ? `${countPieces(state.board, winner.id)} pieces left after ${state.turnNumber} turns`
            : 'Every remaining piece was eliminated'}
        </p>
        <button
          onClick={onNewGame}
          style={{
            marginTop: 16, padding: '12px 32px', fontSize: 16,
            backgroundColor: '#3498db', color: 'white',
            border: 'none', borderRadius: 8, cursor: 'pointer',
          }}
        >
          Back to Menu
        </button>
      </div>
    </div>
  );
}
