import type { Cell } from '@engine/types';
import { PLAYER_COLORS, PIECE_ICONS, PIECE_LABELS } from '@engine/constants';
import { BOARD_COLORS, CELL_SIZE } from './board-theme';

interface BoardCellProps {
  row: number;
  col: number;
  cell: Cell;
  isSelected: boolean;
  isValid: boolean;
  onClick?: () => void;
}

export function BoardCell({ row, col, cell, isSelected, isValid, onClick }: BoardCellProps) {
  let overlay: string | null = null;
  if (isSelected) overlay = BOARD_COLORS.selected;
  else if (isValid) overlay = cell ? BOARD_COLORS.validAttack : BOARD_COLORS.validMove;

  return (
    <div
      data-testid={`cell-${row}-${col}`}
      onClick={onClick}
      style={{
        width: CELL_SIZE,
        height: CELL_SIZE,
        position: 'relative',
        backgroundColor: (row + col) % 2 === 0 ? BOARD_COLORS.light : BOARD_COLORS.dark,
        border: `1px solid ${BOARD_COLORS.border}`,
        boxSizing: 'border-box',
        cursor: onClick ? 'pointer' : 'default',
      }}
    >
      {overlay && (
        <div style={{ position: 'absolute', inset: 0, backgroundColor: overlay }} />
      )}
      {cell && <PieceToken cell={cell} />}
    </div>
  );
}

function PieceToken({ cell }: { cell: NonNullable<Cell> }) {
  const color = PLAYER_COLORS[cell.owner];
  return (
    <div
      title={`${PIECE_LABELS[cell.type]} (player ${cell.owner})`}
      style={{
        position: 'absolute',
        inset: 6,
        borderRadius: '50%',
        backgroundColor: `${color}b4`,
        border: `3px solid ${color}`,
        display: 'flex',
        alignItems: 'center',
        justifyContent: 'center',
        fontSize: CELL_SIZE / 2.6,
        userSelect: 'none',
      }}
    >
      {PIECE_ICONS[cell.type]}
    </div>
  );
}
