import type { Board, Coord } from '@engine/types';
import { getCell } from '@engine/board/board';
import { coordsEqual } from '@engine/board/coords';
import { BoardCell } from './BoardCell';
import { CELL_SIZE } from './board-theme';
import { coordKey } from '../../hooks/useValidMoves';

interface BoardGridProps {
  board: Board;
  selected: Coord | null;
  validDestinations: Set<string>;
  onCellClick?: (coord: Coord) => void;
}

export function BoardGrid({ board, selected, validDestinations, onCellClick }: BoardGridProps) {
  const labels = Array.from({ length: board.size }, (_, i) => i);

  return (
    <div style={{ display: 'inline-block' }}>
      <div style={{ display: 'flex', marginLeft: 20 }}>
        {labels.map((col) => (
          <div key={col} style={{ width: CELL_SIZE, textAlign: 'center', fontSize: 12, color: '#777' }}>
            {col}
          </div>
        ))}
      </div>
      {labels.map((row) => (
        <div key={row} style={{ display: 'flex', alignItems: 'center' }}>
          <div style={{ width: 20, fontSize: 12, color: '#777' }}>{row}</div>
          {labels.map((col) => {
            const coord = { row, col };
            return (
              <BoardCell
                key={col}
                row={row}
                col={col}
                cell={getCell(board, row, col)}
                isSelected={selected !== null && coordsEqual(selected, coord)}
                isValid={validDestinations.has(coordKey(coord))}
                onClick={onCellClick ? () => onCellClick(coord) : undefined}
              />
            );
          })}
        </div>
      ))}
    </div>
  );
}
