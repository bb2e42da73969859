import { useMemo } from 'react';
import type { GameState, Coord } from '@engine/types';
import { getCell } from '@engine/board/board';
import { getValidMoves, hasAnyValidMove } from '@engine/rules/movement';

export interface ValidMoves {
  /** Keys "row,col" of cells the selected piece may move to. */
  destinations: Set<string>;
  canPass: boolean;
}

export function coordKey(coord: Coord): string {
  return `${coord.row},${coord.col}`;
}

export function useValidMoves(state: GameState, selected: Coord | null): ValidMoves {
  return useMemo(() => {
    const current = state.players[state.currentPlayerIndex];
    let destinations = new Set<string>();

    if (selected && state.phase === 'IN_PROGRESS') {
      const piece = getCell(state.board, selected.row, selected.col);
      if (piece?.owner === current.id) {
        destinations = new Set(getValidMoves(state, selected.row, selected.col).map(coordKey));
      }
    }

    return {
      destinations,
      canPass: state.phase === 'IN_PROGRESS' && !hasAnyValidMove(state, current.id),
    };
  }, [state, selected]);
}
