import type { GameState, PieceType, PlayerId } from '@engine/types';
import type { GameConfig } from '@engine/config';
import { newGame } from '@engine/state';
import { createBoard, placePiece } from '@engine/board/board';

export type PieceSpec = [row: number, col: number, type: PieceType, owner: PlayerId];

interface CustomGameOptions {
  numPlayers?: number;
  current?: number;
  config?: Partial<GameConfig>;
}

/** An IN_PROGRESS game whose board holds exactly the given pieces. */
export function customGame(pieces: PieceSpec[], options: CustomGameOptions = {}): GameState {
  const base = newGame(options.numPlayers ?? 2, { seed: 1, config: options.config });
  let board = createBoard(base.config.boardSize);
  for (const [row, col, type, owner] of pieces) {
    board = placePiece(board, row, col, { type, owner }).board;
  }
  return {
    ...base,
    phase: 'IN_PROGRESS',
    board,
    players: base.players.map((p) => ({ ...p, inventory: [] })),
    currentPlayerIndex: options.current ?? 0,
    turnNumber: 1,
  };
}
