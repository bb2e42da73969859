import type { GameConfig } from './config';

export type { GameConfig } from './config';

// ─── Pieces ───────────────────────────────────────────

export type PieceType = 'rock' | 'paper' | 'scissors';

export const ALL_PIECE_TYPES: readonly PieceType[] = ['rock', 'paper', 'scissors'];

export type PieceCount = Record<PieceType, number>;

export type PlayerId = 1 | 2 | 3;

export interface Piece {
  type: PieceType;
  owner: PlayerId;
}

// ─── Board ────────────────────────────────────────────

export interface Coord {
  row: number;
  col: number;
}

export type Cell = Piece | null;

export interface Board {
  size: number;
  cells: Cell[]; // row-major, length size * size
}

export interface PlacedPiece {
  row: number;
  col: number;
  piece: Piece;
}

// ─── Combat ───────────────────────────────────────────

export type CombatOutcome = 'attacker_wins' | 'defender_wins' | 'draw';

/** Presentation tag for a move: the prevailing piece type, or 'none' for a plain step. */
export type CombatCategory = PieceType | 'none';

export interface MoveResult {
  success: boolean;
  board: Board;
  outcome: CombatOutcome | null;
  captured: Piece | null;
  removed: Piece[];
  category: CombatCategory;
}

// ─── Player ───────────────────────────────────────────

export interface PlayerState {
  id: PlayerId;
  name: string;
  inventory: Piece[]; // unplaced pieces, empty once the board is set up
}

// ─── Game Phase ───────────────────────────────────────

export type GamePhase = 'SETUP' | 'IN_PROGRESS' | 'GAME_OVER';

// ─── Game State ───────────────────────────────────────

export interface GameState {
  config: GameConfig;
  phase: GamePhase;
  board: Board;
  players: PlayerState[];
  currentPlayerIndex: number;
  winner: PlayerId | null; // null while playing, or when nobody survives

  // Turn state
  turnNumber: number;
  turnTimeRemaining: number; // seconds

  // Game log
  log: string[];

  // PRNG seed for reproducibility
  seed: number;
  prngState: number;
}
