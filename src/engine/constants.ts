import type { PieceType, PlayerId } from './types';

// ─── Players ─────────────────────────────────────────

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 3;

export const PLAYER_COLORS: Record<PlayerId, string> = {
  1: '#dc143c', // crimson
  2: '#1e90ff', // dodger blue
  3: '#32cd32', // lime green
};

// ─── Pieces ──────────────────────────────────────────

export const PIECE_LABELS: Record<PieceType, string> = {
  rock: 'Rock',
  paper: 'Paper',
  scissors: 'Scissors',
};

export const PIECE_ICONS: Record<PieceType, string> = {
  rock: '\u{1FAA8}',
  paper: '\u{1F4C4}',
  scissors: '\u{2702}️',
};
