import { describe, it, expect } from 'vitest';
import { newGame } from '@engine/state';
import { resolveConfig, DEFAULT_GAME_CONFIG } from '@engine/config';
import { ConfigurationError } from '@engine/errors';
import { getStartingRegions, setupBoard } from '@engine/rules/setup';
import { getPlayerPieces, countPieces } from '@engine/board/board';
import { countPieceTypes } from '@engine/utils/piece-utils';

const SEEDS = [1, 7, 42, 2024];

describe('Configuration', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual({ boardSize: 6, piecesPerType: 4, turnDurationSeconds: 30 });
    expect(resolveConfig({ turnDurationSeconds: 15 }).turnDurationSeconds).toBe(15);
  });

  it.each([
    [{ boardSize: 1 }],
    [{ piecesPerType: 0 }],
    [{ turnDurationSeconds: 0 }],
    [{ boardSize: 4.5 }],
  ])('rejects %o', (overrides) => {
    expect(() => resolveConfig(overrides)).toThrow(ConfigurationError);
  });
});

describe('newGame', () => {
  it('creates a game waiting for setup', () => {
    const state = newGame(2, { seed: 42 });
    expect(state.phase).toBe('SETUP');
    expect(state.players.map((p) => p.name)).toEqual(['Player 1', 'Player 2']);
    expect(state.players.map((p) => p.id)).toEqual([1, 2]);
    expect(state.players[0].inventory).toHaveLength(12);
    expect(countPieces(state.board)).toBe(0);
    expect(state.turnNumber).toBe(0);
    expect(state.config).toEqual(DEFAULT_GAME_CONFIG);
    expect(state.prngState).toBe(42);
  });

  it('uses given names', () => {
    const state = newGame(3, { names: ['Ann', ' Ben ', ''], seed: 1 });
    expect(state.players.map((p) => p.name)).toEqual(['Ann', 'Ben', 'Player 3']);
  });

  it.each([1, 4, 0, 2.5])('rejects %d players', (n) => {
    expect(() => newGame(n)).toThrow(ConfigurationError);
  });

  it('rejects a name list of the wrong length', () => {
    expect(() => newGame(2, { names: ['Solo'] })).toThrow(ConfigurationError);
  });

  it('rejects more pieces than a region can hold', () => {
    expect(() => newGame(2, { config: { piecesPerType: 5 } })).toThrow(ConfigurationError);
  });

  it('rejects a board too small for disjoint regions', () => {
    expect(() => newGame(2, { config: { boardSize: 3, piecesPerType: 1 } })).toThrow(/overlap/);
  });
});

describe('Starting regions', () => {
  it('two players get the top and bottom two rows', () => {
    const [top, bottom] = getStartingRegions(6, 2);
    expect(top).toHaveLength(12);
    expect(bottom).toHaveLength(12);
    expect(top.every((c) => c.row <= 1)).toBe(true);
    expect(bottom.every((c) => c.row >= 4)).toBe(true);
  });

  it('three players get disjoint 12-cell bands covering the board', () => {
    const regions = getStartingRegions(6, 3);
    expect(regions.map((r) => r.length)).toEqual([12, 12, 12]);
    const keys = new Set(regions.flat().map((c) => `${c.row},${c.col}`));
    expect(keys.size).toBe(36);
    expect(regions[2].every((c) => c.col >= 4)).toBe(true);
  });
});

describe('setupBoard', () => {
  for (const numPlayers of [2, 3]) {
    it.each(SEEDS)(`deals every piece into its region (${numPlayers} players, seed %d)`, (seed) => {
      const state = setupBoard(newGame(numPlayers, { seed }));
      const regions = getStartingRegions(6, numPlayers);

      expect(state.phase).toBe('IN_PROGRESS');
      expect(countPieces(state.board)).toBe(12 * numPlayers);

      state.players.forEach((player, i) => {
        expect(player.inventory).toEqual([]);
        expect(countPieceTypes(state.board, player.id)).toEqual({ rock: 4, paper: 4, scissors: 4 });
        const region = new Set(regions[i].map((c) => `${c.row},${c.col}`));
        for (const { row, col } of getPlayerPieces(state.board, player.id)) {
          expect(region.has(`${row},${col}`)).toBe(true);
        }
      });
    });
  }

  it('starts the first turn', () => {
    const state = setupBoard(newGame(2, { seed: 42 }));
    expect(state.currentPlayerIndex).toBe(0);
    expect(state.turnNumber).toBe(1);
    expect(state.turnTimeRemaining).toBe(30);
    expect(state.prngState).toBe(43);
    expect(state.log).toEqual(['Board set up with 12 pieces per player.', "Player 1's turn"]);
  });

  it('is reproducible from the seed', () => {
    const a = setupBoard(newGame(3, { seed: 99 }));
    const b = setupBoard(newGame(3, { seed: 99 }));
    expect(a.board).toEqual(b.board);
  });

  it('does nothing outside the setup phase', () => {
    const state = setupBoard(newGame(2, { seed: 5 }));
    expect(setupBoard(state)).toBe(state);
  });
});
