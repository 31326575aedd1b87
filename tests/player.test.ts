// ─── Player & autoplay tests ────────────────────────────────────────────────

import { describe, it, expect, vi } from "vitest";
import { Game, GameStatus, Player, autoplay } from "../src/engine/index";
import type { Logger } from "../src/engine/index";

function quietLogger(): Logger {
  return { debug: vi.fn(), warn: vi.fn() };
}

// ─── Move selection ────────────────────────────────────────────────────────

describe("Player - move selection", () => {
  it("has no safe move before any observation", () => {
    const player = new Player({ rows: 3, cols: 3, seed: 1 });
    expect(player.makeSafeMove()).toBeNull();
    expect(player.confirmedSafe()).toEqual([]);
  });

  it("picks a confirmed safe cell that has not been played", () => {
    const player = new Player({ rows: 3, cols: 3, seed: 1 });
    player.observe({ row: 0, col: 0 }, 0);
    const move = player.makeSafeMove();
    expect([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
    ]).toContainEqual(move);
    expect(player.nextMove()).toEqual({ cell: expect.any(Object), safe: true });
  });

  it("random moves skip played cells and known mines", () => {
    const player = new Player({ rows: 1, cols: 3, seed: 4 });
    player.observe({ row: 0, col: 0 }, 1);
    expect(player.confirmedMines()).toEqual([{ row: 0, col: 1 }]);
    expect(player.makeSafeMove()).toBeNull();
    expect(player.makeRandomMove()).toEqual({ row: 0, col: 2 });
    expect(player.nextMove()).toEqual({ cell: { row: 0, col: 2 }, safe: false });
  });

  it("never guesses a cell the last observation proved to be a mine", () => {
    const player = new Player({ rows: 2, cols: 2, seed: 4 });
    player.observe({ row: 0, col: 0 }, 1);
    player.observe({ row: 0, col: 1 }, 1);
    player.observe({ row: 1, col: 0 }, 1);
    expect(player.confirmedMines()).toEqual([{ row: 1, col: 1 }]);
    expect(player.makeRandomMove()).toBeNull();
  });

  it("returns null when nothing is left to play", () => {
    const player = new Player({ rows: 1, cols: 2, seed: 4 });
    player.observe({ row: 0, col: 0 }, 1);
    expect(player.makeRandomMove()).toBeNull();
    expect(player.nextMove()).toBeNull();
  });

  it("hasMadeMove tracks observed cells", () => {
    const player = new Player({ rows: 2, cols: 2, seed: 4 });
    player.observe({ row: 1, col: 1 }, 0);
    expect(player.hasMadeMove({ row: 1, col: 1 })).toBe(true);
    expect(player.hasMadeMove({ row: 0, col: 0 })).toBe(false);
  });

  it("sessions do not share knowledge", () => {
    const first = new Player({ rows: 3, cols: 3, seed: 1 });
    const second = new Player({ rows: 3, cols: 3, seed: 1 });
    first.observe({ row: 0, col: 0 }, 0);
    expect(first.confirmedSafe()).toHaveLength(3);
    expect(second.confirmedSafe()).toEqual([]);
  });

  it("logs guesses only in debug mode", () => {
    const logger = quietLogger();
    const player = new Player({ rows: 2, cols: 2, seed: 9, debug: true, logger });
    player.nextMove();
    expect(logger.debug).toHaveBeenCalledTimes(1);

    const quiet = quietLogger();
    new Player({ rows: 2, cols: 2, seed: 9, logger: quiet }).nextMove();
    expect(quiet.debug).not.toHaveBeenCalled();
  });
});

// ─── Autoplay ──────────────────────────────────────────────────────────────

describe("autoplay", () => {
  const boards = [
    { rows: 8, cols: 8, minesTotal: 8, seed: 21 },
    { rows: 9, cols: 9, minesTotal: 10, seed: 77 },
    { rows: 16, cols: 16, minesTotal: 40, seed: 123 },
  ];

  for (const board of boards) {
    it(`plays a ${board.rows}×${board.cols} board to the end without false deductions`, () => {
      const game = new Game({ ...board, safeFirstClick: true });
      const player = new Player({ rows: board.rows, cols: board.cols, seed: board.seed, logger: quietLogger() });

      const result = autoplay(game, player);

      expect(result.contradiction).toBe(false);
      expect([GameStatus.Won, GameStatus.Lost]).toContain(result.status);
      for (const m of player.confirmedMines()) {
        expect(game.isMine(m.row, m.col)).toBe(true);
      }
      for (const s of player.knowledge.safeCells()) {
        expect(game.isMine(s.row, s.col)).toBe(false);
      }
      if (result.status === GameStatus.Lost) {
        expect(result.randomMoves).toBeGreaterThan(0);
      }
      for (const sentence of player.knowledge.sentences) {
        for (const cell of sentence.cells) {
          expect(player.knowledge.isMine(cell) || player.knowledge.isSafe(cell)).toBe(false);
        }
      }
    });
  }

  it("the first move on a fresh board is a guess", () => {
    const game = new Game({ rows: 5, cols: 5, minesTotal: 3, seed: 2, safeFirstClick: true });
    const player = new Player({ rows: 5, cols: 5, seed: 2 });
    const result = autoplay(game, player, { maxMoves: 1 });
    expect(result.moves).toBe(1);
    expect(result.randomMoves).toBe(1);
    expect(game.status).not.toBe(GameStatus.Lost);
  });

  it("flags only real mines when asked to", () => {
    const game = new Game({ rows: 9, cols: 9, minesTotal: 10, seed: 5, safeFirstClick: true });
    const player = new Player({ rows: 9, cols: 9, seed: 5 });
    autoplay(game, player, { flagMines: true });
    for (const row of game.grid) {
      for (const cell of row) {
        if (cell.flagged) expect(cell.mine).toBe(true);
      }
    }
  });

  it("stops on an inconsistent board", () => {
    const game = new Game({ rows: 3, cols: 3, minesTotal: 0, seed: 1 });
    const player = new Player({ rows: 3, cols: 3, seed: 1, logger: quietLogger() });
    player.observe({ row: 1, col: 1 }, 1);
    const result = autoplay(game, player);
    expect(result.contradiction).toBe(true);
    expect(result.moves).toBe(1);
    expect(result.reason).toBe(player.knowledge.contradiction);
    expect(result.reason).toBeDefined();
  });
});
