import type { Cell, Pos } from "./types";
import { createRng, shuffle } from "./rng";
import { posKey } from "./pos-set";

export function inBounds(row: number, col: number, rows: number, cols: number): boolean {
  return row >= 0 && row < rows && col >= 0 && col < cols;
}

// In-bounds cells within one row and one column, not including the cell itself.
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (inBounds(r, c, rows, cols)) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ mine: false, opened: false, flagged: false, hint: 0 });
    }
    grid.push(row);
  }
  return grid;
}

// Scatter `minesTotal` mines uniformly over the cells not excluded.
// If the exclusion leaves too few cells, every eligible cell gets a mine.
export function placeMines(
  grid: Cell[][],
  minesTotal: number,
  seed: number,
  excludePositions: Pos[] = [],
): Pos[] {
  const rows = grid.length;
  const cols = rows > 0 ? grid[0].length : 0;
  const rng = createRng(seed);
  const excludeSet = new Set(excludePositions.map((p) => posKey(p)));

  const eligible: Pos[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const p = { row: r, col: c };
      if (!excludeSet.has(posKey(p))) eligible.push(p);
    }
  }

  const placed = shuffle(eligible, rng).slice(0, Math.min(minesTotal, eligible.length));
  for (const p of placed) grid[p.row][p.col].mine = true;
  return placed;
}

// hint = number of neighbouring mines
export function computeHints(grid: Cell[][], rows: number, cols: number): void {
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      let sum = 0;
      for (const n of neighbours(r, c, rows, cols)) {
        if (grid[n.row][n.col].mine) sum++;
      }
      grid[r][c].hint = sum;
    }
  }
}

/**
 * Text picture of where the mines are, one `|X` / `| ` per cell, with
 * `--` rules between rows.
 */
export function renderGrid(grid: Cell[][]): string {
  const cols = grid.length > 0 ? grid[0].length : 0;
  const rule = "--".repeat(cols) + "-";
  const lines: string[] = [];
  for (const row of grid) {
    lines.push(rule);
    lines.push(row.map((cell) => (cell.mine ? "|X" : "| ")).join("") + "|");
  }
  lines.push(rule);
  return lines.join("\n");
}
