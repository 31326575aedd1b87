import { GameStatus } from "./types";
import type { Cell, GameConfig, Pos } from "./types";
import {
  createEmptyGrid,
  placeMines,
  computeHints,
  inBounds,
  neighbours,
  renderGrid,
} from "./board";
import { resolveGameConfig } from "./config";

export class Game {
  readonly config: GameConfig;
  readonly rows: number;
  readonly cols: number;
  grid: Cell[][];
  status: GameStatus = GameStatus.Playing;
  explodedPos: Pos | null = null;
  private firstClick = true;
  private safeCellCount = 0;
  private openedCount = 0;
  private placedMines = 0;

  constructor(config: Partial<GameConfig> = {}) {
    this.config = resolveGameConfig(config);
    this.rows = this.config.rows;
    this.cols = this.config.cols;
    this.grid = createEmptyGrid(this.rows, this.cols);

    if (!this.config.safeFirstClick) {
      this.initBoard([]);
    }
  }

  // Lazily called on first click when safeFirstClick is on
  private initBoard(excludePositions: Pos[]): void {
    this.grid = createEmptyGrid(this.rows, this.cols);
    this.placedMines = placeMines(
      this.grid,
      this.config.minesTotal,
      this.config.seed,
      excludePositions,
    ).length;
    computeHints(this.grid, this.rows, this.cols);

    this.safeCellCount = 0;
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        if (!this.grid[r][c].mine) this.safeCellCount++;
      }
    }
  }

  cell(row: number, col: number): Cell {
    return this.grid[row][col];
  }

  isMine(row: number, col: number): boolean {
    return inBounds(row, col, this.rows, this.cols) && this.grid[row][col].mine;
  }

  /** Number of mines within one row and column of the cell, not counting the cell. */
  nearbyMines(row: number, col: number): number {
    if (!inBounds(row, col, this.rows, this.cols)) return 0;
    return this.grid[row][col].hint;
  }

  get mines(): Pos[] {
    const out: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        if (this.grid[r][c].mine) out.push({ row: r, col: c });
      }
    }
    return out;
  }

  get flaggedCount(): number {
    let flags = 0;
    for (const row of this.grid) {
      for (const cell of row) if (cell.flagged) flags++;
    }
    return flags;
  }

  get remainingMines(): number {
    return this.config.minesTotal - this.flaggedCount;
  }

  open(row: number, col: number): Pos[] {
    if (this.status !== GameStatus.Playing) return [];
    if (!inBounds(row, col, this.rows, this.cols)) return [];

    if (this.firstClick && this.config.safeFirstClick) {
      const exclude = [
        { row, col },
        ...neighbours(row, col, this.rows, this.cols),
      ];
      this.initBoard(exclude);
    }
    this.firstClick = false;

    const cell = this.grid[row][col];
    if (cell.opened || cell.flagged) return [];

    cell.opened = true;
    this.openedCount++;
    const opened: Pos[] = [{ row, col }];

    if (cell.mine) {
      this.status = GameStatus.Lost;
      this.explodedPos = { row, col };
      return opened;
    }

    if (cell.hint === 0) {
      const queue: Pos[] = neighbours(row, col, this.rows, this.cols);
      let p = queue.pop();
      while (p !== undefined) {
        const nc = this.grid[p.row][p.col];
        if (!nc.opened && !nc.flagged && !nc.mine) {
          nc.opened = true;
          this.openedCount++;
          opened.push(p);
          if (nc.hint === 0) {
            queue.push(...neighbours(p.row, p.col, this.rows, this.cols));
          }
        }
        p = queue.pop();
      }
    }

    this.checkWin();
    return opened;
  }

  toggleFlag(row: number, col: number): void {
    if (this.status !== GameStatus.Playing) return;
    if (!inBounds(row, col, this.rows, this.cols)) return;
    const cell = this.grid[row][col];
    if (cell.opened) return;
    cell.flagged = !cell.flagged;
    this.checkWin();
  }

  /** True once every safe cell is open, or the flags sit exactly on the mines. */
  won(): boolean {
    if (this.status === GameStatus.Lost) return false;
    if (this.firstClick && this.config.safeFirstClick) return false;
    if (this.openedCount === this.safeCellCount) return true;

    let flaggedMines = 0;
    for (const row of this.grid) {
      for (const cell of row) {
        if (cell.flagged && !cell.mine) return false;
        if (cell.flagged) flaggedMines++;
      }
    }
    return flaggedMines === this.placedMines;
  }

  private checkWin(): void {
    if (this.won()) {
      this.status = GameStatus.Won;
    }
  }

  render(): string {
    return renderGrid(this.grid);
  }
}
