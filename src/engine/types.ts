export interface Pos {
  row: number;
  col: number;
}

export interface Logger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export interface GameConfig {
  rows: number;
  cols: number;
  minesTotal: number;
  seed: number;
  // keep the first opened cell and its neighbours clear of mines
  safeFirstClick: boolean;
}

export interface PlayerConfig {
  rows: number;
  cols: number;
  seed: number;
  debug: boolean;
  logger?: Logger;
}

export interface Cell {
  mine: boolean;
  opened: boolean;
  flagged: boolean;
  hint: number;        // number of mines among the neighbours
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

export interface InferenceResult {
  newSafes: Pos[];
  newMines: Pos[];
  sentencesAdded: number;
  contradiction: boolean;
  reason?: string;
}
