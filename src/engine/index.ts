export { Game } from "./game";
export { Player } from "./player";
export { autoplay } from "./autoplay";
export type { AutoplayOptions, AutoplayResult } from "./autoplay";
export { Sentence } from "./sentence";
export { KnowledgeBase, dedupe } from "./knowledge";
export { InferenceEngine } from "./inference";
export type { InferenceOptions } from "./inference";
export { PosSet, posKey, formatPos, comparePos } from "./pos-set";
export {
  createEmptyGrid,
  placeMines,
  computeHints,
  neighbours,
  inBounds,
  renderGrid,
} from "./board";
export { createRng, shuffle, pick } from "./rng";
export {
  ConfigError,
  DEFAULT_GAME_CONFIG,
  DEFAULT_PLAYER_CONFIG,
  GameConfigSchema,
  PlayerConfigSchema,
  resolveGameConfig,
  resolvePlayerConfig,
} from "./config";
export type {
  GameConfig,
  PlayerConfig,
  Cell,
  Pos,
  Logger,
  InferenceResult,
} from "./types";
export { GameStatus } from "./types";
