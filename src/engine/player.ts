import type { InferenceResult, Logger, PlayerConfig, Pos } from "./types";
import { KnowledgeBase } from "./knowledge";
import { InferenceEngine } from "./inference";
import { resolvePlayerConfig } from "./config";
import { createRng, pick } from "./rng";

/**
 * One game session's player: owns its knowledge base and inference engine,
 * and picks the next cell to open from what they know.
 */
export class Player {
  readonly config: PlayerConfig;
  readonly rows: number;
  readonly cols: number;
  readonly knowledge = new KnowledgeBase();
  private readonly engine: InferenceEngine;
  private readonly rng: () => number;
  private readonly logger: Logger;

  constructor(config: Partial<PlayerConfig> = {}) {
    const { logger, ...resolved } = resolvePlayerConfig(config);
    this.config = resolved;
    this.rows = resolved.rows;
    this.cols = resolved.cols;
    this.logger = logger;
    this.rng = createRng(resolved.seed);
    this.engine = new InferenceEngine(this.knowledge, {
      rows: this.rows,
      cols: this.cols,
      debug: resolved.debug,
      logger,
    });
  }

  /** Feed in the neighbour count the board reported for an opened cell. */
  observe(cell: Pos, count: number): InferenceResult {
    return this.engine.observe(cell, count);
  }

  confirmedSafe(): Pos[] {
    return this.knowledge.confirmedSafe();
  }

  confirmedMines(): Pos[] {
    return this.knowledge.confirmedMines();
  }

  hasMadeMove(cell: Pos): boolean {
    return this.knowledge.hasMadeMove(cell);
  }

  /** A known-safe cell not played yet, or null when none is known. */
  makeSafeMove(): Pos | null {
    return pick(this.knowledge.confirmedSafe(), this.rng);
  }

  /** Any cell that is neither played nor a known mine, or null when none is left. */
  makeRandomMove(): Pos | null {
    const kb = this.knowledge;
    const available: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        const p = { row: r, col: c };
        if (!kb.hasMadeMove(p) && !kb.isMine(p)) available.push(p);
      }
    }
    return pick(available, this.rng);
  }

  nextMove(): { cell: Pos; safe: boolean } | null {
    const safe = this.makeSafeMove();
    if (safe) return { cell: safe, safe: true };
    const random = this.makeRandomMove();
    if (random) {
      if (this.config.debug) {
        this.logger.debug(`No known safe move, guessing (${random.row},${random.col})`);
      }
      return { cell: random, safe: false };
    }
    return null;
  }
}
