import { z } from "zod";
import type { GameConfig, Logger, PlayerConfig } from "./types";

export const DEFAULT_GAME_CONFIG: GameConfig = {
  rows: 8,
  cols: 8,
  minesTotal: 8,
  seed: Date.now(),
  safeFirstClick: false,
};

export const DEFAULT_PLAYER_CONFIG: PlayerConfig = {
  rows: 8,
  cols: 8,
  seed: Date.now(),
  debug: false,
};

const dimension = z.number().int().positive();
const seed = z.number().int();

export const GameConfigSchema = z
  .object({
    rows: dimension,
    cols: dimension,
    minesTotal: z.number().int().nonnegative(),
    seed,
    safeFirstClick: z.boolean(),
  })
  .refine((c) => c.minesTotal <= c.rows * c.cols, {
    message: "minesTotal cannot exceed the number of cells",
    path: ["minesTotal"],
  });

export const PlayerConfigSchema = z.object({
  rows: dimension,
  cols: dimension,
  seed,
  debug: z.boolean(),
});

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

export function resolveGameConfig(config: Partial<GameConfig> = {}): GameConfig {
  const merged = { ...DEFAULT_GAME_CONFIG, ...config };
  const parsed = GameConfigSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  return parsed.data;
}

// The logger is not data, so it bypasses the schema and is carried over as is.
export function resolvePlayerConfig(config: Partial<PlayerConfig> = {}): PlayerConfig & { logger: Logger } {
  const merged = { ...DEFAULT_PLAYER_CONFIG, ...config };
  const parsed = PlayerConfigSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  return { ...parsed.data, logger: config.logger ?? console };
}
