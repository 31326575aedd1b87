import { GameStatus } from "./types";
import type { Game } from "./game";
import type { Player } from "./player";

export interface AutoplayOptions {
  maxMoves?: number;
  // flag every confirmed mine on the board as it is found
  flagMines?: boolean;
}

export interface AutoplayResult {
  status: GameStatus;
  moves: number;
  randomMoves: number;
  contradiction: boolean;
  reason?: string;
}

/**
 * Plays `game` with `player` until the game ends, the player runs out of
 * moves or the knowledge turns out inconsistent. Every cell the board opens
 * (flood fill included) is fed back to the player as an observation.
 */
export function autoplay(game: Game, player: Player, options: AutoplayOptions = {}): AutoplayResult {
  const maxMoves = options.maxMoves ?? game.rows * game.cols;
  const flagMines = options.flagMines ?? false;
  let moves = 0;
  let randomMoves = 0;

  while (moves < maxMoves && game.status === GameStatus.Playing) {
    const move = player.nextMove();
    if (!move) break;
    moves++;
    if (!move.safe) randomMoves++;

    for (const p of game.open(move.cell.row, move.cell.col)) {
      if (game.status === GameStatus.Lost) break;
      const result = player.observe(p, game.nearbyMines(p.row, p.col));
      if (result.contradiction) {
        return { status: game.status, moves, randomMoves, contradiction: true, reason: result.reason };
      }
    }

    if (flagMines) {
      for (const m of player.confirmedMines()) {
        if (!game.cell(m.row, m.col).flagged) game.toggleFlag(m.row, m.col);
      }
    }
  }

  return { status: game.status, moves, randomMoves, contradiction: false };
}
