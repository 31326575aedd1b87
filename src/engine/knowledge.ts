import type { Pos } from "./types";
import { PosSet, formatPos, posKey } from "./pos-set";
import { Sentence } from "./sentence";

/**
 * Everything one game session knows: the cells played, the cells proven safe
 * or mined, and the live sentences about the remaining cells.
 *
 * No live sentence mentions a resolved cell: marking a cell a mine or safe
 * rewrites every sentence that contains it. Sentences go in and come out as
 * copies, so the live ones only change through {@link markMine} and
 * {@link markSafe}.
 */
export class KnowledgeBase {
  private readonly movesMade = new PosSet();
  private readonly safes = new PosSet();
  private readonly mines = new PosSet();
  private readonly observations = new Map<string, number>();
  private live: Sentence[] = [];
  private contradictionReason: string | null = null;

  get sentences(): readonly Sentence[] {
    return this.live.map((s) => s.clone());
  }

  get moveCount(): number {
    return this.movesMade.size;
  }

  get safeCount(): number {
    return this.safes.size;
  }

  get mineCount(): number {
    return this.mines.size;
  }

  /** Reason the knowledge became inconsistent, or null while it is sound. */
  get contradiction(): string | null {
    return this.contradictionReason;
  }

  // Only the first reason is kept; later ones are consequences of it.
  reportContradiction(reason: string): void {
    if (this.contradictionReason === null) this.contradictionReason = reason;
  }

  /** Returns the count recorded when this cell was first observed, if any. */
  recordMove(pos: Pos, count: number): number | undefined {
    const previous = this.observations.get(posKey(pos));
    this.movesMade.add(pos);
    if (previous === undefined) this.observations.set(posKey(pos), count);
    return previous;
  }

  hasMadeMove(pos: Pos): boolean {
    return this.movesMade.has(pos);
  }

  isSafe(pos: Pos): boolean {
    return this.safes.has(pos);
  }

  isMine(pos: Pos): boolean {
    return this.mines.has(pos);
  }

  /** Returns true when the cell was not known to be a mine before. */
  markMine(pos: Pos): boolean {
    if (this.safes.has(pos)) {
      this.reportContradiction(`Cell ${formatPos(pos)} is both safe and a mine.`);
      return false;
    }
    const added = this.mines.add(pos);
    for (const s of [...this.live]) s.markMine(pos);
    return added;
  }

  /** Returns true when the cell was not known to be safe before. */
  markSafe(pos: Pos): boolean {
    if (this.mines.has(pos)) {
      this.reportContradiction(`Cell ${formatPos(pos)} is both a mine and safe.`);
      return false;
    }
    const added = this.safes.add(pos);
    for (const s of [...this.live]) s.markSafe(pos);
    return added;
  }

  has(sentence: Sentence): boolean {
    return this.live.some((s) => s.equals(sentence));
  }

  addSentence(sentence: Sentence): boolean {
    if (sentence.isEmpty() || this.has(sentence)) return false;
    this.live.push(sentence.clone());
    return true;
  }

  // Brings a sentence that is not live yet up to date with resolved cells.
  resolve(sentence: Sentence): void {
    for (const cell of sentence.cells) {
      if (this.mines.has(cell)) sentence.markMine(cell);
      else if (this.safes.has(cell)) sentence.markSafe(cell);
    }
  }

  // Verify first: an empty sentence with a non-zero count is a contradiction.
  prune(): void {
    this.verify();
    this.live = dedupe(this.live);
  }

  /** Records the first sentence whose count no longer fits its cells. */
  verify(): boolean {
    const bad = this.live.find((s) => !s.isConsistent());
    if (bad) this.reportContradiction(`Inconsistent sentence ${bad.toString()}.`);
    return this.contradictionReason === null;
  }

  /** Cells proven safe that have not been played yet. */
  confirmedSafe(): Pos[] {
    return this.safes.toArray().filter((p) => !this.movesMade.has(p));
  }

  /** Every cell proven safe, played or not, in the order it was proven. */
  safeCells(): Pos[] {
    return this.safes.toArray();
  }

  confirmedMines(): Pos[] {
    return this.mines.toArray();
  }

  describe(): string {
    const lines = this.live.map((s) => `  ${s.toString()}`);
    lines.push(`  safes: ${this.confirmedSafe().map(formatPos).join(" ") || "-"}`);
    lines.push(`  mines: ${this.mines.sorted().map(formatPos).join(" ") || "-"}`);
    return lines.join("\n");
  }
}

// Drops empty sentences and keeps the first copy of each distinct value.
export function dedupe(sentences: readonly Sentence[]): Sentence[] {
  const seen = new Set<string>();
  const out: Sentence[] = [];
  for (const s of sentences) {
    if (s.isEmpty()) continue;
    const key = s.key();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(s);
  }
  return out;
}
