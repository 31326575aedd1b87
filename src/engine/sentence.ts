import type { Pos } from "./types";
import { PosSet, formatPos, posKey } from "./pos-set";

/**
 * A logical statement about the board: exactly `count` of `cells` are mines.
 *
 * Sentences compare by value (same cells, same count). Use {@link equals} or
 * {@link key}, never `===`, when deduplicating.
 */
export class Sentence {
  private readonly members: PosSet;
  private mineCount: number;

  constructor(cells: Iterable<Pos>, count: number) {
    this.members = new PosSet(cells);
    this.mineCount = count;
  }

  /** Mines among {@link cells}. Only {@link markMine} lowers it. */
  get count(): number {
    return this.mineCount;
  }

  get cells(): Pos[] {
    return this.members.toArray();
  }

  get size(): number {
    return this.members.size;
  }

  has(pos: Pos): boolean {
    return this.members.has(pos);
  }

  isEmpty(): boolean {
    return this.members.size === 0;
  }

  /** Every cell is a mine when the count covers the whole set, otherwise null. */
  knownMines(): Pos[] | null {
    if (this.count === this.members.size) return this.members.toArray();
    return null;
  }

  /** Every cell is safe when the count is zero, otherwise null. */
  knownSafes(): Pos[] | null {
    if (this.count === 0) return this.members.toArray();
    return null;
  }

  markMine(pos: Pos): void {
    if (this.members.delete(pos)) this.mineCount--;
  }

  markSafe(pos: Pos): void {
    this.members.delete(pos);
  }

  clone(): Sentence {
    return new Sentence(this.members, this.mineCount);
  }

  isSubsetOf(other: Sentence): boolean {
    return this.members.isSubsetOf(other.members);
  }

  /** The sentence left over once `other`'s cells and mines are taken out of this one. */
  difference(other: Sentence): Sentence {
    return new Sentence(this.members.difference(other.members), this.count - other.count);
  }

  isConsistent(): boolean {
    return this.count >= 0 && this.count <= this.members.size;
  }

  equals(other: Sentence): boolean {
    return this.count === other.count && this.members.equals(other.members);
  }

  key(): string {
    return `${this.members.sorted().map(posKey).join(";")}=${this.count}`;
  }

  toString(): string {
    return `{${this.members.sorted().map(formatPos).join(", ")}} = ${this.count}`;
  }
}
