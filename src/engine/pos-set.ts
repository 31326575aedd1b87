import type { Pos } from "./types";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

export function formatPos(pos: Pos): string {
  return `(${pos.row},${pos.col})`;
}

export function comparePos(a: Pos, b: Pos): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

// Set of cells with value semantics: items are deduplicated by posKey.
// Removal swaps the last item into the hole, so iteration order is only
// insertion order while nothing has been deleted.
export class PosSet implements Iterable<Pos> {
  private readonly items: Pos[] = [];
  private readonly indexByKey = new Map<string, number>();

  constructor(cells: Iterable<Pos> = []) {
    for (const p of cells) this.add(p);
  }

  get size(): number {
    return this.items.length;
  }

  has(pos: Pos): boolean {
    return this.indexByKey.has(posKey(pos));
  }

  hasKey(key: string): boolean {
    return this.indexByKey.has(key);
  }

  /** Returns true when the cell was not present before. */
  add(pos: Pos): boolean {
    const key = posKey(pos);
    if (this.indexByKey.has(key)) return false;
    this.indexByKey.set(key, this.items.length);
    this.items.push({ row: pos.row, col: pos.col });
    return true;
  }

  /** Returns true when the cell was present. */
  delete(pos: Pos): boolean {
    const key = posKey(pos);
    const idx = this.indexByKey.get(key);
    if (idx === undefined) return false;

    const lastIndex = this.items.length - 1;
    const last = this.items[lastIndex];
    this.items[idx] = last;
    this.indexByKey.set(posKey(last), idx);
    this.items.pop();
    this.indexByKey.delete(key);
    return true;
  }

  isSubsetOf(other: PosSet): boolean {
    if (this.size > other.size) return false;
    for (const key of this.indexByKey.keys()) {
      if (!other.hasKey(key)) return false;
    }
    return true;
  }

  difference(other: PosSet): PosSet {
    const out = new PosSet();
    for (const p of this.items) {
      if (!other.has(p)) out.add(p);
    }
    return out;
  }

  equals(other: PosSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  /** Snapshot copy, safe to iterate while the set changes. */
  toArray(): Pos[] {
    return this.items.map((p) => ({ row: p.row, col: p.col }));
  }

  sorted(): Pos[] {
    return this.toArray().sort(comparePos);
  }

  [Symbol.iterator](): Iterator<Pos> {
    return this.toArray()[Symbol.iterator]();
  }
}
