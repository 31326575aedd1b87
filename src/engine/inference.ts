import type { InferenceResult, Logger, Pos } from "./types";
import { neighbours } from "./board";
import { formatPos } from "./pos-set";
import { KnowledgeBase, dedupe } from "./knowledge";
import { Sentence } from "./sentence";

export interface InferenceOptions {
  rows: number;
  cols: number;
  debug?: boolean;
  logger?: Logger;
}

/**
 * Turns board observations into knowledge. Each call to {@link observe} runs
 * to a fixpoint: when it returns, every mine, safe cell and sentence that the
 * subset rule and direct counting can reach is in the knowledge base.
 */
export class InferenceEngine {
  readonly knowledge: KnowledgeBase;
  private readonly rows: number;
  private readonly cols: number;
  private readonly debug: boolean;
  private readonly logger: Logger;

  constructor(knowledge: KnowledgeBase, options: InferenceOptions) {
    this.knowledge = knowledge;
    this.rows = options.rows;
    this.cols = options.cols;
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? console;
  }

  observe(cell: Pos, count: number): InferenceResult {
    const kb = this.knowledge;
    if (kb.contradiction !== null) return this.fail();

    const previous = kb.recordMove(cell, count);
    if (previous !== undefined) {
      if (previous !== count) {
        kb.reportContradiction(
          `Cell ${formatPos(cell)} reported ${count} neighbouring mines, previously ${previous}.`,
        );
        return this.fail();
      }
      return emptyResult();
    }

    const minesBefore = kb.mineCount;
    const safesBefore = kb.safeCount;
    kb.markSafe(cell);

    let adjusted = count;
    const unknown: Pos[] = [];
    for (const n of neighbours(cell.row, cell.col, this.rows, this.cols)) {
      if (kb.isMine(n)) adjusted--;
      else if (!kb.isSafe(n)) unknown.push(n);
    }

    const result = this.propagate(new Sentence(unknown, adjusted), minesBefore, safesBefore);
    if (this.debug && !result.contradiction) {
      this.logger.debug(`observed ${formatPos(cell)} = ${count}:\n${kb.describe()}`);
    }
    return result;
  }

  /** Adds a sentence known to be true and propagates it to a fixpoint. */
  learn(sentence: Sentence): InferenceResult {
    return this.propagate(sentence, this.knowledge.mineCount, this.knowledge.safeCount);
  }

  // mines and safes only ever grow, so everything past the two marks is new
  private propagate(sentence: Sentence, minesBefore: number, safesBefore: number): InferenceResult {
    const kb = this.knowledge;
    if (kb.contradiction !== null) return this.fail();
    let sentencesAdded = 0;

    const pending: Sentence[] = [sentence];
    // settle whatever marking the observed cell changed in the live sentences
    this.deriveSubsets(pending);
    this.saturate(pending);

    while (pending.length > 0 && kb.contradiction === null) {
      const next = pending.pop();
      if (next === undefined) break;

      kb.resolve(next);
      if (!next.isConsistent()) {
        kb.reportContradiction(`Inconsistent sentence ${next.toString()}.`);
        break;
      }
      if (next.isEmpty() || kb.has(next)) continue;

      const label = next.toString();
      kb.addSentence(next);
      sentencesAdded++;
      this.deriveSubsets(pending);
      this.saturate(pending);

      if (this.debug) {
        this.logger.debug(`after ${label}:\n${kb.describe()}`);
      }
    }

    if (kb.contradiction !== null) return this.fail();

    return {
      newSafes: kb.safeCells().slice(safesBefore),
      newMines: kb.confirmedMines().slice(minesBefore),
      sentencesAdded,
      contradiction: false,
    };
  }

  // Subset rule: B ⊆ A gives (A \ B) = A.count - B.count.
  private deriveSubsets(pending: Sentence[]): void {
    const kb = this.knowledge;
    const snapshot = kb.sentences;
    for (const a of snapshot) {
      for (const b of snapshot) {
        if (a === b || a.count === 0 || b.count === 0) continue;
        if (!b.isSubsetOf(a)) continue;

        const candidate = a.difference(b);
        if (!candidate.isConsistent()) {
          kb.reportContradiction(
            `${a.toString()} and ${b.toString()} imply ${candidate.toString()}.`,
          );
          return;
        }
        if (candidate.isEmpty()) continue;
        if (pending.some((p) => p.equals(candidate)) || kb.has(candidate)) continue;
        pending.push(candidate);
      }
    }
  }

  // Marks whatever the live sentences settle, until a pass confirms nothing new.
  private saturate(pending: Sentence[]): void {
    const kb = this.knowledge;
    while (kb.contradiction === null) {
      const minesBefore = kb.mineCount;
      const safesBefore = kb.safeCount;

      for (const s of kb.sentences) {
        const mines = s.knownMines();
        if (mines) for (const c of mines) kb.markMine(c);
        const safes = s.knownSafes();
        if (safes) for (const c of safes) kb.markSafe(c);
      }

      kb.prune();
      for (const p of pending) {
        kb.resolve(p);
        if (!p.isConsistent()) kb.reportContradiction(`Inconsistent sentence ${p.toString()}.`);
      }
      const stillPending = dedupe(pending);
      pending.length = 0;
      pending.push(...stillPending);

      if (kb.contradiction !== null) return;
      if (kb.mineCount === minesBefore && kb.safeCount === safesBefore) return;
      this.deriveSubsets(pending);
    }
  }

  private fail(): InferenceResult {
    const reason = this.knowledge.contradiction ?? "Knowledge base is inconsistent.";
    this.logger.warn(`Contradiction: ${reason}`);
    return { ...emptyResult(), contradiction: true, reason };
  }
}

function emptyResult(): InferenceResult {
  return { newSafes: [], newMines: [], sentencesAdded: 0, contradiction: false };
}
