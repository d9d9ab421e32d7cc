import type { ScoredHit } from "./types.js";

/** Array.sort semantics: <0 means a before b. */
export type Comparator<T> = (a: T, b: T) => number;

export interface TopKSelector<T> {
  /** Returns the best K items under `comparator`, sorted best first. */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Ranking order shared by both indexes: score descending, docId ascending. */
export const byScoreThenId: Comparator<Pick<ScoredHit, "docId" | "score">> = (a, b) =>
  b.score - a.score || compareIds(a.docId, b.docId);
