import type { ScoredHit } from "../types.js";
import type { NormalizedHit, ScoreNormalizer } from "../fusion.js";

/**
 * Min-max scaling onto [0,1] over exactly the values given.
 *
 * A single value, or values that are all equal, map to 1.0: every candidate
 * of such a list is as good as the best one.
 */
export class MinMaxNormalizer implements ScoreNormalizer {
  normalizeValues(values: readonly number[]): number[] {
    if (values.length === 0) return [];

    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
      if (v < min) min = v;
      if (v > max) max = v;
    }

    const range = max - min;
    if (values.length === 1 || range === 0) return values.map(() => 1);
    return values.map((v) => (v - min) / range);
  }

  normalize(hits: readonly ScoredHit[]): NormalizedHit[] {
    const normalized = this.normalizeValues(hits.map((h) => h.score));
    return hits.map((h, i) => ({ ...h, normalized: normalized[i] ?? 0 }));
  }
}
