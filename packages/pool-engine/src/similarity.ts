// src/similarity.ts
import Fuse, { type IFuseOptions } from "fuse.js";

/**
 * Scores one probe against a list of candidates. Both sides arrive already
 * normalized; the result is aligned with `candidates`, each value in 0..100.
 */
export interface SimilarityScorer {
  readonly name: MatchStrategy;
  score(probe: string, candidates: readonly string[]): number[];
}

export type MatchStrategy = "fuzzy" | "substring";

export const MATCH_STRATEGIES: readonly MatchStrategy[] = ["fuzzy", "substring"];

// Fuse scores run from 0 (perfect) to 1 (no match). Threshold 1 keeps every
// candidate in the result set; the resolver applies its own cut-off.
const FUSE_OPTIONS: IFuseOptions<string> = {
  includeScore: true,
  threshold: 1,
  ignoreLocation: true,
  ignoreFieldNorm: true,
  isCaseSensitive: false,
  shouldSort: false,
  minMatchCharLength: 1,
};

export function toRelevance(fuseScore: number | undefined): number {
  const score = fuseScore ?? 1;
  if (!Number.isFinite(score)) return 0;
  return Math.max(0, Math.min(100, Math.round((1 - score) * 100)));
}

/**
 * Bitap relevance weighted by the length ratio of the two keys. Fuse divides
 * the error count by the probe length only, so on its own a short label would
 * score high against any long name holding something close to it
 * ("porto" against "sportlisboaebenfica").
 */
export function lengthWeightedRelevance(fuseScore: number | undefined, probe: string, candidate: string): number {
  const longer = Math.max(probe.length, candidate.length);
  if (longer === 0) return 0;
  const ratio = Math.min(probe.length, candidate.length) / longer;
  return Math.round(toRelevance(fuseScore) * ratio);
}

/**
 * Edit-distance based scoring through Fuse.js' Bitap search. A candidate that
 * contains the probe outright scores 100 ("bayern" in "fcbayernmunchen");
 * anything else gets its Bitap relevance scaled by the length ratio, so
 * "liverpol" sits well above "unknownfc" when compared with "liverpool".
 */
export class FuzzyScorer implements SimilarityScorer {
  readonly name = "fuzzy";

  score(probe: string, candidates: readonly string[]): number[] {
    const scores = candidates.map(() => 0);
    if (!probe || candidates.length === 0) return scores;

    const fuse = new Fuse(candidates, FUSE_OPTIONS);
    for (const result of fuse.search(probe)) {
      const candidate = result.item;
      scores[result.refIndex] = candidate.includes(probe)
        ? 100
        : lengthWeightedRelevance(result.score, probe, candidate);
    }
    return scores;
  }
}

/** Degraded mode: containment in either direction is a hit, anything else a miss. */
export class SubstringScorer implements SimilarityScorer {
  readonly name = "substring";

  score(probe: string, candidates: readonly string[]): number[] {
    return candidates.map((candidate) => {
      if (!probe || !candidate) return 0;
      return candidate.includes(probe) || probe.includes(candidate) ? 100 : 0;
    });
  }
}

export function isMatchStrategy(value: string): value is MatchStrategy {
  return MATCH_STRATEGIES.some((strategy) => strategy === value);
}

export function createScorer(strategy: MatchStrategy): SimilarityScorer {
  switch (strategy) {
    case "fuzzy":
      return new FuzzyScorer();
    case "substring":
      return new SubstringScorer();
  }
}
