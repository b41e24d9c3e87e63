// src/name-resolver.ts
import type { Aliases } from "@champions-pool/shared";
import { normalizeTeamName } from "./team-name-utils.js";
import { FuzzyScorer, type SimilarityScorer } from "./similarity.js";

export const DEFAULT_THRESHOLD = 60;

export interface Resolution {
  bestCandidate: string | null;
  score: number;
}

interface Candidate {
  name: string;
  key: string;
  index: number;
}

interface Best {
  candidate: Candidate;
  score: number;
  distance: number;
}

const NO_MATCH: Resolution = { bestCandidate: null, score: 0 };

const defaultScorer: SimilarityScorer = new FuzzyScorer();

export function clampThreshold(threshold: number): number {
  if (!Number.isFinite(threshold)) return DEFAULT_THRESHOLD;
  return Math.max(0, Math.min(100, Math.round(threshold)));
}

/**
 * Alias probes for a label: looked up by the label itself first, then by
 * any alias key that normalizes to the same form.
 */
export function aliasesFor(label: string, aliases: Aliases): readonly string[] {
  // Own keys only: a label such as "constructor" must not reach Object.prototype.
  if (Object.hasOwn(aliases, label)) {
    const direct = aliases[label];
    if (Array.isArray(direct)) return direct;
  }

  const key = normalizeTeamName(label);
  if (!key) return [];
  for (const [aliasKey, values] of Object.entries(aliases)) {
    if (normalizeTeamName(aliasKey) === key && Array.isArray(values)) return values;
  }
  return [];
}

// First occurrence wins when two candidates share a normalized form.
function uniqueCandidates(candidates: readonly string[]): Candidate[] {
  const seen = new Set<string>();
  const unique: Candidate[] = [];
  candidates.forEach((name, index) => {
    const key = normalizeTeamName(name);
    if (!key || seen.has(key)) return;
    seen.add(key);
    unique.push({ name, key, index });
  });
  return unique;
}

function isBetter(next: Best, current: Best | null): boolean {
  if (!current) return true;
  if (next.score !== current.score) return next.score > current.score;
  if (next.distance !== current.distance) return next.distance < current.distance;
  return next.candidate.index < current.candidate.index;
}

/**
 * Finds the canonical name that best matches a user-typed label.
 *
 * Every probe (the label plus its aliases) is compared with every candidate;
 * exact normalized equality scores 100, anything else goes through the scorer.
 * Among equal scores the candidate whose normalized length is closest to the
 * probe wins, then the earlier candidate. Below `threshold`, or with a best
 * score of 0, the label stays unresolved.
 */
export function resolveTeam(
  query: string,
  candidates: readonly string[],
  aliases: Aliases = {},
  threshold: number = DEFAULT_THRESHOLD,
  scorer: SimilarityScorer = defaultScorer,
): Resolution {
  const pool = uniqueCandidates(candidates);
  if (pool.length === 0) return NO_MATCH;

  const probes = [...new Set([query, ...aliasesFor(query, aliases)].map(normalizeTeamName))].filter(Boolean);
  const keys = pool.map((candidate) => candidate.key);

  let best: Best | null = null;
  for (const probe of probes) {
    const scores = scorer.score(probe, keys);
    for (let i = 0; i < pool.length; i++) {
      const candidate = pool[i];
      const raw = candidate.key === probe ? 100 : (scores[i] ?? 0);
      const next: Best = {
        candidate,
        score: Number.isFinite(raw) ? Math.max(0, Math.min(100, Math.round(raw))) : 0,
        distance: Math.abs(candidate.key.length - probe.length),
      };
      if (isBetter(next, best)) best = next;
    }
  }

  if (!best || best.score === 0 || best.score < clampThreshold(threshold)) return NO_MATCH;
  return { bestCandidate: best.candidate.name, score: best.score };
}
