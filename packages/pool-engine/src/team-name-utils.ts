// src/team-name-utils.ts
//
// Helpers for consistent team-name matching between user-typed labels
// and the names published by a standings source.

export function cleanTeamName(name: string): string {
  return String(name || "").replace(/\s+/g, " ").trim();
}

export function stripTrailingParenthetical(name: string): string {
  // Standings pages sometimes append the country code: "Inter (ITA)".
  return String(name || "")
    .replace(/\s*\([^)]*\)\s*$/, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Comparison key for a team label: accents folded, lower-cased, and every
 * character outside [a-z0-9] removed. "Atlético Madrid" -> "atleticomadrid".
 */
export function normalizeTeamName(name: string): string {
  return String(name || "")
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "");
}
