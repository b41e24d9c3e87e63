// src/aggregator.ts
import type {
  Aliases,
  Participant,
  RankedAssignment,
  ResolvedAssignment,
  StandingsTable,
  TeamLabels,
  TeamResolution,
} from "@champions-pool/shared";
import { DEFAULT_THRESHOLD, resolveTeam, type Resolution } from "./name-resolver.js";
import { canonicalNames, pointsByTeam } from "./standings-table.js";
import type { SimilarityScorer } from "./similarity.js";

export type ParticipantInput = Readonly<Record<string, TeamLabels>> | readonly Participant[];

function isParticipantList(input: ParticipantInput): input is readonly Participant[] {
  return Array.isArray(input);
}

export function toParticipants(input: ParticipantInput): Participant[] {
  if (isParticipantList(input)) return [...input];
  return Object.entries(input).map(([id, teamLabels]) => ({ id, teamLabels }));
}

export function describeTeam(team: TeamResolution): string {
  return team.resolvedName === null
    ? `${team.inputLabel}: not found`
    : `${team.resolvedName}: ${team.points} pts`;
}

// Only corrections are worth a note; exact hits stay silent.
export function correctionNote(team: TeamResolution): string | null {
  if (team.resolvedName === null) return `not found: ${team.inputLabel}`;
  if (team.score < 100) return `${team.inputLabel} -> ${team.resolvedName} (${team.score}%)`;
  return null;
}

export function compareAssignments(a: ResolvedAssignment, b: ResolvedAssignment): number {
  if (a.totalPoints !== b.totalPoints) return b.totalPoints - a.totalPoints;
  if (a.participantId === b.participantId) return 0;
  return a.participantId < b.participantId ? -1 : 1;
}

/**
 * Resolves every participant's teams against the standings and sums their
 * points. Unresolved labels count zero and get a "not found" note; so does
 * a label whose resolution fails outright.
 * Result is ordered by total descending, then participant id ascending.
 */
export function aggregate(
  standings: StandingsTable,
  participants: ParticipantInput,
  aliases: Aliases = {},
  threshold: number = DEFAULT_THRESHOLD,
  scorer?: SimilarityScorer,
): ResolvedAssignment[] {
  const candidates = canonicalNames(standings);
  const lookup = pointsByTeam(standings);

  const results = toParticipants(participants).map((participant): ResolvedAssignment => {
    const perTeam = participant.teamLabels.map((inputLabel): TeamResolution => {
      let resolution: Resolution;
      try {
        resolution = resolveTeam(inputLabel, candidates, aliases, threshold, scorer);
      } catch (error) {
        console.warn(
          `Resolver: Could not resolve "${inputLabel}" for ${participant.id}: ${error instanceof Error ? error.message : String(error)}`,
        );
        resolution = { bestCandidate: null, score: 0 };
      }
      const { bestCandidate, score } = resolution;
      return {
        inputLabel,
        resolvedName: bestCandidate,
        score,
        points: bestCandidate === null ? 0 : (lookup.get(bestCandidate) ?? 0),
      };
    });

    return {
      participantId: participant.id,
      perTeam,
      totalPoints: perTeam.reduce((sum, team) => sum + team.points, 0),
      breakdown: perTeam.map(describeTeam).join(" | "),
      notes: perTeam.map(correctionNote).filter((note): note is string => note !== null),
    };
  });

  return results.sort(compareAssignments);
}

/** Competition ranking: equal totals share a position, the next one skips (1, 2, 2, 4). */
export function rankPositions(assignments: readonly ResolvedAssignment[]): RankedAssignment[] {
  let previousTotal: number | null = null;
  let position = 0;
  return assignments.map((assignment, index) => {
    if (assignment.totalPoints !== previousTotal) {
      position = index + 1;
      previousTotal = assignment.totalPoints;
    }
    return { ...assignment, position };
  });
}
