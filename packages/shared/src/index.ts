export type StandingsSourceKind = "api" | "html" | "static";

export interface StandingsRow {
	canonicalName: string;
	points: number;
	tiebreakFields: readonly number[]; // goal difference, goals for
}

export type StandingsTable = readonly StandingsRow[];

export type TeamLabels = readonly [string, string];

export interface Participant {
	id: string;
	teamLabels: TeamLabels;
}

// label -> extra probes, e.g. { "Inter": ["FC Internazionale Milano"] }
export type Aliases = Readonly<Record<string, readonly string[]>>;

export interface TeamResolution {
	inputLabel: string;
	resolvedName: string | null;
	score: number;
	points: number;
}

export interface ResolvedAssignment {
	participantId: string;
	perTeam: TeamResolution[];
	totalPoints: number;
	breakdown: string;
	notes: string[];
}

export interface RankedAssignment extends ResolvedAssignment {
	position: number;
}

export interface StandingsSnapshot {
	table: StandingsTable;
	source: StandingsSourceKind;
	fallback: boolean;
	fetchedAt: string;
}

export interface RankingResponse {
	source: StandingsSourceKind;
	fallback: boolean;
	fetchedAt: string;
	threshold: number;
	ranking: RankedAssignment[];
}

export interface ResolveResponse {
	query: string;
	bestCandidate: string | null;
	score: number;
	points: number;
}

export interface ApiResponse<T> {
	success: boolean;
	data?: T;
	error?: string;
	message?: string;
}
