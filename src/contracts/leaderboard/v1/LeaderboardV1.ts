/**
 * LeaderboardV1 — Shapes shared by every stage of the poll leaderboard pipeline.
 *
 * - Match outcome records are the only source of truth; every other shape is derived.
 * - Rows carry typed cells; column names are produced by the table builders (tables.v1.ts).
 * - Nothing here performs I/O.
 */

export const LEADERBOARD_CONTRACT_VERSION = "LeaderboardV1" as const;

/** Stable participant key (poll username). */
export type Username = string;

/** Poll kinds a league runs every match. */
export type PollKindV1 = "winner" | "margin";

/** Rank schemes. Older exports call these "competitive" and "sequential". */
export type RankKindV1 = "STANDARD" | "DENSE";

/** Placeholder choice written for a participant with no vote in a match. */
export const NO_CHOICE = "---" as const;

/**
 * One participant's vote in one match.
 * points is always finite and >= 0; 0 means "voted, but wrong".
 */
export interface MatchOutcomeRecordV1 {
  username: Username;
  displayName: string;
  /** Short label of the chosen answer (e.g. "CSK", "11-20R"). */
  choiceShort: string;
  /** Full answer text as shown in the poll. */
  choiceFull: string;
  points: number;
}

/**
 * SCORED: answer resolved normally (may still be a washout if everyone scored 0).
 * VOID: no result; excluded from streak sequences.
 * NO_CORRECT_ANSWER: result declared but no option matched it; everyone scores 0
 * and the match still counts for streaks.
 */
export type MatchStatusV1 = "SCORED" | "VOID" | "NO_CORRECT_ANSWER";

export interface MatchResultV1 {
  /** Source identifier (poll file stem). */
  matchId: string;
  /** League match number, used for ordering and award details. */
  matchNumber: number;
  status: MatchStatusV1;
  records: MatchOutcomeRecordV1[];
}

/** One sub-period cell of an aggregate row. */
export interface SubPeriodCellV1 {
  /** Column label, e.g. "Match_3" or "Week2". */
  label: string;
  /** Choice short label for match cells; undefined for period-total cells. */
  choice?: string;
  points: number;
}

/**
 * One participant's row for an aggregation period.
 * cells are in chronological order and complete for the period.
 */
export interface PeriodAggregateV1 {
  username: Username;
  displayName: string;
  cells: SubPeriodCellV1[];
  total: number;
}

export interface RankPairV1 {
  standard: number;
  dense: number;
}

/** Movement relative to the previous period for one rank kind. */
export type RankMovementV1 =
  | { kind: "UP"; by: number }
  | { kind: "DOWN"; by: number }
  | { kind: "SAME" }
  | { kind: "NEW" };

export interface RankMovementPairV1 {
  standard: RankMovementV1;
  dense: RankMovementV1;
}

/** Anything the ranker can order. */
export interface ScoredV1 {
  username: Username;
  score: number;
}

export type RankedV1<T> = T & { ranks: RankPairV1 };

export type RankedEntryV1 = RankedV1<PeriodAggregateV1> & { movement?: RankMovementPairV1 };

/** Persisted previous-period ranks, keyed by username. */
export type RankSnapshotV1 = Record<Username, RankPairV1>;

export interface RankSnapshotKeyV1 {
  /** Board scope, e.g. "poll_winner", "poll_margin", "combined". */
  board: string;
  /** Period identifier, e.g. "week4". */
  periodKey: string;
}

export type RankSnapshotLoadV1 =
  | { status: "FOUND"; snapshot: RankSnapshotV1 }
  | { status: "MISSING" }
  | { status: "CORRUPT"; reason: string };

export interface RankSnapshotStoreV1 {
  load(key: RankSnapshotKeyV1): RankSnapshotLoadV1;
  /** Must either persist the whole snapshot or leave the previous file untouched. */
  save(key: RankSnapshotKeyV1, snapshot: RankSnapshotV1): void;
}

export type StreakOutcomeV1 = "WON" | "LOST" | "ABSENT";

export type StreakModeV1 = "WINNING" | "LOSING";

export interface StreakResultV1 {
  username: Username;
  displayName: string;
  length: number;
  /** Indexes into the season's non-void match sequence. */
  startIndex: number;
  endIndex: number;
  startMatchNumber: number;
  endMatchNumber: number;
}

export interface PlayoffPredictionV1 {
  username: Username;
  displayName: string;
  predictedTeams: string[];
  correctPicks: string[];
  points: number;
}

/** A week's worth of period aggregates, or null when that week's source is absent. */
export interface PeriodSourceV1 {
  week: number;
  rows: PeriodAggregateV1[] | null;
}

/** One-shot bonus scores folded into a season total (playoff predictions). */
export interface BonusSourceV1 {
  label: string;
  rows: Array<{ username: Username; displayName: string; points: number }> | null;
}
