// src/pipeline/leaguePipeline.v1.ts
// One parameterized pipeline for a cutoff week:
//   weekly boards -> per-poll season standings -> combined standing -> detailed board -> playoffs -> awards.
// Each stage is also exported on its own for the HTTP routes.
//
// Snapshot scopes: "poll_winner", "poll_margin", "combined"; period key "week<N>",
// previous period "week<N-1>" (none for week 1).

import type {
  BonusSourceV1,
  MatchResultV1,
  PeriodSourceV1,
  PollKindV1,
  RankSnapshotKeyV1,
  RankSnapshotStoreV1,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, LeaderboardErrorV1, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import type { LeagueConfig } from "../config/leagueConfig.v1";
import { periodKey } from "../config/runConfig.v1";
import { buildAwards, type AwardsV1 } from "../awards/awards.v1";
import type { PlayoffExtractionV1 } from "../extract/playoffPoll.v1";
import { combineSeasonStandings } from "../leaderboard/combinedSeason.v1";
import { buildMatchBoard, type MatchBoardV1 } from "../leaderboard/matchAggregator.v1";
import { aggregateSeason, type SeasonStandingV1, type SnapshotTrackingV1 } from "../leaderboard/seasonAggregator.v1";
import type { LeagueSourceV1 } from "../sources/leagueSource.v1";

export const COMBINED_BOARD = "combined";

export type LeaguePipelineDepsV1 = {
  cfg: LeagueConfig;
  source: LeagueSourceV1;
  store: RankSnapshotStoreV1;
};

export type SeasonOptionsV1 = {
  includePlayoffs: boolean;
  /** Skip the snapshot write (movement is still computed). */
  dryRun: boolean;
};

export type Staged<T> = { value: T; diagnostics: DiagnosticV1[] };

export function snapshotBoard(poll: PollKindV1): string {
  return `poll_${poll}`;
}

export function trackingFor(store: RankSnapshotStoreV1, board: string, week: number, dryRun: boolean): SnapshotTrackingV1 {
  const current: RankSnapshotKeyV1 = { board, periodKey: periodKey(week) };
  const previous: RankSnapshotKeyV1 | null = week > 1 ? { board, periodKey: periodKey(week - 1) } : null;
  return { store, current, previous, dryRun };
}

function assertWeek(week: number): void {
  if (!Number.isInteger(week) || week < 1) {
    throw new LeaderboardErrorV1("INVALID_CONFIGURATION", `week must be a positive integer, got ${week}`);
  }
}

export function weeklyBoard(deps: LeaguePipelineDepsV1, poll: PollKindV1, week: number): Staged<MatchBoardV1 | null> {
  assertWeek(week);
  const loaded = deps.source.loadMatches(week, poll);
  if (!loaded) {
    return {
      value: null,
      diagnostics: [diagnostic("MISSING_PERIOD_SOURCE", `no ${poll} polls for week ${week}`, { poll, week })],
    };
  }
  const board = buildMatchBoard(loaded.matches);
  return { value: board, diagnostics: [...loaded.diagnostics, ...board.diagnostics] };
}

/** Every match of weeks 1..week for one poll, chronological. Missing weeks are skipped silently. */
export function seasonMatches(deps: LeaguePipelineDepsV1, poll: PollKindV1, week: number): Staged<MatchResultV1[]> {
  assertWeek(week);
  const matches: MatchResultV1[] = [];
  const diagnostics: DiagnosticV1[] = [];
  for (let w = 1; w <= week; w++) {
    const loaded = deps.source.loadMatches(w, poll);
    if (!loaded) continue;
    matches.push(...loaded.matches);
    diagnostics.push(...loaded.diagnostics);
  }
  return { value: matches, diagnostics };
}

export function playoffBonus(deps: LeaguePipelineDepsV1, playoffs: PlayoffExtractionV1 | null): BonusSourceV1 {
  const label = deps.cfg.playoffs.bonusLabel;
  if (!playoffs || !playoffs.ok) return { label, rows: null };
  return {
    label,
    rows: playoffs.entries.map((e) => ({ username: e.username, displayName: e.displayName, points: e.points })),
  };
}

/** Throws INVALID_CONFIGURATION when no week 1..week has data for this poll. */
export function seasonStanding(
  deps: LeaguePipelineDepsV1,
  poll: PollKindV1,
  week: number,
  opts: SeasonOptionsV1,
  playoffs: PlayoffExtractionV1 | null = opts.includePlayoffs ? deps.source.loadPlayoffs() : null
): SeasonStandingV1 {
  assertWeek(week);
  const diagnostics: DiagnosticV1[] = [];
  const periods: PeriodSourceV1[] = [];
  for (let w = 1; w <= week; w++) {
    const weekly = weeklyBoard(deps, poll, w);
    if (weekly.value) diagnostics.push(...weekly.diagnostics);
    periods.push({ week: w, rows: weekly.value ? weekly.value.entries : null });
  }

  const standing = aggregateSeason({
    periods,
    bonus: opts.includePlayoffs ? playoffBonus(deps, playoffs) : undefined,
    tracking: trackingFor(deps.store, snapshotBoard(poll), week, opts.dryRun),
  });
  return { ...standing, diagnostics: [...diagnostics, ...standing.diagnostics] };
}

export type PollStandingsV1 = Partial<Record<PollKindV1, SeasonStandingV1 | null>>;

/**
 * Season standing for every configured poll. A poll with no data at all maps to null
 * with a MISSING_PERIOD_SOURCE diagnostic instead of failing the whole run.
 */
export function seasonStandings(
  deps: LeaguePipelineDepsV1,
  week: number,
  opts: SeasonOptionsV1,
  playoffs: PlayoffExtractionV1 | null
): Staged<PollStandingsV1> {
  const value: PollStandingsV1 = {};
  const diagnostics: DiagnosticV1[] = [];
  for (const poll of deps.cfg.polls) {
    try {
      const standing = seasonStanding(deps, poll, week, opts, playoffs);
      value[poll] = standing;
      diagnostics.push(...standing.diagnostics);
    } catch (err) {
      if (!(err instanceof LeaderboardErrorV1) || err.code !== "INVALID_CONFIGURATION") throw err;
      value[poll] = null;
      diagnostics.push(diagnostic("MISSING_PERIOD_SOURCE", `${poll} season standing unavailable: ${err.message}`, { poll, week }));
    }
  }
  return { value, diagnostics };
}

export function combinedStanding(
  deps: LeaguePipelineDepsV1,
  week: number,
  opts: SeasonOptionsV1,
  standings: PollStandingsV1
): SeasonStandingV1 {
  return combineSeasonStandings({
    throughWeek: week,
    sources: deps.cfg.polls.map((poll) => ({ poll, standing: standings[poll] ?? null })),
    bonusLabel: opts.includePlayoffs ? deps.cfg.playoffs.bonusLabel : undefined,
    tracking: trackingFor(deps.store, COMBINED_BOARD, week, opts.dryRun),
  });
}

/** All winner-poll matches so far, numbered Match_1..Match_N across weeks. */
export function detailedBoard(deps: LeaguePipelineDepsV1, poll: PollKindV1, week: number): Staged<MatchBoardV1 | null> {
  const season = seasonMatches(deps, poll, week);
  if (season.value.length === 0) {
    return {
      value: null,
      diagnostics: [...season.diagnostics, diagnostic("MISSING_PERIOD_SOURCE", `no ${poll} polls up to week ${week}`, { poll, week })],
    };
  }
  const board = buildMatchBoard(season.value);
  return { value: board, diagnostics: [...season.diagnostics, ...board.diagnostics] };
}

export function seasonAwards(
  deps: LeaguePipelineDepsV1,
  week: number,
  standings: PollStandingsV1
): Staged<AwardsV1> {
  const winnerMatches = seasonMatches(deps, "winner", week);
  const awards = buildAwards({
    winnerBoard: standings.winner?.entries ?? null,
    marginBoard: standings.margin?.entries ?? null,
    winnerMatches: winnerMatches.value,
    settings: deps.cfg.awards,
  });
  return { value: awards, diagnostics: winnerMatches.diagnostics };
}

export type LeagueRunV1 = {
  week: number;
  weekly: Partial<Record<PollKindV1, MatchBoardV1 | null>>;
  season: PollStandingsV1;
  combined: SeasonStandingV1;
  detailed: MatchBoardV1 | null;
  playoffs: PlayoffExtractionV1 | null;
  awards: AwardsV1;
  diagnostics: DiagnosticV1[];
};

/**
 * Full run for one cutoff week. Fails with INVALID_CONFIGURATION only when no poll has any data;
 * a single missing poll or week degrades to diagnostics.
 */
export function runLeague(deps: LeaguePipelineDepsV1, week: number, opts: SeasonOptionsV1): LeagueRunV1 {
  assertWeek(week);
  const diagnostics: DiagnosticV1[] = [];
  const playoffs = opts.includePlayoffs ? deps.source.loadPlayoffs() : null;
  if (playoffs) diagnostics.push(...playoffs.diagnostics);

  const weekly: LeagueRunV1["weekly"] = {};
  for (const poll of deps.cfg.polls) weekly[poll] = weeklyBoard(deps, poll, week).value;

  // standings carry the weekly source diagnostics
  const standings = seasonStandings(deps, week, opts, playoffs);
  const season = standings.value;
  diagnostics.push(...standings.diagnostics);

  const combined = combinedStanding(deps, week, opts, season);
  diagnostics.push(...combined.diagnostics);

  const detailed = detailedBoard(deps, "winner", week);
  const awards = seasonAwards(deps, week, season);

  return {
    week,
    weekly,
    season,
    combined,
    detailed: detailed.value,
    playoffs,
    awards: awards.value,
    diagnostics,
  };
}
