// src/leaderboard/seasonAggregator.v1.ts
// Season-to-date standing: one column per available week (+ optional bonus column),
// ranked and movement-tracked. Missing weeks are omitted with a diagnostic; no weeks at all is fatal.

import type {
  BonusSourceV1,
  PeriodAggregateV1,
  PeriodSourceV1,
  RankMovementPairV1,
  RankSnapshotKeyV1,
  RankSnapshotStoreV1,
  RankedEntryV1,
  Username,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, LeaderboardErrorV1, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import { sumPoints } from "./points.v1";
import { rankEntries } from "./ranker.v1";
import { trackRankMovement } from "./rankMovement.v1";

export const BONUS_LABEL_DEFAULT = "Playoffs";

export function weekLabel(week: number): string {
  return `Week${week}`;
}

export type ColumnContributionV1 = {
  username: Username;
  displayName: string;
  label: string;
  points: number;
};

/**
 * Builds one row per contributing participant with a cell for every column.
 * Later contributions win for display names; a missing cell is 0.0.
 */
export function foldColumns(
  columns: readonly string[],
  contributions: readonly ColumnContributionV1[]
): PeriodAggregateV1[] {
  const byUser = new Map<Username, { displayName: string; points: Map<string, number> }>();
  for (const c of contributions) {
    let acc = byUser.get(c.username);
    if (!acc) {
      acc = { displayName: c.displayName, points: new Map() };
      byUser.set(c.username, acc);
    }
    acc.displayName = c.displayName;
    acc.points.set(c.label, c.points);
  }

  const rows: PeriodAggregateV1[] = [];
  for (const [username, acc] of byUser) {
    const cells = columns.map((label) => ({ label, points: acc.points.get(label) ?? 0 }));
    rows.push({ username, displayName: acc.displayName, cells, total: sumPoints(cells.map((c) => c.points)) });
  }
  return rows;
}

export type SnapshotTrackingV1 = {
  store: RankSnapshotStoreV1;
  current: RankSnapshotKeyV1;
  previous: RankSnapshotKeyV1 | null;
  dryRun?: boolean;
};

export type SeasonStandingV1 = {
  columns: string[];
  entries: Array<RankedEntryV1 & { movement: RankMovementPairV1 }>;
  diagnostics: DiagnosticV1[];
  snapshotPersisted: boolean;
};

/** Ranks rows by total and diffs them against the previous snapshot. */
export function rankAndTrack(
  columns: string[],
  rows: PeriodAggregateV1[],
  tracking: SnapshotTrackingV1,
  diagnostics: DiagnosticV1[]
): SeasonStandingV1 {
  const ranked = rankEntries(rows, (r) => r.total);
  const tracked = trackRankMovement({ entries: ranked, ...tracking });
  return {
    columns,
    entries: tracked.entries,
    diagnostics: [...diagnostics, ...tracked.diagnostics],
    snapshotPersisted: tracked.persisted,
  };
}

export type SeasonAggregationParamsV1 = {
  /** Chronological; rows === null means that week's source is absent. */
  periods: readonly PeriodSourceV1[];
  bonus?: BonusSourceV1;
  tracking: SnapshotTrackingV1;
};

/** No periods gives an empty standing and leaves the snapshot store alone. */
export function aggregateSeason(params: SeasonAggregationParamsV1): SeasonStandingV1 {
  const { periods, bonus, tracking } = params;
  if (periods.length === 0) return { columns: [], entries: [], diagnostics: [], snapshotPersisted: false };

  const diagnostics: DiagnosticV1[] = [];
  const columns: string[] = [];
  const contributions: ColumnContributionV1[] = [];

  for (const period of periods) {
    const label = weekLabel(period.week);
    if (period.rows === null) {
      diagnostics.push(diagnostic("MISSING_PERIOD_SOURCE", `no weekly leaderboard for ${label}, column omitted`, { week: period.week }));
      continue;
    }
    columns.push(label);
    for (const row of period.rows) {
      contributions.push({ username: row.username, displayName: row.displayName, label, points: row.total });
    }
  }

  if (columns.length === 0) {
    throw new LeaderboardErrorV1("INVALID_CONFIGURATION", "no weekly leaderboard exists for any requested week");
  }

  if (bonus) {
    columns.push(bonus.label);
    if (bonus.rows === null) {
      diagnostics.push(diagnostic("MISSING_BONUS_SOURCE", `${bonus.label} scores not found, column left at 0.0`));
    } else {
      for (const row of bonus.rows) {
        contributions.push({ username: row.username, displayName: row.displayName, label: bonus.label, points: row.points });
      }
    }
  }

  return rankAndTrack(columns, foldColumns(columns, contributions), tracking, diagnostics);
}
