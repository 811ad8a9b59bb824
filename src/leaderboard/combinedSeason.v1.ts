// src/leaderboard/combinedSeason.v1.ts
// Merges per-poll season standings into one board: Winner_Week1, Margin_Week1, Winner_Week2, ...
// At least one source board must exist.

import type { PollKindV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, LeaderboardErrorV1, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import {
  foldColumns,
  rankAndTrack,
  weekLabel,
  type ColumnContributionV1,
  type SeasonStandingV1,
  type SnapshotTrackingV1,
} from "./seasonAggregator.v1";

const POLL_PREFIX: Record<PollKindV1, string> = {
  winner: "Winner",
  margin: "Margin",
};

export type CombinedSourceV1 = {
  poll: PollKindV1;
  /** null when that poll has no season standing for the cutoff week. */
  standing: Pick<SeasonStandingV1, "columns" | "entries"> | null;
};

export type CombineSeasonParamsV1 = {
  throughWeek: number;
  sources: readonly CombinedSourceV1[];
  /** Carry a bonus column (e.g. "Playoffs") found on the source boards. */
  bonusLabel?: string;
  tracking: SnapshotTrackingV1;
};

export function combinedColumnLabel(poll: PollKindV1, week: number): string {
  return `${POLL_PREFIX[poll]}_${weekLabel(week)}`;
}

export function combineSeasonStandings(params: CombineSeasonParamsV1): SeasonStandingV1 {
  const { throughWeek, sources, bonusLabel, tracking } = params;
  const present = sources.filter((s) => s.standing !== null);
  if (present.length === 0) {
    const names = sources.map((s) => s.poll).join(", ") || "none";
    throw new LeaderboardErrorV1("INVALID_CONFIGURATION", `no season standing available for week ${throughWeek} (sources: ${names})`);
  }

  const available = new Set<string>();
  const contributions: ColumnContributionV1[] = [];

  for (const source of present) {
    const standing = source.standing;
    if (!standing) continue;
    const sourceColumns = new Set(standing.columns);

    for (const entry of standing.entries) {
      for (let week = 1; week <= throughWeek; week++) {
        const from = weekLabel(week);
        if (!sourceColumns.has(from)) continue;
        const label = combinedColumnLabel(source.poll, week);
        const cell = entry.cells.find((c) => c.label === from);
        contributions.push({ username: entry.username, displayName: entry.displayName, label, points: cell?.points ?? 0 });
      }
      if (bonusLabel && sourceColumns.has(bonusLabel)) {
        const cell = entry.cells.find((c) => c.label === bonusLabel);
        contributions.push({ username: entry.username, displayName: entry.displayName, label: bonusLabel, points: cell?.points ?? 0 });
      }
    }
    // columns exist even if the source board has no rows yet
    for (let week = 1; week <= throughWeek; week++) {
      if (sourceColumns.has(weekLabel(week))) available.add(combinedColumnLabel(source.poll, week));
    }
  }

  const columns: string[] = [];
  for (let week = 1; week <= throughWeek; week++) {
    for (const poll of ["winner", "margin"] as const) {
      const label = combinedColumnLabel(poll, week);
      if (available.has(label)) columns.push(label);
    }
  }
  if (bonusLabel) columns.push(bonusLabel);

  const diagnostics: DiagnosticV1[] = sources
    .filter((s) => s.standing === null)
    .map((s) =>
      diagnostic("MISSING_PERIOD_SOURCE", `no ${s.poll} season standing for week ${throughWeek}, columns omitted`, {
        poll: s.poll,
        week: throughWeek,
      })
    );
  return rankAndTrack(columns, foldColumns(columns, contributions), tracking, diagnostics);
}
