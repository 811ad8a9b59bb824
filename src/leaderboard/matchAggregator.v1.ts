// src/leaderboard/matchAggregator.v1.ts
// Folds a period's matches (chronological) into one row per participant.
// Pure. Malformed points were already coerced by the extractor/source; we coerce again
// so the fold never sees NaN regardless of where records came from.

import {
  NO_CHOICE,
  type MatchOutcomeRecordV1,
  type MatchResultV1,
  type PeriodAggregateV1,
  type RankedV1,
  type SubPeriodCellV1,
  type Username,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import { coercePoints, sumPoints } from "./points.v1";
import { rankEntries } from "./ranker.v1";

export type MatchAggregationV1 = {
  /** Column labels in order: Match_1..Match_N. */
  labels: string[];
  rows: PeriodAggregateV1[];
  diagnostics: DiagnosticV1[];
};

type Accumulator = {
  username: Username;
  displayName: string;
  cells: Map<number, SubPeriodCellV1>;
};

export function matchLabel(position: number): string {
  return `Match_${position}`;
}

function defaultCell(label: string): SubPeriodCellV1 {
  return { label, choice: NO_CHOICE, points: 0 };
}

/** One record per participant; a repeated vote in the same match replaces the earlier one. */
export function latestVotes(match: MatchResultV1): MatchOutcomeRecordV1[] {
  const byUser = new Map<Username, MatchOutcomeRecordV1>();
  for (const record of match.records) byUser.set(record.username, record);
  return Array.from(byUser.values());
}

export function aggregateMatches(matches: readonly MatchResultV1[]): MatchAggregationV1 {
  const byUser = new Map<Username, Accumulator>();
  const labels: string[] = [];
  const diagnostics: DiagnosticV1[] = [];

  matches.forEach((match, idx) => {
    const label = matchLabel(idx + 1);
    labels.push(label);

    const present = new Set<Username>();
    for (const record of latestVotes(match)) {
      const { points, malformed } = coercePoints(record.points);
      if (malformed) {
        diagnostics.push(
          diagnostic("MALFORMED_RECORD", "points coerced to 0.0", {
            matchId: match.matchId,
            username: record.username,
          })
        );
      }

      let acc = byUser.get(record.username);
      if (!acc) {
        acc = { username: record.username, displayName: record.displayName, cells: new Map() };
        byUser.set(record.username, acc);
      }
      acc.displayName = record.displayName;
      acc.cells.set(idx, { label, choice: record.choiceShort, points });
      present.add(record.username);
    }

    // previously seen, absent here
    for (const acc of byUser.values()) {
      if (!present.has(acc.username) && !acc.cells.has(idx)) acc.cells.set(idx, defaultCell(label));
    }
  });

  const rows: PeriodAggregateV1[] = [];
  for (const acc of byUser.values()) {
    // late joiners get defaults for the matches before their first vote
    const cells = labels.map((label, idx) => acc.cells.get(idx) ?? defaultCell(label));
    rows.push({
      username: acc.username,
      displayName: acc.displayName,
      cells,
      total: sumPoints(cells.map((c) => c.points)),
    });
  }

  return { labels, rows, diagnostics };
}

export type MatchBoardV1 = {
  labels: string[];
  entries: Array<RankedV1<PeriodAggregateV1>>;
  diagnostics: DiagnosticV1[];
};

/** Weekly board (or the detailed season board when given every match so far). */
export function buildMatchBoard(matches: readonly MatchResultV1[]): MatchBoardV1 {
  const { labels, rows, diagnostics } = aggregateMatches(matches);
  return { labels, entries: rankEntries(rows, (r) => r.total), diagnostics };
}
