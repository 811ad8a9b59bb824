// src/leaderboard/tables.v1.ts
// Output rows with an explicit, ordered column list per row kind.
// Order: rank columns, identity columns, sub-period columns (chronological), total.

import type {
  MatchResultV1,
  PlayoffPredictionV1,
  PollKindV1,
  RankMovementPairV1,
  RankedEntryV1,
  RankedV1,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import { formatPoints } from "./points.v1";
import { renderMovement } from "./rankMovement.v1";

export type TableKindV1 = "MATCH" | "WEEKLY" | "DETAILED" | "SEASON" | "PLAYOFF";

export type TableV1 = {
  kind: TableKindV1;
  header: string[];
  rows: string[][];
};

export const CHOICE_COLUMN: Record<PollKindV1, { short: string; full: string; cell: string }> = {
  winner: { short: "Team Voted Short", full: "Team Voted", cell: "Team_Short" },
  margin: { short: "Margin Voted Short", full: "Margin Voted", cell: "Margin_Short" },
};

/** One processed match: the per-match export the weekly boards are rebuilt from. */
export function matchTable(poll: PollKindV1, match: MatchResultV1): TableV1 {
  const names = CHOICE_COLUMN[poll];
  const records = match.records
    .slice()
    .sort((a, b) => (a.username < b.username ? -1 : a.username > b.username ? 1 : 0));
  return {
    kind: "MATCH",
    header: ["Username", "Display Name", names.short, names.full, "Points", "Match Status"],
    rows: records.map((r) => [r.username, r.displayName, r.choiceShort, r.choiceFull, formatPoints(r.points), match.status]),
  };
}

/** Weekly (or detailed season) board: per-match choice/points pairs and Total_Points. */
export function matchBoardTable(
  poll: PollKindV1,
  labels: readonly string[],
  entries: ReadonlyArray<RankedEntryV1>,
  kind: "WEEKLY" | "DETAILED" = "WEEKLY"
): TableV1 {
  const cellName = CHOICE_COLUMN[poll].cell;
  const header = ["Dense Rank", "Standard Rank", "Username", "Display Name"];
  for (const label of labels) header.push(`${label}_${cellName}`, `${label}_Points`);
  header.push("Total_Points");

  const rows = entries.map((e) => {
    const row = [String(e.ranks.dense), String(e.ranks.standard), e.username, e.displayName];
    for (const cell of e.cells) row.push(cell.choice ?? "", formatPoints(cell.points));
    row.push(formatPoints(e.total));
    return row;
  });

  return { kind, header, rows };
}

/** Season board: rank + movement columns, one column per period, Total. */
export function seasonTable(
  columns: readonly string[],
  entries: ReadonlyArray<RankedEntryV1 & { movement: RankMovementPairV1 }>
): TableV1 {
  const header = [
    "Dense Rank",
    "Dense Rank Movement",
    "Standard Rank",
    "Standard Rank Movement",
    "Username",
    "Display Name",
    ...columns,
    "Total",
  ];

  const rows = entries.map((e) => [
    String(e.ranks.dense),
    renderMovement(e.movement.dense),
    String(e.ranks.standard),
    renderMovement(e.movement.standard),
    e.username,
    e.displayName,
    ...e.cells.map((c) => formatPoints(c.points)),
    formatPoints(e.total),
  ]);

  return { kind: "SEASON", header, rows };
}

export function playoffTable(entries: ReadonlyArray<RankedV1<PlayoffPredictionV1>>): TableV1 {
  return {
    kind: "PLAYOFF",
    header: ["Dense Rank", "Standard Rank", "Username", "Display Name", "Predicted Teams", "Correct Picks", "Points"],
    rows: entries.map((e) => [
      String(e.ranks.dense),
      String(e.ranks.standard),
      e.username,
      e.displayName,
      e.predictedTeams.join(", "),
      e.correctPicks.length > 0 ? e.correctPicks.join(", ") : "---",
      formatPoints(e.points),
    ]),
  };
}
