// src/pipeline/leagueOutputs.v1.ts
// Materializes a LeagueRunV1 under the results dir.
//
//   csv:  weekly/poll_<kind>/week<N>.csv, overall/poll_<kind>/week<N>.csv, overall/combined/week<N>.csv,
//         detailed/poll_winner/week<N>.csv, playoffs/playoff_predictions.csv
//   xlsx: league_week<N>.xlsx with one sheet per table

import path from "node:path";

import type { PollKindV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import { periodKey, type RunConfig } from "../config/runConfig.v1";
import { matchBoardTable, playoffTable, seasonTable, type TableV1 } from "../leaderboard/tables.v1";
import { writeCsvTable } from "../output/csvSink.v1";
import { writeWorkbook } from "../output/workbookSink.v1";
import { COMBINED_BOARD, snapshotBoard, type LeagueRunV1 } from "./leaguePipeline.v1";

export type NamedTableV1 = {
  /** Sheet name in workbooks. */
  name: string;
  /** CSV path relative to the results dir. */
  relPath: string;
  table: TableV1;
};

export function leagueTables(run: LeagueRunV1, polls: readonly PollKindV1[]): NamedTableV1[] {
  const file = `${periodKey(run.week)}.csv`;
  const tables: NamedTableV1[] = [];

  for (const poll of polls) {
    const weekly = run.weekly[poll];
    if (weekly) {
      tables.push({
        name: `Weekly ${poll}`,
        relPath: path.join("weekly", snapshotBoard(poll), file),
        table: matchBoardTable(poll, weekly.labels, weekly.entries),
      });
    }
    const season = run.season[poll];
    if (season) {
      tables.push({
        name: `Overall ${poll}`,
        relPath: path.join("overall", snapshotBoard(poll), file),
        table: seasonTable(season.columns, season.entries),
      });
    }
  }

  tables.push({
    name: "Overall combined",
    relPath: path.join("overall", COMBINED_BOARD, file),
    table: seasonTable(run.combined.columns, run.combined.entries),
  });

  if (run.detailed) {
    tables.push({
      name: "Detailed winner",
      relPath: path.join("detailed", snapshotBoard("winner"), file),
      table: matchBoardTable("winner", run.detailed.labels, run.detailed.entries, "DETAILED"),
    });
  }

  if (run.playoffs?.ok) {
    tables.push({
      name: "Playoffs",
      relPath: path.join("playoffs", "playoff_predictions.csv"),
      table: playoffTable(run.playoffs.entries),
    });
  }

  return tables;
}

/** Returns the absolute paths written. */
export function writeLeagueOutputs(
  run: LeagueRunV1,
  polls: readonly PollKindV1[],
  opts: { resultsDir: string; format: RunConfig["format"] }
): string[] {
  const tables = leagueTables(run, polls);
  if (opts.format === "xlsx") {
    return [writeWorkbook(path.join(opts.resultsDir, `league_${periodKey(run.week)}.xlsx`), tables)];
  }
  return tables.map((t) => writeCsvTable(path.join(opts.resultsDir, t.relPath), t.table));
}
