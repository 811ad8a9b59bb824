// src/sources/matchCsv.v1.ts
// Processed per-match CSV (the export written by extractPolls) -> MatchResultV1.
// Rows without a Username are skipped; unparseable points coerce to 0.0. Both report MALFORMED_RECORD.
//
// A match with no votes is a header-only CSV, so each poll directory also keeps
// match_status.json (matchId -> status). Status precedence: that index, then the
// "Match Status" column, then VOID for a file with no rows, else SCORED.

import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import type {
  MatchOutcomeRecordV1,
  MatchResultV1,
  MatchStatusV1,
  PollKindV1,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import { byUsername, type ExtractedMatchV1 } from "../extract/winnerPoll.v1";
import { UNKNOWN } from "../extract/rawPoll.v1";
import { coercePoints } from "../leaderboard/points.v1";
import { CHOICE_COLUMN } from "../leaderboard/tables.v1";

const CsvRowsSchema = z.array(z.record(z.string(), z.string()));
const MatchStatusSchema = z.enum(["SCORED", "VOID", "NO_CORRECT_ANSWER"]);
const MatchStatusIndexSchema = z.record(z.string(), MatchStatusSchema);

export const MATCH_STATUS_FILE = "match_status.json";

/** Empty when the directory has no index; an unreadable index is reported and ignored. */
export function readMatchStatusIndex(dir: string, diagnostics: DiagnosticV1[]): Map<string, MatchStatusV1> {
  const file = path.join(dir, MATCH_STATUS_FILE);
  if (!fs.existsSync(file)) return new Map();

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    diagnostics.push(diagnostic("POLL_INVALID", `unreadable JSON: ${reason}`, { file: MATCH_STATUS_FILE }));
    return new Map();
  }

  const result = MatchStatusIndexSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    diagnostics.push(
      diagnostic("POLL_INVALID", `schema violation: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown"}`, {
        file: MATCH_STATUS_FILE,
      })
    );
    return new Map();
  }
  return new Map(Object.entries(result.data));
}

export function writeMatchStatusIndex(dir: string, matches: readonly MatchResultV1[]): string {
  const file = path.join(dir, MATCH_STATUS_FILE);
  const index = Object.fromEntries(matches.map((m): [string, MatchStatusV1] => [m.matchId, m.status]));
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(file, `${JSON.stringify(index, null, 2)}\n`, "utf8");
  return file;
}

export function parseMatchCsv(
  text: string,
  ctx: { matchId: string; matchNumber: number; poll: PollKindV1; status?: MatchStatusV1 }
): ExtractedMatchV1 {
  const rows = CsvRowsSchema.parse(parse(text, { columns: true, bom: true, skip_empty_lines: true }));
  const names = CHOICE_COLUMN[ctx.poll];
  const diagnostics: DiagnosticV1[] = [];
  const records: MatchOutcomeRecordV1[] = [];
  let columnStatus: MatchStatusV1 | undefined;

  rows.forEach((row, i) => {
    const username = (row["Username"] ?? "").trim();
    if (!username) {
      diagnostics.push(diagnostic("MALFORMED_RECORD", "row without Username skipped", { matchId: ctx.matchId, row: i + 2 }));
      return;
    }
    const { points, malformed } = coercePoints(row["Points"]);
    if (malformed) {
      diagnostics.push(
        diagnostic("MALFORMED_RECORD", `points ${JSON.stringify(row["Points"] ?? "")} coerced to 0.0`, {
          matchId: ctx.matchId,
          username,
        })
      );
    }
    const parsedStatus = MatchStatusSchema.safeParse(row["Match Status"]);
    if (parsedStatus.success) columnStatus = parsedStatus.data;

    records.push({
      username,
      displayName: row["Display Name"] || username,
      choiceShort: row[names.short] || UNKNOWN,
      choiceFull: row[names.full] || UNKNOWN,
      points,
    });
  });
  records.sort(byUsername);
  const status = ctx.status ?? columnStatus ?? (rows.length === 0 ? "VOID" : "SCORED");

  return { match: { matchId: ctx.matchId, matchNumber: ctx.matchNumber, status, records }, diagnostics };
}
