// src/sources/leagueSource.fs.v1.ts
// File-system league source.
//
// Layout (relative to the configured dirs):
//   <rawDir>/week<N>/poll_<kind>/<matchNo>-<slug>.json        raw poll exports
//   <processedDir>/week<N>/poll_<kind>/<matchNo>-<slug>.csv   processed per-match results
//   <processedDir>/week<N>/poll_<kind>/match_status.json      matchId -> status for those CSVs
//   <rawDir>/playoff_predictions.json                         playoff prediction poll
//
// Raw exports win over processed CSVs for the same week/poll unless none of them loads. A file that fails to parse is
// skipped with a POLL_INVALID (or MARGIN_INVALID) diagnostic; the rest of the week still loads.

import fs from "node:fs";
import path from "node:path";
import type { z } from "zod";

import type { MatchResultV1, PollKindV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import { resolveLeaguePath, type LeagueConfig } from "../config/leagueConfig.v1";
import { extractMarginPoll, MarginParseError } from "../extract/marginPoll.v1";
import { extractPlayoffPoll, type PlayoffExtractionV1 } from "../extract/playoffPoll.v1";
import {
  MarginPollSchema,
  matchNumberFromFileName,
  PlayoffPollSchema,
  WinnerPollSchema,
} from "../extract/rawPoll.v1";
import { extractWinnerPoll, type ExtractContextV1, type ExtractedMatchV1 } from "../extract/winnerPoll.v1";
import { parseMatchCsv, readMatchStatusIndex } from "./matchCsv.v1";
import type { LeagueSourceV1, LoadedMatchesV1 } from "./leagueSource.v1";

export const PLAYOFF_FILE = "playoff_predictions.json";

export function weekDirName(week: number): string {
  return `week${week}`;
}

export function pollDirName(poll: PollKindV1): string {
  return `poll_${poll}`;
}

type MatchFile = { fileName: string; matchId: string; matchNumber: number };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Files with a numeric match prefix, in league match order.
 * null when the directory is missing or holds no file with this extension at all.
 */
function listMatchFiles(dir: string, ext: ".json" | ".csv", diagnostics: DiagnosticV1[]): MatchFile[] | null {
  if (!fs.existsSync(dir)) return null;
  const candidates = fs.readdirSync(dir).filter((fileName) => path.extname(fileName).toLowerCase() === ext);
  if (candidates.length === 0) return null;

  const files: MatchFile[] = [];
  for (const fileName of candidates) {
    const matchNumber = matchNumberFromFileName(fileName);
    if (matchNumber === null) {
      diagnostics.push(diagnostic("POLL_INVALID", "file name has no match number prefix, skipped", { file: fileName }));
      continue;
    }
    files.push({ fileName, matchId: path.basename(fileName, path.extname(fileName)), matchNumber });
  }
  return files.sort((a, b) => a.matchNumber - b.matchNumber || (a.fileName < b.fileName ? -1 : 1));
}

function readJson(absPath: string): unknown {
  return JSON.parse(fs.readFileSync(absPath, "utf8"));
}

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  file: string,
  diagnostics: DiagnosticV1[]
): T | null {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  const detail = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
  diagnostics.push(diagnostic("POLL_INVALID", `schema violation: ${detail}`, { file }));
  return null;
}

export type LeagueSourceFsOptionsV1 = {
  rawDir?: string;
  processedDir?: string;
};

export class LeagueSourceFsV1 implements LeagueSourceV1 {
  readonly rawDir: string;
  readonly processedDir: string;

  constructor(private readonly cfg: LeagueConfig, opts: LeagueSourceFsOptionsV1 = {}) {
    this.rawDir = opts.rawDir ?? resolveLeaguePath(cfg, "rawDir");
    this.processedDir = opts.processedDir ?? resolveLeaguePath(cfg, "processedDir");
  }

  listWeeks(): number[] {
    const weeks = new Set<number>();
    for (const root of [this.rawDir, this.processedDir]) {
      if (!fs.existsSync(root)) continue;
      for (const entry of fs.readdirSync(root, { withFileTypes: true })) {
        const m = /^week(\d+)$/.exec(entry.name);
        if (entry.isDirectory() && m) weeks.add(Number.parseInt(m[1], 10));
      }
    }
    return Array.from(weeks).sort((a, b) => a - b);
  }

  rawPollDir(week: number, poll: PollKindV1): string {
    return path.join(this.rawDir, weekDirName(week), pollDirName(poll));
  }

  processedPollDir(week: number, poll: PollKindV1): string {
    return path.join(this.processedDir, weekDirName(week), pollDirName(poll));
  }

  /** Raw exports when any of them loads; otherwise the processed CSVs, keeping the raw diagnostics. */
  loadMatches(week: number, poll: PollKindV1): LoadedMatchesV1 | null {
    const raw = this.loadRaw(week, poll);
    if (raw && raw.matches.length > 0) return raw;

    const processed = this.loadProcessed(week, poll);
    if (!processed) return raw;
    return { matches: processed.matches, diagnostics: [...(raw?.diagnostics ?? []), ...processed.diagnostics] };
  }

  /** Raw exports only; extractPolls uses this to (re)write the processed CSVs. */
  loadRaw(week: number, poll: PollKindV1): LoadedMatchesV1 | null {
    const diagnostics: DiagnosticV1[] = [];
    const dir = this.rawPollDir(week, poll);
    const files = listMatchFiles(dir, ".json", diagnostics);
    if (!files) return null;

    const matches: MatchResultV1[] = [];
    for (const file of files) {
      const extracted = this.extractFile(path.join(dir, file.fileName), poll, file, diagnostics);
      if (!extracted) continue;
      matches.push(extracted.match);
      diagnostics.push(...extracted.diagnostics);
    }
    return { matches, diagnostics };
  }

  private extractFile(
    absPath: string,
    poll: PollKindV1,
    file: MatchFile,
    diagnostics: DiagnosticV1[]
  ): ExtractedMatchV1 | null {
    let raw: unknown;
    try {
      raw = readJson(absPath);
    } catch (err) {
      diagnostics.push(diagnostic("POLL_INVALID", `unreadable JSON: ${errorMessage(err)}`, { file: file.fileName }));
      return null;
    }

    const ctx: ExtractContextV1 = {
      matchId: file.matchId,
      matchNumber: file.matchNumber,
      teams: this.cfg.teams,
      defaultMatchPoints: this.cfg.defaultMatchPoints,
    };

    if (poll === "winner") {
      const parsed = parseWith(WinnerPollSchema, raw, file.fileName, diagnostics);
      return parsed ? extractWinnerPoll(parsed, { ...ctx, noResultMarkers: this.cfg.noResultMarkers }) : null;
    }

    const parsed = parseWith(MarginPollSchema, raw, file.fileName, diagnostics);
    if (!parsed) return null;
    try {
      return extractMarginPoll(parsed, { ...ctx, unmatchedMarginPolicy: this.cfg.unmatchedMarginPolicy });
    } catch (err) {
      if (!(err instanceof MarginParseError)) throw err;
      diagnostics.push(diagnostic("MARGIN_INVALID", err.message, { file: file.fileName }));
      return null;
    }
  }

  private loadProcessed(week: number, poll: PollKindV1): LoadedMatchesV1 | null {
    const diagnostics: DiagnosticV1[] = [];
    const dir = this.processedPollDir(week, poll);
    const files = listMatchFiles(dir, ".csv", diagnostics);
    if (!files) return null;

    const statuses = readMatchStatusIndex(dir, diagnostics);
    const matches: MatchResultV1[] = [];
    for (const file of files) {
      try {
        const text = fs.readFileSync(path.join(dir, file.fileName), "utf8");
        const extracted = parseMatchCsv(text, {
          matchId: file.matchId,
          matchNumber: file.matchNumber,
          poll,
          status: statuses.get(file.matchId),
        });
        matches.push(extracted.match);
        diagnostics.push(...extracted.diagnostics);
      } catch (err) {
        diagnostics.push(diagnostic("POLL_INVALID", `unreadable CSV: ${errorMessage(err)}`, { file: file.fileName }));
      }
    }
    return { matches, diagnostics };
  }

  loadPlayoffs(): PlayoffExtractionV1 | null {
    const absPath = path.join(this.rawDir, PLAYOFF_FILE);
    if (!fs.existsSync(absPath)) return null;

    const diagnostics: DiagnosticV1[] = [];
    let raw: unknown;
    try {
      raw = readJson(absPath);
    } catch (err) {
      diagnostics.push(diagnostic("POLL_INVALID", `unreadable JSON: ${errorMessage(err)}`, { file: PLAYOFF_FILE }));
      return { ok: false, diagnostics };
    }
    const parsed = parseWith(PlayoffPollSchema, raw, PLAYOFF_FILE, diagnostics);
    if (!parsed) return { ok: false, diagnostics };
    return extractPlayoffPoll(parsed, { teams: this.cfg.teams, qualifierCount: this.cfg.playoffs.qualifierCount });
  }
}
