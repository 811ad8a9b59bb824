// src/extract/winnerPoll.v1.ts
// "Who wins?" poll -> one MatchOutcomeRecordV1 per vote.
// A vote scores the match points when its team's short code equals the declared winner.

import type { MatchOutcomeRecordV1, MatchResultV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import { coercePoints } from "../leaderboard/points.v1";
import { answerKey, UNKNOWN, voterIdentity, type WinnerPoll } from "./rawPoll.v1";

export type ExtractContextV1 = {
  matchId: string;
  matchNumber: number;
  /** Full team name -> short code. */
  teams: Record<string, string>;
  defaultMatchPoints: number;
};

export type ExtractedMatchV1 = {
  match: MatchResultV1;
  diagnostics: DiagnosticV1[];
};

export function byUsername(a: MatchOutcomeRecordV1, b: MatchOutcomeRecordV1): number {
  return a.username < b.username ? -1 : a.username > b.username ? 1 : 0;
}

/** Resolves the poll's points field; absent means the league default. */
export function matchPoints(
  raw: string | number | null | undefined,
  ctx: Pick<ExtractContextV1, "matchId" | "defaultMatchPoints">,
  diagnostics: DiagnosticV1[]
): number {
  if (raw === undefined || raw === null) return ctx.defaultMatchPoints;
  const { points, malformed } = coercePoints(raw);
  if (malformed) {
    diagnostics.push(diagnostic("MALFORMED_RECORD", `poll points ${JSON.stringify(raw)} coerced to 0.0`, { matchId: ctx.matchId }));
  }
  return points;
}

export function extractWinnerPoll(
  poll: WinnerPoll,
  ctx: ExtractContextV1 & { noResultMarkers: readonly string[] }
): ExtractedMatchV1 {
  const diagnostics: DiagnosticV1[] = [];
  const points = matchPoints(poll.points, ctx, diagnostics);

  const winner = (poll.winner ?? "").trim();
  const noResult =
    winner === "" || ctx.noResultMarkers.some((m) => m.toUpperCase() === winner.toUpperCase());

  const answerNames = new Map<string, string>();
  for (const a of poll.answers) answerNames.set(String(a.id), a.name);

  const records: MatchOutcomeRecordV1[] = poll.votes.map((vote) => {
    const { username, displayName } = voterIdentity(vote);
    const key = answerKey(vote.answerId);
    const choiceFull = (key !== null ? answerNames.get(key) : undefined) ?? UNKNOWN;
    const choiceShort = ctx.teams[choiceFull] ?? choiceFull;
    return {
      username,
      displayName,
      choiceShort,
      choiceFull,
      points: !noResult && choiceShort === winner ? points : 0,
    };
  });
  records.sort(byUsername);

  return {
    match: {
      matchId: ctx.matchId,
      matchNumber: ctx.matchNumber,
      status: noResult ? "VOID" : "SCORED",
      records,
    },
    diagnostics,
  };
}
