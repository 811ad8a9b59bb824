// src/extract/marginPoll.v1.ts
// "By how much?" poll -> one MatchOutcomeRecordV1 per vote.
// When no answer covers the declared margin, unmatchedMarginPolicy decides whether the match is
// void (dropped from streaks) or a match nobody called correctly (kept, everyone 0.0).

import type { MatchOutcomeRecordV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import type { UnmatchedMarginPolicy } from "../config/leagueConfig.v1";
import { answerShortName, findWinningAnswer, parseMargin } from "./marginRange.v1";
import { answerKey, UNKNOWN, voterIdentity, type MarginPoll } from "./rawPoll.v1";
import { byUsername, matchPoints, type ExtractContextV1, type ExtractedMatchV1 } from "./winnerPoll.v1";

export class MarginParseError extends Error {
  constructor(readonly matchId: string, readonly margin: string) {
    super(`MARGIN_INVALID: ${matchId}: ${JSON.stringify(margin)}`);
    this.name = "MarginParseError";
  }
}

export function extractMarginPoll(
  poll: MarginPoll,
  ctx: ExtractContextV1 & { unmatchedMarginPolicy: UnmatchedMarginPolicy }
): ExtractedMatchV1 {
  const margin = parseMargin(poll.margin);
  if (!margin) throw new MarginParseError(ctx.matchId, poll.margin);

  const diagnostics: ExtractedMatchV1["diagnostics"] = [];
  const points = matchPoints(poll.points, ctx, diagnostics);

  const winning = findWinningAnswer(margin, poll.answers);
  const winningKey = winning ? String(winning.id) : null;

  const answerNames = new Map<string, { full: string; short: string }>();
  for (const a of poll.answers) {
    answerNames.set(String(a.id), { full: a.name, short: answerShortName(a.name, margin.unit) });
  }

  const records: MatchOutcomeRecordV1[] = poll.votes.map((vote) => {
    const { username, displayName } = voterIdentity(vote);
    const key = answerKey(vote.answerId);
    const answer = key !== null ? answerNames.get(key) : undefined;
    return {
      username,
      displayName,
      choiceShort: answer?.short ?? UNKNOWN,
      choiceFull: answer?.full ?? UNKNOWN,
      points: winningKey !== null && key === winningKey ? points : 0,
    };
  });
  records.sort(byUsername);

  const status = winning ? "SCORED" : ctx.unmatchedMarginPolicy === "VOID" ? "VOID" : "NO_CORRECT_ANSWER";

  return {
    match: { matchId: ctx.matchId, matchNumber: ctx.matchNumber, status, records },
    diagnostics,
  };
}
