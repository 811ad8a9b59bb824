// src/extract/playoffPoll.v1.ts
// Playoff bracket prediction: each voter picks several teams;
// points = |picked ∩ qualified| * points per correct pick.

import type { PlayoffPredictionV1, RankedV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import { coercePoints } from "../leaderboard/points.v1";
import { rankEntries } from "../leaderboard/ranker.v1";
import { answerKey, UNKNOWN, voterIdentity, type PlayoffPoll } from "./rawPoll.v1";

export type PlayoffExtractionV1 =
  | { ok: true; entries: Array<RankedV1<PlayoffPredictionV1>>; qualifiedTeams: string[]; diagnostics: DiagnosticV1[] }
  | { ok: false; diagnostics: DiagnosticV1[] };

export function extractPlayoffPoll(
  poll: PlayoffPoll,
  ctx: { teams: Record<string, string>; qualifierCount: number }
): PlayoffExtractionV1 {
  const diagnostics: DiagnosticV1[] = [];
  const qualified = poll.qualifiedTeams ?? poll.qualifiedteams ?? poll.playoffteams ?? [];
  if (qualified.length !== ctx.qualifierCount) {
    diagnostics.push(
      diagnostic("POLL_INVALID", `playoff poll needs exactly ${ctx.qualifierCount} qualified teams, got ${qualified.length}`)
    );
    return { ok: false, diagnostics };
  }
  const qualifiedSet = new Set(qualified);

  let perPick = 0;
  if (poll.points !== undefined && poll.points !== null) {
    const coerced = coercePoints(poll.points);
    if (coerced.malformed) {
      diagnostics.push(diagnostic("MALFORMED_RECORD", `playoff points ${JSON.stringify(poll.points)} coerced to 0.0`));
    }
    perPick = coerced.points;
  }

  const answerNames = new Map<string, string>();
  for (const a of poll.answers) answerNames.set(String(a.id), a.name);

  // grouped by voter id: one row per voter however many picks they made
  const byVoter = new Map<string, { username: string; displayName: string; teams: string[] }>();
  for (const vote of poll.votes) {
    const { username, displayName } = voterIdentity(vote);
    const voterId = vote.user?.id !== undefined && vote.user?.id !== null ? String(vote.user.id) : UNKNOWN;
    let voter = byVoter.get(voterId);
    if (!voter) {
      voter = { username, displayName, teams: [] };
      byVoter.set(voterId, voter);
    }
    const key = answerKey(vote.answerId);
    const full = (key !== null ? answerNames.get(key) : undefined) ?? UNKNOWN;
    voter.teams.push(ctx.teams[full] ?? full);
  }

  const predictions: PlayoffPredictionV1[] = [];
  for (const voter of byVoter.values()) {
    const predictedTeams = voter.teams.slice().sort();
    const correctPicks = Array.from(new Set(voter.teams.filter((t) => qualifiedSet.has(t)))).sort();
    predictions.push({
      username: voter.username,
      displayName: voter.displayName,
      predictedTeams,
      correctPicks,
      points: correctPicks.length * perPick,
    });
  }

  return { ok: true, entries: rankEntries(predictions, (p) => p.points), qualifiedTeams: qualified, diagnostics };
}
