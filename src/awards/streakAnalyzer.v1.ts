// src/awards/streakAnalyzer.v1.ts
// Longest contiguous run of wins (or losses) per participant across the season.
//
// - Washed-out matches are dropped before any sequence is built.
// - A repeated vote in one match counts once, as its last record (same rule as the match board).
// - ABSENT and the opposite outcome both reset the current run to zero.
// - best run only moves on a strictly longer run, so the earliest of equal runs is kept.
// - Top-N order: length desc, start index asc, username asc.

import type {
  MatchResultV1,
  StreakModeV1,
  StreakOutcomeV1,
  StreakResultV1,
  Username,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import { latestVotes } from "../leaderboard/matchAggregator.v1";
import { coercePoints } from "../leaderboard/points.v1";

/** VOID, or scored with at least one vote and every vote at 0.0. */
export function isWashedOut(match: MatchResultV1): boolean {
  if (match.status === "VOID") return true;
  if (match.status === "NO_CORRECT_ANSWER") return false;
  return match.records.length > 0 && match.records.every((r) => coercePoints(r.points).points === 0);
}

export type OutcomeSequencesV1 = {
  /** Non-void matches in chronological order; sequence index i refers to matches[i]. */
  matches: MatchResultV1[];
  byUser: Map<Username, { displayName: string; outcomes: StreakOutcomeV1[] }>;
};

export function buildOutcomeSequences(season: readonly MatchResultV1[]): OutcomeSequencesV1 {
  const matches = season.filter((m) => !isWashedOut(m));
  const byUser = new Map<Username, { displayName: string; outcomes: StreakOutcomeV1[] }>();

  matches.forEach((match, idx) => {
    for (const record of latestVotes(match)) {
      let seq = byUser.get(record.username);
      if (!seq) {
        seq = { displayName: record.displayName, outcomes: new Array<StreakOutcomeV1>(idx).fill("ABSENT") };
        byUser.set(record.username, seq);
      }
      seq.displayName = record.displayName;
      seq.outcomes.push(coercePoints(record.points).points > 0 ? "WON" : "LOST");
    }
    for (const seq of byUser.values()) {
      if (seq.outcomes.length === idx) seq.outcomes.push("ABSENT");
    }
  });

  return { matches, byUser };
}

export type LongestRunV1 = { length: number; startIndex: number; endIndex: number };

export function longestRun(outcomes: readonly StreakOutcomeV1[], mode: StreakModeV1): LongestRunV1 | null {
  const target: StreakOutcomeV1 = mode === "WINNING" ? "WON" : "LOST";

  let currentLength = 0;
  let currentStart = 0;
  let best: LongestRunV1 | null = null;

  for (let idx = 0; idx < outcomes.length; idx++) {
    if (outcomes[idx] !== target) {
      currentLength = 0;
      continue;
    }
    if (currentLength === 0) currentStart = idx;
    currentLength += 1;
    if (!best || currentLength > best.length) {
      best = { length: currentLength, startIndex: currentStart, endIndex: idx };
    }
  }

  return best;
}

export type StreakQueryV1 = {
  mode: StreakModeV1;
  n: number;
  /** Participants removed before ranking (e.g. already awarded a top finish). */
  exclude?: ReadonlySet<Username>;
};

export function topStreaks(season: readonly MatchResultV1[], query: StreakQueryV1): StreakResultV1[] {
  const { matches, byUser } = buildOutcomeSequences(season);
  const results: StreakResultV1[] = [];

  for (const [username, seq] of byUser) {
    if (query.exclude?.has(username)) continue;
    const run = longestRun(seq.outcomes, query.mode);
    if (!run) continue;
    results.push({
      username,
      displayName: seq.displayName,
      length: run.length,
      startIndex: run.startIndex,
      endIndex: run.endIndex,
      startMatchNumber: matches[run.startIndex].matchNumber,
      endMatchNumber: matches[run.endIndex].matchNumber,
    });
  }

  results.sort((a, b) => {
    if (b.length !== a.length) return b.length - a.length;
    if (a.startIndex !== b.startIndex) return a.startIndex - b.startIndex;
    return a.username < b.username ? -1 : a.username > b.username ? 1 : 0;
  });

  return results.slice(0, Math.max(0, query.n));
}

/** Single longest streak over everyone, or null when nobody has a qualifying run. */
export function longestStreak(season: readonly MatchResultV1[], mode: StreakModeV1): StreakResultV1 | null {
  return topStreaks(season, { mode, n: 1 })[0] ?? null;
}
