// src/leaderboard/ranker.v1.ts
// Standard (1,2,2,4) and dense (1,2,2,3) ranking over a score-sorted list.
// Pure function. Input order never affects the result.

import type { RankedV1, Username } from "../contracts/leaderboard/v1/LeaderboardV1";

export function compareByScore(
  a: { username: Username; score: number },
  b: { username: Username; score: number }
): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.username < b.username) return -1;
  if (a.username > b.username) return 1;
  return 0;
}

/**
 * Sorts by (score desc, username asc) and attaches both rank kinds.
 * A strictly lower score moves standard rank to its 1-based position and
 * dense rank up by one; equal scores carry both ranks over.
 */
export function rankEntries<T extends { username: Username }>(
  entries: readonly T[],
  scoreOf: (entry: T) => number
): Array<RankedV1<T>> {
  const sorted = entries
    .map((entry) => ({ entry, username: entry.username, score: scoreOf(entry) }))
    .sort(compareByScore);

  const ranked: Array<RankedV1<T>> = [];
  let standard = 1;
  let dense = 1;
  let prevScore: number | null = null;

  sorted.forEach((item, i) => {
    if (prevScore !== null && item.score < prevScore) {
      standard = i + 1;
      dense += 1;
    }
    ranked.push({ ...item.entry, ranks: { standard, dense } });
    prevScore = item.score;
  });

  return ranked;
}
