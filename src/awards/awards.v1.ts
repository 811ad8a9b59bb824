// src/awards/awards.v1.ts
// End-of-season awards derived from the ranked season boards and the winner-poll match history.
// Pure: boards and matches in, award lists out.

import type {
  MatchResultV1,
  RankPairV1,
  RankedEntryV1,
  StreakResultV1,
  Username,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import type { LeagueConfig } from "../config/leagueConfig.v1";
import { latestVotes } from "../leaderboard/matchAggregator.v1";
import { longestStreak, topStreaks } from "./streakAnalyzer.v1";

export type FinisherV1 = {
  username: Username;
  displayName: string;
  total: number;
  ranks: RankPairV1;
};

export type TeamVoterV1 = {
  username: Username;
  displayName: string;
  count: number;
  /** League match numbers, ascending. */
  matchNumbers: number[];
};

export type AwardsV1 = {
  topFinishers: FinisherV1[];
  marginChampion: FinisherV1 | null;
  /** Excludes the top finishers so one player does not sweep both prizes. */
  winningStreaks: StreakResultV1[];
  overallWinningStreak: StreakResultV1 | null;
  losingStreaks: StreakResultV1[];
  overallLosingStreak: StreakResultV1 | null;
  teamVoters: { team: string; voters: TeamVoterV1[] } | null;
};

function toFinisher(e: RankedEntryV1): FinisherV1 {
  return { username: e.username, displayName: e.displayName, total: e.total, ranks: e.ranks };
}

/** First n rows of an already-ranked board. */
export function topFinishers(board: readonly RankedEntryV1[], n: number): FinisherV1[] {
  return board.slice(0, Math.max(0, n)).map(toFinisher);
}

export function champion(board: readonly RankedEntryV1[] | null): FinisherV1 | null {
  const first = board?.[0];
  return first ? toFinisher(first) : null;
}

export function topTeamVoters(matches: readonly MatchResultV1[], team: string, n: number): TeamVoterV1[] {
  const byUser = new Map<Username, TeamVoterV1>();
  for (const match of matches) {
    for (const r of latestVotes(match)) {
      let voter = byUser.get(r.username);
      if (!voter) {
        voter = { username: r.username, displayName: r.displayName, count: 0, matchNumbers: [] };
        byUser.set(r.username, voter);
      }
      voter.displayName = r.displayName;
      if (r.choiceShort === team) {
        voter.count += 1;
        voter.matchNumbers.push(match.matchNumber);
      }
    }
  }

  return Array.from(byUser.values())
    .filter((v) => v.count > 0)
    .map((v) => ({ ...v, matchNumbers: v.matchNumbers.slice().sort((a, b) => a - b) }))
    .sort((a, b) => b.count - a.count || (a.username < b.username ? -1 : a.username > b.username ? 1 : 0))
    .slice(0, Math.max(0, n));
}

export type BuildAwardsParamsV1 = {
  /** Ranked winner-poll season board; null when it could not be built. */
  winnerBoard: readonly RankedEntryV1[] | null;
  marginBoard: readonly RankedEntryV1[] | null;
  /** Every winner-poll match of the season so far, chronological. */
  winnerMatches: readonly MatchResultV1[];
  settings: LeagueConfig["awards"];
};

export function buildAwards(params: BuildAwardsParamsV1): AwardsV1 {
  const { winnerBoard, marginBoard, winnerMatches, settings } = params;

  const finishers = winnerBoard ? topFinishers(winnerBoard, settings.topFinishers) : [];
  const exclude = new Set(finishers.map((f) => f.username));
  const team = settings.teamOfInterest;

  return {
    topFinishers: finishers,
    marginChampion: champion(marginBoard),
    winningStreaks: topStreaks(winnerMatches, { mode: "WINNING", n: settings.streakPlaces, exclude }),
    overallWinningStreak: longestStreak(winnerMatches, "WINNING"),
    losingStreaks: topStreaks(winnerMatches, { mode: "LOSING", n: settings.streakPlaces }),
    overallLosingStreak: longestStreak(winnerMatches, "LOSING"),
    teamVoters: team ? { team, voters: topTeamVoters(winnerMatches, team, settings.teamVoterPlaces) } : null,
  };
}
