import { describe, expect, it } from "vitest";

import type { RankedEntryV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import { aggregateMatches } from "../leaderboard/matchAggregator.v1";
import { match, rec } from "../testing/leagueFixtures";
import { buildAwards, champion, topFinishers, topTeamVoters } from "./awards.v1";
import { ordinal, renderPrizeReport } from "./prizeReport.v1";
import { buildOutcomeSequences } from "./streakAnalyzer.v1";

function entry(username: string, total: number, standard: number, dense = standard): RankedEntryV1 {
  return { username, displayName: username.toUpperCase(), cells: [], total, ranks: { standard, dense } };
}

const season = [
  match(1, [rec("alice", 1, "CSK"), rec("bob", 0, "MI")]),
  match(2, [rec("alice", 1, "CSK"), rec("bob", 1, "CSK")]),
  match(3, [rec("alice", 0, "MI"), rec("bob", 1, "CSK")]),
];

const settings = { topFinishers: 1, streakPlaces: 2, teamOfInterest: "CSK", teamVoterPlaces: 1 };

describe("topFinishers / champion", () => {
  const board = [entry("alice", 9, 1), entry("bob", 9, 1), entry("carol", 4, 3, 2)];

  it("takes the first rows of the ranked board", () => {
    expect(topFinishers(board, 2).map((f) => [f.username, f.total, f.ranks.standard])).toEqual([
      ["alice", 9, 1],
      ["bob", 9, 1],
    ]);
    expect(topFinishers(board, 0)).toEqual([]);
  });

  it("returns the leader or null", () => {
    expect(champion(board)?.username).toBe("alice");
    expect(champion([])).toBeNull();
    expect(champion(null)).toBeNull();
  });
});

describe("topTeamVoters", () => {
  it("counts votes for the team with the match numbers", () => {
    const voters = topTeamVoters([...season, match(4, [rec("carol", 0, "CSK")])], "CSK", 3);
    expect(voters).toEqual([
      { username: "alice", displayName: "ALICE", count: 2, matchNumbers: [1, 2] },
      { username: "bob", displayName: "BOB", count: 2, matchNumbers: [2, 3] },
      { username: "carol", displayName: "CAROL", count: 1, matchNumbers: [4] },
    ]);
  });

  it("leaves out participants who never picked the team", () => {
    expect(topTeamVoters(season, "RCB", 3)).toEqual([]);
  });

  it("agrees with the match board and streaks on a repeated vote", () => {
    const repeated = [match(1, [rec("amy", 0, "MI"), rec("amy", 1, "CSK")])];

    expect(aggregateMatches(repeated).rows[0].cells).toEqual([{ label: "Match_1", choice: "CSK", points: 1 }]);
    expect(buildOutcomeSequences(repeated).byUser.get("amy")?.outcomes).toEqual(["WON"]);
    expect(topTeamVoters(repeated, "CSK", 3)).toEqual([
      { username: "amy", displayName: "AMY", count: 1, matchNumbers: [1] },
    ]);
    expect(topTeamVoters(repeated, "MI", 3)).toEqual([]);
  });
});

describe("buildAwards", () => {
  const awards = buildAwards({
    winnerBoard: [entry("alice", 3, 1), entry("bob", 2, 2)],
    marginBoard: [entry("carol", 5, 1)],
    winnerMatches: season,
    settings,
  });

  it("excludes top finishers from the winning streak prize only", () => {
    expect(awards.topFinishers.map((f) => f.username)).toEqual(["alice"]);
    expect(awards.winningStreaks.map((s) => [s.username, s.length, s.startMatchNumber])).toEqual([["bob", 2, 2]]);
    expect(awards.overallWinningStreak?.username).toBe("alice");
  });

  it("ranks losing streaks by length then start", () => {
    expect(awards.losingStreaks.map((s) => [s.username, s.startMatchNumber])).toEqual([
      ["bob", 1],
      ["alice", 3],
    ]);
    expect(awards.overallLosingStreak?.username).toBe("bob");
  });

  it("names the margin champion and top team voter", () => {
    expect(awards.marginChampion?.username).toBe("carol");
    expect(awards.teamVoters).toEqual({
      team: "CSK",
      voters: [{ username: "alice", displayName: "ALICE", count: 2, matchNumbers: [1, 2] }],
    });
  });

  it("skips team voters when no team is configured", () => {
    const none = buildAwards({
      winnerBoard: null,
      marginBoard: null,
      winnerMatches: [],
      settings: { topFinishers: 3, streakPlaces: 3, teamVoterPlaces: 3 },
    });
    expect(none).toEqual({
      topFinishers: [],
      marginChampion: null,
      winningStreaks: [],
      overallWinningStreak: null,
      losingStreaks: [],
      overallLosingStreak: null,
      teamVoters: null,
    });
  });

  it("renders the prize report", () => {
    expect(renderPrizeReport(awards).split("\n")).toEqual([
      "Prize Winners:",
      "Predict the Winner - 1st Place:",
      "  Username: alice",
      "  Display Name: ALICE",
      "  Details: Total Points: 3.0",
      "",
      "Predict the Winning Margin - 1st Place:",
      "  Username: carol",
      "  Display Name: CAROL",
      "  Details: Total Points: 5.0",
      "",
      "Longest Winning Streak - 1st:",
      "  Username: bob",
      "  Display Name: BOB",
      "  Details: Winning Streak: 2 matches, Starting from Match #2 to Match #3",
      "",
      "Overall Longest Winning Streak:",
      "  Username: alice",
      "  Display Name: ALICE",
      "  Details: Winning Streak: 2 matches, Starting from Match #1 to Match #2",
      "",
      "Longest Losing Streak - 1st:",
      "  Username: bob",
      "  Display Name: BOB",
      "  Details: Losing Streak: 1 matches, Starting from Match #1 to Match #1",
      "",
      "Longest Losing Streak - 2nd:",
      "  Username: alice",
      "  Display Name: ALICE",
      "  Details: Losing Streak: 1 matches, Starting from Match #3 to Match #3",
      "",
      "Overall Longest Losing Streak:",
      "  Username: bob",
      "  Display Name: BOB",
      "  Details: Losing Streak: 1 matches, Starting from Match #1 to Match #1",
      "",
      "Top CSK Voter - 1st:",
      "  Username: alice",
      "  Display Name: ALICE",
      "  Details: Voted for CSK 2 times: Match #1, Match #2",
      "",
    ]);
  });
});

describe("ordinal", () => {
  it("handles the teens", () => {
    expect([1, 2, 3, 4, 11, 12, 13, 21, 22, 101, 111].map(ordinal)).toEqual([
      "1st",
      "2nd",
      "3rd",
      "4th",
      "11th",
      "12th",
      "13th",
      "21st",
      "22nd",
      "101st",
      "111th",
    ]);
  });
});
