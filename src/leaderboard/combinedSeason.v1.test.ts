import { describe, expect, it } from "vitest";

import type { PeriodAggregateV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import { RankSnapshotStoreMemoryV1 } from "../store/rankSnapshotStore.memory.v1";
import { combineSeasonStandings, combinedColumnLabel } from "./combinedSeason.v1";
import { aggregateSeason, type SnapshotTrackingV1 } from "./seasonAggregator.v1";

function row(username: string, total: number): PeriodAggregateV1 {
  return { username, displayName: username.toUpperCase(), cells: [], total };
}

function tracking(board: string, store = new RankSnapshotStoreMemoryV1()): SnapshotTrackingV1 {
  return { store, current: { board, periodKey: "week2" }, previous: null, dryRun: true };
}

const winner = aggregateSeason({
  periods: [
    { week: 1, rows: [row("alice", 1), row("bob", 0)] },
    { week: 2, rows: [row("alice", 2), row("bob", 1)] },
  ],
  tracking: tracking("poll_winner"),
});

const margin = aggregateSeason({
  periods: [
    { week: 1, rows: null },
    { week: 2, rows: [row("alice", 1), row("carol", 2)] },
  ],
  tracking: tracking("poll_margin"),
});

describe("combinedColumnLabel", () => {
  it("prefixes the poll kind", () => {
    expect(combinedColumnLabel("winner", 3)).toBe("Winner_Week3");
    expect(combinedColumnLabel("margin", 10)).toBe("Margin_Week10");
  });
});

describe("combineSeasonStandings", () => {
  it("interleaves winner and margin columns by week", () => {
    const combined = combineSeasonStandings({
      throughWeek: 2,
      sources: [
        { poll: "winner", standing: winner },
        { poll: "margin", standing: margin },
      ],
      tracking: tracking("combined"),
    });

    expect(combined.columns).toEqual(["Winner_Week1", "Winner_Week2", "Margin_Week2"]);
    expect(combined.diagnostics).toEqual([]);
    expect(combined.entries.map((e) => [e.username, e.cells.map((c) => c.points), e.total, e.ranks.standard])).toEqual([
      ["alice", [1, 2, 1], 4, 1],
      ["carol", [0, 0, 2], 2, 2],
      ["bob", [0, 1, 0], 1, 3],
    ]);
  });

  it("works from one source and reports the missing one", () => {
    const combined = combineSeasonStandings({
      throughWeek: 2,
      sources: [
        { poll: "winner", standing: winner },
        { poll: "margin", standing: null },
      ],
      tracking: tracking("combined"),
    });

    expect(combined.columns).toEqual(["Winner_Week1", "Winner_Week2"]);
    expect(combined.diagnostics).toEqual([
      {
        code: "MISSING_PERIOD_SOURCE",
        message: "no margin season standing for week 2, columns omitted",
        context: { poll: "margin", week: 2 },
      },
    ]);
  });

  it("fails when neither source exists", () => {
    expect(() =>
      combineSeasonStandings({
        throughWeek: 2,
        sources: [
          { poll: "winner", standing: null },
          { poll: "margin", standing: null },
        ],
        tracking: tracking("combined"),
      })
    ).toThrow("INVALID_CONFIGURATION: no season standing available for week 2 (sources: winner, margin)");
  });

  it("carries the bonus column last", () => {
    const withBonus = aggregateSeason({
      periods: [{ week: 1, rows: [row("alice", 1)] }],
      bonus: { label: "Playoffs", rows: [{ username: "alice", displayName: "ALICE", points: 3 }] },
      tracking: tracking("poll_winner"),
    });
    const combined = combineSeasonStandings({
      throughWeek: 1,
      sources: [{ poll: "winner", standing: withBonus }],
      bonusLabel: "Playoffs",
      tracking: tracking("combined"),
    });

    expect(combined.columns).toEqual(["Winner_Week1", "Playoffs"]);
    expect(combined.entries[0].cells).toEqual([
      { label: "Winner_Week1", points: 1 },
      { label: "Playoffs", points: 3 },
    ]);
    expect(combined.entries[0].total).toBe(4);
  });

  it("tracks movement against the combined scope", () => {
    const store = new RankSnapshotStoreMemoryV1();
    store.save({ board: "combined", periodKey: "week1" }, { bob: { dense: 1, standard: 1 } });
    const combined = combineSeasonStandings({
      throughWeek: 2,
      sources: [{ poll: "winner", standing: winner }],
      tracking: { store, current: { board: "combined", periodKey: "week2" }, previous: { board: "combined", periodKey: "week1" } },
    });

    const bob = combined.entries.find((e) => e.username === "bob");
    expect(bob?.movement.standard).toEqual({ kind: "DOWN", by: 1 });
    expect(store.listKeys()).toEqual(["combined/week1", "combined/week2"]);
  });
});
