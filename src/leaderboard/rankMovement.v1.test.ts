import { describe, expect, it } from "vitest";

import type {
  RankSnapshotKeyV1,
  RankSnapshotLoadV1,
  RankSnapshotStoreV1,
  RankSnapshotV1,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import { LeaderboardErrorV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import { RankSnapshotStoreMemoryV1 } from "../store/rankSnapshotStore.memory.v1";
import { rankEntries } from "./ranker.v1";
import { computeMovements, movementBetween, renderMovement, snapshotOf, trackRankMovement } from "./rankMovement.v1";

const prevKey: RankSnapshotKeyV1 = { board: "poll_winner", periodKey: "week1" };
const currKey: RankSnapshotKeyV1 = { board: "poll_winner", periodKey: "week2" };

const ranked = rankEntries(
  [
    { username: "alice", total: 9 },
    { username: "bob", total: 7 },
    { username: "carol", total: 4 },
  ],
  (r) => r.total
);

class FixedLoadStore implements RankSnapshotStoreV1 {
  saved: RankSnapshotV1 | null = null;
  constructor(private readonly result: RankSnapshotLoadV1, private readonly failSave = false) {}
  load(): RankSnapshotLoadV1 {
    return this.result;
  }
  save(_key: RankSnapshotKeyV1, snapshot: RankSnapshotV1): void {
    if (this.failSave) throw new Error("disk full");
    this.saved = snapshot;
  }
}

describe("movementBetween", () => {
  it("classifies rank changes", () => {
    expect(movementBetween(undefined, 3)).toEqual({ kind: "NEW" });
    expect(movementBetween(5, 2)).toEqual({ kind: "UP", by: 3 });
    expect(movementBetween(2, 5)).toEqual({ kind: "DOWN", by: 3 });
    expect(movementBetween(4, 4)).toEqual({ kind: "SAME" });
  });

  it("is symmetric when previous and current swap", () => {
    expect(movementBetween(6, 1)).toEqual({ kind: "UP", by: 5 });
    expect(movementBetween(1, 6)).toEqual({ kind: "DOWN", by: 5 });
  });
});

describe("renderMovement", () => {
  it("renders arrows, dash and N", () => {
    expect(renderMovement({ kind: "UP", by: 2 })).toBe("↑2");
    expect(renderMovement({ kind: "DOWN", by: 1 })).toBe("↓1");
    expect(renderMovement({ kind: "SAME" })).toBe("—");
    expect(renderMovement({ kind: "NEW" })).toBe("N");
  });
});

describe("snapshotOf", () => {
  it("maps usernames to both ranks", () => {
    expect(snapshotOf(ranked)).toEqual({
      alice: { dense: 1, standard: 1 },
      bob: { dense: 2, standard: 2 },
      carol: { dense: 3, standard: 3 },
    });
  });
});

describe("computeMovements", () => {
  it("ignores inherited object keys when looking up usernames", () => {
    const [entry] = computeMovements(rankEntries([{ username: "constructor" }], () => 1), {});
    expect(entry.movement).toEqual({ standard: { kind: "NEW" }, dense: { kind: "NEW" } });
  });
});

describe("trackRankMovement", () => {
  it("marks everyone new and still saves when the previous snapshot is missing", () => {
    const store = new RankSnapshotStoreMemoryV1();
    const result = trackRankMovement({ entries: ranked, store, current: currKey, previous: prevKey });

    expect(result.entries.map((e) => e.movement.standard.kind)).toEqual(["NEW", "NEW", "NEW"]);
    expect(result.diagnostics).toEqual([
      {
        code: "SNAPSHOT_UNAVAILABLE",
        message: "no previous ranks, treating everyone as new",
        context: { board: "poll_winner", periodKey: "week1" },
      },
    ]);
    expect(result.persisted).toBe(true);
    expect(store.load(currKey)).toEqual({ status: "FOUND", snapshot: snapshotOf(ranked) });
  });

  it("diffs against the previous snapshot", () => {
    const store = new RankSnapshotStoreMemoryV1();
    store.save(prevKey, { alice: { dense: 2, standard: 3 }, bob: { dense: 1, standard: 1 } });

    const result = trackRankMovement({ entries: ranked, store, current: currKey, previous: prevKey });

    expect(result.diagnostics).toEqual([]);
    expect(result.entries.map((e) => [e.username, e.movement.standard, e.movement.dense])).toEqual([
      ["alice", { kind: "UP", by: 2 }, { kind: "UP", by: 1 }],
      ["bob", { kind: "DOWN", by: 1 }, { kind: "DOWN", by: 1 }],
      ["carol", { kind: "NEW" }, { kind: "NEW" }],
    ]);
  });

  it("does not read anything for the first period", () => {
    const store = new FixedLoadStore({ status: "CORRUPT", reason: "should not be read" });
    const result = trackRankMovement({ entries: ranked, store, current: currKey, previous: null });
    expect(result.diagnostics).toEqual([]);
    expect(result.entries.every((e) => e.movement.dense.kind === "NEW")).toBe(true);
    expect(store.saved).toEqual(snapshotOf(ranked));
  });

  it("reports a corrupt snapshot and degrades to new entrants", () => {
    const store = new FixedLoadStore({ status: "CORRUPT", reason: "bad json" });
    const result = trackRankMovement({ entries: ranked, store, current: currKey, previous: prevKey });

    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0].code).toBe("SNAPSHOT_UNAVAILABLE");
    expect(result.diagnostics[0].message).toBe("previous ranks unreadable, treating everyone as new: bad json");
    expect(result.entries.every((e) => e.movement.standard.kind === "NEW")).toBe(true);
    expect(store.saved).toEqual(snapshotOf(ranked));
  });

  it("skips the write on dryRun", () => {
    const store = new RankSnapshotStoreMemoryV1();
    const result = trackRankMovement({ entries: ranked, store, current: currKey, previous: prevKey, dryRun: true });
    expect(result.persisted).toBe(false);
    expect(store.load(currKey)).toEqual({ status: "MISSING" });
  });

  it("wraps a failed write in SNAPSHOT_WRITE_FAILED", () => {
    const store = new FixedLoadStore({ status: "MISSING" }, true);
    let caught: unknown;
    try {
      trackRankMovement({ entries: ranked, store, current: currKey, previous: prevKey });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(LeaderboardErrorV1);
    expect(caught instanceof LeaderboardErrorV1 && caught.code).toBe("SNAPSHOT_WRITE_FAILED");
    expect(caught instanceof Error && caught.message).toBe("SNAPSHOT_WRITE_FAILED: poll_winner/week2: disk full");
  });

  it("carries a participant named __proto__ from one period to the next", () => {
    const store = new RankSnapshotStoreMemoryV1();
    const week = rankEntries(
      [
        { username: "__proto__", total: 3 },
        { username: "amy", total: 1 },
      ],
      (r) => r.total
    );

    const first = trackRankMovement({ entries: week, store, current: prevKey, previous: null });
    expect(Object.keys(first.snapshot)).toEqual(["__proto__", "amy"]);

    const second = trackRankMovement({ entries: week, store, current: currKey, previous: prevKey });
    expect(second.entries.map((e) => [e.username, e.movement.standard.kind, e.movement.dense.kind])).toEqual([
      ["__proto__", "SAME", "SAME"],
      ["amy", "SAME", "SAME"],
    ]);
  });

  it("gives the same result when rerun with unchanged inputs", () => {
    const store = new RankSnapshotStoreMemoryV1();
    store.save(prevKey, { alice: { dense: 3, standard: 3 } });
    const first = trackRankMovement({ entries: ranked, store, current: currKey, previous: prevKey });
    const second = trackRankMovement({ entries: ranked, store, current: currKey, previous: prevKey });
    expect(second.entries).toEqual(first.entries);
    expect(store.load(currKey)).toEqual({ status: "FOUND", snapshot: first.snapshot });
  });
});
