// src/store/rankSnapshotStore.memory.v1.ts
// In-memory RankSnapshot persistence (tests, HTTP previews). No files.

import type {
  RankPairV1,
  RankSnapshotKeyV1,
  RankSnapshotLoadV1,
  RankSnapshotStoreV1,
  RankSnapshotV1,
  Username,
} from "../contracts/leaderboard/v1/LeaderboardV1";

export function snapshotStorageKey(key: RankSnapshotKeyV1): string {
  return `${key.board}/${key.periodKey}`;
}

export class RankSnapshotStoreMemoryV1 implements RankSnapshotStoreV1 {
  private byKey = new Map<string, RankSnapshotV1>();

  load(key: RankSnapshotKeyV1): RankSnapshotLoadV1 {
    const found = this.byKey.get(snapshotStorageKey(key));
    if (!found) return { status: "MISSING" };
    return { status: "FOUND", snapshot: found };
  }

  save(key: RankSnapshotKeyV1, snapshot: RankSnapshotV1): void {
    // frozen copy; callers may keep mutating their own object
    this.byKey.set(snapshotStorageKey(key), frozenCopy(snapshot));
  }

  listKeys(): string[] {
    return Array.from(this.byKey.keys()).sort();
  }
}

function frozenCopy(snapshot: RankSnapshotV1): RankSnapshotV1 {
  return Object.freeze(
    Object.fromEntries(
      Object.entries(snapshot).map(([username, ranks]): [Username, RankPairV1] => [username, Object.freeze({ ...ranks })])
    )
  );
}
