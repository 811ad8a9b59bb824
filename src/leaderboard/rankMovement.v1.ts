// src/leaderboard/rankMovement.v1.ts
// Rank-movement tracking against the previous period's persisted RankSnapshot.
// Reads the previous snapshot once, writes the current one once (unless dryRun).

import type {
  RankMovementPairV1,
  RankMovementV1,
  RankPairV1,
  RankSnapshotKeyV1,
  RankSnapshotStoreV1,
  RankSnapshotV1,
  RankedV1,
  Username,
} from "../contracts/leaderboard/v1/LeaderboardV1";
import { diagnostic, LeaderboardErrorV1, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";

export const MOVEMENT_NEW = "N";
export const MOVEMENT_SAME = "—";

export function movementBetween(previousRank: number | undefined, currentRank: number): RankMovementV1 {
  if (previousRank === undefined) return { kind: "NEW" };
  const delta = previousRank - currentRank;
  if (delta > 0) return { kind: "UP", by: delta };
  if (delta < 0) return { kind: "DOWN", by: -delta };
  return { kind: "SAME" };
}

export function renderMovement(movement: RankMovementV1): string {
  switch (movement.kind) {
    case "UP":
      return `↑${movement.by}`;
    case "DOWN":
      return `↓${movement.by}`;
    case "SAME":
      return MOVEMENT_SAME;
    case "NEW":
      return MOVEMENT_NEW;
  }
}

/** Every username becomes an own key, including ones like "__proto__". */
export function snapshotOf(entries: ReadonlyArray<{ username: Username; ranks: RankPairV1 }>): RankSnapshotV1 {
  return Object.fromEntries(entries.map((e): [Username, RankPairV1] => [e.username, { dense: e.ranks.dense, standard: e.ranks.standard }]));
}

export function computeMovements<T extends { username: Username }>(
  entries: ReadonlyArray<RankedV1<T>>,
  previous: RankSnapshotV1 | null
): Array<RankedV1<T> & { movement: RankMovementPairV1 }> {
  return entries.map((entry) => {
    const prev = previous && Object.prototype.hasOwnProperty.call(previous, entry.username)
      ? previous[entry.username]
      : undefined;
    return {
      ...entry,
      movement: {
        standard: movementBetween(prev?.standard, entry.ranks.standard),
        dense: movementBetween(prev?.dense, entry.ranks.dense),
      },
    };
  });
}

export type TrackMovementParamsV1<T extends { username: Username }> = {
  entries: ReadonlyArray<RankedV1<T>>;
  store: RankSnapshotStoreV1;
  current: RankSnapshotKeyV1;
  /** null on the first period: everyone is a new entrant. */
  previous: RankSnapshotKeyV1 | null;
  dryRun?: boolean;
};

export type TrackedMovementV1<T extends { username: Username }> = {
  entries: Array<RankedV1<T> & { movement: RankMovementPairV1 }>;
  snapshot: RankSnapshotV1;
  persisted: boolean;
  diagnostics: DiagnosticV1[];
};

export function trackRankMovement<T extends { username: Username }>(
  params: TrackMovementParamsV1<T>
): TrackedMovementV1<T> {
  const { entries, store, current, previous } = params;
  const diagnostics: DiagnosticV1[] = [];

  let previousSnapshot: RankSnapshotV1 | null = null;
  if (previous) {
    const loaded = store.load(previous);
    if (loaded.status === "FOUND") {
      previousSnapshot = loaded.snapshot;
    } else if (loaded.status === "CORRUPT") {
      diagnostics.push(
        diagnostic("SNAPSHOT_UNAVAILABLE", `previous ranks unreadable, treating everyone as new: ${loaded.reason}`, {
          board: previous.board,
          periodKey: previous.periodKey,
        })
      );
    } else {
      diagnostics.push(
        diagnostic("SNAPSHOT_UNAVAILABLE", "no previous ranks, treating everyone as new", {
          board: previous.board,
          periodKey: previous.periodKey,
        })
      );
    }
  }

  const tracked = computeMovements(entries, previousSnapshot);
  const snapshot = snapshotOf(tracked);

  let persisted = false;
  if (!params.dryRun) {
    try {
      store.save(current, snapshot);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new LeaderboardErrorV1("SNAPSHOT_WRITE_FAILED", `${current.board}/${current.periodKey}: ${reason}`);
    }
    persisted = true;
  }

  return { entries: tracked, snapshot, persisted, diagnostics };
}
