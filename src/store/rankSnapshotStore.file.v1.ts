// src/store/rankSnapshotStore.file.v1.ts
// RankSnapshot persistence on disk: <rootDir>/<board>/<periodKey>.json
// Layout of each file: [["<username>", { "dense": 1, "standard": 1 }], ...]
// Entries rather than an object so any username survives the JSON round trip.

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import type {
  RankSnapshotKeyV1,
  RankSnapshotLoadV1,
  RankSnapshotStoreV1,
  RankSnapshotV1,
} from "../contracts/leaderboard/v1/LeaderboardV1";

const RankPairSchema = z.object({
  dense: z.number().int().positive(),
  standard: z.number().int().positive(),
});

const RankSnapshotSchema = z.array(z.tuple([z.string(), RankPairSchema]));

const SAFE_SEGMENT = /^[A-Za-z0-9_.-]+$/;

function assertSafeSegment(value: string, field: string): void {
  if (!SAFE_SEGMENT.test(value) || value === "." || value === "..") {
    throw new Error(`SNAPSHOT_BAD_KEY: ${field}=${JSON.stringify(value)}`);
  }
}

export class RankSnapshotStoreFileV1 implements RankSnapshotStoreV1 {
  constructor(private readonly rootDir: string) {}

  pathFor(key: RankSnapshotKeyV1): string {
    assertSafeSegment(key.board, "board");
    assertSafeSegment(key.periodKey, "periodKey");
    return path.join(this.rootDir, key.board, `${key.periodKey}.json`);
  }

  load(key: RankSnapshotKeyV1): RankSnapshotLoadV1 {
    const file = this.pathFor(key);
    if (!fs.existsSync(file)) return { status: "MISSING" };

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch {
      return { status: "CORRUPT", reason: `invalid JSON in ${file}` };
    }

    const result = RankSnapshotSchema.safeParse(parsed);
    if (!result.success) {
      const first = result.error.issues[0];
      return { status: "CORRUPT", reason: `${file}: ${first ? `${first.path.join(".")} ${first.message}` : "schema violation"}` };
    }
    return { status: "FOUND", snapshot: Object.fromEntries(result.data) };
  }

  save(key: RankSnapshotKeyV1, snapshot: RankSnapshotV1): void {
    const file = this.pathFor(key);
    fs.mkdirSync(path.dirname(file), { recursive: true });

    // write-then-rename: a failed run leaves the previous file (or nothing) in place
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmp, JSON.stringify(Object.entries(snapshot)), "utf8");
      fs.renameSync(tmp, file);
    } catch (err) {
      fs.rmSync(tmp, { force: true });
      throw err;
    }
  }
}
