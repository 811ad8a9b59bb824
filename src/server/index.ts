// src/server/index.ts
import "dotenv/config";

import path from "node:path";

import { loadLeagueConfig, resolveLeaguePath } from "../config/leagueConfig.v1";
import { createLogger } from "../logger";
import { LeagueSourceFsV1 } from "../sources/leagueSource.fs.v1";
import { RankSnapshotStoreFileV1 } from "../store/rankSnapshotStore.file.v1";
import { buildServer } from "./app";

const log = createLogger("server");

async function main() {
  const cfg = loadLeagueConfig();
  const source = new LeagueSourceFsV1(cfg);
  const store = new RankSnapshotStoreFileV1(path.join(resolveLeaguePath(cfg, "resultsDir"), "ranks"));

  const app = await buildServer({ cfg, source, store });

  const port = Number(process.env.PORT ?? 3000);
  const host = process.env.HOST ?? "127.0.0.1";
  await app.listen({ port, host });
  app.log.info(`server listening on http://${host}:${port}`);
}

main().catch((err: unknown) => {
  log.error("server failed to start", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
