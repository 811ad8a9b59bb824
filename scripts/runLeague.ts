// scripts/runLeague.ts
//
// One pipeline run for a cutoff week: weekly boards, season standings (per poll + combined),
// the detailed winner board and playoff results, written under results/.
// Rank snapshots are read from results/ranks/<board>/week<N-1>.json and written for week<N>.
//
// Usage:
//   npx -y tsx scripts/runLeague.ts --week 3
//   npx -y tsx scripts/runLeague.ts --week 10 --includePlayoffs true --format xlsx
//
// Optional:
//   --dryRun   (write boards, leave rank snapshots untouched)

import "dotenv/config";

import path from "node:path";

import { LeaderboardErrorV1 } from "../src/contracts/leaderboard/v1/DiagnosticsV1";
import { loadLeagueConfig, resolveLeaguePath } from "../src/config/leagueConfig.v1";
import { parseRunConfig } from "../src/config/runConfig.v1";
import { createLogger } from "../src/logger";
import { writeLeagueOutputs } from "../src/pipeline/leagueOutputs.v1";
import { runLeague } from "../src/pipeline/leaguePipeline.v1";
import { LeagueSourceFsV1 } from "../src/sources/leagueSource.fs.v1";
import { RankSnapshotStoreFileV1 } from "../src/store/rankSnapshotStore.file.v1";

const log = createLogger("runLeague");

async function main() {
  const run = parseRunConfig(process.argv.slice(2));
  const cfg = loadLeagueConfig();
  const resultsDir = resolveLeaguePath(cfg, "resultsDir");

  const deps = {
    cfg,
    source: new LeagueSourceFsV1(cfg),
    store: new RankSnapshotStoreFileV1(path.join(resultsDir, "ranks")),
  };

  console.log("== runLeague ==");
  console.log({ ...run, leagueId: cfg.leagueId, season: cfg.season });

  const result = runLeague(deps, run.week, { includePlayoffs: run.includePlayoffs, dryRun: run.dryRun });
  for (const d of result.diagnostics) log.warn(d.message, { code: d.code, ...d.context });

  const written = writeLeagueOutputs(result, cfg.polls, { resultsDir, format: run.format });
  for (const file of written) log.info("wrote", { file });

  console.log("== done ==");
  console.log({
    week: result.week,
    combinedRows: result.combined.entries.length,
    snapshotPersisted: result.combined.snapshotPersisted,
    diagnostics: result.diagnostics.length,
    files: written.length,
  });
}

main().catch((e: unknown) => {
  const code = e instanceof LeaderboardErrorV1 ? e.code : undefined;
  log.error("runLeague failed", { error: e instanceof Error ? e.message : String(e), code });
  process.exit(1);
});
