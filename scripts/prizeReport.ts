// scripts/prizeReport.ts
//
// Prize report for the season through a cutoff week -> results/prize_winners.txt
// Read-only with respect to rank snapshots.
//
// Usage:
//   npx -y tsx scripts/prizeReport.ts --week 10

import "dotenv/config";

import fs from "node:fs";
import path from "node:path";

import { renderPrizeReport } from "../src/awards/prizeReport.v1";
import { loadLeagueConfig, resolveLeaguePath } from "../src/config/leagueConfig.v1";
import { getArg, parseWeek } from "../src/config/runConfig.v1";
import { createLogger } from "../src/logger";
import { seasonAwards, seasonStandings } from "../src/pipeline/leaguePipeline.v1";
import { LeagueSourceFsV1 } from "../src/sources/leagueSource.fs.v1";
import { RankSnapshotStoreFileV1 } from "../src/store/rankSnapshotStore.file.v1";

const log = createLogger("prizeReport");

async function main() {
  const argv = process.argv.slice(2);
  const weekRaw = getArg(argv, "--week") || process.env.LEAGUE_WEEK;
  if (!weekRaw) throw new Error("Missing required arg: --week (or LEAGUE_WEEK)");
  const week = parseWeek(weekRaw);

  const cfg = loadLeagueConfig();
  const resultsDir = resolveLeaguePath(cfg, "resultsDir");
  const deps = {
    cfg,
    source: new LeagueSourceFsV1(cfg),
    store: new RankSnapshotStoreFileV1(path.join(resultsDir, "ranks")),
  };

  const standings = seasonStandings(deps, week, { includePlayoffs: false, dryRun: true }, null);
  const awards = seasonAwards(deps, week, standings.value);
  for (const d of [...standings.diagnostics, ...awards.diagnostics]) log.warn(d.message, { code: d.code, ...d.context });

  const report = renderPrizeReport(awards.value);
  const outFile = path.join(resultsDir, "prize_winners.txt");
  fs.mkdirSync(path.dirname(outFile), { recursive: true });
  fs.writeFileSync(outFile, report, "utf8");

  console.log(report);
  console.log(`\nResults saved to: ${outFile}`);
}

main().catch((e: unknown) => {
  log.error("prizeReport failed", { error: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});
