// scripts/extractPolls.ts
//
// Raw poll exports -> processed per-match CSVs for one week.
//   data/raw/week<N>/poll_<kind>/<n>-<slug>.json  ->  data/processed/week<N>/poll_<kind>/<n>-<slug>.csv
//   plus data/processed/week<N>/poll_<kind>/match_status.json (status of every written match)
//
// Usage:
//   npx -y tsx scripts/extractPolls.ts --week 3
//   LEAGUE_WEEK=3 npx -y tsx scripts/extractPolls.ts
//
// Optional:
//   --dryRun   (parse and report only, write nothing)

import "dotenv/config";

import path from "node:path";

import { loadLeagueConfig } from "../src/config/leagueConfig.v1";
import { flagValue, getArg, parseWeek } from "../src/config/runConfig.v1";
import { matchTable } from "../src/leaderboard/tables.v1";
import { createLogger } from "../src/logger";
import { writeCsvTable } from "../src/output/csvSink.v1";
import { LeagueSourceFsV1 } from "../src/sources/leagueSource.fs.v1";
import { writeMatchStatusIndex } from "../src/sources/matchCsv.v1";

const log = createLogger("extractPolls");

async function main() {
  const argv = process.argv.slice(2);
  const weekRaw = getArg(argv, "--week") || process.env.LEAGUE_WEEK;
  if (!weekRaw) throw new Error("Missing required arg: --week (or LEAGUE_WEEK)");
  const week = parseWeek(weekRaw);
  const dryRun = flagValue(getArg(argv, "--dryRun"), undefined);

  const cfg = loadLeagueConfig();
  const source = new LeagueSourceFsV1(cfg);

  console.log("== extractPolls ==");
  console.log({ week, dryRun, rawDir: source.rawDir, processedDir: source.processedDir });

  let written = 0;
  for (const poll of cfg.polls) {
    const loaded = source.loadRaw(week, poll);
    if (!loaded) {
      log.warn("no raw polls", { poll, week, dir: source.rawPollDir(week, poll) });
      continue;
    }
    for (const d of loaded.diagnostics) log.warn(d.message, { code: d.code, ...d.context });

    for (const match of loaded.matches) {
      const out = path.join(source.processedPollDir(week, poll), `${match.matchId}.csv`);
      if (!dryRun) writeCsvTable(out, matchTable(poll, match));
      written += 1;
      log.info(dryRun ? "would write" : "wrote", { poll, matchId: match.matchId, status: match.status, votes: match.records.length });
    }
    if (!dryRun && loaded.matches.length > 0) writeMatchStatusIndex(source.processedPollDir(week, poll), loaded.matches);
  }

  console.log("== done ==");
  console.log({ matches: written, dryRun });
}

main().catch((e: unknown) => {
  log.error("extractPolls failed", { error: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});
