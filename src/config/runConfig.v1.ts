// src/config/runConfig.v1.ts
// Per-invocation run configuration: which week to process and how.
// CLI flags win over environment (LEAGUE_WEEK, LEAGUE_INCLUDE_PLAYOFFS, LEAGUE_FORMAT).

import { z } from "zod";

export const RunConfigSchema = z.object({
  /** Cutoff week (1-based). Weekly boards are built for this week; season boards through it. */
  week: z.number().int().positive(),
  includePlayoffs: z.boolean(),
  /** Compute and write outputs but leave rank snapshots untouched. */
  dryRun: z.boolean(),
  format: z.enum(["csv", "xlsx"]),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

export function getArg(argv: readonly string[], flag: string): string | undefined {
  const idx = argv.findIndex((a) => a === flag);
  if (idx === -1) return undefined;
  const next = argv[idx + 1];
  if (next === undefined || next.startsWith("--")) return "";
  return next;
}

export function toBool(v: string | undefined, fallback: boolean): boolean {
  if (v === undefined || v === "") return fallback;
  const normalized = v.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "n", "off"].includes(normalized)) return false;
  throw new Error(`Invalid boolean value: ${v}`);
}

/** A bare flag ("--dryRun") means true; an absent flag falls back to the env value. */
export function flagValue(v: string | undefined, envValue: string | undefined): boolean {
  if (v === "") return true;
  return toBool(v ?? envValue, false);
}

/** Accepts "3", "week3" or "Week3". */
export function parseWeek(v: string): number {
  const m = /^(?:week)?\s*(\d+)$/i.exec(v.trim());
  if (!m) throw new Error(`Invalid week: ${v}`);
  return Number.parseInt(m[1], 10);
}

export function parseRunConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): RunConfig {
  const weekRaw = getArg(argv, "--week") || env.LEAGUE_WEEK;
  if (!weekRaw) throw new Error("Missing required arg: --week (or LEAGUE_WEEK)");

  const candidate = {
    week: parseWeek(weekRaw),
    includePlayoffs: flagValue(getArg(argv, "--includePlayoffs"), env.LEAGUE_INCLUDE_PLAYOFFS),
    dryRun: flagValue(getArg(argv, "--dryRun"), undefined),
    format: getArg(argv, "--format") || env.LEAGUE_FORMAT || "csv",
  };

  const result = RunConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(
      "RUN_CONFIG_INVALID:\n" + result.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n")
    );
  }
  return result.data;
}

export function periodKey(week: number): string {
  return `week${week}`;
}
