// src/config/leagueConfig.v1.ts
// League configuration loader (read-only). JSON on disk, validated with zod.

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function readJsonFile<T>(absPath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (!fs.existsSync(absPath)) throw new Error(`CONFIG_NOT_FOUND: ${absPath}`);
  const raw = fs.readFileSync(absPath, "utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`CONFIG_INVALID_JSON: ${absPath}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `CONFIG_SCHEMA_VIOLATION: ${absPath}\n` +
        result.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n")
    );
  }
  return result.data;
}

export function repoRootConfigPath(filename: string): string {
  return path.join(process.cwd(), "config", filename);
}

// ---- Schemas ----

export const PollKindSchema = z.enum(["winner", "margin"]);

export const UnmatchedMarginPolicySchema = z.enum(["NO_CORRECT_ANSWER", "VOID"]);

export const LeagueConfigSchema = z.object({
  leagueId: z.string().min(1),
  season: z.string().min(1),
  /** Full team name -> short code. */
  teams: z.record(z.string().min(1), z.string().min(1)),
  polls: z.array(PollKindSchema).min(1),
  noResultMarkers: z.array(z.string().min(1)).default([]),
  defaultMatchPoints: z.number().nonnegative().default(1),
  unmatchedMarginPolicy: UnmatchedMarginPolicySchema.default("NO_CORRECT_ANSWER"),
  playoffs: z
    .object({
      qualifierCount: z.number().int().positive(),
      bonusLabel: z.string().min(1),
    })
    .default({ qualifierCount: 4, bonusLabel: "Playoffs" }),
  awards: z
    .object({
      topFinishers: z.number().int().positive(),
      streakPlaces: z.number().int().positive(),
      teamOfInterest: z.string().min(1).optional(),
      teamVoterPlaces: z.number().int().positive(),
    })
    .default({ topFinishers: 3, streakPlaces: 3, teamVoterPlaces: 3 }),
  paths: z.object({
    rawDir: z.string().min(1),
    processedDir: z.string().min(1),
    resultsDir: z.string().min(1),
  }),
});

// ---- Types ----
export type LeagueConfig = z.infer<typeof LeagueConfigSchema>;
export type UnmatchedMarginPolicy = z.infer<typeof UnmatchedMarginPolicySchema>;

export function validateLeagueConfig(cfg: LeagueConfig): LeagueConfig {
  const seenPolls = new Set<string>();
  for (const p of cfg.polls) {
    if (seenPolls.has(p)) throw new Error(`CONFIG_DUPLICATE_POLL_KIND: ${p}`);
    seenPolls.add(p);
  }

  const seenShort = new Map<string, string>();
  for (const [full, short] of Object.entries(cfg.teams)) {
    const prior = seenShort.get(short);
    if (prior) throw new Error(`CONFIG_DUPLICATE_TEAM_SHORT_NAME: ${short} (${prior}, ${full})`);
    seenShort.set(short, full);
  }
  return cfg;
}

export function loadLeagueConfig(absPath?: string): LeagueConfig {
  const p = absPath ?? process.env.LEAGUE_CONFIG_PATH ?? repoRootConfigPath("leagueConfig.default.json");
  return validateLeagueConfig(readJsonFile(path.resolve(p), LeagueConfigSchema));
}

/** Resolves a configured directory against the working directory. */
export function resolveLeaguePath(cfg: LeagueConfig, key: keyof LeagueConfig["paths"]): string {
  return path.resolve(process.cwd(), cfg.paths[key]);
}
