// src/server/leaderboards.routes.v1.ts
// Read-only leaderboard API. Every request recomputes from the league source with dryRun on,
// so the API never writes rank snapshots.

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";

import { LeaderboardErrorV1, type DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import { PollKindSchema } from "../config/leagueConfig.v1";
import { renderPrizeReport } from "../awards/prizeReport.v1";
import { matchBoardTable, playoffTable, seasonTable } from "../leaderboard/tables.v1";
import {
  combinedStanding,
  detailedBoard,
  seasonAwards,
  seasonStanding,
  seasonStandings,
  weeklyBoard,
  type LeaguePipelineDepsV1,
} from "../pipeline/leaguePipeline.v1";

const WeekParamsSchema = z.object({ week: z.coerce.number().int().positive() });
const PollWeekParamsSchema = WeekParamsSchema.extend({ poll: PollKindSchema });
const SeasonQuerySchema = z.object({
  includePlayoffs: z.enum(["true", "false"]).optional(),
});
const DetailedQuerySchema = z.object({ poll: PollKindSchema.optional() });

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error("BAD_REQUEST: " + result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  return result.data;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function fail(reply: FastifyReply, e: unknown) {
  const error = errorMessage(e);
  const status = e instanceof LeaderboardErrorV1 || error.startsWith("BAD_REQUEST") ? 400 : 500;
  return reply.code(status).send({ ok: false, error });
}

export async function registerLeaderboardRoutes(app: FastifyInstance, deps: LeaguePipelineDepsV1) {
  const { cfg } = deps;

  const warnDiagnostics = (route: string, diagnostics: DiagnosticV1[]) => {
    if (diagnostics.length > 0) app.log.warn({ route, diagnostics }, "leaderboard diagnostics");
  };

  const requireConfiguredPoll = (poll: z.infer<typeof PollKindSchema>) => {
    if (!cfg.polls.includes(poll)) throw new Error(`BAD_REQUEST: poll ${poll} is not configured for this league`);
  };

  // -------------------------------
  // GET /leaderboards/combined/:week
  // -------------------------------
  app.get("/leaderboards/combined/:week", async (req, reply) => {
    try {
      const { week } = parseOrThrow(WeekParamsSchema, req.params);
      const { includePlayoffs } = parseOrThrow(SeasonQuerySchema, req.query);
      const opts = { includePlayoffs: includePlayoffs === "true", dryRun: true };
      const playoffs = opts.includePlayoffs ? deps.source.loadPlayoffs() : null;

      const standings = seasonStandings(deps, week, opts, playoffs);
      const diagnostics: DiagnosticV1[] = [...standings.diagnostics];
      const combined = combinedStanding(deps, week, opts, standings.value);
      diagnostics.push(...combined.diagnostics);
      warnDiagnostics("combined", diagnostics);

      return reply.send({ ok: true, week, table: seasonTable(combined.columns, combined.entries), diagnostics });
    } catch (e) {
      return fail(reply, e);
    }
  });

  // -------------------------------
  // GET /leaderboards/detailed/:week
  // -------------------------------
  app.get("/leaderboards/detailed/:week", async (req, reply) => {
    try {
      const { week } = parseOrThrow(WeekParamsSchema, req.params);
      const poll = parseOrThrow(DetailedQuerySchema, req.query).poll ?? "winner";
      requireConfiguredPoll(poll);

      const detailed = detailedBoard(deps, poll, week);
      warnDiagnostics("detailed", detailed.diagnostics);
      if (!detailed.value) {
        return reply.code(404).send({ ok: false, error: `NOT_FOUND: no ${poll} polls up to week ${week}` });
      }
      const table = matchBoardTable(poll, detailed.value.labels, detailed.value.entries, "DETAILED");
      return reply.send({ ok: true, week, poll, table, diagnostics: detailed.diagnostics });
    } catch (e) {
      return fail(reply, e);
    }
  });

  // -------------------------------
  // GET /leaderboards/:poll/weekly/:week
  // -------------------------------
  app.get("/leaderboards/:poll/weekly/:week", async (req, reply) => {
    try {
      const { poll, week } = parseOrThrow(PollWeekParamsSchema, req.params);
      requireConfiguredPoll(poll);

      const weekly = weeklyBoard(deps, poll, week);
      warnDiagnostics("weekly", weekly.diagnostics);
      if (!weekly.value) {
        return reply.code(404).send({ ok: false, error: `NOT_FOUND: no ${poll} polls for week ${week}` });
      }
      const table = matchBoardTable(poll, weekly.value.labels, weekly.value.entries);
      return reply.send({ ok: true, week, poll, table, diagnostics: weekly.diagnostics });
    } catch (e) {
      return fail(reply, e);
    }
  });

  // -------------------------------
  // GET /leaderboards/:poll/season/:week
  // -------------------------------
  app.get("/leaderboards/:poll/season/:week", async (req, reply) => {
    try {
      const { poll, week } = parseOrThrow(PollWeekParamsSchema, req.params);
      const { includePlayoffs } = parseOrThrow(SeasonQuerySchema, req.query);
      requireConfiguredPoll(poll);

      const standing = seasonStanding(deps, poll, week, { includePlayoffs: includePlayoffs === "true", dryRun: true });
      warnDiagnostics("season", standing.diagnostics);
      return reply.send({
        ok: true,
        week,
        poll,
        table: seasonTable(standing.columns, standing.entries),
        diagnostics: standing.diagnostics,
      });
    } catch (e) {
      return fail(reply, e);
    }
  });

  // -------------------------------
  // GET /playoffs
  // -------------------------------
  app.get("/playoffs", async (_req, reply) => {
    try {
      const playoffs = deps.source.loadPlayoffs();
      if (!playoffs) return reply.code(404).send({ ok: false, error: "NOT_FOUND: no playoff prediction poll" });
      warnDiagnostics("playoffs", playoffs.diagnostics);
      if (!playoffs.ok) {
        return reply.code(400).send({ ok: false, error: "POLL_INVALID: playoff poll rejected", diagnostics: playoffs.diagnostics });
      }
      return reply.send({
        ok: true,
        qualifiedTeams: playoffs.qualifiedTeams,
        table: playoffTable(playoffs.entries),
        diagnostics: playoffs.diagnostics,
      });
    } catch (e) {
      return fail(reply, e);
    }
  });

  // -------------------------------
  // GET /awards/:week
  // -------------------------------
  app.get("/awards/:week", async (req, reply) => {
    try {
      const { week } = parseOrThrow(WeekParamsSchema, req.params);
      const opts = { includePlayoffs: false, dryRun: true };

      const standings = seasonStandings(deps, week, opts, null);
      const awards = seasonAwards(deps, week, standings.value);
      warnDiagnostics("awards", awards.diagnostics);

      return reply.send({ ok: true, week, awards: awards.value, report: renderPrizeReport(awards.value) });
    } catch (e) {
      return fail(reply, e);
    }
  });
}
