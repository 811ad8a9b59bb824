// src/server/app.ts
// Fastify instance with the leaderboard routes registered. index.ts listens; tests inject.

import Fastify from "fastify";
import cors from "@fastify/cors";

import { logLevel } from "../logger";
import type { LeaguePipelineDepsV1 } from "../pipeline/leaguePipeline.v1";
import { registerLeaderboardRoutes } from "./leaderboards.routes.v1";

export async function buildServer(deps: LeaguePipelineDepsV1) {
  const app = Fastify({ logger: { level: logLevel() } });

  await app.register(cors, { origin: true });

  app.get("/health", async () => ({ status: "ok", leagueId: deps.cfg.leagueId, season: deps.cfg.season }));

  await registerLeaderboardRoutes(app, deps);
  return app;
}
