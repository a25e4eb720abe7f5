import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import {
  AgentCreateSchema,
  AutoMatchSchema,
  ExternalFailureError,
  MatchRequestSchema,
  RoundRobinSchema,
  TournamentCreateSchema,
  type DecisionProvider
} from "@gauntlet/shared";
import type { ZodError } from "zod";
import { toAgentView } from "./arena/agents.js";
import { ArenaError } from "./arena/errors.js";
import { ArenaManager, type ArenaConfig } from "./arena/manager.js";
import { Matchmaker, type MatchBatch } from "./arena/matchmaker.js";
import { TournamentManager } from "./arena/tournament.js";
import { SpectatorHub } from "./spectate.js";

export type AppOptions = {
  arena: ArenaConfig;
  publicOrigin: string;
  logger?: FastifyServerOptions["logger"];
  rateLimitMax?: number;
  provider?: DecisionProvider;
};

export type BuiltApp = {
  app: FastifyInstance;
  arena: ArenaManager;
  tournaments: TournamentManager;
  matchmaker: Matchmaker;
  spectators: SpectatorHub;
};

function batchView(batch: MatchBatch) {
  return { matches: batch.outcomes.map(o => o.summary), skipped: batch.skipped };
}

function badRequest(error: ZodError) {
  return { error: "Bad request", issues: error.issues.map(i => ({ path: i.path.join("."), message: i.message })) };
}

export async function buildApp(opts: AppOptions): Promise<BuiltApp> {
  const app = Fastify({ logger: opts.logger ?? true });

  await app.register(cors, {
    origin: [opts.publicOrigin],
    credentials: true
  });

  await app.register(rateLimit, { max: opts.rateLimitMax ?? 120, timeWindow: "1 minute" });

  const spectators = new SpectatorHub();
  const arena = new ArenaManager(opts.arena, {
    logger: app.log,
    sinkFor: matchId => spectators.sinkFor(matchId),
    ...(opts.provider ? { provider: opts.provider } : {})
  });
  const tournaments = new TournamentManager(arena);
  const matchmaker = new Matchmaker(arena, app.log);

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ArenaError) return reply.status(err.statusCode).send({ error: err.message });
    if (err instanceof ExternalFailureError) {
      req.log.warn({ err, game: err.game, playerId: err.playerId, phase: err.phase }, "decision provider failed");
      return reply.status(502).send({ error: err.message, playerId: err.playerId, phase: err.phase });
    }
    if (err.statusCode && err.statusCode < 500) return reply.status(err.statusCode).send({ error: err.message });
    req.log.error({ err }, "unhandled error");
    return reply.status(500).send({ error: "Internal error" });
  });

  app.get("/health", async () => ({ ok: true }));

  app.post("/agents", async (req, reply) => {
    const parsed = AgentCreateSchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(badRequest(parsed.error));
    return reply.status(201).send(arena.createAgent(parsed.data));
  });

  app.get("/agents", async () => ({ agents: arena.listAgents() }));

  app.get<{ Params: { id: string } }>("/agents/:id/opponent", async req => {
    arena.agents.get(req.params.id);
    const opponent = matchmaker.findOpponent(req.params.id);
    return { opponent: opponent ? toAgentView(opponent) : null };
  });

  app.get("/leaderboard", async () => ({ leaderboard: arena.leaderboard() }));

  app.post("/matches", async (req, reply) => {
    const parsed = MatchRequestSchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(badRequest(parsed.error));
    const outcome = await arena.runMatch(parsed.data);
    return reply.status(201).send(outcome);
  });

  app.post("/matches/round-robin", async (req, reply) => {
    const parsed = RoundRobinSchema.safeParse(req.body ?? {});
    if (!parsed.success) return reply.status(400).send(badRequest(parsed.error));
    return reply.status(201).send(batchView(await matchmaker.roundRobin(parsed.data)));
  });

  app.post("/matches/auto", async (req, reply) => {
    const parsed = AutoMatchSchema.safeParse(req.body ?? {});
    if (!parsed.success) return reply.status(400).send(badRequest(parsed.error));
    return reply.status(201).send(batchView(await matchmaker.autoMatch(parsed.data)));
  });

  app.get("/matches", async () => ({ matches: arena.matchHistory() }));

  app.post("/tournaments", async (req, reply) => {
    const parsed = TournamentCreateSchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(badRequest(parsed.error));
    const bracket = await tournaments.run(tournaments.create(parsed.data));
    return reply.status(201).send({ bracket, display: tournaments.display(bracket) });
  });

  app.get("/tournaments", async () => ({ tournaments: tournaments.list() }));

  return { app, arena, tournaments, matchmaker, spectators };
}
