// apps/server/src/index.ts
import { Server } from "socket.io";
import { buildApp } from "./app.js";
import { env } from "./env.js";
import { ARENA_ROOM, handleSpectatorMessage, type SpectatorServerEvent } from "./spectate.js";

type ServerToClientEvents = { evt: (evt: SpectatorServerEvent) => void };
type ClientToServerEvents = { evt: (msg: unknown) => void };

const { app, spectators } = await buildApp({
  publicOrigin: env.PUBLIC_ORIGIN,
  logger: { level: env.LOG_LEVEL },
  arena: {
    riskLevel: env.RISK_LEVEL,
    maxWagerPct: env.MAX_WAGER_PCT,
    houseFee: env.HOUSE_FEE,
    decisionTimeoutMs: env.DECISION_TIMEOUT_MS,
    auctionRounds: env.AUCTION_ROUNDS,
    combatMaxTurns: env.COMBAT_MAX_TURNS,
    smallBlindFraction: env.POKER_SMALL_BLIND_FRACTION
  }
});

const io = new Server<ClientToServerEvents, ServerToClientEvents>(app.server, {
  cors: { origin: [env.PUBLIC_ORIGIN], credentials: true },
  transports: ["websocket"]
});

spectators.attach((rooms, evt) => {
  io.to(rooms).emit("evt", evt);
});

io.on("connection", socket => {
  // Everyone watches the arena feed; match rooms are opt-in.
  void socket.join(ARENA_ROOM);

  socket.on("evt", msg => {
    const reply = handleSpectatorMessage(msg, {
      join: room => void socket.join(room),
      leave: room => void socket.leave(room)
    });
    socket.emit("evt", reply);
  });
});

await app.listen({ port: env.PORT, host: env.HOST });
app.log.info(`Server listening on :${env.PORT}`);
