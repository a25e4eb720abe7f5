// apps/server/test/support.ts
import { pino } from "pino";
import type { ArenaConfig } from "../src/arena/manager.js";

export const testConfig: ArenaConfig = {
  riskLevel: "medium",
  houseFee: 0.01,
  decisionTimeoutMs: 1000,
  auctionRounds: 5,
  combatMaxTurns: 20,
  smallBlindFraction: 0.05
};

export const quietLogger = pino({ level: "silent" });
