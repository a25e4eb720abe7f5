import type { DecisionProvider } from "./decisions.js";
import type { SimLogger } from "./log.js";
import type { Rng } from "./rng.js";
import type { GameKey, GameResult, WinMethod } from "./types.js";

export type SimEvent =
  | { type: "poker:start"; playerA: string; playerB: string; smallBlind: number; bigBlind: number; pot: number }
  | { type: "poker:street"; street: string; board: string[]; pot: number }
  | { type: "poker:action"; street: string; playerId: string; action: string; amount: number; pot: number }
  | { type: "poker:end"; winner: string; winMethod: WinMethod; pot: number }
  | {
      type: "auction:round";
      round: number;
      item: string;
      bids: Record<string, number>;
      winner: string;
      winningBid: number;
      profit: number;
    }
  | { type: "auction:end"; winner: string; profits: Record<string, number> }
  | {
      type: "combat:start";
      playerA: string;
      playerB: string;
      archetypeA: string;
      archetypeB: string;
      maxHpA: number;
      maxHpB: number;
    }
  | { type: "combat:dot"; turn: number; playerId: string; damage: number; hp: number }
  | {
      type: "combat:turn";
      turn: number;
      playerId: string;
      ability: string;
      damage: number;
      hpA: number;
      hpB: number;
      mpA: number;
      mpB: number;
    }
  | { type: "combat:end"; winner: string; winMethod: WinMethod; finalHpA: number; finalHpB: number };

export interface EventSink {
  notify(event: SimEvent): void;
}

export type DecisionContext = { opponent?: string; bankroll?: string };

export interface ContextSource {
  describe(playerId: string, opponentId: string, game: GameKey): DecisionContext;
}

export type SimulatorDeps = {
  provider: DecisionProvider;
  rng?: Rng;
  sink?: EventSink;
  context?: ContextSource;
  logger?: SimLogger;
};

export type Simulator<Key extends GameKey, Details, Entry> = {
  key: Key;
  play: (playerA: string, playerB: string, wager: number) => Promise<GameResult<Key, Details, Entry>>;
};

// Spectator failures never reach the simulation.
export function emitSafely(sink: EventSink | undefined, event: SimEvent, logger: SimLogger) {
  if (!sink) return;
  try {
    sink.notify(event);
  } catch (err) {
    logger.warn({ err, eventType: event.type }, "event sink failed");
  }
}

export function assertMatchArgs(playerA: string, playerB: string, wager: number) {
  if (!playerA || !playerB) throw new Error("Both players are required");
  if (playerA === playerB) throw new Error("A player cannot face themselves");
  if (!Number.isFinite(wager) || wager <= 0) throw new RangeError(`Wager must be positive, got ${wager}`);
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
