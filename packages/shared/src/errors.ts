import type { GameKey } from "./types.js";

export class ExternalFailureError extends Error {
  readonly game: GameKey;
  readonly playerId: string;
  readonly phase: string;

  constructor(message: string, details: { game: GameKey; playerId: string; phase: string; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.name = "ExternalFailureError";
    this.game = details.game;
    this.playerId = details.playerId;
    this.phase = details.phase;
  }
}

export class DecisionTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Decision provider did not answer within ${timeoutMs}ms`);
    this.name = "DecisionTimeoutError";
  }
}
