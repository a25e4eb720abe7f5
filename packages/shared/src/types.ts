import { z } from "zod";

export const GameKeySchema = z.enum(["poker", "auction", "combat"]);
export type GameKey = z.infer<typeof GameKeySchema>;

export const PersonalitySchema = z.enum(["aggressive", "conservative", "balanced", "adaptive"]);
export type Personality = z.infer<typeof PersonalitySchema>;

export type AdjustmentKind = "validation" | "out_of_range" | "protocol";

export type Adjustment = {
  kind: AdjustmentKind;
  field: string;
  received: unknown;
  applied: unknown;
};

export type DecisionLogEntry<Request, Response> = {
  seq: number;
  playerId: string;
  phase: string;
  request: Request;
  response: Response;
  adjustments: Adjustment[];
};

export type WinMethod = "fold" | "showdown" | "KO" | "HP advantage" | "profit";

export type GameResult<Key extends GameKey, Details, Entry> = {
  readonly gameKey: Key;
  readonly winner: string;
  readonly loser: string;
  readonly wager: number;
  readonly roundsPlayed: number;
  readonly details: Details;
  readonly decisionLog: readonly Entry[];
};

export const MatchRequestSchema = z.object({
  game: GameKeySchema,
  playerA: z.string().min(1),
  playerB: z.string().min(1),
  wager: z.number().positive().finite(),
  seed: z.number().int().nonnegative().optional(),
  matchId: z.string().uuid().optional()
});
export type MatchRequest = z.infer<typeof MatchRequestSchema>;

export const AgentCreateSchema = z.object({
  name: z.string().min(1).max(40),
  id: z.string().min(1).max(80).optional(),
  personality: PersonalitySchema.default("balanced"),
  initialBalance: z.number().positive().finite().default(1)
});
export type AgentCreate = z.infer<typeof AgentCreateSchema>;

export const TournamentCreateSchema = z.object({
  name: z.string().min(1).max(80),
  game: GameKeySchema,
  entryFee: z.number().positive().finite(),
  players: z.array(z.string().min(1)).min(2).max(16)
});
export type TournamentCreate = z.infer<typeof TournamentCreateSchema>;

export const SpectatorClientEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("spectate"), matchId: z.string().min(1) }),
  z.object({ type: z.literal("unspectate"), matchId: z.string().min(1) })
]);
export type SpectatorClientEvent = z.infer<typeof SpectatorClientEventSchema>;

export const RoundRobinSchema = z.object({
  game: GameKeySchema,
  wager: z.number().positive().finite().default(0.01)
});
export type RoundRobinRequest = z.infer<typeof RoundRobinSchema>;

export const AutoMatchSchema = RoundRobinSchema.extend({
  count: z.number().int().min(1).max(100).default(5)
});
export type AutoMatchRequest = z.infer<typeof AutoMatchSchema>;
