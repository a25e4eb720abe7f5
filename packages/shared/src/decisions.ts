import { z } from "zod";
import { ExternalFailureError } from "./errors.js";
import type { Adjustment, GameKey } from "./types.js";

export const PokerActionSchema = z.enum(["fold", "call", "raise"]);
export type PokerActionType = z.infer<typeof PokerActionSchema>;

export type Street = "preflop" | "flop" | "turn" | "river";

export type PokerActionRequest = {
  holeCards: string[];
  communityCards: string[];
  pot: number;
  stack: number;
  opponentStack: number;
  position: "SB" | "BB";
  toCall: number;
  street: Street;
  legalActions: PokerActionType[];
  opponentContext?: string;
  bankrollContext?: string;
};

export type PokerDecision = {
  action: PokerActionType;
  raise_amount: number;
  confidence: number;
  bluff_probability: number;
  estimated_win_prob: number;
  reasoning: string;
};

export type BidHistoryEntry = {
  round: number;
  item: string;
  yourBid: number;
  winningBid: number;
  won: boolean;
};

export type AuctionBidRequest = {
  itemDescription: string;
  estimatedValue: number;
  minValue: number;
  maxValue: number;
  budget: number;
  numBidders: number;
  round: number;
  totalRounds: number;
  bidHistory: BidHistoryEntry[];
  opponentContext?: string;
  bankrollContext?: string;
};

export type AuctionDecision = {
  bid_amount: number;
  confidence: number;
  strategy: string;
  reasoning: string;
};

export type FighterSnapshot = {
  playerId: string;
  archetype: string;
  hp: number;
  maxHp: number;
  mp: number;
  maxMp: number;
  attack: number;
  defense: number;
  speed: number;
  defending: boolean;
  modifiers: { stat: string; delta: number; remaining: number }[];
  dots: { damage: number; remaining: number }[];
  status: string;
};

export type AbilityOption = {
  name: string;
  description: string;
  cost: number;
  power: number;
};

export type CombatAbilityRequest = {
  self: FighterSnapshot;
  opponent: FighterSnapshot;
  abilities: AbilityOption[];
  turn: number;
  maxTurns: number;
};

export type CombatDecision = {
  ability: string;
  confidence: number;
  reasoning: string;
};

// Responses are untrusted: an object, or JSON text as a language model would return it.
export interface DecisionProvider {
  pokerAction(playerId: string, request: PokerActionRequest): Promise<unknown>;
  auctionBid(playerId: string, request: AuctionBidRequest): Promise<unknown>;
  combatAbility(playerId: string, request: CombatAbilityRequest): Promise<unknown>;
}

export type Validated<T> = { decision: T; adjustments: Adjustment[] };

type Payload = Record<string, unknown>;

const PayloadSchema = z.record(z.string(), z.unknown());
const FiniteNumber = z.number().finite();
const Text = z.string();

export function parsePayload(raw: unknown): Payload | null {
  let value = raw;
  if (typeof raw === "string") {
    const cleaned = raw
      .trim()
      .split("\n")
      .filter(line => !line.trim().startsWith("```"))
      .join("\n");
    try {
      value = JSON.parse(cleaned);
    } catch {
      return null;
    }
  }
  const parsed = PayloadSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export async function consult(
  call: () => Promise<unknown>,
  where: { game: GameKey; playerId: string; phase: string }
): Promise<Payload> {
  let raw: unknown;
  try {
    raw = await call();
  } catch (err) {
    throw new ExternalFailureError(`Decision provider failed for ${where.playerId} (${where.phase})`, {
      ...where,
      cause: err
    });
  }
  const payload = parsePayload(raw);
  if (!payload) {
    throw new ExternalFailureError(`Unparsable decision for ${where.playerId} (${where.phase})`, {
      ...where,
      cause: raw
    });
  }
  return payload;
}

function readField<T>(payload: Payload, field: string, schema: z.ZodType<T>, fallback: T, adjustments: Adjustment[]): T {
  const parsed = schema.safeParse(payload[field]);
  if (parsed.success) return parsed.data;
  adjustments.push({ kind: "validation", field, received: payload[field] ?? null, applied: fallback });
  return fallback;
}

function readText(payload: Payload, field: string, fallback: string): string {
  const parsed = Text.safeParse(payload[field]);
  return parsed.success ? parsed.data : fallback;
}

function clamp(value: number, min: number, max: number, field: string, adjustments: Adjustment[]): number {
  const applied = Math.min(Math.max(value, min), max);
  if (applied !== value) adjustments.push({ kind: "out_of_range", field, received: value, applied });
  return applied;
}

function readProbability(payload: Payload, field: string, fallback: number, adjustments: Adjustment[]): number {
  return clamp(readField(payload, field, FiniteNumber, fallback, adjustments), 0, 1, field, adjustments);
}

export function validatePokerDecision(
  payload: Payload,
  limits: { toCall: number; stack: number; bigBlind: number; legal: readonly PokerActionType[] }
): Validated<PokerDecision> {
  const adjustments: Adjustment[] = [];
  const requested = readField(payload, "action", Text, "fold", adjustments);
  const known = PokerActionSchema.safeParse(requested);
  let action: PokerActionType = "fold";
  if (known.success) action = known.data;
  else adjustments.push({ kind: "protocol", field: "action", received: requested, applied: "fold" });

  // Folding for free is a check; raising past the cap (or with nothing behind) is a call.
  if (!limits.legal.includes(action)) {
    adjustments.push({ kind: "protocol", field: "action", received: action, applied: "call" });
    action = "call";
  }

  let raiseAmount = readField(payload, "raise_amount", FiniteNumber, 0, action === "raise" ? adjustments : []);
  if (action === "raise") {
    const behind = limits.stack - Math.min(limits.toCall, limits.stack);
    raiseAmount = clamp(raiseAmount, Math.min(limits.bigBlind, behind), behind, "raise_amount", adjustments);
  }

  return {
    decision: {
      action,
      raise_amount: raiseAmount,
      confidence: readProbability(payload, "confidence", 0.5, adjustments),
      bluff_probability: readProbability(payload, "bluff_probability", 0, adjustments),
      estimated_win_prob: readProbability(payload, "estimated_win_prob", 0.5, adjustments),
      reasoning: readText(payload, "reasoning", "")
    },
    adjustments
  };
}

export const MIN_BID = 0.001;

export function validateAuctionBid(payload: Payload, limits: { budget: number }): Validated<AuctionDecision> {
  const adjustments: Adjustment[] = [];
  const requested = readField(payload, "bid_amount", FiniteNumber, 0, adjustments);
  const floor = Math.min(MIN_BID, limits.budget);
  return {
    decision: {
      bid_amount: clamp(requested, floor, limits.budget, "bid_amount", adjustments),
      confidence: readProbability(payload, "confidence", 0.5, adjustments),
      strategy: readField(payload, "strategy", Text.min(1), "value", adjustments),
      reasoning: readText(payload, "reasoning", "")
    },
    adjustments
  };
}

export function validateCombatChoice(payload: Payload, options: readonly string[]): Validated<CombatDecision> {
  if (options.length === 0) throw new Error("No ability options to choose from");
  const adjustments: Adjustment[] = [];
  let ability = readField(payload, "ability", Text.min(1), options[0], adjustments);
  if (!options.includes(ability)) {
    adjustments.push({ kind: "protocol", field: "ability", received: ability, applied: options[0] });
    ability = options[0];
  }
  return {
    decision: {
      ability,
      confidence: readProbability(payload, "confidence", 0.5, adjustments),
      reasoning: readText(payload, "reasoning", "")
    },
    adjustments
  };
}
