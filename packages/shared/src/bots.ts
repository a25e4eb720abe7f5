import type {
  AuctionBidRequest,
  AuctionDecision,
  CombatAbilityRequest,
  CombatDecision,
  DecisionProvider,
  PokerActionRequest,
  PokerDecision
} from "./decisions.js";
import { mulberry32, pickOne, randomSeed, type Rng } from "./rng.js";
import type { Personality } from "./types.js";

type BotStyle = {
  // Raise when rng() exceeds this.
  raiseAbove: number;
  // Fold when the bet is more than this share of the stack.
  foldOver: number;
  // Fraction of the published range the bot is willing to pay up to.
  bidCeiling: number;
  // Heal when HP falls under this share of max.
  healUnder: number;
};

const STYLES: Record<Personality, BotStyle> = {
  aggressive: { raiseAbove: 0.7, foldOver: 1, bidCeiling: 0.8, healUnder: 0.2 },
  conservative: { raiseAbove: 0.95, foldOver: 0.3, bidCeiling: 0.55, healUnder: 0.5 },
  balanced: { raiseAbove: 0.85, foldOver: 0.6, bidCeiling: 0.7, healUnder: 0.35 },
  adaptive: { raiseAbove: 0.8, foldOver: 0.5, bidCeiling: 0.7, healUnder: 0.35 }
};

export function botPokerDecision(req: PokerActionRequest, style: BotStyle, rng: Rng): PokerDecision {
  const r = rng();
  const base = { confidence: 0.5, bluff_probability: 0, estimated_win_prob: 0.5, reasoning: "bot" };
  if (req.legalActions.includes("raise") && r > style.raiseAbove) {
    return { ...base, action: "raise", raise_amount: Math.max(req.pot / 2, req.toCall), bluff_probability: 1 - r };
  }
  if (req.legalActions.includes("fold") && req.toCall > req.stack * style.foldOver) {
    return { ...base, action: "fold", raise_amount: 0 };
  }
  return { ...base, action: "call", raise_amount: 0 };
}

export function botAuctionBid(req: AuctionBidRequest, style: BotStyle, rng: Rng): AuctionDecision {
  const low = req.minValue * 0.8;
  const high = req.minValue + (req.maxValue - req.minValue) * style.bidCeiling;
  const bid = Math.min(req.budget, low + rng() * Math.max(0, high - low));
  return { bid_amount: bid, confidence: 0.5, strategy: "value", reasoning: "bot" };
}

export function botCombatChoice(req: CombatAbilityRequest, style: BotStyle, rng: Rng): CombatDecision {
  const names = req.abilities.map(a => a.name);
  const healing = req.abilities.find(a => a.power === 0 && a.name !== "defend");
  if (healing && req.self.hp < req.self.maxHp * style.healUnder) {
    return { ability: healing.name, confidence: 0.7, reasoning: "bot heal" };
  }
  return { ability: pickOne(names, rng), confidence: 0.5, reasoning: "bot" };
}

export function createBotProvider(personalities: Record<string, Personality> = {}, seed = randomSeed()): DecisionProvider {
  const rng = mulberry32(seed);
  const styleOf = (playerId: string) => STYLES[personalities[playerId] ?? "balanced"];

  return {
    pokerAction: async (playerId, req) => botPokerDecision(req, styleOf(playerId), rng),
    auctionBid: async (playerId, req) => botAuctionBid(req, styleOf(playerId), rng),
    combatAbility: async (playerId, req) => botCombatChoice(req, styleOf(playerId), rng)
  };
}
