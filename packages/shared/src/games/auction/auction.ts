import {
  consult,
  validateAuctionBid,
  type AuctionBidRequest,
  type AuctionDecision,
  type BidHistoryEntry
} from "../../decisions.js";
import { assertMatchArgs, deepFreeze, emitSafely, type Simulator, type SimulatorDeps } from "../../gameInterface.js";
import { silentLogger } from "../../log.js";
import { mulberry32, pickOne, randomSeed } from "../../rng.js";
import type { DecisionLogEntry, GameResult } from "../../types.js";
import { AUCTION_ITEMS, estimatedValue, type AuctionItem } from "./items.js";

export const DEFAULT_AUCTION_ROUNDS = 5;
export const BIDDERS_PER_ROUND = 2;

export type AuctionOptions = {
  rounds?: number;
  items?: readonly AuctionItem[];
};

export type AuctionRoundRecord = {
  round: number;
  item: string;
  minValue: number;
  maxValue: number;
  trueValue: number;
  bids: Record<string, number>;
  winner: string;
  winningBid: number;
  profit: number;
  tieBroken: boolean;
};

export type AuctionDetails = {
  rounds: AuctionRoundRecord[];
  profits: Record<string, number>;
  budgetsRemaining: Record<string, number>;
  winMethod: "profit";
};

export type AuctionDecisionLogEntry = DecisionLogEntry<AuctionBidRequest, AuctionDecision>;
export type AuctionResult = GameResult<"auction", AuctionDetails, AuctionDecisionLogEntry>;

export function createAuctionSimulator(
  deps: SimulatorDeps,
  opts: AuctionOptions = {}
): Simulator<"auction", AuctionDetails, AuctionDecisionLogEntry> {
  const logger = deps.logger ?? silentLogger;
  const totalRounds = opts.rounds ?? DEFAULT_AUCTION_ROUNDS;
  const items = opts.items ?? AUCTION_ITEMS;

  return {
    key: "auction",

    play: async (playerA, playerB, wager) => {
      assertMatchArgs(playerA, playerB, wager);
      if (!Number.isInteger(totalRounds) || totalRounds < 1) {
        throw new RangeError(`rounds must be a positive integer, got ${totalRounds}`);
      }
      if (items.length === 0) throw new Error("Auction needs at least one item");
      const rng = deps.rng ?? mulberry32(randomSeed());
      const players = [playerA, playerB];

      const budgets: Record<string, number> = { [playerA]: wager, [playerB]: wager };
      const profits: Record<string, number> = { [playerA]: 0, [playerB]: 0 };
      const history: Record<string, BidHistoryEntry[]> = { [playerA]: [], [playerB]: [] };
      const rounds: AuctionRoundRecord[] = [];
      const decisions: AuctionDecisionLogEntry[] = [];

      logger.info({ playerA, playerB, wager, rounds: totalRounds }, "auction started");

      async function askBid(player: string, opponent: string, item: AuctionItem, round: number): Promise<number> {
        const ctx = deps.context?.describe(player, opponent, "auction") ?? {};
        const request: AuctionBidRequest = {
          itemDescription: item.name,
          estimatedValue: estimatedValue(item),
          minValue: item.minValue,
          maxValue: item.maxValue,
          budget: budgets[player],
          numBidders: BIDDERS_PER_ROUND,
          round,
          totalRounds,
          bidHistory: history[player].map(h => ({ ...h })),
          ...(ctx.opponent !== undefined ? { opponentContext: ctx.opponent } : {}),
          ...(ctx.bankroll !== undefined ? { bankrollContext: ctx.bankroll } : {})
        };
        const snapshot = structuredClone(request);
        const phase = `round ${round}`;
        const payload = await consult(() => deps.provider.auctionBid(player, request), {
          game: "auction",
          playerId: player,
          phase
        });
        const { decision, adjustments } = validateAuctionBid(payload, { budget: budgets[player] });
        if (adjustments.length > 0) logger.debug({ player, round, adjustments }, "auction bid adjusted");
        decisions.push({ seq: decisions.length, playerId: player, phase, request: snapshot, response: decision, adjustments });
        return decision.bid_amount;
      }

      for (let round = 1; round <= totalRounds; round++) {
        const item = pickOne(items, rng);
        const trueValue = item.minValue + rng() * (item.maxValue - item.minValue);

        // Both bids are sealed: neither is applied until both are in.
        const bidA = await askBid(playerA, playerB, item, round);
        const bidB = await askBid(playerB, playerA, item, round);

        const tieBroken = bidA === bidB;
        const aWins = tieBroken ? rng() < 0.5 : bidA > bidB;
        const winner = aWins ? playerA : playerB;
        const winningBid = aWins ? bidA : bidB;
        const profit = trueValue - winningBid;

        budgets[winner] -= winningBid;
        profits[winner] += profit;
        const bids = { [playerA]: bidA, [playerB]: bidB };
        for (const p of players) {
          history[p].push({ round, item: item.name, yourBid: bids[p], winningBid, won: p === winner });
        }
        rounds.push({
          round,
          item: item.name,
          minValue: item.minValue,
          maxValue: item.maxValue,
          trueValue,
          bids,
          winner,
          winningBid,
          profit,
          tieBroken
        });

        logger.debug({ round, item: item.name, bids, winner, profit }, "auction round");
        emitSafely(deps.sink, { type: "auction:round", round, item: item.name, bids, winner, winningBid, profit }, logger);
      }

      // Equal cumulative profit goes to player A.
      const aAhead = profits[playerA] >= profits[playerB];
      const winner = aAhead ? playerA : playerB;
      const loser = aAhead ? playerB : playerA;

      logger.info({ winner, profits }, "auction finished");
      emitSafely(deps.sink, { type: "auction:end", winner, profits: { ...profits } }, logger);

      const result: AuctionResult = {
        gameKey: "auction",
        winner,
        loser,
        wager,
        roundsPlayed: rounds.length,
        details: {
          rounds,
          profits,
          budgetsRemaining: budgets,
          winMethod: "profit"
        },
        decisionLog: decisions
      };
      return deepFreeze(result);
    }
  };
}
