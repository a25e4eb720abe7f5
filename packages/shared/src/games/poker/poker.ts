import {
  consult,
  validatePokerDecision,
  type PokerActionRequest,
  type PokerActionType,
  type PokerDecision,
  type Street
} from "../../decisions.js";
import { assertMatchArgs, deepFreeze, emitSafely, type Simulator, type SimulatorDeps } from "../../gameInterface.js";
import { silentLogger } from "../../log.js";
import { mulberry32, randomSeed } from "../../rng.js";
import type { DecisionLogEntry, GameResult } from "../../types.js";
import {
  cardLabel,
  cardsLabel,
  compareHandScores,
  Deck,
  handName,
  scoreHand,
  type Card,
  type HandScore
} from "../cards/cards.js";

export type PokerOptions = {
  // Absolute small blind; wins over smallBlindFraction.
  smallBlind?: number;
  smallBlindFraction?: number;
  maxPassesPerStreet?: number;
};

export type PokerActionLogEntry = {
  street: Street;
  playerId: string;
  action: PokerActionType;
  amount: number;
  toCall: number;
  pot: number;
  bluffProbability: number;
};

export type PokerDetails = {
  handA: string;
  handB: string;
  handAName: string;
  handBName: string;
  community: string;
  board: string[];
  pot: number;
  winMethod: "fold" | "showdown";
  smallBlind: number;
  bigBlind: number;
  remainingStacks: Record<string, number>;
  scores: Record<string, HandScore> | null;
  actions: PokerActionLogEntry[];
};

export type PokerDecisionLogEntry = DecisionLogEntry<PokerActionRequest, PokerDecision>;
export type PokerResult = GameResult<"poker", PokerDetails, PokerDecisionLogEntry>;

export type BettingState = {
  toCall: Record<string, number>;
  hasActed: Record<string, boolean>;
};

type PokerState = {
  playerA: string;
  playerB: string;
  deck: Deck;
  hole: Record<string, Card[]>;
  board: Card[];
  pot: number;
  stacks: Record<string, number>;
  smallBlind: number;
  bigBlind: number;
  actions: PokerActionLogEntry[];
  decisions: PokerDecisionLogEntry[];
};

const STREETS: { street: Street; deal: number }[] = [
  { street: "preflop", deal: 0 },
  { street: "flop", deal: 3 },
  { street: "turn", deal: 1 },
  { street: "river", deal: 1 }
];

export const DEFAULT_SMALL_BLIND_FRACTION = 0.05;
export const MAX_PASSES_PER_STREET = 4;

export function streetComplete(betting: BettingState, players: readonly string[]): boolean {
  return players.every(p => betting.hasActed[p] && betting.toCall[p] <= 0);
}

export function legalPokerActions(toCall: number, stack: number, finalPass: boolean): PokerActionType[] {
  const legal: PokerActionType[] = [];
  if (toCall > 0) legal.push("fold");
  legal.push("call");
  if (!finalPass && stack > toCall) legal.push("raise");
  return legal;
}

export function createPokerSimulator(deps: SimulatorDeps, opts: PokerOptions = {}): Simulator<"poker", PokerDetails, PokerDecisionLogEntry> {
  const logger = deps.logger ?? silentLogger;
  const maxPasses = opts.maxPassesPerStreet ?? MAX_PASSES_PER_STREET;

  async function askPlayer(
    s: PokerState,
    street: Street,
    player: string,
    toCall: number,
    finalPass: boolean
  ): Promise<PokerDecision> {
    const opponent = player === s.playerA ? s.playerB : s.playerA;
    const legal = legalPokerActions(toCall, s.stacks[player], finalPass);
    const ctx = deps.context?.describe(player, opponent, "poker") ?? {};
    const request: PokerActionRequest = {
      holeCards: s.hole[player].map(cardLabel),
      communityCards: s.board.map(cardLabel),
      pot: s.pot,
      stack: s.stacks[player],
      opponentStack: s.stacks[opponent],
      position: player === s.playerA ? "SB" : "BB",
      toCall,
      street,
      legalActions: legal,
      ...(ctx.opponent !== undefined ? { opponentContext: ctx.opponent } : {}),
      ...(ctx.bankroll !== undefined ? { bankrollContext: ctx.bankroll } : {})
    };

    const snapshot = structuredClone(request);
    const payload = await consult(() => deps.provider.pokerAction(player, request), {
      game: "poker",
      playerId: player,
      phase: street
    });
    const { decision, adjustments } = validatePokerDecision(payload, {
      toCall,
      stack: s.stacks[player],
      bigBlind: s.bigBlind,
      legal
    });
    if (adjustments.length > 0) logger.debug({ player, street, adjustments }, "poker decision adjusted");

    s.decisions.push({ seq: s.decisions.length, playerId: player, phase: street, request: snapshot, response: decision, adjustments });
    return decision;
  }

  function move(s: PokerState, player: string, amount: number): number {
    const paid = Math.min(amount, s.stacks[player]);
    s.stacks[player] -= paid;
    s.pot += paid;
    return paid;
  }

  // Returns the id of the player who folded, or null.
  async function runBettingRound(s: PokerState, street: Street): Promise<string | null> {
    const seats = [s.playerA, s.playerB];
    const betting: BettingState = {
      toCall: {
        [s.playerA]: street === "preflop" ? Math.max(0, s.bigBlind - s.smallBlind) : 0,
        [s.playerB]: 0
      },
      hasActed: { [s.playerA]: false, [s.playerB]: false }
    };

    for (let pass = 0; pass < maxPasses; pass++) {
      const finalPass = pass === maxPasses - 1;
      for (const player of seats) {
        const opponent = player === s.playerA ? s.playerB : s.playerA;
        if (betting.hasActed[player] && betting.toCall[player] <= 0) continue;

        // All-in: nothing left to choose or to owe.
        if (s.stacks[player] <= 0) {
          betting.hasActed[player] = true;
          betting.toCall[player] = 0;
          continue;
        }

        const toCall = Math.max(betting.toCall[player], 0);
        const decision = await askPlayer(s, street, player, toCall, finalPass);

        if (decision.action === "fold") {
          s.actions.push({
            street,
            playerId: player,
            action: "fold",
            amount: 0,
            toCall,
            pot: s.pot,
            bluffProbability: decision.bluff_probability
          });
          logger.debug({ street, player }, "fold");
          emitSafely(deps.sink, { type: "poker:action", street, playerId: player, action: "fold", amount: 0, pot: s.pot }, logger);
          return player;
        }

        let amount = move(s, player, toCall);
        betting.toCall[player] = 0;
        betting.hasActed[player] = true;
        if (decision.action === "raise") {
          const raised = move(s, player, decision.raise_amount);
          betting.toCall[opponent] = raised;
          amount += raised;
        }

        s.actions.push({
          street,
          playerId: player,
          action: decision.action,
          amount,
          toCall,
          pot: s.pot,
          bluffProbability: decision.bluff_probability
        });
        logger.debug({ street, player, action: decision.action, amount, pot: s.pot }, "poker action");
        emitSafely(
          deps.sink,
          { type: "poker:action", street, playerId: player, action: decision.action, amount, pot: s.pot },
          logger
        );
      }

      if (streetComplete(betting, seats)) break;
    }
    return null;
  }

  return {
    key: "poker",

    play: async (playerA, playerB, wager) => {
      assertMatchArgs(playerA, playerB, wager);
      const rng = deps.rng ?? mulberry32(randomSeed());
      if (!Number.isInteger(maxPasses) || maxPasses < 1) {
        throw new RangeError(`maxPassesPerStreet must be a positive integer, got ${maxPasses}`);
      }
      const smallBlind = opts.smallBlind ?? wager * (opts.smallBlindFraction ?? DEFAULT_SMALL_BLIND_FRACTION);
      if (!Number.isFinite(smallBlind) || smallBlind <= 0) {
        throw new RangeError(`small blind must be positive, got ${smallBlind}`);
      }
      const bigBlind = smallBlind * 2;

      const deck = new Deck(rng);
      deck.shuffle();
      const s: PokerState = {
        playerA,
        playerB,
        deck,
        hole: { [playerA]: deck.deal(2), [playerB]: deck.deal(2) },
        board: [],
        pot: 0,
        stacks: { [playerA]: wager, [playerB]: wager },
        smallBlind: 0,
        bigBlind: 0,
        actions: [],
        decisions: []
      };
      s.smallBlind = move(s, playerA, smallBlind);
      s.bigBlind = move(s, playerB, bigBlind);

      logger.info({ playerA, playerB, wager, smallBlind: s.smallBlind, bigBlind: s.bigBlind }, "poker hand started");
      emitSafely(
        deps.sink,
        { type: "poker:start", playerA, playerB, smallBlind: s.smallBlind, bigBlind: s.bigBlind, pot: s.pot },
        logger
      );

      let folded: string | null = null;
      for (const { street, deal } of STREETS) {
        if (deal > 0) s.board.push(...deck.deal(deal));
        emitSafely(deps.sink, { type: "poker:street", street, board: s.board.map(cardLabel), pot: s.pot }, logger);
        folded = await runBettingRound(s, street);
        if (folded) break;
      }

      let winner: string;
      let loser: string;
      let handAName: string;
      let handBName: string;
      let scores: Record<string, HandScore> | null = null;
      if (folded) {
        loser = folded;
        winner = folded === playerA ? playerB : playerA;
        handAName = folded === playerA ? "folded" : "uncontested";
        handBName = folded === playerB ? "folded" : "uncontested";
      } else {
        const scoreA = scoreHand([...s.hole[playerA], ...s.board]);
        const scoreB = scoreHand([...s.hole[playerB], ...s.board]);
        scores = { [playerA]: scoreA, [playerB]: scoreB };
        handAName = handName(scoreA.category);
        handBName = handName(scoreB.category);
        // Exact ties go to player A.
        if (compareHandScores(scoreA, scoreB) >= 0) {
          winner = playerA;
          loser = playerB;
        } else {
          winner = playerB;
          loser = playerA;
        }
      }
      const winMethod = folded ? "fold" : "showdown";

      logger.info({ winner, winMethod, pot: s.pot, handAName, handBName }, "poker hand finished");
      emitSafely(deps.sink, { type: "poker:end", winner, winMethod, pot: s.pot }, logger);

      const result: GameResult<"poker", PokerDetails, PokerDecisionLogEntry> = {
        gameKey: "poker",
        winner,
        loser,
        wager,
        roundsPlayed: s.actions.length,
        details: {
          handA: cardsLabel(s.hole[playerA]),
          handB: cardsLabel(s.hole[playerB]),
          handAName,
          handBName,
          community: s.board.length > 0 ? cardsLabel(s.board) : "none",
          board: s.board.map(cardLabel),
          pot: s.pot,
          winMethod,
          smallBlind: s.smallBlind,
          bigBlind: s.bigBlind,
          remainingStacks: { ...s.stacks },
          scores,
          actions: s.actions
        },
        decisionLog: s.decisions
      };
      return deepFreeze(result);
    }
  };
}
