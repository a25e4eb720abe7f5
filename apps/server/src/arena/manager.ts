import crypto from "crypto";
import {
  createAuctionSimulator,
  createBotProvider,
  createCombatSimulator,
  createPokerSimulator,
  mulberry32,
  PERSONALITY_ARCHETYPE,
  randomSeed,
  type AgentCreate,
  type AuctionResult,
  type CombatResult,
  type ContextSource,
  type DecisionProvider,
  type EventSink,
  type GameKey,
  type MatchRequest,
  type PokerResult,
  type SimLogger,
  type SimulatorDeps
} from "@gauntlet/shared";
import { AgentRegistry, toAgentView, type Agent, type AgentView } from "./agents.js";
import type { RiskLevel } from "./bankroll.js";
import { ArenaError } from "./errors.js";
import { KeyedLock } from "./keyedLock.js";
import { withTimeout } from "./timeout.js";

export type ArenaConfig = {
  riskLevel: RiskLevel;
  maxWagerPct?: number;
  houseFee: number;
  decisionTimeoutMs: number;
  auctionRounds: number;
  combatMaxTurns: number;
  smallBlindFraction: number;
};

export type ArenaLogger = SimLogger & { child(bindings: Record<string, unknown>): SimLogger };

export type ArenaDeps = {
  logger: ArenaLogger;
  // Bot players answer when nothing else is wired.
  provider?: DecisionProvider;
  sinkFor?: (matchId: string) => EventSink;
};

export type MatchResult = PokerResult | AuctionResult | CombatResult;

export type MatchSummary = {
  matchId: string;
  game: GameKey;
  seed: number;
  winner: string;
  loser: string;
  winnerName: string;
  loserName: string;
  wager: number;
  roundsPlayed: number;
  winMethod: string;
  pot?: number;
  handA?: string;
  handB?: string;
  community?: string;
  archetypeA?: string;
  archetypeB?: string;
  finalHpA?: number;
  finalHpB?: number;
};

export type MatchOutcome = { summary: MatchSummary; result: MatchResult };

export type LeaderboardRow = AgentView & { rank: number };

// Edge assumed for every arena match when gating on the bankroll.
export const ASSUMED_EDGE = 0.05;
const BLUFF_PROBABILITY = 0.3;
const BOT_SEED_SALT = 0x9e3779b9;
const BLUFF_WIN_PROB = 0.35;

export class ArenaManager {
  readonly agents: AgentRegistry;
  private readonly history: MatchSummary[] = [];
  private readonly lock = new KeyedLock();
  private readonly provider: DecisionProvider | null;

  constructor(
    private readonly config: ArenaConfig,
    private readonly deps: ArenaDeps
  ) {
    this.agents = new AgentRegistry(config.riskLevel, config.maxWagerPct);
    this.provider = deps.provider ? withTimeout(deps.provider, config.decisionTimeoutMs) : null;
  }

  createAgent(input: AgentCreate): AgentView {
    const agent = this.agents.create(input);
    this.deps.logger.info({ agentId: agent.id, personality: agent.personality }, "agent created");
    return toAgentView(agent);
  }

  listAgents(): AgentView[] {
    return this.agents.list().map(toAgentView);
  }

  leaderboard(): LeaderboardRow[] {
    return this.agents
      .list()
      .map(toAgentView)
      .sort((x, y) => y.sessionPnl - x.sessionPnl)
      .map((row, i) => ({ ...row, rank: i + 1 }));
  }

  matchHistory(): MatchSummary[] {
    return [...this.history];
  }

  async runMatch(req: MatchRequest): Promise<MatchOutcome> {
    if (req.playerA === req.playerB) throw new ArenaError("An agent cannot play itself", 400);
    const a = this.agents.get(req.playerA);
    const b = this.agents.get(req.playerB);

    return this.lock.run([a.id, b.id], async () => {
      for (const agent of [a, b]) {
        const check = agent.bankroll.shouldPlay(req.wager, ASSUMED_EDGE);
        if (!check.ok) throw new ArenaError(`${agent.name} cannot play: ${check.reason}`, 409);
      }

      const matchId = req.matchId ?? crypto.randomUUID();
      const seed = req.seed ?? randomSeed();
      const logger = this.deps.logger.child({ matchId, game: req.game });
      const simDeps: SimulatorDeps = {
        provider: this.provider ?? this.botProvider(seed),
        rng: mulberry32(seed),
        context: this.contextSource(),
        logger,
        ...(this.deps.sinkFor ? { sink: this.deps.sinkFor(matchId) } : {})
      };

      logger.info({ playerA: a.name, playerB: b.name, wager: req.wager, seed }, "match started");
      const result = await this.play(req.game, simDeps, a, b, req.wager);

      this.updateStats(a, b, result);
      this.detectBluffs(result);

      const summary = this.summarize(matchId, seed, result, a, b);
      this.history.push(summary);
      logger.info({ winner: summary.winnerName, winMethod: summary.winMethod }, "match finished");
      return { summary, result };
    });
  }

  private play(game: GameKey, deps: SimulatorDeps, a: Agent, b: Agent, wager: number): Promise<MatchResult> {
    switch (game) {
      case "poker":
        return createPokerSimulator(deps, { smallBlindFraction: this.config.smallBlindFraction }).play(a.id, b.id, wager);
      case "auction":
        return createAuctionSimulator(deps, { rounds: this.config.auctionRounds }).play(a.id, b.id, wager);
      case "combat":
        return createCombatSimulator(deps, {
          maxTurns: this.config.combatMaxTurns,
          archetypes: { [a.id]: PERSONALITY_ARCHETYPE[a.personality], [b.id]: PERSONALITY_ARCHETYPE[b.personality] }
        }).play(a.id, b.id, wager);
    }
  }

  // Bots draw from their own stream so the deck and the bots' choices stay independent.
  private botProvider(seed: number): DecisionProvider {
    const bots = createBotProvider(this.agents.personalities, (seed ^ BOT_SEED_SALT) >>> 0);
    return withTimeout(bots, this.config.decisionTimeoutMs);
  }

  private contextSource(): ContextSource {
    return {
      describe: (playerId, opponentId) => {
        const agent = this.agents.find(playerId);
        if (!agent) return {};
        return { opponent: agent.tracker.context(opponentId), bankroll: agent.bankroll.toPromptContext() };
      }
    };
  }

  private updateStats(a: Agent, b: Agent, result: MatchResult) {
    const payout = result.wager * 2 * (1 - this.config.houseFee);
    const winner = result.winner === a.id ? a : b;
    const loser = winner === a ? b : a;
    winner.bankroll.recordResult(result.wager, true, payout);
    loser.bankroll.recordResult(result.wager, false);
    loser.tracker.get(winner.id).recordGameResult(true);
    winner.tracker.get(loser.id).recordGameResult(false);

    const opponentOf = (playerId: string) => (playerId === a.id ? b : a);
    if (result.gameKey === "poker") {
      for (const entry of result.decisionLog) {
        const observer = opponentOf(entry.playerId);
        observer.tracker.get(entry.playerId).recordPokerAction(entry.response.action, isBluff(entry.response));
      }
    } else if (result.gameKey === "auction") {
      for (const round of result.details.rounds) {
        for (const [playerId, bid] of Object.entries(round.bids)) {
          opponentOf(playerId).tracker.get(playerId).recordAuctionBid(bid, round.trueValue);
        }
      }
    }
  }

  private detectBluffs(result: MatchResult) {
    if (result.gameKey !== "poker") return;
    for (const entry of result.decisionLog) {
      if (!isBluff(entry.response)) continue;
      const agent = this.agents.find(entry.playerId);
      if (!agent) continue;
      agent.bluffsAttempted += 1;
      if (result.details.winMethod === "fold" && result.winner === entry.playerId) {
        agent.bluffsSuccessful += 1;
        this.deps.logger.info({ agent: agent.name }, "bluff succeeded");
      }
    }
  }

  private summarize(matchId: string, seed: number, result: MatchResult, a: Agent, b: Agent): MatchSummary {
    const nameOf = (id: string) => (id === a.id ? a.name : b.name);
    const base = {
      matchId,
      game: result.gameKey,
      seed,
      winner: result.winner,
      loser: result.loser,
      winnerName: nameOf(result.winner),
      loserName: nameOf(result.loser),
      wager: result.wager,
      roundsPlayed: result.roundsPlayed,
      winMethod: result.details.winMethod
    };
    switch (result.gameKey) {
      case "poker":
        return {
          ...base,
          pot: result.details.pot,
          handA: result.details.handA,
          handB: result.details.handB,
          community: result.details.community
        };
      case "combat":
        return {
          ...base,
          archetypeA: result.details.archetypes[a.id],
          archetypeB: result.details.archetypes[b.id],
          finalHpA: result.details.finalHp[a.id],
          finalHpB: result.details.finalHp[b.id]
        };
      case "auction":
        return base;
    }
  }
}

export function isBluff(decision: { action: string; bluff_probability: number; estimated_win_prob: number }): boolean {
  return (
    decision.action === "raise" &&
    (decision.bluff_probability > BLUFF_PROBABILITY || decision.estimated_win_prob < BLUFF_WIN_PROB)
  );
}
