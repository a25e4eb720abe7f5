import { ExternalFailureError, type AutoMatchRequest, type RoundRobinRequest, type SimLogger } from "@gauntlet/shared";
import type { Agent } from "./agents.js";
import { MIN_WAGER } from "./bankroll.js";
import { ArenaError } from "./errors.js";
import type { ArenaManager, MatchOutcome } from "./manager.js";

export type MatchBatch = {
  outcomes: MatchOutcome[];
  skipped: { playerA: string; playerB: string; error: string }[];
};

export class Matchmaker {
  constructor(
    private readonly arena: ArenaManager,
    private readonly logger: SimLogger
  ) {}

  // Closest in games played among opponents that can still cover the minimum wager.
  findOpponent(playerId: string): Agent | null {
    const player = this.arena.agents.find(playerId);
    if (!player) return null;
    const distance = (agent: Agent) => Math.abs(agent.bankroll.gamesPlayed - player.bankroll.gamesPlayed);
    const candidates = this.arena.agents
      .list()
      .filter(agent => agent.id !== playerId && agent.bankroll.balance >= MIN_WAGER)
      .sort((x, y) => distance(x) - distance(y));
    return candidates[0] ?? null;
  }

  async autoMatch(req: AutoMatchRequest): Promise<MatchBatch> {
    const ids = this.arena.agents.list().map(agent => agent.id);
    if (ids.length < 2) throw new ArenaError("Need at least 2 agents for auto-matching", 400);

    const pairs: [string, string][] = [];
    for (let i = 0; i < req.count; i++) pairs.push([ids[i % ids.length], ids[(i + 1) % ids.length]]);
    return this.playAll(req.game, req.wager, pairs);
  }

  async roundRobin(req: RoundRobinRequest): Promise<MatchBatch> {
    const ids = this.arena.agents.list().map(agent => agent.id);
    const pairs: [string, string][] = [];
    for (let i = 0; i < ids.length; i++) {
      for (let j = i + 1; j < ids.length; j++) pairs.push([ids[i], ids[j]]);
    }
    return this.playAll(req.game, req.wager, pairs);
  }

  private async playAll(game: AutoMatchRequest["game"], wager: number, pairs: [string, string][]): Promise<MatchBatch> {
    const batch: MatchBatch = { outcomes: [], skipped: [] };
    for (const [playerA, playerB] of pairs) {
      try {
        batch.outcomes.push(await this.arena.runMatch({ game, playerA, playerB, wager }));
      } catch (err) {
        if (!(err instanceof ArenaError || err instanceof ExternalFailureError)) throw err;
        this.logger.warn({ err, playerA, playerB, game }, "match skipped");
        batch.skipped.push({ playerA, playerB, error: err.message });
      }
    }
    return batch;
  }
}
