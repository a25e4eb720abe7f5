import crypto from "crypto";
import type { AgentCreate, Personality } from "@gauntlet/shared";
import { Bankroll, type BankrollSummary, type RiskLevel } from "./bankroll.js";
import { ArenaError } from "./errors.js";
import { OpponentTracker } from "./opponentModel.js";

export type Agent = {
  id: string;
  name: string;
  personality: Personality;
  bankroll: Bankroll;
  tracker: OpponentTracker;
  bluffsAttempted: number;
  bluffsSuccessful: number;
};

export type AgentView = BankrollSummary & {
  id: string;
  name: string;
  personality: Personality;
  bluffsAttempted: number;
  bluffsSuccessful: number;
};

export class AgentRegistry {
  private readonly agents = new Map<string, Agent>();
  // Read live by the bot provider.
  readonly personalities: Record<string, Personality> = {};

  constructor(
    private readonly riskLevel: RiskLevel,
    private readonly maxWagerPct?: number
  ) {}

  create(input: AgentCreate): Agent {
    const id = input.id ?? crypto.randomUUID();
    if (this.agents.has(id)) throw new ArenaError(`Agent ${id} already exists`, 409);
    const agent: Agent = {
      id,
      name: input.name,
      personality: input.personality,
      bankroll: new Bankroll(input.initialBalance, this.riskLevel, this.maxWagerPct),
      tracker: new OpponentTracker(),
      bluffsAttempted: 0,
      bluffsSuccessful: 0
    };
    this.agents.set(id, agent);
    this.personalities[id] = agent.personality;
    return agent;
  }

  get(id: string): Agent {
    const agent = this.agents.get(id);
    if (!agent) throw new ArenaError(`Unknown agent ${id}`, 404);
    return agent;
  }

  find(id: string): Agent | null {
    return this.agents.get(id) ?? null;
  }

  list(): Agent[] {
    return [...this.agents.values()];
  }
}

export function toAgentView(agent: Agent): AgentView {
  return {
    id: agent.id,
    name: agent.name,
    personality: agent.personality,
    ...agent.bankroll.summary(),
    bluffsAttempted: agent.bluffsAttempted,
    bluffsSuccessful: agent.bluffsSuccessful
  };
}
