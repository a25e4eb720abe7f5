// packages/shared/test/bots.test.ts
import { describe, it, expect } from "vitest";
import { createBotProvider } from "../src/bots.js";
import { createAuctionSimulator } from "../src/games/auction/auction.js";
import { createCombatSimulator } from "../src/games/combat/combat.js";
import { createPokerSimulator } from "../src/games/poker/poker.js";
import { mulberry32 } from "../src/rng.js";

const personalities = { alice: "aggressive", bob: "conservative" } as const;

describe("bot provider", () => {
  it("only takes legal poker actions", async () => {
    for (let seed = 1; seed <= 20; seed++) {
      const provider = createBotProvider(personalities, seed);
      const result = await createPokerSimulator({ provider, rng: mulberry32(seed) }).play("alice", "bob", 1);
      const protocol = result.decisionLog.flatMap(e => e.adjustments).filter(a => a.kind === "protocol");
      expect(protocol).toEqual([]);
    }
  });

  it("bids inside the budget", async () => {
    const provider = createBotProvider(personalities, 3);
    const result = await createAuctionSimulator({ provider, rng: mulberry32(3) }).play("alice", "bob", 1);
    for (const entry of result.decisionLog) {
      expect(entry.adjustments).toEqual([]);
      expect(entry.response.bid_amount).toBeLessThanOrEqual(entry.request.budget);
    }
  });

  it("picks offered combat abilities and finishes the duel", async () => {
    const provider = createBotProvider({ alice: "balanced", bob: "adaptive" }, 11);
    const result = await createCombatSimulator({ provider, rng: mulberry32(11) }).play("alice", "bob", 1);
    expect(["KO", "HP advantage"]).toContain(result.details.winMethod);
    for (const entry of result.decisionLog) {
      expect(entry.request.abilities.map(a => a.name)).toContain(entry.response.ability);
    }
  });

  it("is reproducible from its seed", async () => {
    const play = () =>
      createPokerSimulator({ provider: createBotProvider(personalities, 42), rng: mulberry32(42) }).play("alice", "bob", 1);
    const [a, b] = await Promise.all([play(), play()]);
    expect(a.details.actions).toEqual(b.details.actions);
  });
});
