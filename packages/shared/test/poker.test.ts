// packages/shared/test/poker.test.ts
import { describe, it, expect } from "vitest";
import { ExternalFailureError } from "../src/errors.js";
import { createPokerSimulator, legalPokerActions, streetComplete, type PokerOptions } from "../src/games/poker/poker.js";
import { mulberry32 } from "../src/rng.js";
import { collectingSink, scriptedProvider } from "./helpers.js";

const alwaysCall = scriptedProvider({ poker: () => ({ action: "call" }) });

describe("poker betting rules", () => {
  it("offers fold only when facing a bet and no raise on the cap pass", () => {
    expect(legalPokerActions(0, 1, false)).toEqual(["call", "raise"]);
    expect(legalPokerActions(0.1, 1, false)).toEqual(["fold", "call", "raise"]);
    expect(legalPokerActions(0.1, 1, true)).toEqual(["fold", "call"]);
    expect(legalPokerActions(0.1, 0.1, false)).toEqual(["fold", "call"]);
  });

  it("completes a street only when both acted and owe nothing", () => {
    const seats = ["a", "b"];
    expect(streetComplete({ toCall: { a: 0, b: 0 }, hasActed: { a: true, b: false } }, seats)).toBe(false);
    expect(streetComplete({ toCall: { a: 0.1, b: 0 }, hasActed: { a: true, b: true } }, seats)).toBe(false);
    expect(streetComplete({ toCall: { a: 0, b: 0 }, hasActed: { a: true, b: true } }, seats)).toBe(true);
  });
});

describe("poker simulator", () => {
  it("builds a 0.04 pot from 0.01/0.02 blinds when A calls and B checks", async () => {
    const sim = createPokerSimulator({ provider: alwaysCall, rng: mulberry32(1) }, { smallBlind: 0.01 });
    const result = await sim.play("alice", "bob", 1);

    const preflop = result.details.actions.filter(a => a.street === "preflop");
    expect(preflop.map(a => [a.playerId, a.action])).toEqual([
      ["alice", "call"],
      ["bob", "call"]
    ]);
    expect(preflop[0].toCall).toBeCloseTo(0.01);
    expect(preflop[1].toCall).toBe(0);
    expect(preflop[1].pot).toBeCloseTo(0.04);
    expect(result.details.smallBlind).toBe(0.01);
    expect(result.details.bigBlind).toBe(0.02);
    expect(result.decisionLog[0].request.position).toBe("SB");
    expect(result.decisionLog[1].request.legalActions).toEqual(["call", "raise"]);
  });

  it("always reaches showdown when both players only call", async () => {
    for (let seed = 1; seed <= 25; seed++) {
      const sim = createPokerSimulator({ provider: alwaysCall, rng: mulberry32(seed) }, { smallBlind: 0.01 });
      const result = await sim.play("alice", "bob", 1);
      expect(result.details.winMethod).toBe("showdown");
      expect(result.details.board).toHaveLength(5);
      expect(result.roundsPlayed).toBe(8);
      expect(result.details.pot).toBeCloseTo(0.04);
      expect(result.details.scores).not.toBeNull();
    }
  });

  it("defaults the small blind to 5% of the wager", async () => {
    const result = await createPokerSimulator({ provider: alwaysCall, rng: mulberry32(3) }).play("alice", "bob", 2);
    expect(result.details.smallBlind).toBeCloseTo(0.1);
    expect(result.details.bigBlind).toBeCloseTo(0.2);
  });

  it("ends the hand on a fold", async () => {
    const provider = scriptedProvider({ poker: () => ({ action: "fold" }) });
    const result = await createPokerSimulator({ provider, rng: mulberry32(4) }, { smallBlind: 0.01 }).play("alice", "bob", 1);
    expect(result.winner).toBe("bob");
    expect(result.loser).toBe("alice");
    expect(result.details.winMethod).toBe("fold");
    expect(result.details.handAName).toBe("folded");
    expect(result.details.handBName).toBe("uncontested");
    expect(result.details.community).toBe("none");
    expect(result.details.scores).toBeNull();
    expect(result.roundsPlayed).toBe(1);
  });

  it("coerces a free fold into a check", async () => {
    const provider = scriptedProvider({ poker: id => ({ action: id === "bob" ? "fold" : "call" }) });
    const result = await createPokerSimulator({ provider, rng: mulberry32(5) }, { smallBlind: 0.01 }).play("alice", "bob", 1);
    expect(result.details.winMethod).toBe("showdown");
    expect(result.decisionLog[1].playerId).toBe("bob");
    expect(result.decisionLog[1].response.action).toBe("call");
    expect(result.decisionLog[1].adjustments).toContainEqual({
      kind: "protocol",
      field: "action",
      received: "fold",
      applied: "call"
    });
  });

  it("caps raising at four passes per street", async () => {
    const provider = scriptedProvider({ poker: () => ({ action: "raise", raise_amount: 0.05 }) });
    const result = await createPokerSimulator({ provider, rng: mulberry32(6) }, { smallBlind: 0.01 }).play("alice", "bob", 10);

    const preflop = result.decisionLog.filter(e => e.phase === "preflop");
    expect(preflop.map(e => e.playerId)).toEqual(["alice", "bob", "alice", "bob", "alice", "bob", "alice"]);
    const last = preflop[preflop.length - 1];
    expect(last.request.legalActions).toEqual(["fold", "call"]);
    expect(last.response.action).toBe("call");
    expect(last.adjustments).toContainEqual({ kind: "protocol", field: "action", received: "raise", applied: "call" });

    expect(result.roundsPlayed).toBe(28);
    expect(result.details.winMethod).toBe("showdown");
    expect(result.details.pot).toBeCloseTo(2.44);
    expect(result.details.remainingStacks.alice).toBeCloseTo(8.78);
    expect(result.details.remainingStacks.bob).toBeCloseTo(8.78);
  });

  it("keeps chips conserved and stacks non-negative under random play", async () => {
    for (let seed = 1; seed <= 40; seed++) {
      const rng = mulberry32(seed * 31);
      const provider = scriptedProvider({
        poker: () => {
          const r = rng();
          if (r < 0.1) return { action: "fold" };
          if (r < 0.5) return { action: "raise", raise_amount: rng() * 0.6 };
          return { action: "call" };
        }
      });
      const wager = 0.5;
      const result = await createPokerSimulator({ provider, rng: mulberry32(seed) }).play("alice", "bob", wager);
      const { alice, bob } = result.details.remainingStacks;
      expect(alice).toBeGreaterThanOrEqual(0);
      expect(bob).toBeGreaterThanOrEqual(0);
      expect(alice + bob + result.details.pot).toBeCloseTo(2 * wager);
      // Both owe nothing at the end of every completed street, so contributions match.
      if (result.details.winMethod === "showdown") expect(alice).toBeCloseTo(bob);
    }
  });

  it("is reproducible from its seed", async () => {
    const a = await createPokerSimulator({ provider: alwaysCall, rng: mulberry32(99) }).play("alice", "bob", 1);
    const b = await createPokerSimulator({ provider: alwaysCall, rng: mulberry32(99) }).play("alice", "bob", 1);
    expect(a.details.handA).toBe(b.details.handA);
    expect(a.details.board).toEqual(b.details.board);
    expect(a.winner).toBe(b.winner);
  });

  it("logs the request as it was sent", async () => {
    const provider = scriptedProvider({
      poker: (_id, req) => {
        req.holeCards.push("XX");
        return { action: "call" };
      }
    });
    const result = await createPokerSimulator({ provider, rng: mulberry32(8) }).play("alice", "bob", 1);
    expect(result.decisionLog[0].request.holeCards).toHaveLength(2);
  });

  it("returns a frozen result", async () => {
    const result = await createPokerSimulator({ provider: alwaysCall, rng: mulberry32(9) }).play("alice", "bob", 1);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.details.actions[0])).toBe(true);
    expect(Object.isFrozen(result.decisionLog)).toBe(true);
  });

  it("streams events and survives a failing sink", async () => {
    const sink = collectingSink();
    await createPokerSimulator({ provider: alwaysCall, rng: mulberry32(10), sink }).play("alice", "bob", 1);
    expect(sink.events[0].type).toBe("poker:start");
    expect(sink.events[sink.events.length - 1].type).toBe("poker:end");
    expect(sink.events.filter(e => e.type === "poker:street")).toHaveLength(4);

    const broken = { notify: () => { throw new Error("spectator gone"); } };
    const result = await createPokerSimulator({ provider: alwaysCall, rng: mulberry32(10), sink: broken }).play("alice", "bob", 1);
    expect(result.details.winMethod).toBe("showdown");
  });

  it("accepts fenced JSON text from the provider", async () => {
    const provider = scriptedProvider({ poker: () => '```json\n{"action": "call", "confidence": 0.8}\n```' });
    const result = await createPokerSimulator({ provider, rng: mulberry32(11) }).play("alice", "bob", 1);
    expect(result.decisionLog[0].response.confidence).toBe(0.8);
  });

  it("raises ExternalFailureError when the provider fails", async () => {
    const provider = scriptedProvider({
      poker: id => {
        if (id === "bob") throw new Error("model offline");
        return { action: "call" };
      }
    });
    const err = await createPokerSimulator({ provider, rng: mulberry32(12) })
      .play("alice", "bob", 1)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalFailureError);
    if (!(err instanceof ExternalFailureError)) return;
    expect(err.playerId).toBe("bob");
    expect(err.phase).toBe("preflop");
  });

  it("rejects bad match arguments", async () => {
    const sim = createPokerSimulator({ provider: alwaysCall });
    await expect(sim.play("alice", "alice", 1)).rejects.toThrow(/themselves/);
    await expect(sim.play("alice", "bob", 0)).rejects.toBeInstanceOf(RangeError);
  });

  it("rejects pass caps and blinds that would leave a street unsettled", async () => {
    const play = (opts: PokerOptions) => createPokerSimulator({ provider: alwaysCall }, opts).play("alice", "bob", 1);
    await expect(play({ maxPassesPerStreet: 0 })).rejects.toThrow(/maxPassesPerStreet/);
    await expect(play({ maxPassesPerStreet: 2.5 })).rejects.toBeInstanceOf(RangeError);
    await expect(play({ smallBlind: -0.01 })).rejects.toThrow(/small blind/);
    await expect(play({ smallBlindFraction: Number.NaN })).rejects.toBeInstanceOf(RangeError);
  });

  it("settles every street under a smaller pass cap", async () => {
    const provider = scriptedProvider({ poker: () => ({ action: "raise", raise_amount: 0.05 }) });
    const result = await createPokerSimulator({ provider, rng: mulberry32(6) }, { smallBlind: 0.01, maxPassesPerStreet: 2 }).play(
      "alice",
      "bob",
      10
    );
    expect(result.details.winMethod).toBe("showdown");
    expect(result.details.remainingStacks.alice).toBeCloseTo(result.details.remainingStacks.bob);
  });
});
