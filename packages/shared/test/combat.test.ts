// packages/shared/test/combat.test.ts
import { describe, it, expect } from "vitest";
import { ARCHETYPES, PERSONALITY_ARCHETYPE, type Ability } from "../src/games/combat/archetypes.js";
import {
  affordableAbilities,
  computeDamage,
  createCombatSimulator,
  createFighter,
  effectiveStat,
  resolveAbility,
  tickDots,
  tickModifiers
} from "../src/games/combat/combat.js";
import { mulberry32 } from "../src/rng.js";
import { collectingSink, scriptedProvider } from "./helpers.js";

function ability(archetype: keyof typeof ARCHETYPES, name: string): Ability {
  const found = ARCHETYPES[archetype].abilities.find(a => a.name === name);
  if (!found) throw new Error(`no ${name} on ${archetype}`);
  return found;
}

describe("combat rules", () => {
  it("computes physical and magic damage", () => {
    const warrior = createFighter("w", ARCHETYPES.warrior);
    const mage = createFighter("m", ARCHETYPES.mage);
    const rogue = createFighter("r", ARCHETYPES.rogue);
    expect(computeDamage(warrior, mage, ability("warrior", "slash"))).toBe(23);
    expect(computeDamage(mage, warrior, ability("mage", "fireball"))).toBe(26);
    // 21 base, times 1.4 for the faster rogue
    expect(computeDamage(rogue, warrior, ability("rogue", "backstab"))).toBe(29);
  });

  it("halves damage against a defending fighter", () => {
    const warrior = createFighter("w", ARCHETYPES.warrior);
    const mage = createFighter("m", ARCHETYPES.mage);
    mage.defending = true;
    expect(computeDamage(warrior, mage, ability("warrior", "slash"))).toBe(11);
  });

  it("floors effective stats at 1", () => {
    const mage = createFighter("m", ARCHETYPES.mage);
    mage.modifiers.push({ stat: "defense", delta: -100, remaining: 2 });
    mage.modifiers.push({ stat: "attack", delta: 2, remaining: 1 });
    mage.modifiers.push({ stat: "attack", delta: 3, remaining: 2 });
    expect(effectiveStat(mage, "defense")).toBe(1);
    expect(effectiveStat(mage, "attack")).toBe(15);
    tickModifiers(mage);
    expect(effectiveStat(mage, "attack")).toBe(13);
  });

  it("ticks independent damage-over-time entries separately", () => {
    const healer = createFighter("h", ARCHETYPES.healer);
    healer.dots.push({ damage: 8, remaining: 3 }, { damage: 6, remaining: 2 });
    expect(tickDots(healer)).toBe(14);
    expect(tickDots(healer)).toBe(14);
    expect(healer.dots).toEqual([{ damage: 8, remaining: 1 }]);
    expect(tickDots(healer)).toBe(8);
    expect(tickDots(healer)).toBe(0);
    expect(healer.hp).toBe(100 - 36);
  });

  it("offers only defend when nothing else is affordable", () => {
    const mage = createFighter("m", ARCHETYPES.mage);
    mage.mp = 0;
    expect(affordableAbilities(mage).map(a => a.name)).toEqual(["defend"]);
    const warrior = createFighter("w", ARCHETYPES.warrior);
    warrior.mp = 0;
    expect(affordableAbilities(warrior).map(a => a.name)).toEqual(["slash", "defend"]);
  });

  it("keeps HP and MP inside their bounds", () => {
    const warrior = createFighter("w", ARCHETYPES.warrior);
    const mage = createFighter("m", ARCHETYPES.mage);
    expect(resolveAbility(mage, warrior, ability("mage", "defend"))).toEqual({ damage: 0, healed: 0 });
    expect(mage.mp).toBe(100);
    warrior.hp = 110;
    expect(resolveAbility(warrior, mage, ability("warrior", "heal")).healed).toBe(10);
    expect(warrior.hp).toBe(120);
    expect(warrior.mp).toBe(28);
    mage.hp = 5;
    resolveAbility(warrior, mage, ability("warrior", "slash"));
    expect(mage.hp).toBe(0);
  });

  it("cleanses DoTs and debuffs but keeps buffs", () => {
    const healer = createFighter("h", ARCHETYPES.healer);
    const rogue = createFighter("r", ARCHETYPES.rogue);
    healer.hp = 50;
    healer.dots.push({ damage: 8, remaining: 3 });
    healer.modifiers.push({ stat: "speed", delta: -3, remaining: 2 }, { stat: "attack", delta: 2, remaining: 2 });
    const { healed } = resolveAbility(healer, rogue, ability("healer", "purify"));
    expect(healed).toBe(10);
    expect(healer.dots).toEqual([]);
    expect(healer.modifiers).toEqual([{ stat: "attack", delta: 2, remaining: 2 }]);
    expect(healer.mp).toBe(80);
  });

  it("attaches debuffs to the target and self-debuffs to the attacker", () => {
    const warrior = createFighter("w", ARCHETYPES.warrior);
    const mage = createFighter("m", ARCHETYPES.mage);
    resolveAbility(warrior, mage, ability("warrior", "berserk"));
    expect(warrior.modifiers).toEqual([{ stat: "defense", delta: -4, remaining: 2 }]);
    resolveAbility(mage, warrior, ability("mage", "ice_shard"));
    expect(warrior.modifiers).toContainEqual({ stat: "speed", delta: -3, remaining: 2 });
  });

  it("maps personalities to archetypes", () => {
    expect(PERSONALITY_ARCHETYPE).toEqual({
      aggressive: "warrior",
      conservative: "healer",
      balanced: "mage",
      adaptive: "rogue"
    });
  });
});

describe("combat simulator", () => {
  const firstOption = scriptedProvider({ combat: (_id, req) => ({ ability: req.abilities[0].name }) });

  it("plays warrior against mage to a knockout", async () => {
    const sink = collectingSink();
    const sim = createCombatSimulator(
      { provider: firstOption, rng: mulberry32(1), sink },
      { archetypes: { alice: "warrior", bob: "mage" } }
    );
    const result = await sim.play("alice", "bob", 1);

    expect(result.winner).toBe("alice");
    expect(result.details.winMethod).toBe("KO");
    expect(result.details.turns).toBe(4);
    expect(result.roundsPlayed).toBe(8);
    expect(result.details.finalHp).toEqual({ alice: 16, bob: 0 });
    // The faster mage opens every turn.
    expect(result.decisionLog[0].playerId).toBe("bob");
    expect(result.decisionLog[6].request.self.mp).toBe(55);

    for (const e of sink.events) {
      if (e.type !== "combat:turn") continue;
      expect(e.hpA).toBeGreaterThanOrEqual(0);
      expect(e.hpA).toBeLessThanOrEqual(120);
      expect(e.hpB).toBeGreaterThanOrEqual(0);
      expect(e.hpB).toBeLessThanOrEqual(80);
      expect(e.mpB).toBeGreaterThanOrEqual(0);
    }
    expect(sink.events[0]).toEqual({
      type: "combat:start",
      playerA: "alice",
      playerB: "bob",
      archetypeA: "warrior",
      archetypeB: "mage",
      maxHpA: 120,
      maxHpB: 80
    });
    expect(sink.events[sink.events.length - 1]).toEqual({
      type: "combat:end",
      winner: "alice",
      winMethod: "KO",
      finalHpA: 16,
      finalHpB: 0
    });
  });

  it("decides on HP at the turn cap, ties going to A", async () => {
    const provider = scriptedProvider({ combat: () => ({ ability: "defend" }) });
    const sim = createCombatSimulator(
      { provider, rng: mulberry32(2) },
      { archetypes: { alice: "mage", bob: "mage" }, maxTurns: 3 }
    );
    const result = await sim.play("alice", "bob", 1);
    expect(result.details.winMethod).toBe("HP advantage");
    expect(result.winner).toBe("alice");
    expect(result.details.turns).toBe(3);
    expect(result.roundsPlayed).toBe(6);
  });

  it("logs damage-over-time ticks at the start of the victim's sub-turn", async () => {
    const provider = scriptedProvider({
      combat: id => ({ ability: id === "alice" ? "poison_blade" : "defend" })
    });
    const sim = createCombatSimulator(
      { provider, rng: mulberry32(3) },
      { archetypes: { alice: "rogue", bob: "healer" }, maxTurns: 2 }
    );
    const result = await sim.play("alice", "bob", 1);
    const dots = result.details.log.filter(e => e.kind === "dot");
    expect(dots).toEqual([
      { kind: "dot", turn: 1, playerId: "bob", damage: 8, hp: 82 },
      { kind: "dot", turn: 2, playerId: "bob", damage: 16, hp: 61 }
    ]);
  });

  it("falls back to the first affordable ability on an invalid choice", async () => {
    const provider = scriptedProvider({ combat: () => ({ ability: "meteor" }) });
    const sim = createCombatSimulator({ provider, rng: mulberry32(4) }, { archetypes: { alice: "healer", bob: "rogue" }, maxTurns: 1 });
    const result = await sim.play("alice", "bob", 1);
    const aliceEntry = result.decisionLog.find(e => e.playerId === "alice");
    expect(aliceEntry?.response.ability).toBe("smite");
    expect(aliceEntry?.adjustments[0]).toEqual({ kind: "protocol", field: "ability", received: "meteor", applied: "smite" });
  });

  it("draws archetypes from the match rng when none are given", async () => {
    const a = await createCombatSimulator({ provider: firstOption, rng: mulberry32(77) }).play("alice", "bob", 1);
    const b = await createCombatSimulator({ provider: firstOption, rng: mulberry32(77) }).play("alice", "bob", 1);
    expect(a.details.archetypes).toEqual(b.details.archetypes);
    expect(a.winner).toBe(b.winner);
  });

  it("rejects an unknown archetype", async () => {
    const sim = createCombatSimulator({ provider: firstOption }, { archetypes: { alice: "paladin" } });
    await expect(sim.play("alice", "bob", 1)).rejects.toThrow(/Unknown archetype/);
  });
});
