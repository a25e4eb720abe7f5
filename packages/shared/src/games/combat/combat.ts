import {
  consult,
  validateCombatChoice,
  type AbilityOption,
  type CombatAbilityRequest,
  type CombatDecision,
  type FighterSnapshot
} from "../../decisions.js";
import { assertMatchArgs, deepFreeze, emitSafely, type Simulator, type SimulatorDeps } from "../../gameInterface.js";
import { silentLogger } from "../../log.js";
import { mulberry32, pickOne, randomSeed } from "../../rng.js";
import type { DecisionLogEntry, GameResult } from "../../types.js";
import {
  abilityPower,
  ARCHETYPE_KEYS,
  ARCHETYPES,
  isArchetypeKey,
  type Ability,
  type Archetype,
  type ArchetypeKey,
  type StatName
} from "./archetypes.js";

export const DEFAULT_MAX_TURNS = 20;
export const SPEED_BONUS_MULTIPLIER = 1.4;

export type CombatOptions = {
  // Archetype per player id; players not listed get one drawn from the match rng.
  archetypes?: Record<string, string>;
  maxTurns?: number;
};

export type Modifier = { stat: StatName; delta: number; remaining: number };
export type DamageOverTime = { damage: number; remaining: number };

export type Fighter = {
  playerId: string;
  archetype: Archetype;
  hp: number;
  maxHp: number;
  mp: number;
  maxMp: number;
  modifiers: Modifier[];
  dots: DamageOverTime[];
  defending: boolean;
};

export type CombatLogEntry =
  | { kind: "dot"; turn: number; playerId: string; damage: number; hp: number }
  | {
      kind: "ability";
      turn: number;
      playerId: string;
      ability: string;
      damage: number;
      healed: number;
      actorHp: number;
      actorMp: number;
      targetHp: number;
    };

export type CombatDetails = {
  archetypes: Record<string, ArchetypeKey>;
  finalHp: Record<string, number>;
  maxHp: Record<string, number>;
  turns: number;
  winMethod: "KO" | "HP advantage";
  log: CombatLogEntry[];
};

export type CombatDecisionLogEntry = DecisionLogEntry<CombatAbilityRequest, CombatDecision>;
export type CombatResult = GameResult<"combat", CombatDetails, CombatDecisionLogEntry>;

export type Resolution = { damage: number; healed: number };

export function createFighter(playerId: string, archetype: Archetype): Fighter {
  return {
    playerId,
    archetype,
    hp: archetype.hp,
    maxHp: archetype.hp,
    mp: archetype.mp,
    maxMp: archetype.mp,
    modifiers: [],
    dots: [],
    defending: false
  };
}

export function effectiveStat(f: Fighter, stat: StatName): number {
  const delta = f.modifiers.filter(m => m.stat === stat).reduce((sum, m) => sum + m.delta, 0);
  return Math.max(1, f.archetype[stat] + delta);
}

// Applies one tick of every DoT entry; returns the total damage taken.
export function tickDots(f: Fighter): number {
  let total = 0;
  for (const dot of f.dots) {
    total += dot.damage;
    dot.remaining -= 1;
  }
  f.dots = f.dots.filter(d => d.remaining > 0);
  f.hp = Math.max(0, f.hp - total);
  return total;
}

export function tickModifiers(f: Fighter) {
  for (const m of f.modifiers) m.remaining -= 1;
  f.modifiers = f.modifiers.filter(m => m.remaining > 0);
}

function defendAbility(archetype: Archetype): Ability {
  const defend = archetype.abilities.find(a => a.effect.kind === "defend");
  if (!defend) throw new Error(`Archetype ${archetype.key} has no defend ability`);
  return defend;
}

export function affordableAbilities(f: Fighter): Ability[] {
  const affordable = f.archetype.abilities.filter(a => a.cost <= f.mp);
  return affordable.length > 0 ? affordable : [defendAbility(f.archetype)];
}

export function computeDamage(attacker: Fighter, defender: Fighter, ability: Ability): number {
  const effect = ability.effect;
  if (effect.kind !== "damage") return 0;
  const atk = effectiveStat(attacker, "attack");
  const def = effectiveStat(defender, "defense");
  const p = effect.power;

  let damage =
    effect.damageType === "physical"
      ? Math.max(1, Math.trunc((p * atk) / 15 - p * (def / 20) * 0.3))
      : Math.max(1, Math.trunc(p * 0.9 + atk * 0.2 - def * 0.15));

  if (effect.speedBonus && effectiveStat(attacker, "speed") > effectiveStat(defender, "speed")) {
    damage = Math.trunc(damage * SPEED_BONUS_MULTIPLIER);
  }
  if (defender.defending) damage = Math.max(1, Math.floor(damage / 2));
  return damage;
}

function heal(f: Fighter, amount: number): number {
  const before = f.hp;
  f.hp = Math.min(f.maxHp, f.hp + amount);
  return f.hp - before;
}

export function resolveAbility(actor: Fighter, target: Fighter, ability: Ability): Resolution {
  actor.mp = Math.max(0, actor.mp - ability.cost);
  const effect = ability.effect;

  switch (effect.kind) {
    case "defend":
      actor.defending = true;
      actor.mp = Math.min(actor.maxMp, actor.mp + effect.mpRestore);
      return { damage: 0, healed: 0 };
    case "heal":
      return { damage: 0, healed: heal(actor, effect.amount) };
    case "cleanse":
      actor.dots = [];
      actor.modifiers = actor.modifiers.filter(m => m.delta >= 0);
      return { damage: 0, healed: heal(actor, effect.healAmount) };
    case "damage": {
      const damage = computeDamage(actor, target, ability);
      target.hp = Math.max(0, target.hp - damage);
      if (effect.debuff) target.modifiers.push({ stat: effect.debuff.stat, delta: effect.debuff.delta, remaining: effect.debuff.turns });
      if (effect.selfDebuff) {
        actor.modifiers.push({ stat: effect.selfDebuff.stat, delta: effect.selfDebuff.delta, remaining: effect.selfDebuff.turns });
      }
      if (effect.dot) target.dots.push({ damage: effect.dot.damage, remaining: effect.dot.turns });
      return { damage, healed: 0 };
    }
    default: {
      const unreachable: never = effect;
      throw new Error(`Unknown ability effect ${JSON.stringify(unreachable)}`);
    }
  }
}

export function fighterStatus(f: Fighter): string {
  const parts = [`HP ${f.hp}/${f.maxHp}`, `MP ${f.mp}/${f.maxMp}`];
  if (f.defending) parts.push("defending");
  for (const m of f.modifiers) parts.push(`${m.stat} ${m.delta > 0 ? "+" : ""}${m.delta} (${m.remaining}t)`);
  for (const d of f.dots) parts.push(`burning ${d.damage}/t (${d.remaining}t)`);
  return parts.join(", ");
}

export function fighterSnapshot(f: Fighter): FighterSnapshot {
  return {
    playerId: f.playerId,
    archetype: f.archetype.key,
    hp: f.hp,
    maxHp: f.maxHp,
    mp: f.mp,
    maxMp: f.maxMp,
    attack: effectiveStat(f, "attack"),
    defense: effectiveStat(f, "defense"),
    speed: effectiveStat(f, "speed"),
    defending: f.defending,
    modifiers: f.modifiers.map(m => ({ ...m })),
    dots: f.dots.map(d => ({ ...d })),
    status: fighterStatus(f)
  };
}

function toOption(ability: Ability): AbilityOption {
  return { name: ability.name, description: ability.description, cost: ability.cost, power: abilityPower(ability) };
}

export function createCombatSimulator(
  deps: SimulatorDeps,
  opts: CombatOptions = {}
): Simulator<"combat", CombatDetails, CombatDecisionLogEntry> {
  const logger = deps.logger ?? silentLogger;
  const maxTurns = opts.maxTurns ?? DEFAULT_MAX_TURNS;

  function archetypeFor(playerId: string, draw: () => ArchetypeKey): Archetype {
    const requested = opts.archetypes?.[playerId];
    if (requested === undefined) return ARCHETYPES[draw()];
    if (!isArchetypeKey(requested)) throw new Error(`Unknown archetype "${requested}" for ${playerId}`);
    return ARCHETYPES[requested];
  }

  return {
    key: "combat",

    play: async (playerA, playerB, wager) => {
      assertMatchArgs(playerA, playerB, wager);
      if (!Number.isInteger(maxTurns) || maxTurns < 1) throw new RangeError(`maxTurns must be a positive integer, got ${maxTurns}`);
      const rng = deps.rng ?? mulberry32(randomSeed());
      const draw = () => pickOne(ARCHETYPE_KEYS, rng);

      const a = createFighter(playerA, archetypeFor(playerA, draw));
      const b = createFighter(playerB, archetypeFor(playerB, draw));
      const log: CombatLogEntry[] = [];
      const decisions: CombatDecisionLogEntry[] = [];

      logger.info({ playerA, playerB, archetypeA: a.archetype.key, archetypeB: b.archetype.key }, "combat started");
      emitSafely(
        deps.sink,
        {
          type: "combat:start",
          playerA,
          playerB,
          archetypeA: a.archetype.key,
          archetypeB: b.archetype.key,
          maxHpA: a.maxHp,
          maxHpB: b.maxHp
        },
        logger
      );

      async function choose(actor: Fighter, target: Fighter, turn: number, options: Ability[]): Promise<Ability> {
        const request: CombatAbilityRequest = {
          self: fighterSnapshot(actor),
          opponent: fighterSnapshot(target),
          abilities: options.map(toOption),
          turn,
          maxTurns
        };
        const snapshot = structuredClone(request);
        const phase = `turn ${turn}`;
        const payload = await consult(() => deps.provider.combatAbility(actor.playerId, request), {
          game: "combat",
          playerId: actor.playerId,
          phase
        });
        const { decision, adjustments } = validateCombatChoice(payload, options.map(o => o.name));
        if (adjustments.length > 0) logger.debug({ player: actor.playerId, turn, adjustments }, "combat choice adjusted");
        decisions.push({ seq: decisions.length, playerId: actor.playerId, phase, request: snapshot, response: decision, adjustments });

        const chosen = options.find(o => o.name === decision.ability);
        return chosen ?? options[0];
      }

      let koLoser: Fighter | null = null;
      let turns = 0;

      fight: for (let turn = 1; turn <= maxTurns; turn++) {
        turns = turn;
        const order = effectiveStat(a, "speed") >= effectiveStat(b, "speed") ? [a, b] : [b, a];

        for (const actor of order) {
          const target = actor === a ? b : a;

          const dotDamage = tickDots(actor);
          if (dotDamage > 0) {
            log.push({ kind: "dot", turn, playerId: actor.playerId, damage: dotDamage, hp: actor.hp });
            emitSafely(deps.sink, { type: "combat:dot", turn, playerId: actor.playerId, damage: dotDamage, hp: actor.hp }, logger);
          }
          if (actor.hp <= 0) {
            koLoser = actor;
            break fight;
          }
          tickModifiers(actor);
          actor.defending = false;

          const ability = await choose(actor, target, turn, affordableAbilities(actor));
          const { damage, healed } = resolveAbility(actor, target, ability);
          log.push({
            kind: "ability",
            turn,
            playerId: actor.playerId,
            ability: ability.name,
            damage,
            healed,
            actorHp: actor.hp,
            actorMp: actor.mp,
            targetHp: target.hp
          });
          logger.debug({ turn, player: actor.playerId, ability: ability.name, damage, healed }, "combat action");
          emitSafely(
            deps.sink,
            {
              type: "combat:turn",
              turn,
              playerId: actor.playerId,
              ability: ability.name,
              damage,
              hpA: a.hp,
              hpB: b.hp,
              mpA: a.mp,
              mpB: b.mp
            },
            logger
          );

          if (target.hp <= 0) {
            koLoser = target;
            break fight;
          }
        }
      }

      let winner: Fighter;
      let loser: Fighter;
      if (koLoser) {
        loser = koLoser;
        winner = koLoser === a ? b : a;
      } else if (b.hp > a.hp) {
        winner = b;
        loser = a;
      } else {
        // Equal HP at the cap goes to player A.
        winner = a;
        loser = b;
      }
      const winMethod = koLoser ? "KO" : "HP advantage";

      logger.info({ winner: winner.playerId, winMethod, turns, hpA: a.hp, hpB: b.hp }, "combat finished");
      emitSafely(deps.sink, { type: "combat:end", winner: winner.playerId, winMethod, finalHpA: a.hp, finalHpB: b.hp }, logger);

      const result: CombatResult = {
        gameKey: "combat",
        winner: winner.playerId,
        loser: loser.playerId,
        wager,
        roundsPlayed: log.filter(e => e.kind === "ability").length,
        details: {
          archetypes: { [playerA]: a.archetype.key, [playerB]: b.archetype.key },
          finalHp: { [playerA]: a.hp, [playerB]: b.hp },
          maxHp: { [playerA]: a.maxHp, [playerB]: b.maxHp },
          turns,
          winMethod,
          log
        },
        decisionLog: decisions
      };
      return deepFreeze(result);
    }
  };
}
