import type { Personality } from "../../types.js";

export type StatName = "attack" | "defense" | "speed";

export type ModifierTemplate = { stat: StatName; delta: number; turns: number };
export type DotTemplate = { damage: number; turns: number };

export type DamageType = "physical" | "magic";

export type AbilityEffect =
  | {
      kind: "damage";
      damageType: DamageType;
      power: number;
      // Bonus when the attacker is strictly faster than the defender.
      speedBonus?: boolean;
      debuff?: ModifierTemplate;
      selfDebuff?: ModifierTemplate;
      dot?: DotTemplate;
    }
  | { kind: "heal"; amount: number }
  | { kind: "defend"; mpRestore: number }
  | { kind: "cleanse"; healAmount: number };

export type Ability = {
  name: string;
  cost: number;
  description: string;
  effect: AbilityEffect;
};

export type ArchetypeKey = "warrior" | "mage" | "rogue" | "healer";

export type Archetype = {
  key: ArchetypeKey;
  name: string;
  hp: number;
  mp: number;
  attack: number;
  defense: number;
  speed: number;
  abilities: readonly Ability[];
};

export const ARCHETYPE_KEYS: readonly ArchetypeKey[] = ["warrior", "mage", "rogue", "healer"];

export const ARCHETYPES: Readonly<Record<ArchetypeKey, Archetype>> = {
  warrior: {
    key: "warrior",
    name: "Warrior",
    hp: 120,
    mp: 40,
    attack: 18,
    defense: 14,
    speed: 8,
    abilities: [
      { name: "slash", cost: 0, description: "Basic sword slash", effect: { kind: "damage", damageType: "physical", power: 22 } },
      {
        name: "shield_bash",
        cost: 8,
        description: "Stunning strike, lowers opponent attack by 3 for 2 turns",
        effect: { kind: "damage", damageType: "physical", power: 15, debuff: { stat: "attack", delta: -3, turns: 2 } }
      },
      {
        name: "berserk",
        cost: 15,
        description: "Heavy attack that lowers own defense by 4 for 2 turns",
        effect: { kind: "damage", damageType: "physical", power: 35, selfDebuff: { stat: "defense", delta: -4, turns: 2 } }
      },
      { name: "defend", cost: 0, description: "Block stance, halves incoming damage and restores 5 MP", effect: { kind: "defend", mpRestore: 5 } },
      { name: "heal", cost: 12, description: "Bandage wounds, restores 25 HP", effect: { kind: "heal", amount: 25 } }
    ]
  },
  mage: {
    key: "mage",
    name: "Mage",
    hp: 80,
    mp: 100,
    attack: 10,
    defense: 8,
    speed: 10,
    abilities: [
      { name: "fireball", cost: 15, description: "Fireball dealing 30 magic damage", effect: { kind: "damage", damageType: "magic", power: 30 } },
      {
        name: "ice_shard",
        cost: 8,
        description: "Ice projectile, slows opponent by 3 for 2 turns",
        effect: { kind: "damage", damageType: "magic", power: 18, debuff: { stat: "speed", delta: -3, turns: 2 } }
      },
      { name: "arcane_burst", cost: 30, description: "Arcane explosion, very high damage", effect: { kind: "damage", damageType: "magic", power: 45 } },
      { name: "defend", cost: 0, description: "Magical barrier, halves damage and restores 8 MP", effect: { kind: "defend", mpRestore: 8 } },
      { name: "heal", cost: 10, description: "Healing light, restores 20 HP", effect: { kind: "heal", amount: 20 } }
    ]
  },
  rogue: {
    key: "rogue",
    name: "Rogue",
    hp: 90,
    mp: 60,
    attack: 16,
    defense: 10,
    speed: 16,
    abilities: [
      {
        name: "backstab",
        cost: 5,
        description: "Quick stab, bonus damage when faster than the opponent",
        effect: { kind: "damage", damageType: "physical", power: 25, speedBonus: true }
      },
      {
        name: "poison_blade",
        cost: 10,
        description: "Poisoned strike, 8 damage per turn for 3 turns",
        effect: { kind: "damage", damageType: "physical", power: 12, dot: { damage: 8, turns: 3 } }
      },
      { name: "shadow_strike", cost: 20, description: "Strike from the shadows, high damage", effect: { kind: "damage", damageType: "physical", power: 38 } },
      { name: "defend", cost: 0, description: "Evasive dodge, halves damage and restores 6 MP", effect: { kind: "defend", mpRestore: 6 } },
      { name: "heal", cost: 10, description: "Quick bandage, restores 18 HP", effect: { kind: "heal", amount: 18 } }
    ]
  },
  healer: {
    key: "healer",
    name: "Healer",
    hp: 100,
    mp: 90,
    attack: 10,
    defense: 12,
    speed: 9,
    abilities: [
      { name: "smite", cost: 5, description: "Holy damage strike", effect: { kind: "damage", damageType: "magic", power: 16 } },
      { name: "divine_heal", cost: 15, description: "Powerful healing, restores 40 HP", effect: { kind: "heal", amount: 40 } },
      {
        name: "holy_fire",
        cost: 18,
        description: "Sacred fire, burns for 6 damage per turn over 2 turns",
        effect: { kind: "damage", damageType: "magic", power: 28, dot: { damage: 6, turns: 2 } }
      },
      { name: "defend", cost: 0, description: "Prayer shield, halves damage and restores 8 MP", effect: { kind: "defend", mpRestore: 8 } },
      { name: "purify", cost: 10, description: "Removes debuffs and damage over time, restores 10 HP", effect: { kind: "cleanse", healAmount: 10 } }
    ]
  }
};

export const PERSONALITY_ARCHETYPE: Readonly<Record<Personality, ArchetypeKey>> = {
  aggressive: "warrior",
  conservative: "healer",
  balanced: "mage",
  adaptive: "rogue"
};

export function isArchetypeKey(value: string): value is ArchetypeKey {
  return ARCHETYPE_KEYS.some(k => k === value);
}

export function abilityPower(ability: Ability): number {
  return ability.effect.kind === "damage" ? ability.effect.power : 0;
}
