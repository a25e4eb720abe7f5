export * from "./types.js";
export * from "./errors.js";
export * from "./log.js";
export * from "./rng.js";
export * from "./decisions.js";
export * from "./gameInterface.js";
export * from "./bots.js";
export * from "./games/cards/cards.js";
export * from "./games/poker/poker.js";
export * from "./games/auction/items.js";
export * from "./games/auction/auction.js";
export * from "./games/combat/archetypes.js";
export * from "./games/combat/combat.js";
