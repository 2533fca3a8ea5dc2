/**
 * Game simulation: world state, tick systems, combat, bosses, items and
 * progression.
 *
 * @example
 * ```typescript
 * import { createRun, Simulation } from "@crawl/game";
 *
 * const sim = new Simulation(createRun({ difficulty: "Normal", runSeed: 12345 }));
 * sim.send({ type: "attack" });
 * sim.run(30);
 * ```
 */

// Core
export * from "./constants";
export * from "./core/clock";
export * from "./core/events";
export * from "./core/logger";

// World
export * from "./world/camera";
export * from "./world/floor-setup";
export * from "./world/input";
export * from "./world/world";
export * from "./simulation";
export * from "./snapshot";
export * from "./save";

// Entities and combat
export * from "./entities/boss";
export * from "./entities/enemy";
export * from "./entities/player";
export * from "./combat/damage";
export * from "./combat/enemy-attacks";
export * from "./combat/hits";
export * from "./patterns/animation";
export * from "./patterns/pattern";
export * from "./projectiles/impact";
export * from "./projectiles/projectile";
export * from "./status/cooldown";
export * from "./status/effects";

// Movement and actions
export * from "./movement/enemy-ai";
export * from "./movement/knockback";
export * from "./movement/player-movement";
export * from "./actions/apply-input";
export * from "./actions/player-actions";

// Items and progression
export * from "./catalog/loader";
export * from "./catalog/schema";
export * from "./items/consumables";
export * from "./items/drops";
export * from "./items/tiers";
export * from "./items/weapons";
export * from "./progression/skill-tree";
export * from "./progression/ultimate";

// Systems
export * from "./systems";
