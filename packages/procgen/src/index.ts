/**
 * Procedural floor generation, pathfinding and spawn placement.
 *
 * @example
 * ```typescript
 * import { findPlayerSpawn, generateFloor } from "@crawl/procgen";
 *
 * const floor = generateFloor(180, 60, 12345);
 * const start = findPlayerSpawn(floor, new SeededRandom(floor.seed));
 * ```
 */

export * from "./core";
export * from "./floor";
export * from "./generators";
export * from "./pipeline";
export * from "./spawn";
