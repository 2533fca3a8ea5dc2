/**
 * Spawn Placement
 *
 * Rejection sampling of interior tiles for enemies and items, and the
 * player's starting tile.
 */

import type { SeededRandom } from "@crawl/contracts";
import { manhattan, type Point } from "../core/geometry/types";
import type { Floor } from "../floor/floor";

/**
 * Options for spawn placement
 */
export interface SpawnPlacementOptions {
  readonly player: Point;
  /** Occupied tiles (enemies already placed, items) */
  readonly existing?: readonly Point[];
  /** Number of positions wanted */
  readonly count: number;
  /** Minimum Manhattan distance from the player */
  readonly minPlayerDistance: number;
  /** Minimum Manhattan distance between accepted spawns (default: 5) */
  readonly minSpacing?: number;
  /** Sampling budget (default: count × 100) */
  readonly attempts?: number;
}

export const DEFAULT_SPAWN_SPACING = 5;
export const SPAWN_ATTEMPTS_PER_POSITION = 100;

function isOnOrBeside(tile: Point, player: Point): boolean {
  return manhattan(tile, player) <= 1;
}

/**
 * Sample up to `count` spawn tiles. Each candidate must be walkable, off
 * the player tile and its four neighbours, off every existing and accepted
 * tile, at least `minPlayerDistance` from the player and at least
 * `minSpacing` from every accepted spawn. Floors narrower or shorter
 * than 3 tiles have no interior and yield nothing.
 */
export function findSpawnPositions(
  floor: Floor,
  rng: SeededRandom,
  options: SpawnPlacementOptions,
): Point[] {
  const accepted: Point[] = [];
  if (floor.width < 3 || floor.height < 3 || options.count <= 0) return accepted;

  const minSpacing = options.minSpacing ?? DEFAULT_SPAWN_SPACING;
  const attempts = options.attempts ?? options.count * SPAWN_ATTEMPTS_PER_POSITION;
  const existing = options.existing ?? [];

  for (let attempt = 0; attempt < attempts && accepted.length < options.count; attempt++) {
    const candidate = {
      x: rng.range(1, floor.width - 2),
      y: rng.range(1, floor.height - 2),
    };

    if (!floor.isWalkable(candidate.x, candidate.y)) continue;
    if (isOnOrBeside(candidate, options.player)) continue;
    if (manhattan(candidate, options.player) < options.minPlayerDistance) continue;
    if (existing.some((p) => p.x === candidate.x && p.y === candidate.y)) continue;
    if (accepted.some((p) => p.x === candidate.x && p.y === candidate.y)) continue;
    if (accepted.some((p) => manhattan(p, candidate) < minSpacing)) continue;

    accepted.push(candidate);
  }

  return accepted;
}

/**
 * A random tile of the largest room, or undefined on a floor with no
 * open tiles.
 */
export function findPlayerSpawn(floor: Floor, rng: SeededRandom): Point | undefined {
  const room = floor.largestRoom();
  if (room === undefined) return undefined;
  return rng.choice(room.tiles);
}
