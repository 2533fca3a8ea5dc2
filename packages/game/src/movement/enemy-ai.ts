import {
  DIRECTIONS_4,
  findPath,
  manhattan,
  pointsEqual,
  type PathMode,
  type Point,
} from "@crawl/procgen";
import type { Enemy } from "../entities/enemy";
import type { World } from "../world/world";

/**
 * Whether an enemy may step onto a tile: in bounds, walkable unless it is
 * a ghost, not the player's tile, not another blocking enemy and within
 * its leash.
 */
export function enemyCanEnter(world: World, enemy: Enemy, target: Point): boolean {
  const floor = world.floor;
  if (!floor.isInBounds(target.x, target.y)) return false;
  if (!enemy.isGhost() && !floor.isWalkable(target.x, target.y)) return false;
  if (pointsEqual(target, world.player.position)) return false;

  const other = world.blockingEnemyAt(target);
  if (other && other !== enemy) return false;

  if (enemy.leashRadius !== undefined && manhattan(target, enemy.spawnPoint) > enemy.leashRadius) {
    return false;
  }
  return true;
}

/**
 * Next tile toward the player by A*, through the world's path cache.
 * Ghosts path through walls.
 */
export function chaseStep(world: World, enemy: Enemy): Point | undefined {
  const mode: PathMode = enemy.isGhost() ? "ghost" : "walker";
  const from = enemy.position;
  const to = world.player.position;

  const cached = world.paths.get(mode, from, to);
  if (cached !== undefined) return cached ?? undefined;

  const floor = world.floor;
  const passable =
    mode === "ghost" ? () => true : (x: number, y: number) => floor.isWalkable(x, y);
  const path = findPath(from, to, passable, { width: floor.width, height: floor.height });
  const step = path?.[1] ?? null;
  world.paths.set(mode, from, to, step);
  return step ?? undefined;
}

/** First enterable neighbour in a shuffled cardinal order */
export function wanderStep(world: World, enemy: Enemy): Point | undefined {
  for (const dir of world.rng.shuffle(DIRECTIONS_4)) {
    const target = { x: enemy.position.x + dir.x, y: enemy.position.y + dir.y };
    if (enemyCanEnter(world, enemy, target)) return target;
  }
  return undefined;
}

/**
 * One emitted move: chase when the player is detected but not adjacent,
 * otherwise (or when the path step is blocked) wander. Adjacent enemies
 * hold position.
 */
export function moveEnemy(world: World, enemy: Enemy): void {
  const distance = manhattan(enemy.position, world.player.position);
  if (distance <= 1) return;

  let target: Point | undefined;
  if (distance <= enemy.detectionRadius) {
    const step = chaseStep(world, enemy);
    if (step && enemyCanEnter(world, enemy, step)) target = step;
  }
  target ??= wanderStep(world, enemy);

  if (target) enemy.position = target;
}

/**
 * Advance the movement accumulator by the enemy's speed (halved while
 * crippled) and move once it reaches a full tile.
 */
export function advanceEnemyMovement(world: World, enemy: Enemy): void {
  if (enemy.status.has("Stun")) return;
  const speed = enemy.status.has("Cripple") ? enemy.speed / 2 : enemy.speed;
  enemy.movementTicks += speed;
  if (enemy.movementTicks >= 1) {
    enemy.movementTicks -= 1;
    moveEnemy(world, enemy);
  }
}
