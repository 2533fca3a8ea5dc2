import { pointsEqual, type Point } from "@crawl/procgen";
import { strikeEnemy, strikePlayer } from "../combat/hits";
import { PLAYER_ID } from "../core/events";
import { FIRE_OIL_BURN_SECONDS } from "../constants";
import { ActiveAnimation, type AnimationHit } from "../patterns/animation";
import { PatternColor } from "../patterns/pattern";
import { burn } from "../status/effects";
import type { World } from "../world/world";
import { impactArea, type Projectile, type ProjectileStop } from "./projectile";

/** Seconds the burn marks of a fire-oil impact stay visible */
export const BURN_MARK_SECONDS = 0.4;

function entityOnTile(world: World, projectile: Projectile, tile: Point): boolean {
  if (projectile.owner === PLAYER_ID) {
    return world.enemyAt(tile) !== undefined;
  }
  return pointsEqual(world.player.position, tile);
}

/**
 * Apply a projectile's impact centred on `center`: damage to every
 * target in its area, plus Burn and a burn mark for fire oil.
 */
export function detonate(world: World, projectile: Projectile, center: Point): void {
  const tiles = impactArea(center, projectile.impactRadius);
  const fire = projectile.kind === "FireOil";
  const hit: AnimationHit = {
    owner: projectile.owner,
    damage: projectile.damage,
    damageType: projectile.damageType,
    knockback: 0,
    origin: center,
    effect: fire ? burn(FIRE_OIL_BURN_SECONDS) : undefined,
  };

  for (const tile of tiles) {
    if (projectile.owner === PLAYER_ID) {
      const enemy = world.enemyAt(tile);
      if (enemy) strikeEnemy(world, enemy, hit);
    } else if (pointsEqual(world.player.position, tile)) {
      strikePlayer(world, hit);
    }
  }

  if (fire) {
    world.animations.push(
      new ActiveAnimation(
        [{ tiles, color: PatternColor.ORANGE, glyph: "▒", duration: BURN_MARK_SECONDS }],
        "Magic",
      ),
    );
  }
}

/**
 * Move a projectile one tick and resolve its stop, if any. A projectile
 * that flies into a wall detonates on the last open tile it crossed.
 */
export function stepProjectile(
  world: World,
  projectile: Projectile,
  deltaSeconds: number,
): ProjectileStop | undefined {
  if (projectile.dead) return undefined;

  const previous = projectile.tile();
  projectile.advance(deltaSeconds);
  const tile = projectile.tile();

  let stop: ProjectileStop | undefined;
  if (!world.floor.isInBounds(tile.x, tile.y) || !world.floor.isWalkable(tile.x, tile.y)) {
    stop = "wall";
  } else if (entityOnTile(world, projectile, tile)) {
    stop = "entity";
  } else if (projectile.travelled >= projectile.maxDistance) {
    stop = "distance";
  }

  if (stop === undefined) return undefined;
  projectile.dead = true;
  detonate(world, projectile, stop === "wall" ? previous : tile);
  return stop;
}
