import type { Direction, Point } from "@crawl/procgen";
import type { DamageType } from "../combat/damage";
import type { EntityId } from "../core/events";
import {
  ARROW_MAX_DISTANCE,
  ARROW_SPEED,
  FIRE_OIL_MAX_DISTANCE,
  FIRE_OIL_RADIUS,
  FIRE_OIL_SPEED,
} from "../constants";

export type ProjectileKind = "Arrow" | "FireOil";

export interface ProjectileInit {
  readonly kind: ProjectileKind;
  readonly origin: Point;
  readonly direction: Direction;
  readonly owner: EntityId;
  readonly damage: number;
  readonly damageType: DamageType;
  readonly spawnTime: number;
  readonly speed?: number;
  readonly maxDistance?: number;
}

/**
 * Why a projectile stopped.
 */
export type ProjectileStop = "wall" | "entity" | "distance";

/**
 * A projectile moving in continuous space. Collision checks use the
 * rounded tile.
 */
export class Projectile {
  readonly kind: ProjectileKind;
  x: number;
  y: number;
  readonly direction: Direction;
  readonly speed: number;
  readonly maxDistance: number;
  readonly owner: EntityId;
  readonly damage: number;
  readonly damageType: DamageType;
  readonly spawnTime: number;
  travelled = 0;
  dead = false;

  constructor(init: ProjectileInit) {
    this.kind = init.kind;
    this.x = init.origin.x;
    this.y = init.origin.y;
    this.direction = init.direction;
    this.owner = init.owner;
    this.damage = init.damage;
    this.damageType = init.damageType;
    this.spawnTime = init.spawnTime;
    const arrow = init.kind === "Arrow";
    this.speed = init.speed ?? (arrow ? ARROW_SPEED : FIRE_OIL_SPEED);
    this.maxDistance = init.maxDistance ?? (arrow ? ARROW_MAX_DISTANCE : FIRE_OIL_MAX_DISTANCE);
  }

  /** 1 for an arrow (its own tile), 4 for fire oil */
  get impactRadius(): number {
    return this.kind === "Arrow" ? 1 : FIRE_OIL_RADIUS;
  }

  tile(): Point {
    return { x: Math.round(this.x), y: Math.round(this.y) };
  }

  /** Advance by direction × speed × dt */
  advance(deltaSeconds: number): void {
    const step = this.speed * deltaSeconds;
    const length = Math.hypot(this.direction.dx, this.direction.dy) || 1;
    this.x += (this.direction.dx / length) * step;
    this.y += (this.direction.dy / length) * step;
    this.travelled += step;
  }

  glyph(): string {
    if (this.kind === "FireOil") return "*";
    const { dx, dy } = this.direction;
    if (dx > 0) return "→";
    if (dx < 0) return "←";
    if (dy > 0) return "↓";
    return "↑";
  }
}

/**
 * Tiles an impact touches: the tile itself for radius 1, else the disk
 * dx² + dy² ≤ r².
 */
export function impactArea(center: Point, radius: number): Point[] {
  if (radius <= 1) return [{ x: center.x, y: center.y }];
  const tiles: Point[] = [];
  const r2 = radius * radius;
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      if (dx * dx + dy * dy <= r2) {
        tiles.push({ x: center.x + dx, y: center.y + dy });
      }
    }
  }
  return tiles;
}
