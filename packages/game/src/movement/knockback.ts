import type { Point } from "@crawl/procgen";
import type { Vector } from "../combat/hits";
import { KNOCKBACK_DAMPING, KNOCKBACK_EPSILON } from "../constants";

/** Round half away from zero so pushes are symmetric */
function roundAway(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * One tick of knockback motion. The entity moves to the rounded pushed
 * tile, or slides along one axis when that tile is blocked; the vector is
 * then damped and zeroed once negligible. Returns the new position.
 */
export function applyKnockback(
  position: Point,
  knockback: Vector,
  canEnter: (p: Point) => boolean,
): Point {
  if (knockback.x === 0 && knockback.y === 0) return position;

  const dx = roundAway(knockback.x);
  const dy = roundAway(knockback.y);
  const candidates: Point[] = [
    { x: position.x + dx, y: position.y + dy },
    { x: position.x + dx, y: position.y },
    { x: position.x, y: position.y + dy },
  ];

  let next = position;
  for (const candidate of candidates) {
    if (candidate.x === position.x && candidate.y === position.y) continue;
    if (canEnter(candidate)) {
      next = candidate;
      break;
    }
  }

  knockback.x *= KNOCKBACK_DAMPING;
  knockback.y *= KNOCKBACK_DAMPING;
  if (Math.hypot(knockback.x, knockback.y) < KNOCKBACK_EPSILON) {
    knockback.x = 0;
    knockback.y = 0;
  }
  return next;
}
