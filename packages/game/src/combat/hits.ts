import type { Point } from "@crawl/procgen";
import { PLAYER_ID } from "../core/events";
import type { Enemy } from "../entities/enemy";
import type { AnimationHit } from "../patterns/animation";
import type { World } from "../world/world";
import { formatBreakdown, PHASE_SHIFT_CHANCE, resolveDamage, type DamageBreakdown } from "./damage";

export interface Vector {
  x: number;
  y: number;
}

/**
 * Push from `from` toward `to` scaled to `force`; zero when the points
 * coincide.
 */
export function knockbackVector(from: Point, to: Point, force: number): Vector {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const length = Math.hypot(dx, dy);
  if (length === 0 || force === 0) return { x: 0, y: 0 };
  return { x: (dx / length) * force, y: (dy / length) * force };
}

/**
 * Damage an enemy with a player attack. Returns the breakdown, or
 * undefined when the enemy was already dead or phased out of the hit.
 */
export function strikeEnemy(
  world: World,
  enemy: Enemy,
  hit: AnimationHit,
): DamageBreakdown | undefined {
  if (!enemy.isAlive()) return undefined;

  if (enemy.hasBuff("PhaseShift") && world.rng.probability(PHASE_SHIFT_CHANCE)) {
    world.events.emit({ type: "message", text: `${enemy.name} phases through the attack` });
    return undefined;
  }

  const player = world.player;
  const breakdown = resolveDamage({
    base: hit.damage,
    type: hit.damageType,
    targetElement: enemy.element,
    targetBuffs: enemy.buffs,
    critChance: player.critChance,
    roll: world.rng.next(),
  });

  const multiplier = enemy.boss?.incomingDamageMultiplier() ?? 1;
  const final =
    multiplier === 1 ? breakdown.final : Math.max(1, Math.ceil(breakdown.final * multiplier));
  const taken = enemy.takeDamage(final);
  enemy.damagedAt = world.clock.now();

  const push = knockbackVector(hit.origin, enemy.position, hit.knockback);
  enemy.knockback.x += push.x;
  enemy.knockback.y += push.y;

  if (hit.effect && enemy.status.add(hit.effect)) {
    world.events.emit({
      type: "status.applied",
      entity: enemy.id,
      status: hit.effect.kind,
      duration: hit.effect.duration,
    });
  }

  player.ultimate.addCharge(taken);
  world.events.emit({
    type: "combat.damage",
    source: hit.owner,
    target: enemy.id,
    damage: taken,
    damageType: hit.damageType,
    isCritical: breakdown.isCritical,
  });
  world.logger.debug(`${enemy.name} hit`, { breakdown: formatBreakdown(breakdown) });
  return breakdown;
}

/**
 * Damage the player with an enemy attack. The attacker's buffs scale the
 * hit; Ghost makes the player immune; an active block halves it and is
 * spent. Returns the damage taken.
 */
export function strikePlayer(world: World, hit: AnimationHit): number {
  const player = world.player;
  if (!player.isAlive() || player.isInvulnerable()) return 0;

  const attacker = world.enemyById(hit.owner);
  const breakdown = resolveDamage({
    base: hit.damage,
    type: hit.damageType,
    attackerBuffs: attacker?.buffs,
    attackerHealthFraction: attacker ? attacker.health / Math.max(1, attacker.maxHealth) : 1,
  });

  let damage = breakdown.final;
  if (player.blockUntil !== undefined && world.clock.now() <= player.blockUntil) {
    damage = Math.max(1, Math.floor(damage / 2));
    player.blockUntil = undefined;
  }

  const taken = player.takeDamage(damage);
  const push = knockbackVector(hit.origin, player.position, hit.knockback);
  player.knockback.x += push.x;
  player.knockback.y += push.y;

  if (hit.effect && player.status.add(hit.effect)) {
    world.events.emit({
      type: "status.applied",
      entity: PLAYER_ID,
      status: hit.effect.kind,
      duration: hit.effect.duration,
    });
  }

  player.ultimate.addCharge(taken);
  world.events.emit({
    type: "combat.damage",
    source: hit.owner,
    target: PLAYER_ID,
    damage: taken,
    damageType: hit.damageType,
    isCritical: breakdown.isCritical,
  });
  world.logger.debug("Player hit", { breakdown: formatBreakdown(breakdown) });
  return taken;
}

/**
 * Apply a landed hit to its footprint. Player hits damage the first live
 * enemy on each tile; enemy hits damage the player once if the player
 * stands on any tile.
 */
export function applyFootprint(
  world: World,
  hit: AnimationHit,
  footprint: readonly Point[],
): void {
  if (hit.owner === PLAYER_ID) {
    for (const tile of footprint) {
      const enemy = world.enemyAt(tile);
      if (enemy) strikeEnemy(world, enemy, hit);
    }
    return;
  }

  const { x, y } = world.player.position;
  if (footprint.some((tile) => tile.x === x && tile.y === y)) {
    strikePlayer(world, hit);
  }
}
