import { directionBetween, manhattan } from "@crawl/procgen";
import { ENEMY_ATTACK_TICKS, PLAYER_KNOCKBACK_FORCE } from "../constants";
import {
  effectToStatus,
  RARITY_PROFILES,
  ULTIMATE_POWER_MULTIPLIER,
  type Enemy,
} from "../entities/enemy";
import { ActiveAnimation, type AnimationHit } from "../patterns/animation";
import { animationFrames, patternCategory, type AttackPattern } from "../patterns/pattern";
import type { World } from "../world/world";
import { DamageType, patternDamageType } from "./damage";

function playAt(
  world: World,
  enemy: Enemy,
  pattern: AttackPattern,
  hit: AnimationHit | undefined,
): void {
  const direction = directionBetween(enemy.position, world.player.position);
  world.animations.push(
    new ActiveAnimation(
      animationFrames(pattern, enemy.position, direction),
      patternCategory(pattern),
      hit,
    ),
  );
}

/**
 * Count the attack accumulator up and strike once it is full: regular
 * enemies when adjacent, bosses anywhere within their attack radius.
 * Nothing attacks before the player has acted on the floor.
 */
export function updateEnemyAttack(world: World, enemy: Enemy): void {
  enemy.attackTicks += 1;
  if (!world.playerHasActed || enemy.status.has("Stun")) return;
  if (enemy.attackTicks < ENEMY_ATTACK_TICKS) return;

  const distance = manhattan(enemy.position, world.player.position);
  const boss = enemy.boss;

  if (boss) {
    if (boss.isTransitioning() || distance > boss.profile.attackRadius) return;
    enemy.attackTicks = 0;
    const pattern = boss.nextPattern();
    playAt(world, enemy, pattern, {
      owner: enemy.id,
      damage: boss.effectiveDamage(),
      damageType: patternDamageType(pattern),
      knockback: PLAYER_KNOCKBACK_FORCE,
      origin: enemy.position,
    });
    return;
  }

  if (distance > 1) return;
  enemy.attackTicks = 0;
  const attack = enemy.nextAttack();
  playAt(world, enemy, RARITY_PROFILES[enemy.rarity].strikePattern, {
    owner: enemy.id,
    damage: enemy.rollDamage(attack, world.rng),
    damageType: attack?.type ?? DamageType.PHYSICAL,
    knockback: PLAYER_KNOCKBACK_FORCE,
    origin: enemy.position,
    effect: attack?.effect ? effectToStatus(attack.effect) : undefined,
  });
}

/**
 * Fire a template ultimate when it is off cooldown and the player is
 * inside its radius. An ultimate with no damage only plays its animation.
 */
export function updateEnemyUltimate(world: World, enemy: Enemy): void {
  const ultimate = enemy.ultimate;
  const cooldown = enemy.ultimateCooldown;
  if (!ultimate || !cooldown || !world.playerHasActed) return;
  if (!cooldown.isReady() || enemy.status.has("Stun")) return;
  if (manhattan(enemy.position, world.player.position) > ultimate.radius) return;

  cooldown.trigger();
  const damage = Math.round(
    ultimate.damage * ULTIMATE_POWER_MULTIPLIER[ultimate.power] * enemy.damageMultiplier,
  );
  playAt(
    world,
    enemy,
    ultimate.pattern,
    damage > 0
      ? {
          owner: enemy.id,
          damage,
          damageType: patternDamageType(ultimate.pattern),
          knockback: 0,
          origin: enemy.position,
        }
      : undefined,
  );
  world.events.emit({ type: "message", text: `${enemy.name} unleashes ${ultimate.name}` });
}

/**
 * Boss bookkeeping for one tick: phase changes and specials while the
 * player is within detection range.
 */
export function updateBoss(world: World, enemy: Enemy): void {
  const boss = enemy.boss;
  if (!boss) return;

  const phase = boss.updatePhase(enemy.health);
  if (phase) {
    world.events.emit({ type: "boss.phase", entity: enemy.id, phase });
    world.logger.info("Boss phase changed", { boss: enemy.name, phase });
  }

  if (!world.playerHasActed || !boss.canUseSpecial()) return;
  if (manhattan(enemy.position, world.player.position) > enemy.detectionRadius) return;

  const special = boss.triggerSpecial(enemy);
  world.events.emit({ type: "boss.special", entity: enemy.id, ability: special.name });
  if (special.burst) {
    playAt(world, enemy, special.burst, {
      owner: enemy.id,
      damage: boss.effectiveDamage(),
      damageType: DamageType.FIRE,
      knockback: 0,
      origin: enemy.position,
    });
  }
}
