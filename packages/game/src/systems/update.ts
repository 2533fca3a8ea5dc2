import { defineSystem, Phase } from "@crawl/schedule";
import { applyFootprint } from "../combat/hits";
import { updateBoss, updateEnemyAttack, updateEnemyUltimate } from "../combat/enemy-attacks";
import { advanceEnemyMovement, enemyCanEnter } from "../movement/enemy-ai";
import { applyKnockback } from "../movement/knockback";
import { playerCanEnter } from "../movement/player-movement";
import { stepProjectile } from "../projectiles/impact";
import type { World } from "../world/world";
import { isPlaying } from "./conditions";

export const PlayerKnockbackSystem = defineSystem<World>("player-knockback")
  .inPhase(Phase.Update)
  .runIf(isPlaying)
  .execute((world) => {
    const player = world.player;
    const next = applyKnockback(player.position, player.knockback, (p) =>
      playerCanEnter(world, p),
    );
    if (next !== player.position) world.movePlayerTo(next);
  });

/**
 * Per enemy: knockback, boss bookkeeping, movement, then attacks.
 */
export const EnemySystem = defineSystem<World>("enemies")
  .inPhase(Phase.Update)
  .after("player-knockback")
  .runIf(isPlaying)
  .execute((world) => {
    for (const enemy of world.enemies) {
      if (!enemy.isAlive()) continue;

      enemy.position = applyKnockback(enemy.position, enemy.knockback, (p) =>
        enemyCanEnter(world, enemy, p),
      );
      updateBoss(world, enemy);
      advanceEnemyMovement(world, enemy);
      updateEnemyAttack(world, enemy);
      updateEnemyUltimate(world, enemy);
    }
  });

export const ProjectileSystem = defineSystem<World>("projectiles")
  .inPhase(Phase.Update)
  .after("enemies")
  .runIf(isPlaying)
  .execute((world) => {
    for (const projectile of world.projectiles) {
      stepProjectile(world, projectile, world.deltaSeconds);
    }
    world.projectiles = world.projectiles.filter((p) => !p.dead);
  });

/**
 * Advance animations; a hit lands on its footprint on the update that
 * crosses into the last frame.
 */
export const AnimationSystem = defineSystem<World>("animations")
  .inPhase(Phase.Update)
  .after("projectiles")
  .runIf(isPlaying)
  .execute((world) => {
    const active = world.animations;
    world.animations = [];
    const kept = active.filter((animation) => {
      const step = animation.update(world.deltaSeconds);
      if (step.hit) applyFootprint(world, step.hit, step.footprint);
      return !step.finished;
    });
    // Animations started by hits this tick go after the survivors
    world.animations = [...kept, ...world.animations];
  });
