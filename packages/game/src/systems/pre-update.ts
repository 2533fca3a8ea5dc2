import { defineSystem, Phase } from "@crawl/schedule";
import { applyInput } from "../actions/apply-input";
import { PLAYER_ID, type EntityId } from "../core/events";
import type { StatusEffects } from "../status/effects";
import type { World } from "../world/world";
import { isPlaying } from "./conditions";

/**
 * Drain the input queue. Runs while paused so pause can be undone.
 */
export const InputSystem = defineSystem<World>("input")
  .inPhase(Phase.PreUpdate)
  .execute((world) => {
    if (world.isPlaying()) {
      world.player.ticksSinceMove += 1;
    }
    for (const input of world.inputs.drain()) {
      applyInput(world, input);
    }
  });

function expireStatus(world: World, entity: EntityId, status: StatusEffects, dt: number): void {
  for (const kind of status.update(dt)) {
    world.events.emit({ type: "status.removed", entity, status: kind });
  }
}

/**
 * Count status durations down, age item drops and run boss special
 * timers. Warden regeneration is per tick; the Regeneration buff heals
 * once a second.
 */
export const TimersSystem = defineSystem<World>("timers")
  .inPhase(Phase.PreUpdate)
  .after("input")
  .runIf(isPlaying)
  .execute((world) => {
    const dt = world.deltaSeconds;
    expireStatus(world, PLAYER_ID, world.player.status, dt);

    for (const item of world.items) {
      item.age += dt;
    }

    for (const enemy of world.enemies) {
      if (!enemy.isAlive()) continue;
      expireStatus(world, enemy.id, enemy.status, dt);
      enemy.boss?.tickSpecial(enemy, dt);
      enemy.boss?.regenerate(enemy);

      enemy.regenCarry += dt;
      while (enemy.regenCarry >= 1) {
        enemy.regenCarry -= 1;
        enemy.heal(enemy.regenerationPerSecond());
      }
    }
  });

/**
 * Deal damage-over-time. Fractional damage carries over between ticks.
 */
export const StatusDamageSystem = defineSystem<World>("status-damage")
  .inPhase(Phase.PreUpdate)
  .after("timers")
  .runIf(isPlaying)
  .execute((world) => {
    const dt = world.deltaSeconds;
    const player = world.player;

    player.statusDamageCarry += player.status.totalDamagePerSecond() * dt;
    const playerDamage = Math.floor(player.statusDamageCarry);
    if (playerDamage > 0) {
      player.statusDamageCarry -= playerDamage;
      if (!player.isInvulnerable()) {
        const taken = player.takeDamage(playerDamage);
        player.ultimate.addCharge(taken);
      }
    }

    for (const enemy of world.enemies) {
      if (!enemy.isAlive()) continue;
      enemy.statusDamageCarry += enemy.status.totalDamagePerSecond() * dt;
      const damage = Math.floor(enemy.statusDamageCarry);
      if (damage > 0) {
        enemy.statusDamageCarry -= damage;
        enemy.takeDamage(damage);
      }
    }
  });
