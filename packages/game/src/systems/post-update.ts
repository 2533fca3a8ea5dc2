import { defineSystem, Phase } from "@crawl/schedule";
import { weaponsOfTier } from "../catalog/loader";
import { WEAPON_DROP_CHANCE } from "../constants";
import type { Enemy } from "../entities/enemy";
import { WEAPON_DROP_TIERS } from "../items/tiers";
import { enterFloor } from "../world/floor-setup";
import type { World } from "../world/world";
import { floorCleared, isPlaying } from "./conditions";

function dropLoot(world: World, enemy: Enemy): void {
  world.dropItemNear(enemy.position, { kind: "gold", amount: enemy.goldDrop }, "Common");

  if (!world.rng.probability(WEAPON_DROP_CHANCE)) return;
  const tier = world.rng.choice(WEAPON_DROP_TIERS[world.difficulty]);
  const weapon = world.rng.choice(weaponsOfTier(world.catalogs, tier));
  if (weapon) {
    world.dropItemNear(enemy.position, { kind: "weapon", weapon }, tier);
  }
}

/**
 * Remove dead enemies, dropping their gold and maybe a weapon, and credit
 * the kill.
 */
export const DeathSystem = defineSystem<World>("deaths")
  .inPhase(Phase.PostUpdate)
  .runIf(isPlaying)
  .execute((world) => {
    const dead = world.enemies.filter((e) => !e.isAlive());
    if (dead.length === 0) return;

    for (const enemy of dead) {
      dropLoot(world, enemy);
      world.player.enemiesKilled += 1;
      world.player.experience += enemy.boss?.experienceReward() ?? 0;
      world.events.emit({
        type: "combat.death",
        entity: enemy.id,
        name: enemy.name,
        gold: enemy.goldDrop,
      });
    }
    world.enemies = world.enemies.filter((e) => e.isAlive());
  });

export const PlayerDeathSystem = defineSystem<World>("player-death")
  .inPhase(Phase.PostUpdate)
  .after("deaths")
  .runIf(isPlaying)
  .execute((world) => {
    if (world.player.isAlive()) return;
    world.status = "dead";
    world.events.emit({ type: "run.ended", outcome: "dead" });
    world.logger.info("Player died", { level: world.floorLevel, tick: world.tick });
  });

/**
 * A cleared floor leads to the next one once the player has acted on it;
 * clearing the boss floor wins the run.
 */
export const FloorProgressSystem = defineSystem<World>("floor-progress")
  .inPhase(Phase.PostUpdate)
  .after("player-death")
  .runIf(floorCleared)
  .execute((world) => {
    if (world.isBossLevel()) {
      world.status = "victory";
      world.events.emit({ type: "run.ended", outcome: "victory" });
      world.logger.info("Run won", { level: world.floorLevel, tick: world.tick });
      return;
    }
    enterFloor(world, world.floorLevel + 1);
  });

export const CameraSystem = defineSystem<World>("camera")
  .inPhase(Phase.PostUpdate)
  .after("floor-progress")
  .runIf(isPlaying)
  .execute((world) => world.camera.follow(world.player.position));
