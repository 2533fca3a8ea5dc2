import { condition } from "@crawl/schedule";
import type { World } from "../world/world";

/** Gameplay systems run only while the run is playing */
export const isPlaying = condition<World>((world) => world.isPlaying());

/** Every enemy is gone and the player has acted on this floor */
export const floorCleared = isPlaying.and(
  (world) => world.enemies.length === 0 && world.playerHasActed,
);
