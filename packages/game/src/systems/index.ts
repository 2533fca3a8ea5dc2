/**
 * Tick systems.
 *
 * PreUpdate drains input and advances timers, Update moves and fights,
 * PostUpdate settles deaths, floors and the camera.
 *
 * @example
 * ```typescript
 * const scheduler = new SystemScheduler<World>();
 * scheduler.registerBatch(GAME_SYSTEMS);
 * scheduler.runAll(world);
 * ```
 */

import type { System } from "@crawl/schedule";
import type { World } from "../world/world";
import { CameraSystem, DeathSystem, FloorProgressSystem, PlayerDeathSystem } from "./post-update";
import { InputSystem, StatusDamageSystem, TimersSystem } from "./pre-update";
import { AnimationSystem, EnemySystem, PlayerKnockbackSystem, ProjectileSystem } from "./update";

export { isPlaying } from "./conditions";
export * from "./post-update";
export * from "./pre-update";
export * from "./update";

export const GAME_SYSTEMS: readonly System<World>[] = [
  InputSystem,
  TimersSystem,
  StatusDamageSystem,
  PlayerKnockbackSystem,
  EnemySystem,
  ProjectileSystem,
  AnimationSystem,
  DeathSystem,
  PlayerDeathSystem,
  FloorProgressSystem,
  CameraSystem,
];
