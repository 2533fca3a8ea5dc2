import { Floor, Grid, type Point } from "@crawl/procgen";
import { Element } from "../src/combat/damage";
import type { GameEvent } from "../src/core/events";
import { SilentLogger } from "../src/core/logger";
import { Enemy, type EnemyInit } from "../src/entities/enemy";
import { World, type WorldOptions } from "../src/world/world";

/** A walled rectangle, open inside */
export function openFloor(width = 40, height = 30, seed = 1): Floor {
  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    rows.push(
      y === 0 || y === height - 1 ? "#".repeat(width) : `#${".".repeat(width - 2)}#`,
    );
  }
  return Floor.fromGrid(Grid.fromRows(rows), seed);
}

export function testWorld(options: WorldOptions = {}, floor: Floor = openFloor()): World {
  return new World(floor, {
    logger: new SilentLogger(),
    playerPosition: { x: 10, y: 10 },
    ...options,
  });
}

type EnemyOverrides = Partial<Omit<EnemyInit, "id" | "clock" | "position">>;

/** A stationary 10 HP undead fighter unless overridden */
export function placeEnemy(world: World, position: Point, overrides: EnemyOverrides = {}): Enemy {
  return world.addEnemy(
    new Enemy({
      id: world.allocateEntityId(),
      name: "Test Ghoul",
      rarity: "Fighter",
      element: Element.UNDEAD,
      position,
      health: 10,
      speed: 0,
      detectionRadius: 0,
      goldDrop: 10,
      clock: world.clock,
      ...overrides,
    }),
  );
}

/** Collects every event the world delivers from now on */
export function recordEvents(world: World): GameEvent[] {
  const events: GameEvent[] = [];
  world.events.onAny((event) => events.push(event));
  return events;
}
