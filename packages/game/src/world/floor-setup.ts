import {
  CONSUMABLE_KINDS,
  Difficulty,
  difficultyProfile,
  SeededRandom,
} from "@crawl/contracts";
import {
  findPlayerSpawn,
  findSpawnPositions,
  generateFloor,
  type Floor,
  type Point,
} from "@crawl/procgen";
import {
  DEFAULT_RUN_SEED,
  ENEMY_MIN_PLAYER_DISTANCE,
  ENEMY_SEED_OFFSET,
  FLOOR_HEIGHT,
  FLOOR_WIDTH,
  ITEM_MIN_PLAYER_DISTANCE,
  ITEM_MIN_SPACING,
  ITEM_SEED_OFFSET,
  ITEMS_PER_FLOOR,
} from "../constants";
import { BOSS_KINDS } from "../entities/boss";
import { createBoss, enemyFromTemplate } from "../entities/enemy";
import { rollTier } from "../items/tiers";
import { World, type WorldOptions } from "./world";

/** Floor seed for a level: the run seed for level 1, then +1 per level */
export function floorSeed(runSeed: number, level: number): number {
  return runSeed + level - 1;
}

export function generateLevel(runSeed: number, level: number): Floor {
  return generateFloor(FLOOR_WIDTH, FLOOR_HEIGHT, floorSeed(runSeed, level));
}

function spawnItems(world: World): Point[] {
  const rng = SeededRandom.derive(world.floor.seed, ITEM_SEED_OFFSET);
  const positions = findSpawnPositions(world.floor, rng, {
    player: world.player.position,
    count: ITEMS_PER_FLOOR,
    minPlayerDistance: ITEM_MIN_PLAYER_DISTANCE,
    minSpacing: ITEM_MIN_SPACING,
  });

  for (const position of positions) {
    const consumable = rng.choice(CONSUMABLE_KINDS);
    world.addItem(position, { kind: "consumable", consumable }, rollTier(rng, world.difficulty));
  }
  return positions;
}

function spawnEnemies(world: World, occupied: readonly Point[]): void {
  const rng = SeededRandom.derive(world.floor.seed, ENEMY_SEED_OFFSET);
  const boss = world.isBossLevel();
  const [min, max] = difficultyProfile(world.difficulty).enemyCount;

  const positions = findSpawnPositions(world.floor, rng, {
    player: world.player.position,
    existing: occupied,
    count: boss ? 1 : rng.range(min, max),
    minPlayerDistance: ENEMY_MIN_PLAYER_DISTANCE,
  });

  for (const position of positions) {
    const options = {
      id: world.allocateEntityId(),
      position,
      difficulty: world.difficulty,
      clock: world.clock,
    };

    if (boss) {
      const kind = rng.choice(BOSS_KINDS);
      if (kind) world.addEnemy(createBoss(kind, options));
      continue;
    }

    const template = rng.choice(world.catalogs.enemiesByDifficulty[world.difficulty]);
    if (template) world.addEnemy(enemyFromTemplate(template, options));
  }
}

/**
 * Place the player and populate the current floor: items first, then
 * enemies (or the boss on the last level), each from its own seeded
 * stream.
 */
export function populateFloor(world: World): void {
  const floor = world.floor;
  const spawn =
    findPlayerSpawn(floor, new SeededRandom(floor.seed)) ?? floor.findWalkableTile();
  if (spawn) world.movePlayerTo(spawn);

  const items = spawnItems(world);
  spawnEnemies(world, items);

  world.events.emit({ type: "level.entered", level: world.floorLevel, boss: world.isBossLevel() });
  world.logger.info("Entered floor", {
    level: world.floorLevel,
    seed: floor.seed,
    enemies: world.enemies.length,
    items: world.items.length,
  });
}

/** Generate and enter a level of the current run */
export function enterFloor(world: World, level: number): void {
  world.setFloor(generateLevel(world.runSeed, level), level);
  populateFloor(world);
}

/**
 * Start a run: generate its first floor, build the world and populate it.
 */
export function createRun(options: Omit<WorldOptions, "playerPosition"> = {}): World {
  const runSeed = options.runSeed ?? DEFAULT_RUN_SEED;
  const maxLevels = difficultyProfile(options.difficulty ?? Difficulty.NORMAL).maxLevels;
  const level = Math.min(maxLevels, Math.max(1, options.floorLevel ?? 1));
  const world = new World(generateLevel(runSeed, level), {
    ...options,
    runSeed,
    floorLevel: level,
  });
  populateFloor(world);
  return world;
}
