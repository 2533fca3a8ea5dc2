import { loadSave, type CrawlError, type GameSave, type Result } from "@crawl/contracts";
import { findWeapon } from "./catalog/loader";
import { SimulationClock } from "./core/clock";
import { SkillTree } from "./progression/skill-tree";
import { generateLevel, populateFloor } from "./world/floor-setup";
import { World, type WorldOptions } from "./world/world";

/**
 * Capture the persistent part of a run. Enemies, drops and cooldowns are
 * not saved; a restored floor is repopulated from its seed.
 */
export function createSave(world: World): GameSave {
  const player = world.player;
  return {
    playerName: world.playerName,
    player: {
      attackDamage: player.baseDamage,
      attackLength: player.attackLength,
      attackWidth: player.attackWidth,
      dashDistance: player.dashDistance,
      health: player.health,
      maxHealth: player.maxHealth,
      gold: player.gold,
      enemiesKilled: player.enemiesKilled,
    },
    weapons: player.weapons.weapons.map((w) => w.name),
    currentWeapon: player.weapons.currentIndex,
    consumables: player.consumables.items.map((s) => ({ kind: s.kind, quantity: s.quantity })),
    skills: player.skills.snapshot(),
    chosenPath: player.skills.chosenPath,
    ultimate: player.ultimate.kind,
    runSeed: world.runSeed,
    floorLevel: world.floorLevel,
    maxLevels: world.maxLevels,
    position: { x: player.position.x, y: player.position.y },
    difficulty: world.difficulty,
    elapsedSeconds: world.elapsedSeconds(),
  };
}

/**
 * Load a save's player onto a world. The saved maximum health is kept,
 * health is clamped to it, unknown weapon names are skipped and a position inside a wall
 * moves to the nearest walkable tile.
 */
export function applySave(world: World, save: GameSave): void {
  const player = world.player;
  player.baseDamage = save.player.attackDamage;
  player.attackLength = save.player.attackLength;
  player.attackWidth = save.player.attackWidth;
  player.dashDistance = save.player.dashDistance;
  player.skills = new SkillTree(save.skills, save.chosenPath);
  // Saved maximum already includes the skill bonus
  player.baseMaxHealth = save.player.maxHealth / player.skills.totalBonus().health;
  player.health = Math.min(player.maxHealth, Math.max(0, save.player.health));
  player.gold = 0;
  player.addGold(save.player.gold);
  player.enemiesKilled = save.player.enemiesKilled;

  const weapons = save.weapons.flatMap((name) => {
    const weapon = findWeapon(world.catalogs, name);
    if (!weapon) world.logger.warn("Unknown weapon in save", { name });
    return weapon ? [weapon] : [];
  });
  player.weapons.load(weapons, save.currentWeapon);

  player.consumables.clear();
  for (const stack of save.consumables) {
    player.consumables.add(stack.kind, stack.quantity);
  }
  player.ultimate.setKind(save.ultimate);

  const floor = world.floor;
  const position = floor.isWalkable(save.position.x, save.position.y)
    ? save.position
    : (floor.nearestWalkable(save.position) ?? player.position);
  world.movePlayerTo({ x: position.x, y: position.y });
}

/**
 * Rebuild a run from a save: regenerate and repopulate its floor, then
 * restore the player.
 */
export function restoreRun(
  save: GameSave,
  options: Pick<WorldOptions, "logger" | "catalogs" | "viewport"> = {},
): World {
  const world = new World(generateLevel(save.runSeed, save.floorLevel), {
    ...options,
    difficulty: save.difficulty,
    runSeed: save.runSeed,
    floorLevel: save.floorLevel,
    playerName: save.playerName,
    clock: new SimulationClock(save.elapsedSeconds),
    startedAt: 0,
  });
  populateFloor(world);
  applySave(world, save);
  return world;
}

/** Validate an outside payload and restore it */
export function loadRun(
  input: unknown,
  options: Pick<WorldOptions, "logger" | "catalogs" | "viewport"> = {},
): Result<World, CrawlError> {
  return loadSave(input).map((save) => restoreRun(save, options));
}
