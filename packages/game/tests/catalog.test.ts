import { describe, expect, it } from "vitest";
import { SimulationClock } from "../src/core/clock";
import {
  buildCatalogs,
  defaultCatalogs,
  findWeapon,
  parseEnemyCatalog,
  parseWeaponCatalog,
  weaponsOfTier,
} from "../src/catalog/loader";
import { createBoss, enemyFromTemplate, goldDrop } from "../src/entities/enemy";

const template = {
  id: "bog-rat",
  name: "Bog Rat",
  description: "Wet.",
  rarity: "Fighter",
  element: "Ghost",
  health: 8,
  speed: 0.2,
  attacks: [],
  buffs: [],
};

const byDifficulty = {
  Easy: ["bog-rat"],
  Normal: ["bog-rat"],
  Hard: ["bog-rat"],
  Death: ["bog-rat"],
};

describe("bundled catalogs", () => {
  const catalogs = defaultCatalogs();

  it("loads every weapon and template", () => {
    expect(catalogs.weapons).toHaveLength(41);
    expect(catalogs.enemies.size).toBe(12);
    expect(catalogs.enemiesByDifficulty.Easy).toHaveLength(3);
    expect(catalogs.enemiesByDifficulty.Normal).toHaveLength(6);
    expect(catalogs.enemiesByDifficulty.Hard).toHaveLength(7);
    expect(catalogs.enemiesByDifficulty.Death).toHaveLength(6);
    expect(weaponsOfTier(catalogs, "Legendary")).toHaveLength(6);
  });

  it("describes the starting weapons", () => {
    expect(findWeapon(catalogs, "Iron Sword")).toEqual({
      name: "Iron Sword",
      kind: "Sword",
      tier: "Common",
      damage: 5,
      cooldown: 0.5,
      pattern: { kind: "BasicSlash" },
      enchants: [],
    });
    expect(findWeapon(catalogs, "Wood Bow")?.pattern).toEqual({ kind: "ArrowShot", reach: 5 });
    expect(findWeapon(catalogs, "Excalibur Replica")).toBeUndefined();
  });

  it("parses once", () => {
    expect(defaultCatalogs()).toBe(catalogs);
  });
});

describe("catalog validation", () => {
  it("accepts a minimal enemy catalog", () => {
    const result = parseEnemyCatalog({ templates: [template], byDifficulty });
    expect(result.success).toBe(true);
    expect(result.getOrThrow().byDifficulty.Hard.map((t) => t.name)).toEqual(["Bog Rat"]);
  });

  it("rejects a template with no health", () => {
    const result = parseEnemyCatalog({ templates: [{ ...template, health: 0 }], byDifficulty });
    expect(result.success).toBe(false);
    expect(result.error.code).toBe("CATALOG_INVALID");
  });

  it("rejects a difficulty list naming an unknown template", () => {
    const result = parseEnemyCatalog({
      templates: [template],
      byDifficulty: { ...byDifficulty, Death: ["bog-king"] },
    });
    expect(result.success).toBe(false);
    expect(result.error.code).toBe("CATALOG_INVALID");
  });

  it("rejects duplicate weapon names", () => {
    const sword = {
      name: "Twin",
      kind: "Sword",
      tier: "Common",
      damage: 1,
      cooldown: 0.5,
      pattern: { kind: "BasicSlash" },
    };
    const result = parseWeaponCatalog({ weapons: [sword, sword] });
    expect(result.success).toBe(false);
    expect(result.error.code).toBe("CATALOG_INVALID");
  });

  it("fails the whole build when one half is invalid", () => {
    const result = buildCatalogs({ templates: [template], byDifficulty }, { weapons: [] });
    expect(result.success).toBe(false);
  });
});

describe("enemy factory", () => {
  const catalogs = defaultCatalogs();
  const clock = new SimulationClock();

  it("scales templates by difficulty", () => {
    const footsoldier = catalogs.enemies.get("rotting-footsoldier");
    if (!footsoldier) throw new Error("missing template");

    const enemy = enemyFromTemplate(footsoldier, {
      id: 3,
      position: { x: 4, y: 4 },
      difficulty: "Hard",
      clock,
    });
    expect(enemy.name).toBe("Rotting Footsoldier");
    expect(enemy.health).toBe(42);
    expect(enemy.maxHealth).toBe(42);
    expect(enemy.goldDrop).toBe(20);
    expect(enemy.detectionRadius).toBe(7);
  });

  it("gives bosses triple loot and fixed health", () => {
    const boss = createBoss("SkeletalKnight", {
      id: 1,
      position: { x: 0, y: 0 },
      difficulty: "Normal",
      clock,
    });
    expect(boss.name).toBe("Skeletal Knight");
    expect(boss.health).toBe(180);
    expect(boss.goldDrop).toBe(675);
    expect(boss.detectionRadius).toBe(15);
    expect(boss.boss?.phase).toBe("First");
  });

  it("rounds gold up", () => {
    expect(goldDrop("Guard", "Normal")).toBe(23);
    expect(goldDrop("Fighter", "Easy")).toBe(10);
  });
});
