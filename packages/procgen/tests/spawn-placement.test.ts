import { SeededRandom } from "@crawl/contracts";
import { describe, expect, it } from "vitest";
import { manhattan } from "../src/core/geometry";
import { Grid } from "../src/core/grid";
import { Floor } from "../src/floor";
import { findPlayerSpawn, findSpawnPositions } from "../src/spawn";

function openFloor(width: number, height: number): Floor {
  const rows = Array.from({ length: height }, (_, y) =>
    y === 0 || y === height - 1 ? "#".repeat(width) : `#${".".repeat(width - 2)}#`,
  );
  return Floor.fromGrid(Grid.fromRows(rows), 1);
}

describe("findSpawnPositions", () => {
  const floor = openFloor(40, 30);
  const player = { x: 20, y: 15 };

  it("respects walkability, player distance and spacing", () => {
    const spawns = findSpawnPositions(floor, new SeededRandom(42), {
      player,
      count: 8,
      minPlayerDistance: 8,
      minSpacing: 5,
    });

    expect(spawns.length).toBeGreaterThan(0);
    expect(spawns.length).toBeLessThanOrEqual(8);
    for (const [i, spawn] of spawns.entries()) {
      expect(floor.isWalkable(spawn.x, spawn.y)).toBe(true);
      expect(manhattan(spawn, player)).toBeGreaterThanOrEqual(8);
      for (const other of spawns.slice(i + 1)) {
        expect(manhattan(spawn, other)).toBeGreaterThanOrEqual(5);
      }
    }
  });

  it("never reuses an existing tile", () => {
    const existing = [{ x: 5, y: 5 }];
    const spawns = findSpawnPositions(floor, new SeededRandom(7), {
      player,
      existing,
      count: 20,
      minPlayerDistance: 2,
      minSpacing: 1,
    });
    expect(spawns.some((p) => p.x === 5 && p.y === 5)).toBe(false);
  });

  it("keeps off the player tile and its neighbours", () => {
    const tiny = openFloor(5, 5);
    const spawns = findSpawnPositions(tiny, new SeededRandom(3), {
      player: { x: 2, y: 2 },
      count: 9,
      minPlayerDistance: 0,
      minSpacing: 0,
      attempts: 500,
    });
    // Interior is 3×3; the centre and its four neighbours are excluded.
    expect(spawns.length).toBeLessThanOrEqual(4);
    for (const p of spawns) {
      expect(manhattan(p, { x: 2, y: 2 })).toBe(2);
    }
  });

  it("is deterministic for a seed", () => {
    const options = { player, count: 5, minPlayerDistance: 8 };
    expect(findSpawnPositions(floor, new SeededRandom(11), options)).toEqual(
      findSpawnPositions(floor, new SeededRandom(11), options),
    );
  });

  it("returns nothing on floors without an interior", () => {
    const narrow = Floor.fromGrid(Grid.floors(2, 10), 1);
    expect(
      findSpawnPositions(narrow, new SeededRandom(1), { player, count: 3, minPlayerDistance: 0 }),
    ).toEqual([]);
  });

  it("returns nothing on an all-wall floor", () => {
    const walls = Floor.fromGrid(Grid.walls(10, 10), 1);
    expect(
      findSpawnPositions(walls, new SeededRandom(1), { player, count: 3, minPlayerDistance: 0 }),
    ).toEqual([]);
  });
});

describe("findPlayerSpawn", () => {
  it("picks a tile of the largest room", () => {
    const floor = Floor.fromGrid(
      Grid.fromRows(["########", "#.##...#", "#.##...#", "########"]),
      1,
    );
    const spawn = findPlayerSpawn(floor, new SeededRandom(5));
    expect(spawn).toBeDefined();
    if (spawn) {
      expect(floor.roomAt(spawn.x, spawn.y)?.id).toBe(1);
    }
  });

  it("returns undefined on a floor with no open tiles", () => {
    expect(findPlayerSpawn(Floor.fromGrid(Grid.walls(6, 6), 1), new SeededRandom(5))).toBeUndefined();
  });
});
