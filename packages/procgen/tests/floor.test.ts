import { describe, expect, it } from "vitest";
import { Grid } from "../src/core/grid";
import { Floor, wallGlyph } from "../src/floor";

function boxFloor(): Floor {
  return Floor.fromGrid(
    Grid.fromRows([
      "#####",
      "#...#",
      "#...#",
      "#...#",
      "#####",
    ]),
    7,
  );
}

describe("Floor", () => {
  it("indexes every open tile into its room", () => {
    const floor = Floor.fromGrid(Grid.fromRows(["#####", "#.#.#", "#####"]), 1);

    expect(floor.rooms).toHaveLength(2);
    expect(floor.roomAt(1, 1)?.id).toBe(0);
    expect(floor.roomAt(3, 1)?.id).toBe(1);
    expect(floor.roomAt(2, 1)).toBeUndefined();
    expect(floor.roomAt(-1, 0)).toBeUndefined();
  });

  it("uses the integer mean of member tiles as centroid", () => {
    const floor = Floor.fromGrid(Grid.fromRows(["#####", "#...#", "#..##", "#####"]), 1);
    // Tiles: (1,1) (2,1) (3,1) (1,2) (2,2) → sums 9 and 7 over 5.
    expect(floor.rooms[0]?.centroid).toEqual({ x: 1, y: 1 });
  });

  it("copies the grid it is built from", () => {
    const grid = Grid.fromRows(["###", "#.#", "###"]);
    const floor = Floor.fromGrid(grid, 1);
    grid.set(1, 1, 1);
    expect(floor.isWalkable(1, 1)).toBe(true);
  });

  it("treats out-of-bounds tiles as walls", () => {
    const floor = boxFloor();
    expect(floor.isWalkable(5, 2)).toBe(false);
    expect(floor.isWall(5, 2)).toBe(true);
    expect(floor.isWalkable(2, 2)).toBe(true);
  });

  it("spirals out from the centre to find a walkable tile", () => {
    expect(boxFloor().findWalkableTile()).toEqual({ x: 2, y: 2 });

    const offCentre = Floor.fromGrid(
      Grid.fromRows(["#####", "###.#", "#.#.#", "#####", "#####"]),
      1,
    );
    expect(offCentre.findWalkableTile()).toEqual({ x: 1, y: 2 });
  });

  it("finds the nearest walkable tile breadth-first", () => {
    const floor = boxFloor();
    expect(floor.nearestWalkable({ x: 0, y: 0 })).toEqual({ x: 1, y: 1 });
    expect(floor.nearestWalkable({ x: 3, y: 2 })).toEqual({ x: 3, y: 2 });
    expect(floor.nearestWalkable({ x: 40, y: -3 })).toEqual({ x: 3, y: 1 });
  });

  it("has no walkable tile when everything is wall", () => {
    const floor = Floor.fromGrid(Grid.walls(4, 4), 1);
    expect(floor.findWalkableTile()).toBeUndefined();
    expect(floor.nearestWalkable({ x: 1, y: 1 })).toBeUndefined();
    expect(floor.largestRoom()).toBeUndefined();
    expect(floor.rooms).toEqual([]);
  });

  it("picks the largest room", () => {
    const floor = Floor.fromGrid(Grid.fromRows(["#######", "#.#..##", "#.#..##", "#######"]), 1);
    expect(floor.largestRoom()?.tiles).toHaveLength(4);
    expect(floor.largestRoom()?.id).toBe(1);
  });
});

describe("tile appearance", () => {
  it("hashes coordinates into wall glyphs", () => {
    expect(wallGlyph(0, 0)).toBe("█");
    expect(wallGlyph(1, 0)).toBe("▓");
    expect(wallGlyph(0, 1)).toBe("▓");
    expect(wallGlyph(1, 1)).toBe("█");
  });

  it("shades walls by nearby open tiles", () => {
    const floor = boxFloor();
    expect(floor.appearance(0, 0)).toEqual({ glyph: "█", color: 240 });
    expect(floor.appearance(2, 0)?.color).toBe(242);
  });

  it("shades open tiles by adjacent walls", () => {
    const floor = boxFloor();
    expect(floor.appearance(2, 2)).toEqual({ glyph: ".", color: 246 });
    expect(floor.appearance(1, 1)).toEqual({ glyph: ".", color: 242 });
    expect(floor.appearance(9, 9)).toBeUndefined();
  });
});
