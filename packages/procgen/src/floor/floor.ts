/**
 * Floor: a generated cave grid plus its room decomposition.
 */

import { DIRECTIONS_4, type Point } from "../core/geometry/types";
import type { Grid } from "../core/grid/grid";
import { findRegions, regionGetPoints } from "../core/grid/flood-fill";
import { CellType, type ReadonlyGrid, type Region } from "../core/grid/types";
import { tileAppearance, type TileAppearance } from "./appearance";

/**
 * A connected open region of the floor.
 */
export interface Room {
  readonly id: number;
  /** Integer mean of the member tiles; may itself be a wall */
  readonly centroid: Point;
  readonly tiles: readonly Point[];
}

const NO_ROOM = -1;

function toRoom(region: Region): Room {
  const tiles = regionGetPoints(region);
  let sumX = 0;
  let sumY = 0;
  for (const tile of tiles) {
    sumX += tile.x;
    sumY += tile.y;
  }
  return {
    id: region.id,
    centroid: {
      x: Math.floor(sumX / tiles.length),
      y: Math.floor(sumY / tiles.length),
    },
    tiles,
  };
}

/**
 * Immutable once built. Every open tile belongs to exactly one room.
 */
export class Floor {
  readonly width: number;
  readonly height: number;
  readonly seed: number;
  readonly rooms: readonly Room[];
  private readonly grid: ReadonlyGrid;
  private readonly roomIndex: Int32Array;

  private constructor(grid: ReadonlyGrid, seed: number, regions: readonly Region[]) {
    this.width = grid.width;
    this.height = grid.height;
    this.seed = seed;
    this.grid = grid;
    this.rooms = regions.map(toRoom);
    this.roomIndex = new Int32Array(grid.width * grid.height).fill(NO_ROOM);

    for (const room of this.rooms) {
      for (const tile of room.tiles) {
        this.roomIndex[tile.y * this.width + tile.x] = room.id;
      }
    }
  }

  /**
   * Build a floor from a prepared grid, detecting rooms by flood fill.
   * The grid is copied, so later edits to it do not leak in.
   */
  static fromGrid(grid: Grid, seed: number): Floor {
    const copy = grid.clone();
    return new Floor(copy, seed, findRegions(copy, CellType.FLOOR));
  }

  /**
   * Build from the generator's final artifact without re-flooding.
   */
  static fromRegions(grid: Grid, seed: number, regions: readonly Region[]): Floor {
    return new Floor(grid, seed, regions);
  }

  // ===========================================================================
  // TILE QUERIES
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /** Out-of-bounds tiles are walls */
  isWall(x: number, y: number): boolean {
    return this.grid.get(x, y) === CellType.WALL;
  }

  isWalkable(x: number, y: number): boolean {
    return this.isInBounds(x, y) && this.grid.getUnsafe(x, y) === CellType.FLOOR;
  }

  roomAt(x: number, y: number): Room | undefined {
    if (!this.isInBounds(x, y)) return undefined;
    const id = this.roomIndex[y * this.width + x]!;
    return id === NO_ROOM ? undefined : this.rooms[id];
  }

  openTileCount(): number {
    return this.grid.countCells(CellType.FLOOR);
  }

  /** Open tiles in row-major order */
  openTiles(): Point[] {
    return this.grid.findAll(CellType.FLOOR);
  }

  largestRoom(): Room | undefined {
    let largest: Room | undefined;
    for (const room of this.rooms) {
      if (largest === undefined || room.tiles.length > largest.tiles.length) {
        largest = room;
      }
    }
    return largest;
  }

  appearance(x: number, y: number): TileAppearance | undefined {
    return tileAppearance(this.grid, x, y);
  }

  // ===========================================================================
  // SEARCH
  // ===========================================================================

  /**
   * Spiral outward from the centre (square rings, dx outer), then fall back
   * to a row-major scan for tiles the rings never reach.
   */
  findWalkableTile(): Point | undefined {
    const centerX = Math.floor(this.width / 2);
    const centerY = Math.floor(this.height / 2);
    const maxRadius = Math.floor(Math.max(this.width, this.height) / 2);

    for (let radius = 0; radius < maxRadius; radius++) {
      for (let dx = -radius; dx <= radius; dx++) {
        for (let dy = -radius; dy <= radius; dy++) {
          if (radius > 0 && Math.abs(dx) !== radius && Math.abs(dy) !== radius) continue;
          if (this.isWalkable(centerX + dx, centerY + dy)) {
            return { x: centerX + dx, y: centerY + dy };
          }
        }
      }
    }

    return this.openTiles()[0];
  }

  /**
   * Nearest walkable tile to `from` by breadth-first search over every
   * tile (walls included). Starts from `from` clamped into the floor.
   */
  nearestWalkable(from: Point): Point | undefined {
    const start = {
      x: Math.min(Math.max(Math.trunc(from.x), 0), this.width - 1),
      y: Math.min(Math.max(Math.trunc(from.y), 0), this.height - 1),
    };
    const visited = new Uint8Array(this.width * this.height);
    const queue: Point[] = [start];
    visited[start.y * this.width + start.x] = 1;

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head]!;
      if (this.isWalkable(current.x, current.y)) return current;

      for (const dir of DIRECTIONS_4) {
        const nx = current.x + dir.x;
        const ny = current.y + dir.y;
        if (!this.isInBounds(nx, ny)) continue;
        const index = ny * this.width + nx;
        if (visited[index]) continue;
        visited[index] = 1;
        queue.push({ x: nx, y: ny });
      }
    }

    return undefined;
  }

  /** '#' for wall, '.' for open */
  toRows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = "";
      for (let x = 0; x < this.width; x++) {
        row += this.isWalkable(x, y) ? "." : "#";
      }
      rows.push(row);
    }
    return rows;
  }
}
