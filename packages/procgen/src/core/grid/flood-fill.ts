/**
 * Flood fill for region detection and connectivity checks.
 */

import type { Point } from "../geometry/types";
import type { ReadonlyGrid, CellType, Region } from "./types";

const BFS_DIRECTIONS_4: ReadonlyArray<readonly [number, number]> = [
  [0, -1],
  [1, 0],
  [0, 1],
  [-1, 0],
] as const;

// ============================================================================
// Packed Coordinate Utilities
// ============================================================================

/**
 * Pack x,y coordinates into a single number.
 * Format: (y << 16) | x - supports coordinates up to 65535.
 */
export function packCoord(x: number, y: number): number {
  return ((y << 16) | x) >>> 0;
}

export function unpackX(packed: number): number {
  return packed & 0xffff;
}

export function unpackY(packed: number): number {
  return packed >>> 16;
}

export function unpackToPoint(packed: number): Point {
  return { x: packed & 0xffff, y: packed >>> 16 };
}

/**
 * Convert a Region's packed coordinates to Point objects.
 */
export function regionGetPoints(region: Region): Point[] {
  const points: Point[] = new Array(region.packedPoints.length);
  for (let i = 0; i < region.packedPoints.length; i++) {
    points[i] = unpackToPoint(region.packedPoints[i]!);
  }
  return points;
}

/**
 * Iterate over Region points without allocating Point objects.
 */
export function forEachRegionPoint(
  region: Region,
  callback: (x: number, y: number, index: number) => void,
): void {
  const packed = region.packedPoints;
  for (let i = 0; i < packed.length; i++) {
    const p = packed[i]!;
    callback(p & 0xffff, p >>> 16, i);
  }
}

// ============================================================================
// Flood Fill
// ============================================================================

/**
 * Breadth-first fill from (startX, startY) over 4-connected cells equal to
 * `targetValue`. Marks `visited` (one byte per cell) as it goes.
 */
export function floodFillPacked(
  grid: ReadonlyGrid,
  startX: number,
  startY: number,
  targetValue: CellType,
  visited: Uint8Array,
): Uint32Array {
  const width = grid.width;
  if (!grid.isInBounds(startX, startY)) return new Uint32Array(0);
  if (grid.getUnsafe(startX, startY) !== targetValue) return new Uint32Array(0);
  if (visited[startY * width + startX]) return new Uint32Array(0);

  const queue: number[] = [packCoord(startX, startY)];
  visited[startY * width + startX] = 1;
  let head = 0;

  while (head < queue.length) {
    const coord = queue[head++]!;
    const x = coord & 0xffff;
    const y = coord >>> 16;

    for (const [dx, dy] of BFS_DIRECTIONS_4) {
      const nx = x + dx;
      const ny = y + dy;
      if (!grid.isInBounds(nx, ny)) continue;
      const index = ny * width + nx;
      if (visited[index]) continue;
      if (grid.getUnsafe(nx, ny) !== targetValue) continue;
      visited[index] = 1;
      queue.push(packCoord(nx, ny));
    }
  }

  return Uint32Array.from(queue);
}

/**
 * Find every 4-connected region of `targetValue`, ordered by the row-major
 * position of each region's first cell. Region ids are their index.
 */
export function findRegions(grid: ReadonlyGrid, targetValue: CellType): Region[] {
  const visited = new Uint8Array(grid.width * grid.height);
  const regions: Region[] = [];

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (visited[y * grid.width + x]) continue;
      if (grid.getUnsafe(x, y) !== targetValue) continue;

      const packedPoints = floodFillPacked(grid, x, y, targetValue, visited);
      let minX = x;
      let minY = y;
      let maxX = x;
      let maxY = y;
      for (let i = 0; i < packedPoints.length; i++) {
        const p = packedPoints[i]!;
        const px = p & 0xffff;
        const py = p >>> 16;
        if (px < minX) minX = px;
        if (px > maxX) maxX = px;
        if (py < minY) minY = py;
        if (py > maxY) maxY = py;
      }

      regions.push({
        id: regions.length,
        packedPoints,
        bounds: { minX, minY, maxX, maxY },
        size: packedPoints.length,
      });
    }
  }

  return regions;
}

/**
 * Count the cells reachable from `start` over `targetValue` cells.
 */
export function countReachable(
  grid: ReadonlyGrid,
  start: Point,
  targetValue: CellType,
): number {
  const visited = new Uint8Array(grid.width * grid.height);
  return floodFillPacked(grid, start.x, start.y, targetValue, visited).length;
}
