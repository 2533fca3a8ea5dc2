/**
 * Tile appearance: the glyph and 256-colour shade a renderer draws.
 */

import type { ReadonlyGrid } from "../core/grid/types";
import { CellType } from "../core/grid/types";

export interface TileAppearance {
  readonly glyph: string;
  /** xterm-256 palette index */
  readonly color: number;
}

const WALL_GLYPHS = ["█", "▓", "▒", "▀", "▄", "■", "◆", "◊"] as const;

const FLOOR_GLYPH = ".";

/**
 * Count in-bounds cells of `type` within Chebyshev `radius`, self excluded.
 * Unlike the automaton's count, the outside of the map counts as nothing.
 */
function countInside(
  grid: ReadonlyGrid,
  x: number,
  y: number,
  radius: number,
  type: CellType,
): number {
  let count = 0;
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      if (dx === 0 && dy === 0) continue;
      const nx = x + dx;
      const ny = y + dy;
      if (grid.isInBounds(nx, ny) && grid.getUnsafe(nx, ny) === type) count++;
    }
  }
  return count;
}

export function wallGlyph(x: number, y: number): string {
  const index = (Math.imul(x, 73) ^ Math.imul(y, 97)) >>> 0;
  return WALL_GLYPHS[index % WALL_GLYPHS.length]!;
}

/**
 * Walls darken the more enclosed they are; open tiles darken near walls.
 */
export function tileAppearance(
  grid: ReadonlyGrid,
  x: number,
  y: number,
): TileAppearance | undefined {
  if (!grid.isInBounds(x, y)) return undefined;

  if (grid.getUnsafe(x, y) === CellType.WALL) {
    const open = countInside(grid, x, y, 2, CellType.FLOOR);
    const color = open <= 1 ? 236 : open <= 3 ? 238 : open <= 5 ? 240 : 242;
    return { glyph: wallGlyph(x, y), color };
  }

  const walls = countInside(grid, x, y, 1, CellType.WALL);
  const color = walls <= 2 ? 246 : walls <= 4 ? 244 : walls <= 6 ? 242 : 240;
  return { glyph: FLOOR_GLYPH, color };
}
