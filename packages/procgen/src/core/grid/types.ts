/**
 * Grid types for floor generation.
 */

import type { Bounds, Point } from "../geometry/types";

/**
 * Cell types for floor grids
 */
export const CellType = {
  FLOOR: 0,
  WALL: 1,
} as const;

export type CellType = (typeof CellType)[keyof typeof CellType];

/**
 * Region represents a 4-connected area of one cell type.
 * Points are stored packed as (y << 16) | x, in discovery order.
 */
export interface Region {
  readonly id: number;
  readonly packedPoints: Uint32Array;
  readonly bounds: Bounds;
  readonly size: number;
}

/**
 * Read-only grid interface for code that must not mutate cells.
 */
export interface ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): CellType;
  getUnsafe(x: number, y: number): CellType;
  countWithin(x: number, y: number, radius: number, targetType: CellType): number;
  countCells(cellType: CellType): number;
  findAll(cellType: CellType): Point[];
}
