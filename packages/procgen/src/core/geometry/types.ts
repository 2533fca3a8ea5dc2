/**
 * Core geometry types for the tile grid.
 * All types are immutable value objects.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Bounding box defined by min/max corners (inclusive)
 */
export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Unit step with components in {-1, 0, 1}
 */
export interface Direction {
  readonly dx: number;
  readonly dy: number;
}

/**
 * Direction vectors for neighbor calculations (N, E, S, W)
 */
export const DIRECTIONS_4 = [
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
] as const;

export const DIRECTIONS_8 = [
  { x: -1, y: -1 },
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 },
  { x: -1, y: 1 },
  { x: 0, y: 1 },
  { x: 1, y: 1 },
] as const;

export function manhattan(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Component-wise sign of the displacement from `from` to `to`.
 */
export function directionBetween(from: Point, to: Point): Direction {
  return { dx: Math.sign(to.x - from.x), dy: Math.sign(to.y - from.y) };
}

export function isZeroDirection(d: Direction): boolean {
  return d.dx === 0 && d.dy === 0;
}
