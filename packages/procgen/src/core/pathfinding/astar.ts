/**
 * A* over the 4-connected tile graph.
 *
 * A free function with no hidden state: callers pass the walkability
 * predicate, so ghosts and walkers share one search.
 */

import type { Point } from "../geometry/types";
import { DIRECTIONS_4, manhattan } from "../geometry/types";
import { MinHeap } from "../data-structures/min-heap";

export type PassablePredicate = (x: number, y: number) => boolean;

export interface AStarOptions {
  readonly width: number;
  readonly height: number;
  /** Give up after this many node expansions (default: width × height) */
  readonly maxExpansions?: number;
}

interface OpenEntry {
  readonly index: number;
  readonly g: number;
  readonly f: number;
}

/**
 * Shortest 4-connected path from `start` to `goal`, both included.
 *
 * Uniform step cost with the Manhattan heuristic. Neighbours expand in
 * N, E, S, W order and equal f-scores pop in insertion order, so results
 * are reproducible. The goal tile is always enterable; every other tile
 * must satisfy `isPassable`. Returns undefined when no path exists.
 */
export function findPath(
  start: Point,
  goal: Point,
  isPassable: PassablePredicate,
  options: AStarOptions,
): Point[] | undefined {
  const { width, height } = options;
  const inBounds = (x: number, y: number): boolean =>
    x >= 0 && x < width && y >= 0 && y < height;

  if (!inBounds(start.x, start.y) || !inBounds(goal.x, goal.y)) return undefined;
  if (start.x === goal.x && start.y === goal.y) return [{ x: start.x, y: start.y }];

  const size = width * height;
  const maxExpansions = options.maxExpansions ?? size;
  const gScore = new Int32Array(size).fill(-1);
  const cameFrom = new Int32Array(size).fill(-1);
  const closed = new Uint8Array(size);
  const open = new MinHeap<OpenEntry>((a, b) => a.f - b.f);

  const startIndex = start.y * width + start.x;
  const goalIndex = goal.y * width + goal.x;
  gScore[startIndex] = 0;
  open.push({ index: startIndex, g: 0, f: manhattan(start, goal) });

  let expansions = 0;
  while (!open.isEmpty) {
    const current = open.pop();
    if (current === undefined) break;
    if (closed[current.index]) continue;
    if (current.index === goalIndex) {
      return reconstructPath(cameFrom, goalIndex, width);
    }

    closed[current.index] = 1;
    if (++expansions > maxExpansions) break;

    const cx = current.index % width;
    const cy = (current.index - cx) / width;

    for (const dir of DIRECTIONS_4) {
      const nx = cx + dir.x;
      const ny = cy + dir.y;
      if (!inBounds(nx, ny)) continue;
      const neighbor = ny * width + nx;
      if (closed[neighbor]) continue;
      if (neighbor !== goalIndex && !isPassable(nx, ny)) continue;

      const tentative = current.g + 1;
      const known = gScore[neighbor]!;
      if (known !== -1 && tentative >= known) continue;

      gScore[neighbor] = tentative;
      cameFrom[neighbor] = current.index;
      const h = Math.abs(nx - goal.x) + Math.abs(ny - goal.y);
      open.push({ index: neighbor, g: tentative, f: tentative + h });
    }
  }

  return undefined;
}

function reconstructPath(cameFrom: Int32Array, goalIndex: number, width: number): Point[] {
  const path: Point[] = [];
  let index = goalIndex;
  while (index !== -1) {
    path.push({ x: index % width, y: Math.floor(index / width) });
    index = cameFrom[index]!;
  }
  return path.reverse();
}
