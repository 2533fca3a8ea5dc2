/**
 * Next-step cache for chase pathfinding.
 *
 * Entries are keyed by movement mode and (from, to). A stored `null`
 * records that no path exists. The cache must be cleared whenever the
 * floor changes; when full it empties itself.
 */

import type { Point } from "../geometry/types";

export type PathMode = "walker" | "ghost";

export interface PathCacheStats {
  readonly entries: number;
  readonly maxSize: number;
  readonly hits: number;
  readonly misses: number;
}

export const DEFAULT_PATH_CACHE_SIZE = 4096;

export class PathCache {
  private readonly entries = new Map<string, Point | null>();
  private readonly maxSize: number;
  private hits = 0;
  private misses = 0;

  constructor(maxSize: number = DEFAULT_PATH_CACHE_SIZE) {
    this.maxSize = Math.max(1, maxSize);
  }

  private static key(mode: PathMode, from: Point, to: Point): string {
    return `${mode}:${from.x},${from.y}:${to.x},${to.y}`;
  }

  /**
   * Cached next step, `null` for a known dead end, undefined on a miss.
   */
  get(mode: PathMode, from: Point, to: Point): Point | null | undefined {
    const value = this.entries.get(PathCache.key(mode, from, to));
    if (value === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return value;
  }

  set(mode: PathMode, from: Point, to: Point, nextStep: Point | null): void {
    if (this.entries.size >= this.maxSize) {
      this.entries.clear();
    }
    this.entries.set(PathCache.key(mode, from, to), nextStep);
  }

  /** Drop every entry (floor changed) */
  clear(): void {
    this.entries.clear();
  }

  stats(): PathCacheStats {
    return {
      entries: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
