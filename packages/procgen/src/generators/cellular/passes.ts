/**
 * Cave Automaton Passes
 *
 * Noise fill, smoothing, connectivity repair and room detection.
 */

import { UnionFind } from "../../core/algorithms/union-find";
import { manhattan, type Point } from "../../core/geometry/types";
import { Grid } from "../../core/grid/grid";
import { findRegions, forEachRegionPoint } from "../../core/grid/flood-fill";
import { CellType, type Region } from "../../core/grid/types";
import type {
  EmptyArtifact,
  GridArtifact,
  Pass,
  RegionsArtifact,
} from "../../pipeline/types";
import {
  FAR_RADIUS,
  MAX_CONNECT_ROUNDS,
  NEAR_RADIUS,
  WALL_THRESHOLD_FAR,
  WALL_THRESHOLD_NEAR,
} from "./constants";

// =============================================================================
// NOISE FILL PASS
// =============================================================================

/**
 * Walls the border and fills the interior with random walls.
 * Draws exactly one number per interior cell, row by row.
 */
export function noiseFill(): Pass<EmptyArtifact, GridArtifact> {
  return {
    id: "cave.noise-fill",
    inputType: "empty",
    outputType: "grid",
    run(input, ctx) {
      const { width, height } = input;
      const grid = Grid.walls(width, height);
      const chance = ctx.config.fillProbability;
      let openCount = 0;

      for (let y = 1; y < height - 1; y++) {
        for (let x = 1; x < width - 1; x++) {
          if (!ctx.rng.probability(chance)) {
            grid.setUnsafe(x, y, CellType.FLOOR);
            openCount++;
          }
        }
      }

      ctx.trace.decision(
        "cave.noise-fill",
        "Initial random fill",
        [`${Math.round(chance * 100)}% wall chance`],
        openCount,
        `Opened ${openCount} of ${width * height} cells`,
      );

      return { type: "grid", id: "grid.noise", grid };
    },
  };
}

// =============================================================================
// SMOOTHING PASS
// =============================================================================

/**
 * Runs the cave automaton with double buffering. Only interior cells are
 * rewritten, so the border stays wall.
 */
export function smoothCaves(): Pass<GridArtifact, GridArtifact> {
  return {
    id: "cave.smooth",
    inputType: "grid",
    outputType: "grid",
    run(input, ctx) {
      const { iterations, bigAreaCutoff } = ctx.config;
      let current = input.grid;
      let next = current.clone();

      for (let iteration = 0; iteration < iterations; iteration++) {
        const bigArea = iteration < bigAreaCutoff;

        for (let y = 1; y < current.height - 1; y++) {
          for (let x = 1; x < current.width - 1; x++) {
            const near = current.countWithin(x, y, NEAR_RADIUS, CellType.WALL);
            let wall = near >= WALL_THRESHOLD_NEAR;
            if (!wall && bigArea) {
              wall = current.countWithin(x, y, FAR_RADIUS, CellType.WALL) <= WALL_THRESHOLD_FAR;
            }
            next.setUnsafe(x, y, wall ? CellType.WALL : CellType.FLOOR);
          }
        }

        const swap = current;
        current = next;
        next = swap;
      }

      return { type: "grid", id: "grid.smoothed", grid: current };
    },
  };
}

// =============================================================================
// CONNECTIVITY PASS
// =============================================================================

interface Section {
  readonly centroid: Point;
  /** Member tile nearest the centroid; tunnels start and end here */
  readonly anchor: Point;
}

/**
 * Integer-mean centroid of a region and its nearest member tile.
 * Ties on distance go to the tile first in row-major order.
 */
export function describeSection(region: Region): Section {
  let sumX = 0;
  let sumY = 0;
  forEachRegionPoint(region, (x, y) => {
    sumX += x;
    sumY += y;
  });
  const centroid = {
    x: Math.floor(sumX / region.size),
    y: Math.floor(sumY / region.size),
  };

  let anchor: Point = centroid;
  let best = Number.POSITIVE_INFINITY;
  forEachRegionPoint(region, (x, y) => {
    const distance = Math.abs(x - centroid.x) + Math.abs(y - centroid.y);
    if (
      distance < best ||
      (distance === best && (y < anchor.y || (y === anchor.y && x < anchor.x)))
    ) {
      best = distance;
      anchor = { x, y };
    }
  });

  return { centroid, anchor };
}

/**
 * Nearest section by centroid distance that is not yet in `index`'s set.
 * Equal distances keep the lowest index.
 */
function findNearestSection(
  sections: readonly Section[],
  index: number,
  unionFind: UnionFind,
): number | undefined {
  const start = sections[index]!;
  let closest: number | undefined;
  let closestDistance = Number.POSITIVE_INFINITY;

  for (let i = 0; i < sections.length; i++) {
    if (i === index || unionFind.connected(i, index)) continue;
    const distance = manhattan(start.centroid, sections[i]!.centroid);
    if (distance < closestDistance) {
      closestDistance = distance;
      closest = i;
    }
  }

  return closest;
}

/**
 * Open an L-shaped tunnel: along the source row to the target column,
 * then along that column to the target. Both endpoints are opened.
 */
export function carveTunnel(grid: Grid, from: Point, to: Point): number {
  let carved = 0;
  let x = from.x;
  let y = from.y;

  const open = (): void => {
    if (grid.isInBounds(x, y) && grid.getUnsafe(x, y) === CellType.WALL) {
      grid.setUnsafe(x, y, CellType.FLOOR);
      carved++;
    }
  };

  while (x !== to.x) {
    open();
    x += x < to.x ? 1 : -1;
  }
  while (y !== to.y) {
    open();
    y += y < to.y ? 1 : -1;
  }
  open();

  return carved;
}

/**
 * Joins every open region into one by carving tunnels between nearest
 * sections until a single union-find set remains.
 */
export function connectRegions(): Pass<GridArtifact, GridArtifact> {
  return {
    id: "cave.connect-regions",
    inputType: "grid",
    outputType: "grid",
    run(input, ctx) {
      const grid = input.grid;
      let regions = findRegions(grid, CellType.FLOOR);
      const initialCount = regions.length;
      let tunnels = 0;
      let rounds = 0;

      while (regions.length > 1 && rounds < MAX_CONNECT_ROUNDS) {
        const sections = regions.map(describeSection);
        const unionFind = new UnionFind(sections.length);

        while (unionFind.componentCount > 1) {
          for (let i = 0; i < sections.length; i++) {
            const nearest = findNearestSection(sections, i, unionFind);
            if (nearest === undefined) continue;
            carveTunnel(grid, sections[i]!.anchor, sections[nearest]!.anchor);
            unionFind.union(i, nearest);
            tunnels++;
          }
        }

        regions = findRegions(grid, CellType.FLOOR);
        rounds++;
      }

      if (regions.length > 1) {
        ctx.trace.warning(
          "cave.connect-regions",
          `${regions.length} regions remain after ${rounds} rounds`,
        );
      }

      ctx.trace.decision(
        "cave.connect-regions",
        "How many tunnels join the caves?",
        [`${initialCount} regions`],
        tunnels,
        initialCount <= 1
          ? "Already connected"
          : `Carved ${tunnels} tunnels in ${rounds} rounds`,
      );

      return { type: "grid", id: "grid.connected", grid };
    },
  };
}

// =============================================================================
// ROOM DETECTION PASS
// =============================================================================

/**
 * Re-floods the final grid; each open region becomes a room.
 */
export function detectRooms(): Pass<GridArtifact, RegionsArtifact> {
  return {
    id: "cave.detect-rooms",
    inputType: "grid",
    outputType: "regions",
    run(input, ctx) {
      const regions = findRegions(input.grid, CellType.FLOOR);

      ctx.trace.decision(
        "cave.detect-rooms",
        "How many rooms does the floor have?",
        [],
        regions.length,
        regions.length === 0 ? "No open tiles" : `Largest room: ${Math.max(...regions.map((r) => r.size))} tiles`,
      );

      return { type: "regions", id: "regions", grid: input.grid, regions };
    },
  };
}

/**
 * All cave passes, for callers composing their own pipelines.
 */
export const CavePasses = {
  noiseFill,
  smoothCaves,
  connectRegions,
  detectRooms,
} as const;
