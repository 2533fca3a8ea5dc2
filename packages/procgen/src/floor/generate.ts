/**
 * Floor generation API.
 */

import {
  CrawlError,
  FLOOR_DEFAULTS,
  type FloorConfig,
  FloorConfigSchema,
  type FloorConfigInput,
  Result,
} from "@crawl/contracts";
import { createCavePipeline } from "../generators/cellular/generator";
import { createEmptyArtifact, type TraceEvent } from "../pipeline/types";
import { Floor } from "./floor";

export interface GenerateFloorOptions {
  readonly fillProbability?: number;
  readonly iterations?: number;
  readonly bigAreaCutoff?: number;
  readonly trace?: boolean;
}

export interface GeneratedFloor {
  readonly floor: Floor;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Run the cave pipeline for an already validated configuration.
 *
 * @throws Error only when a pass throws, which indicates a bug
 */
export function generateFromConfig(config: FloorConfig): GeneratedFloor {
  const result = createCavePipeline(config).run(
    createEmptyArtifact(config.width, config.height),
  );
  if (!result.success) {
    throw result.error;
  }
  const { grid, regions } = result.artifact;
  return {
    floor: Floor.fromRegions(grid, config.seed, regions),
    trace: result.trace,
    durationMs: result.durationMs,
  };
}

/**
 * Generate a floor. Dimensions below 1 are raised to 1; the same
 * (width, height, seed) always yields the same tiles and rooms.
 *
 * @example
 * ```typescript
 * const floor = generateFloor(180, 60, 12345);
 * floor.rooms.length; // >= 1
 * ```
 */
export function generateFloor(
  width: number,
  height: number,
  seed: number,
  options: GenerateFloorOptions = {},
): Floor {
  const iterations = options.iterations ?? FLOOR_DEFAULTS.iterations;
  return generateFromConfig({
    width: Math.max(1, Math.floor(width)),
    height: Math.max(1, Math.floor(height)),
    seed,
    fillProbability: options.fillProbability ?? FLOOR_DEFAULTS.fillProbability,
    iterations,
    bigAreaCutoff: Math.min(options.bigAreaCutoff ?? FLOOR_DEFAULTS.bigAreaCutoff, iterations),
    trace: options.trace ?? false,
  }).floor;
}

/**
 * Validate an outside configuration, then generate.
 */
export function tryGenerateFloor(
  input: FloorConfigInput,
): Result<GeneratedFloor, CrawlError> {
  const parsed = FloorConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Result.err(CrawlError.fromZod("FLOOR_CONFIG_INVALID", parsed.error));
  }
  return Result.ok(generateFromConfig(parsed.data));
}
