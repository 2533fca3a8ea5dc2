/**
 * Cave Floor Generator
 *
 * Generates cave floors with the cellular automaton, repairs connectivity
 * and detects rooms. Uses the composable pass system with PipelineBuilder.
 */

import type { FloorConfig } from "@crawl/contracts";
import { PipelineBuilder } from "../../pipeline/builder";
import type { EmptyArtifact, Pipeline, RegionsArtifact } from "../../pipeline/types";
import { connectRegions, detectRooms, noiseFill, smoothCaves } from "./passes";

/**
 * Build the cave pipeline for a validated configuration.
 */
export function createCavePipeline(
  config: FloorConfig,
): Pipeline<EmptyArtifact, RegionsArtifact> {
  return PipelineBuilder.create<EmptyArtifact>("cave-pipeline", config)
    .pipe(noiseFill())
    .pipe(smoothCaves())
    .pipe(connectRegions())
    .pipe(detectRooms())
    .build();
}
