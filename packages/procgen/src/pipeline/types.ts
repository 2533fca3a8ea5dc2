/**
 * Pipeline Types
 *
 * Typed artifacts and passes for composable floor generation.
 */

import type { FloorConfig, SeededRandom } from "@crawl/contracts";
import type { Grid } from "../core/grid/grid";
import type { Region } from "../core/grid/types";

// =============================================================================
// ARTIFACTS - Typed intermediate data products
// =============================================================================

/**
 * Base artifact interface. All artifacts have a type discriminant and unique ID.
 */
export interface Artifact<T extends string = string> {
  readonly type: T;
  readonly id: string;
}

/**
 * Empty artifact - starting point for pipelines
 */
export interface EmptyArtifact extends Artifact<"empty"> {
  readonly type: "empty";
  readonly width: number;
  readonly height: number;
}

/**
 * Grid artifact - the cave grid being shaped by the automaton
 */
export interface GridArtifact extends Artifact<"grid"> {
  readonly type: "grid";
  readonly grid: Grid;
}

/**
 * Regions artifact - a connected grid and its open regions
 */
export interface RegionsArtifact extends Artifact<"regions"> {
  readonly type: "regions";
  readonly grid: Grid;
  readonly regions: readonly Region[];
}

export type AnyArtifact = EmptyArtifact | GridArtifact | RegionsArtifact;

// =============================================================================
// TRACING
// =============================================================================

export type TraceEventType = "start" | "end" | "decision" | "warning";

export interface TraceEvent {
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * Receives pass lifecycle events and the choices passes make.
 */
export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(passId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}

// =============================================================================
// PASSES
// =============================================================================

/**
 * Runtime context available to passes.
 *
 * `rng` is the single generation stream. Passes must draw from it in a
 * fixed order so that one seed always yields one floor.
 */
export interface PassContext {
  readonly rng: SeededRandom;
  readonly config: Readonly<FloorConfig>;
  readonly trace: TraceCollector;
}

/**
 * A pass transforms one artifact type into another.
 */
export interface Pass<TIn extends Artifact, TOut extends Artifact> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  run(input: TIn, ctx: PassContext): TOut;
}

// =============================================================================
// PIPELINE
// =============================================================================

export type PipelineResult<T extends Artifact> =
  | {
      readonly success: true;
      readonly artifact: T;
      readonly trace: readonly TraceEvent[];
      readonly durationMs: number;
    }
  | {
      readonly success: false;
      readonly error: Error;
      readonly trace: readonly TraceEvent[];
      readonly durationMs: number;
    };

export interface Pipeline<TStart extends Artifact, TEnd extends Artifact> {
  readonly id: string;
  readonly passIds: readonly string[];
  run(input: TStart): PipelineResult<TEnd>;
}

// =============================================================================
// FACTORIES
// =============================================================================

export function createEmptyArtifact(width: number, height: number): EmptyArtifact {
  return { type: "empty", id: "empty", width, height };
}

export function createGridArtifact(grid: Grid, id = "grid"): GridArtifact {
  return { type: "grid", id, grid };
}
