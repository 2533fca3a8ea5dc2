/**
 * Type-safe pipeline builder DSL.
 *
 * Composes passes into a pipeline with compile-time checking of the
 * artifact flow: each `pipe` only accepts a pass whose input is the
 * previous pass's output.
 */

import type { FloorConfig } from "@crawl/contracts";
import { SeededRandom } from "@crawl/contracts";
import { createTraceCollector } from "./trace";
import type {
  Artifact,
  Pass,
  PassContext,
  Pipeline,
  PipelineResult,
} from "./types";

type Runner<TStart extends Artifact, TCurrent extends Artifact> = (
  input: TStart,
  ctx: PassContext,
) => TCurrent;

/**
 * Run one pass with start/end tracing, tagging failures with the pass id.
 */
function runStep<TIn extends Artifact, TOut extends Artifact>(
  pass: Pass<TIn, TOut>,
  input: TIn,
  ctx: PassContext,
  index: number,
): TOut {
  ctx.trace.start(pass.id);
  const stepStart = performance.now();
  try {
    const output = pass.run(input, ctx);
    ctx.trace.end(pass.id, performance.now() - stepStart);
    return output;
  } catch (error) {
    const original = error instanceof Error ? error : new Error(String(error));
    const enhanced = new Error(
      `Pipeline failed at step ${index} (pass: ${pass.id}): ${original.message}`,
    );
    enhanced.cause = original;
    throw enhanced;
  }
}

/**
 * Pipeline builder for composing passes.
 *
 * Type parameters:
 * - TStart: The input artifact type for the pipeline
 * - TCurrent: The current output artifact type (evolves as passes are added)
 */
export class PipelineBuilder<TStart extends Artifact, TCurrent extends Artifact> {
  private readonly id: string;
  private readonly config: FloorConfig;
  private readonly passIds: readonly string[];
  private readonly runner: Runner<TStart, TCurrent>;

  private constructor(
    id: string,
    config: FloorConfig,
    passIds: readonly string[],
    runner: Runner<TStart, TCurrent>,
  ) {
    this.id = id;
    this.config = config;
    this.passIds = passIds;
    this.runner = runner;
  }

  /**
   * Create a new pipeline builder
   */
  static create<TStart extends Artifact>(
    id: string,
    config: FloorConfig,
  ): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, config, [], (input) => input);
  }

  /**
   * Add a pass to the pipeline.
   */
  pipe<TNext extends Artifact>(
    pass: Pass<TCurrent, TNext>,
  ): PipelineBuilder<TStart, TNext> {
    const previous = this.runner;
    const index = this.passIds.length;
    return new PipelineBuilder<TStart, TNext>(
      this.id,
      this.config,
      [...this.passIds, pass.id],
      (input, ctx) => runStep(pass, previous(input, ctx), ctx, index),
    );
  }

  /**
   * Add a pass that only runs when `condition` holds for the config.
   * The pass must keep the artifact type.
   */
  when(
    condition: (config: FloorConfig) => boolean,
    pass: Pass<TCurrent, TCurrent>,
  ): PipelineBuilder<TStart, TCurrent> {
    return condition(this.config) ? this.pipe(pass) : this;
  }

  /**
   * Build the final pipeline
   */
  build(): Pipeline<TStart, TCurrent> {
    const { id, config, passIds, runner } = this;

    return {
      id,
      passIds,
      run(input: TStart): PipelineResult<TCurrent> {
        const startTime = performance.now();
        const trace = createTraceCollector(config.trace);
        const ctx: PassContext = {
          rng: new SeededRandom(config.seed),
          config,
          trace,
        };

        try {
          const artifact = runner(input, ctx);
          return {
            success: true,
            artifact,
            trace: trace.getEvents(),
            durationMs: performance.now() - startTime,
          };
        } catch (error) {
          return {
            success: false,
            error: error instanceof Error ? error : new Error(String(error)),
            trace: trace.getEvents(),
            durationMs: performance.now() - startTime,
          };
        }
      },
    };
  }
}

/**
 * Convenience function to create a pipeline
 */
export function createPipeline<TStart extends Artifact>(
  id: string,
  config: FloorConfig,
): PipelineBuilder<TStart, TStart> {
  return PipelineBuilder.create<TStart>(id, config);
}
