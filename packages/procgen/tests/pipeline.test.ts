/**
 * Pipeline builder and execution tests
 */

import { FloorConfigSchema } from "@crawl/contracts";
import { describe, expect, it } from "vitest";
import { Grid } from "../src/core/grid";
import { createPipeline, PipelineBuilder } from "../src/pipeline/builder";
import { createTraceCollector, NoOpTraceCollector } from "../src/pipeline/trace";
import type { EmptyArtifact, GridArtifact, Pass } from "../src/pipeline/types";
import { createEmptyArtifact, createGridArtifact } from "../src/pipeline/types";

const fill: Pass<EmptyArtifact, GridArtifact> = {
  id: "test.fill",
  inputType: "empty",
  outputType: "grid",
  run(input, ctx) {
    ctx.trace.decision("test.fill", "Fill with?", ["floor", "wall"], "floor", "test");
    return createGridArtifact(Grid.floors(input.width, input.height));
  },
};

const seal: Pass<GridArtifact, GridArtifact> = {
  id: "test.seal",
  inputType: "grid",
  outputType: "grid",
  run(input) {
    const rows = input.grid.toRows();
    const sealed = rows.map((row, y) =>
      y === 0 || y === rows.length - 1 ? "#".repeat(row.length) : `#${row.slice(1, -1)}#`,
    );
    return createGridArtifact(Grid.fromRows(sealed), "sealed");
  },
};

const boom: Pass<GridArtifact, GridArtifact> = {
  id: "test.boom",
  inputType: "grid",
  outputType: "grid",
  run() {
    throw new Error("nope");
  },
};

describe("PipelineBuilder", () => {
  it("runs passes in order", () => {
    const config = FloorConfigSchema.parse({ width: 4, height: 3 });
    const pipeline = PipelineBuilder.create<EmptyArtifact>("test", config)
      .pipe(fill)
      .pipe(seal)
      .build();

    expect(pipeline.id).toBe("test");
    expect(pipeline.passIds).toEqual(["test.fill", "test.seal"]);

    const result = pipeline.run(createEmptyArtifact(4, 3));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.artifact.id).toBe("sealed");
      expect(result.artifact.grid.toRows()).toEqual(["####", "#..#", "####"]);
    }
  });

  it("skips a conditional pass when the condition fails", () => {
    const config = FloorConfigSchema.parse({ iterations: 0, bigAreaCutoff: 0 });
    const pipeline = createPipeline<EmptyArtifact>("test", config)
      .pipe(fill)
      .when((c) => c.iterations > 0, seal)
      .build();

    expect(pipeline.passIds).toEqual(["test.fill"]);
  });

  it("records start, decision and end events when tracing", () => {
    const config = FloorConfigSchema.parse({ trace: true });
    const result = PipelineBuilder.create<EmptyArtifact>("test", config)
      .pipe(fill)
      .build()
      .run(createEmptyArtifact(2, 2));

    expect(result.trace.map((e) => `${e.passId}:${e.eventType}`)).toEqual([
      "test.fill:start",
      "test.fill:decision",
      "test.fill:end",
    ]);
  });

  it("records nothing when tracing is off", () => {
    const config = FloorConfigSchema.parse({});
    const result = PipelineBuilder.create<EmptyArtifact>("test", config)
      .pipe(fill)
      .build()
      .run(createEmptyArtifact(2, 2));
    expect(result.trace).toEqual([]);
  });

  it("reports the failing pass", () => {
    const config = FloorConfigSchema.parse({});
    const result = PipelineBuilder.create<EmptyArtifact>("test", config)
      .pipe(fill)
      .pipe(boom)
      .build()
      .run(createEmptyArtifact(2, 2));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Pipeline failed at step 1 (pass: test.boom): nope");
      expect(result.error.cause).toBeInstanceOf(Error);
    }
  });
});

describe("trace collectors", () => {
  it("creates a no-op collector when disabled", () => {
    const trace = createTraceCollector(false);
    expect(trace).toBeInstanceOf(NoOpTraceCollector);
    trace.warning("x", "ignored");
    expect(trace.getEvents()).toEqual([]);
  });

  it("collects and clears events when enabled", () => {
    const trace = createTraceCollector(true);
    trace.warning("x", "careful");
    expect(trace.getEvents()).toHaveLength(1);
    expect(trace.getEvents()[0]?.data).toEqual({ message: "careful" });
    trace.clear();
    expect(trace.getEvents()).toEqual([]);
  });
});
