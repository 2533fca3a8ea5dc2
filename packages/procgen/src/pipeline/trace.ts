import type { TraceCollector, TraceEvent, TraceEventType } from "./types";

/**
 * Keeps every pass event of one generation run, timestamped in
 * milliseconds since the collector was created.
 */
export class RecordingTraceCollector implements TraceCollector {
  readonly enabled = true;
  private readonly events: TraceEvent[] = [];
  private readonly origin = performance.now();

  private record(passId: string, eventType: TraceEventType, data?: unknown): void {
    this.events.push({ timestamp: performance.now() - this.origin, passId, eventType, data });
  }

  start(passId: string): void {
    this.record(passId, "start");
  }

  end(passId: string, durationMs: number): void {
    this.record(passId, "end", { durationMs });
  }

  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    this.record(passId, "decision", { question, options, chosen, reason });
  }

  warning(passId: string, message: string): void {
    this.record(passId, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  clear(): void {
    this.events.length = 0;
  }
}

/** Drops everything; used when a floor is generated without tracing */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(): void {}
  end(): void {}
  decision(): void {}
  warning(): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new RecordingTraceCollector() : new NoOpTraceCollector();
}
