/**
 * Time source for cooldowns and timed effects, in seconds.
 */
export interface Clock {
  now(): number;
}

/**
 * Clock that only moves when the simulation advances it, so a paused run
 * accumulates no time.
 */
export class SimulationClock implements Clock {
  private seconds: number;

  constructor(start = 0) {
    this.seconds = start;
  }

  now(): number {
    return this.seconds;
  }

  advance(deltaSeconds: number): void {
    if (deltaSeconds > 0) {
      this.seconds += deltaSeconds;
    }
  }
}
