import { SystemScheduler } from "@crawl/schedule";
import { TICK_SECONDS } from "./constants";
import { buildSnapshot, type Snapshot } from "./snapshot";
import { GAME_SYSTEMS } from "./systems";
import type { InputEvent } from "./world/input";
import type { World } from "./world/world";

/**
 * Drives a world one fixed tick at a time.
 *
 * @example
 * ```typescript
 * const sim = new Simulation(createRun({ difficulty: "Easy", runSeed: 7 }));
 * sim.send({ type: "move", direction: { dx: 1, dy: 0 } });
 * sim.run(60);
 * sim.snapshot().health;
 * ```
 */
export class Simulation {
  private readonly scheduler = new SystemScheduler<World>();

  constructor(readonly world: World) {
    this.scheduler.registerBatch(GAME_SYSTEMS);
    this.scheduler.compile();
  }

  send(input: InputEvent): void {
    this.world.inputs.push(input);
  }

  /**
   * One tick. Time only passes while playing, so a paused run resumes
   * where it stopped.
   */
  step(deltaSeconds: number = TICK_SECONDS): void {
    const world = this.world;
    if (world.isPlaying()) {
      world.clock.advance(deltaSeconds);
      world.tick += 1;
    }
    world.deltaSeconds = deltaSeconds;
    this.scheduler.runAll(world);
    world.events.flush();
  }

  run(ticks: number): void {
    for (let i = 0; i < ticks; i++) {
      this.step();
    }
  }

  /** Step until `done` holds or `maxTicks` run out; returns the ticks taken */
  runUntil(done: (world: World) => boolean, maxTicks: number): number {
    let ticks = 0;
    while (ticks < maxTicks && !done(this.world)) {
      this.step();
      ticks++;
    }
    return ticks;
  }

  snapshot(): Snapshot {
    return buildSnapshot(this.world);
  }
}
