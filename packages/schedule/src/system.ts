import type { Phase } from "./phase";
import type { Condition, RunCondition } from "./run-condition";
import { condition, isCondition } from "./run-condition";

export interface System<C> {
  readonly name: string;
  readonly phase: Phase;
  readonly before: readonly string[];
  readonly after: readonly string[];
  enabled: boolean;
  /** If true, system auto-disables after first successful run */
  readonly once: boolean;
  /** Run conditions that must all be true for the system to execute */
  readonly conditions: readonly Condition<C>[];
  /** Execute the system. Returns true if it actually ran. */
  run(ctx: C): boolean;
}

interface SystemConfig<C> {
  name: string;
  phase?: Phase;
  before: string[];
  after: string[];
  enabled: boolean;
  once: boolean;
  conditions: Condition<C>[];
  run?: (ctx: C) => void;
}

class SystemBuilder<C> {
  private readonly config: SystemConfig<C>;

  constructor(name: string) {
    this.config = {
      name,
      before: [],
      after: [],
      enabled: true,
      once: false,
      conditions: [],
    };
  }

  inPhase(phase: Phase): this {
    this.config.phase = phase;
    return this;
  }

  before(...systems: string[]): this {
    this.config.before.push(...systems);
    return this;
  }

  after(...systems: string[]): this {
    this.config.after.push(...systems);
    return this;
  }

  disabled(): this {
    this.config.enabled = false;
    return this;
  }

  /**
   * Mark this system as one-shot: it will auto-disable after first successful run.
   */
  once(): this {
    this.config.once = true;
    return this;
  }

  /**
   * Add a run condition. The system only executes if ALL conditions return true.
   * Conditions are evaluated in order with short-circuit logic.
   *
   * @example
   * defineSystem<Game>("EnemyAI")
   *   .runIf((game) => game.status === "playing")
   *   .execute(...);
   */
  runIf(cond: Condition<C> | RunCondition<C>): this {
    this.config.conditions.push(isCondition(cond) ? cond : condition(cond));
    return this;
  }

  execute(fn: (ctx: C) => void): System<C> {
    this.config.run = fn;
    return this.build();
  }

  private build(): System<C> {
    if (this.config.phase === undefined) {
      throw new Error(`System "${this.config.name}": phase is required`);
    }
    if (!this.config.run) {
      throw new Error(`System "${this.config.name}": execute function is required`);
    }

    const runFn = this.config.run;
    const conditions = this.config.conditions;
    const isOnce = this.config.once;

    const system: System<C> = {
      name: this.config.name,
      phase: this.config.phase,
      before: this.config.before,
      after: this.config.after,
      enabled: this.config.enabled,
      once: isOnce,
      conditions,
      run(ctx: C): boolean {
        for (const cond of conditions) {
          if (!cond(ctx)) {
            return false;
          }
        }

        runFn(ctx);

        if (isOnce) {
          this.enabled = false;
        }

        return true;
      },
    };

    return system;
  }
}

/**
 * Start building a system that runs against a context of type C.
 *
 * @example
 * const camera = defineSystem<Game>("camera")
 *   .inPhase(Phase.PostUpdate)
 *   .after("deaths")
 *   .execute((game) => game.camera.update());
 */
export function defineSystem<C>(name: string): SystemBuilder<C> {
  return new SystemBuilder<C>(name);
}

export type { SystemBuilder };
