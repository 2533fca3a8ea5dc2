import { Phase, PHASE_ORDER } from "./phase";
import type { System } from "./system";

/**
 * Order one phase's systems so every before/after edge holds. Systems
 * with no constraint between them keep registration order.
 *
 * @throws {Error} Naming the systems caught in a cycle
 */
function orderPhase<C>(systems: readonly System<C>[]): System<C>[] {
  const byName = new Map(systems.map((s) => [s.name, s] as const));
  const successors = new Map<string, Set<string>>();
  const pending = new Map<string, number>();
  for (const system of systems) {
    successors.set(system.name, new Set());
    pending.set(system.name, 0);
  }

  const link = (first: string, then: string): void => {
    const next = successors.get(first);
    const count = pending.get(then);
    if (!next || count === undefined || next.has(then)) return;
    next.add(then);
    pending.set(then, count + 1);
  };

  for (const system of systems) {
    for (const name of system.before) link(system.name, name);
    for (const name of system.after) link(name, system.name);
  }

  const ready = systems.filter((s) => pending.get(s.name) === 0).map((s) => s.name);
  const ordered: System<C>[] = [];
  for (let i = 0; i < ready.length; i++) {
    const name = ready[i]!;
    const system = byName.get(name);
    if (system) ordered.push(system);

    for (const next of successors.get(name) ?? []) {
      const count = (pending.get(next) ?? 0) - 1;
      pending.set(next, count);
      if (count === 0) ready.push(next);
    }
  }

  if (ordered.length !== systems.length) {
    const stuck = systems.filter((s) => !ordered.includes(s)).map((s) => s.name);
    throw new Error(`Circular dependency between systems: ${stuck.join(", ")}`);
  }
  return ordered;
}

/**
 * Runs registered systems phase by phase, each phase in dependency order.
 */
export class SystemScheduler<C> {
  private systemsByPhase = new Map<Phase, System<C>[]>();
  private allSystems: System<C>[] = [];
  private compiled = false;

  register(system: System<C>): void {
    if (this.allSystems.some((s) => s.name === system.name)) {
      throw new Error(`System "${system.name}" is already registered`);
    }
    this.allSystems.push(system);

    let phaseSystems = this.systemsByPhase.get(system.phase);
    if (!phaseSystems) {
      phaseSystems = [];
      this.systemsByPhase.set(system.phase, phaseSystems);
    }
    phaseSystems.push(system);

    this.compiled = false;
  }

  registerBatch(systems: readonly System<C>[]): void {
    for (const system of systems) {
      this.register(system);
    }
  }

  /**
   * Check every before/after name and order each phase.
   *
   * @throws {Error} On an unknown dependency or a cycle
   */
  compile(): void {
    const known = new Set(this.allSystems.map((s) => s.name));
    const problems = this.allSystems.flatMap((system) => [
      ...system.before
        .filter((name) => !known.has(name))
        .map((name) => `System "${system.name}" has .before("${name}") but no system named "${name}" exists`),
      ...system.after
        .filter((name) => !known.has(name))
        .map((name) => `System "${system.name}" has .after("${name}") but no system named "${name}" exists`),
    ]);
    if (problems.length > 0) {
      throw new Error(`Invalid system dependencies:\n  - ${problems.join("\n  - ")}`);
    }

    for (const [phase, systems] of this.systemsByPhase) {
      this.systemsByPhase.set(phase, orderPhase(systems));
    }
    this.compiled = true;
  }

  runPhase(phase: Phase, ctx: C): void {
    if (!this.compiled) {
      this.compile();
    }

    const systems = this.systemsByPhase.get(phase);
    if (!systems) return;

    for (const system of systems) {
      if (!system.enabled) continue;
      system.run(ctx);
    }
  }

  runAll(ctx: C): void {
    for (const phase of PHASE_ORDER) {
      this.runPhase(phase, ctx);
    }
  }

  getSystem(name: string): System<C> | undefined {
    return this.allSystems.find((s) => s.name === name);
  }

  enableSystem(name: string): boolean {
    return this.setEnabled(name, true);
  }

  disableSystem(name: string): boolean {
    return this.setEnabled(name, false);
  }

  private setEnabled(name: string, enabled: boolean): boolean {
    const system = this.getSystem(name);
    if (!system) return false;
    system.enabled = enabled;
    return true;
  }

  getAllSystems(): readonly System<C>[] {
    return this.allSystems;
  }

  /** Systems of a phase, in execution order once compiled. */
  getSystemsInPhase(phase: Phase): readonly System<C>[] {
    if (!this.compiled) {
      this.compile();
    }
    return this.systemsByPhase.get(phase) ?? [];
  }

  clear(): void {
    this.allSystems = [];
    this.systemsByPhase.clear();
    this.compiled = false;
  }
}
