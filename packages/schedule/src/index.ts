/**
 * @crawl/schedule
 *
 * Phased system scheduling: declare systems with `defineSystem`, order them
 * with `.before()`/`.after()`, gate them with run conditions and drive
 * them one tick at a time through `SystemScheduler`.
 */

export { Phase, PHASE_ORDER } from "./phase";
export { condition, isCondition } from "./run-condition";
export type { Condition, RunCondition } from "./run-condition";
export { defineSystem } from "./system";
export type { System, SystemBuilder } from "./system";
export { SystemScheduler } from "./scheduler";
