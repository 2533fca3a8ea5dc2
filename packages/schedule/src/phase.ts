/**
 * Tick phases, run in ascending order by `SystemScheduler.runAll`.
 */
export enum Phase {
  PreUpdate = 0,
  Update = 1,
  PostUpdate = 2,
}

export const PHASE_ORDER: readonly Phase[] = [Phase.PreUpdate, Phase.Update, Phase.PostUpdate];
