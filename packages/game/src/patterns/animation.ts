import type { Point } from "@crawl/procgen";
import type { DamageType } from "../combat/damage";
import type { EntityId } from "../core/events";
import type { StatusEffect } from "../status/effects";
import type { AnimationFrame, PatternCategory } from "./pattern";

/**
 * Damage an animation carries to its footprint.
 */
export interface AnimationHit {
  readonly owner: EntityId;
  readonly damage: number;
  readonly damageType: DamageType;
  /** Tiles of knockback; 0 for none */
  readonly knockback: number;
  /** Where the attacker stood when striking */
  readonly origin: Point;
  readonly effect?: StatusEffect;
}

export interface AnimationStep {
  /** Damage to resolve this tick; set only on the tick the last frame starts */
  readonly hit?: AnimationHit;
  readonly footprint: readonly Point[];
  readonly finished: boolean;
}

/**
 * A playing animation. Advanced by elapsed seconds; the hit fires once,
 * on the update that crosses into the last frame.
 */
export class ActiveAnimation {
  private elapsed = 0;
  private landed = false;
  readonly totalDuration: number;

  constructor(
    readonly frames: readonly AnimationFrame[],
    readonly category: PatternCategory,
    readonly hit?: AnimationHit,
  ) {
    this.totalDuration = frames.reduce((sum, f) => sum + f.duration, 0);
  }

  get elapsedSeconds(): number {
    return this.elapsed;
  }

  /** Index of the frame showing at the current elapsed time */
  frameIndex(): number {
    let accumulated = 0;
    for (let i = 0; i < this.frames.length; i++) {
      accumulated += this.frames[i]!.duration;
      if (this.elapsed < accumulated) return i;
    }
    return this.frames.length - 1;
  }

  currentFrame(): AnimationFrame | undefined {
    if (this.isFinished()) return undefined;
    return this.frames[this.frameIndex()];
  }

  footprint(): readonly Point[] {
    return this.frames[this.frames.length - 1]?.tiles ?? [];
  }

  isFinished(): boolean {
    return this.frames.length === 0 || this.elapsed >= this.totalDuration;
  }

  update(deltaSeconds: number): AnimationStep {
    this.elapsed += Math.max(0, deltaSeconds);

    let hit: AnimationHit | undefined;
    if (!this.landed && this.frames.length > 0 && this.frameIndex() === this.frames.length - 1) {
      this.landed = true;
      hit = this.hit;
    }

    return { hit, footprint: this.footprint(), finished: this.isFinished() };
  }
}
