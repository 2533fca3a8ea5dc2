import { describe, expect, it } from "vitest";
import { DamageType } from "../src/combat/damage";
import { ActiveAnimation, type AnimationHit } from "../src/patterns/animation";
import type { AnimationFrame } from "../src/patterns/pattern";

const hit: AnimationHit = {
  owner: 0,
  damage: 5,
  damageType: DamageType.PHYSICAL,
  knockback: 1,
  origin: { x: 0, y: 0 },
};

function frame(x: number, duration: number): AnimationFrame {
  return { tiles: [{ x, y: 0 }], color: 3, glyph: "X", duration };
}

describe("ActiveAnimation", () => {
  it("lands its hit once, when the last frame starts", () => {
    const animation = new ActiveAnimation([frame(1, 0.06), frame(2, 0.04)], "Melee", hit);

    const first = animation.update(0.05);
    expect(first.hit).toBeUndefined();
    expect(first.finished).toBe(false);

    const second = animation.update(0.02);
    expect(second.hit).toBe(hit);
    expect(second.footprint).toEqual([{ x: 2, y: 0 }]);
    expect(second.finished).toBe(false);

    const third = animation.update(0.05);
    expect(third.hit).toBeUndefined();
    expect(third.finished).toBe(true);
    expect(animation.currentFrame()).toBeUndefined();
  });

  it("tracks the frame showing", () => {
    const animation = new ActiveAnimation([frame(1, 0.1), frame(2, 0.1)], "Melee");
    expect(animation.totalDuration).toBeCloseTo(0.2);
    expect(animation.frameIndex()).toBe(0);

    animation.update(0.15);
    expect(animation.frameIndex()).toBe(1);
    expect(animation.currentFrame()?.tiles).toEqual([{ x: 2, y: 0 }]);
  });

  it("lands a single-frame hit on the first update", () => {
    const animation = new ActiveAnimation([frame(1, 0.2)], "Magic", hit);
    expect(animation.update(0.01).hit).toBe(hit);
  });

  it("is finished from the start without frames", () => {
    const animation = new ActiveAnimation([], "Melee", hit);
    expect(animation.isFinished()).toBe(true);
    expect(animation.update(0.1)).toEqual({ hit: undefined, footprint: [], finished: true });
  });

  it("ignores negative time", () => {
    const animation = new ActiveAnimation([frame(1, 0.1)], "Melee");
    animation.update(-1);
    expect(animation.elapsedSeconds).toBe(0);
  });
});
