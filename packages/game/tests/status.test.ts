import { describe, expect, it } from "vitest";
import { SimulationClock } from "../src/core/clock";
import { Cooldown } from "../src/status/cooldown";
import {
  BLEED_DURATION,
  bleed,
  burn,
  createEffect,
  poison,
  poisonImmunity,
  StatusEffects,
  stun,
} from "../src/status/effects";

describe("StatusEffects", () => {
  it("stacks bleed into one instance", () => {
    const effects = new StatusEffects();
    effects.add(bleed(2));
    effects.add(bleed(3));

    expect(effects.size).toBe(1);
    expect(effects.get("Bleed")?.stacks).toBe(5);
    expect(effects.get("Bleed")?.duration).toBe(BLEED_DURATION);
    expect(effects.totalDamagePerSecond()).toBe(5);

    expect(effects.update(8)).toEqual(["Bleed"]);
    expect(effects.size).toBe(0);
  });

  it("refreshes bleed to the full duration", () => {
    const effects = new StatusEffects();
    effects.add(bleed(2));
    effects.update(3);
    expect(effects.get("Bleed")?.duration).toBe(5);

    effects.add(bleed(1));
    expect(effects.get("Bleed")?.duration).toBe(8);
    expect(effects.get("Bleed")?.stacks).toBe(3);
  });

  it("refreshes an existing poison", () => {
    const effects = new StatusEffects();
    effects.add(poison(4));
    effects.update(3);
    effects.add(poison(4));

    expect(effects.size).toBe(1);
    expect(effects.get("Poison")?.duration).toBe(4);
  });

  it("blocks poison during immunity", () => {
    const effects = new StatusEffects();
    effects.add(poisonImmunity(5));

    expect(effects.add(poison(3))).toBe(false);
    expect(effects.has("Poison")).toBe(false);
  });

  it("keeps every burn as its own instance", () => {
    const effects = new StatusEffects();
    effects.add(burn(1));
    effects.add(burn(3));
    expect(effects.size).toBe(2);
    expect(effects.totalDamagePerSecond()).toBe(4);

    // One burn is left, so Burn is still present
    expect(effects.update(2)).toEqual([]);
    expect(effects.size).toBe(1);
  });

  it("replaces other kinds", () => {
    const effects = new StatusEffects();
    effects.add(stun(1));
    effects.add(stun(2));
    expect(effects.size).toBe(1);
    expect(effects.get("Stun")?.duration).toBe(2);
  });

  it("reports whether a removal found anything", () => {
    const effects = new StatusEffects();
    effects.add(createEffect("Cripple", 2));
    expect(effects.remove("Cripple")).toBe(true);
    expect(effects.remove("Cripple")).toBe(false);
  });
});

describe("Cooldown", () => {
  it("is ready until triggered, then after its duration", () => {
    const clock = new SimulationClock();
    const cooldown = new Cooldown(2, clock);
    expect(cooldown.isReady()).toBe(true);
    expect(cooldown.remaining()).toBe(0);
    expect(cooldown.progress()).toBe(1);

    cooldown.trigger();
    expect(cooldown.isReady()).toBe(false);
    expect(cooldown.remaining()).toBe(2);

    clock.advance(0.5);
    expect(cooldown.remaining()).toBe(1.5);
    expect(cooldown.progress()).toBe(0.25);

    clock.advance(1.5);
    expect(cooldown.isReady()).toBe(true);
    expect(cooldown.remaining()).toBe(0);
  });

  it("forgets its trigger on reset", () => {
    const clock = new SimulationClock(10);
    const cooldown = new Cooldown(5, clock);
    cooldown.trigger();
    expect(cooldown.lastTriggered).toBe(10);

    cooldown.reset();
    expect(cooldown.lastTriggered).toBeUndefined();
    expect(cooldown.isReady()).toBe(true);
  });

  it("clamps negative durations to zero", () => {
    const cooldown = new Cooldown(1, new SimulationClock());
    cooldown.setDuration(-1);
    cooldown.trigger();
    expect(cooldown.duration).toBe(0);
    expect(cooldown.isReady()).toBe(true);
  });
});

describe("SimulationClock", () => {
  it("only moves forward", () => {
    const clock = new SimulationClock(1);
    clock.advance(-5);
    clock.advance(0.25);
    expect(clock.now()).toBe(1.25);
  });
});
