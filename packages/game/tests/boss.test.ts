import { describe, expect, it } from "vitest";
import { SimulationClock } from "../src/core/clock";
import {
  BOSS_BASE_SPEED,
  BossController,
  BossKind,
  BossPhase,
  phaseForHealth,
} from "../src/entities/boss";

function setup(kind: BossKind) {
  const clock = new SimulationClock();
  return { clock, boss: new BossController(kind, clock) };
}

describe("phaseForHealth", () => {
  it("splits at 66% and 33%", () => {
    expect(phaseForHealth(120, 180)).toBe(BossPhase.FIRST);
    expect(phaseForHealth(118, 180)).toBe(BossPhase.SECOND);
    expect(phaseForHealth(60, 180)).toBe(BossPhase.SECOND);
    expect(phaseForHealth(59, 180)).toBe(BossPhase.THIRD);
  });
});

describe("BossController", () => {
  it("enrages the skeletal knight phase by phase", () => {
    const { boss } = setup(BossKind.SKELETAL_KNIGHT);
    expect(boss.effectiveDamage()).toBe(35);

    expect(boss.updatePhase(150)).toBeUndefined();
    expect(boss.updatePhase(90)).toBe(BossPhase.SECOND);
    expect(boss.enrageMultiplier).toBe(1.2);
    expect(boss.effectiveDamage()).toBe(46);

    expect(boss.updatePhase(50)).toBe(BossPhase.THIRD);
    expect(boss.effectiveDamage()).toBe(68);
  });

  it("holds off during a phase transition", () => {
    const { boss, clock } = setup(BossKind.GOBLIN_OVERLORD);
    expect(boss.isTransitioning()).toBe(false);

    boss.updatePhase(70);
    expect(boss.isTransitioning()).toBe(true);
    expect(boss.canUseSpecial()).toBe(false);

    clock.advance(1.5);
    expect(boss.isTransitioning()).toBe(false);
    expect(boss.canUseSpecial()).toBe(true);
  });

  it("rotates through its patterns", () => {
    const { boss } = setup(BossKind.SKELETAL_KNIGHT);
    const kinds = [1, 2, 3, 4].map(() => boss.nextPattern().kind);
    expect(kinds).toEqual(["BasicSlash", "SwordThrust", "GroundSlam", "BasicSlash"]);
  });

  it("halves damage taken during the knight's stance", () => {
    const { boss } = setup(BossKind.SKELETAL_KNIGHT);
    const body = { health: 180, speed: BOSS_BASE_SPEED };

    expect(boss.triggerSpecial(body)).toEqual({ name: "Defensive Stance", healed: 0 });
    expect(boss.incomingDamageMultiplier()).toBe(0.5);
    expect(boss.canUseSpecial()).toBe(false);

    expect(boss.tickSpecial(body, 2)).toBe(false);
    expect(boss.tickSpecial(body, 1)).toBe(true);
    expect(boss.incomingDamageMultiplier()).toBe(1);
  });

  it("charges faster, then slows back down", () => {
    const { boss } = setup(BossKind.GOBLIN_OVERLORD);
    const body = { health: 120, speed: BOSS_BASE_SPEED };

    boss.triggerSpecial(body);
    expect(body.speed).toBe(0.24);
    expect(boss.tickSpecial(body, 2)).toBe(true);
    expect(body.speed).toBe(BOSS_BASE_SPEED);
  });

  it("bursts fire around the sorcerer", () => {
    const { boss } = setup(BossKind.FLAME_SORCERER);
    const special = boss.triggerSpecial({ health: 100, speed: BOSS_BASE_SPEED });
    expect(special.burst).toEqual({ kind: "Fireball", radius: 4 });
  });

  it("heals the warden by a quarter, capped at max health", () => {
    const { boss, clock } = setup(BossKind.CORRUPTED_WARDEN);
    const body = { health: 100, speed: BOSS_BASE_SPEED };
    expect(boss.triggerSpecial(body).healed).toBe(50);
    expect(body.health).toBe(150);

    expect(boss.canUseSpecial()).toBe(false);
    clock.advance(8);
    expect(boss.canUseSpecial()).toBe(true);

    body.health = 190;
    expect(boss.triggerSpecial(body).healed).toBe(10);
    expect(body.health).toBe(200);
  });

  it("regenerates the warden faster in later phases", () => {
    const { boss } = setup(BossKind.CORRUPTED_WARDEN);
    const body = { health: 150, speed: BOSS_BASE_SPEED };
    expect(boss.regenerate(body)).toBe(1);

    boss.updatePhase(90);
    expect(boss.regenerate(body)).toBe(2);
    boss.updatePhase(50);
    expect(boss.regenerate(body)).toBe(3);

    const other = setup(BossKind.SHADOW_ASSASSIN).boss;
    expect(other.regenerate({ health: 50, speed: BOSS_BASE_SPEED })).toBe(0);
  });

  it("rewards half again its base experience", () => {
    expect(setup(BossKind.SKELETAL_KNIGHT).boss.experienceReward()).toBe(375);
  });
});
