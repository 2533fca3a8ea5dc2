import { describe, expect, it } from "vitest";
import { SimulationClock } from "../src/core/clock";
import { Player } from "../src/entities/player";
import { pathCost, pathsConflict, SkillTree } from "../src/progression/skill-tree";
import { Ultimate } from "../src/progression/ultimate";

describe("SkillTree", () => {
  it("charges more for each level", () => {
    expect(pathCost(0)).toBe(100);
    expect(pathCost(3)).toBe(250);
  });

  it("locks out conflicting paths after the first purchase", () => {
    const tree = new SkillTree();
    expect(tree.purchase("Warrior", 150)).toEqual({ purchased: true, gold: 50 });
    expect(tree.chosenPath).toBe("Warrior");
    expect(tree.purchase("Mage", 500)).toEqual({ purchased: false, gold: 500 });
    expect(tree.availablePaths()).toEqual(["Warrior", "Balanced"]);
    expect(tree.purchase("Balanced", 100)).toEqual({ purchased: true, gold: 0 });
    expect(tree.nextCost("Warrior")).toBe(150);
  });

  it("refuses when short of gold", () => {
    const tree = new SkillTree();
    expect(tree.purchase("Rogue", 99)).toEqual({ purchased: false, gold: 99 });
    expect(tree.chosenPath).toBeUndefined();
  });

  it("multiplies bonuses across paths", () => {
    const tree = new SkillTree({ Warrior: 1, Balanced: 1 }, "Warrior");
    const bonus = tree.totalBonus();
    expect(bonus.health).toBeCloseTo(1.242);
    expect(bonus.damage).toBeCloseTo(1.08);
    expect(bonus.speed).toBeCloseTo(1.08);
  });

  it("lets Balanced mix with anything", () => {
    expect(pathsConflict("Warrior", "Balanced")).toBe(false);
    expect(pathsConflict("Mage", "Mage")).toBe(false);
    expect(pathsConflict("Mage", "Rogue")).toBe(true);
  });
});

describe("player stats", () => {
  function player(skills?: SkillTree): Player {
    return new Player({ position: { x: 1, y: 1 }, clock: new SimulationClock(), skills });
  }

  it("raises max health with Warrior levels", () => {
    const p = player(new SkillTree({ Warrior: 2 }, "Warrior"));
    expect(p.maxHealth).toBe(130);
    expect(p.health).toBe(130);
  });

  it("raises unarmed damage with Mage levels", () => {
    expect(player(new SkillTree({ Mage: 1 }, "Mage")).effectiveAttackDamage()).toBe(6);
  });

  it("moves every tick with four Rogue levels", () => {
    expect(player().moveInterval()).toBe(2);
    expect(player(new SkillTree({ Rogue: 2 }, "Rogue")).moveInterval()).toBe(2);
    expect(player(new SkillTree({ Rogue: 4 }, "Rogue")).moveInterval()).toBe(1);
  });

  it("doubles damage and speed under Rage", () => {
    const clock = new SimulationClock();
    const p = new Player({ position: { x: 1, y: 1 }, clock, ultimate: "Rage" });
    p.ultimate.setCharge(100);
    expect(p.ultimate.activate()).toBe(true);
    expect(p.effectiveAttackDamage()).toBe(10);
    expect(p.moveInterval()).toBe(1);

    clock.advance(30);
    expect(p.effectiveAttackDamage()).toBe(5);
  });

  it("keeps gold within range", () => {
    const p = player();
    p.addGold(12.7);
    expect(p.gold).toBe(12);
    expect(p.spendGold(20)).toBe(false);
    expect(p.spendGold(12)).toBe(true);
    expect(p.gold).toBe(0);
    p.addGold(0xffffffff + 10);
    expect(p.gold).toBe(0xffffffff);
  });
});

describe("Ultimate", () => {
  it("charges half the damage, at most 15 per hit", () => {
    const ultimate = new Ultimate("Shockwave", new SimulationClock());
    ultimate.addCharge(40);
    expect(ultimate.charge).toBe(15);
    ultimate.addCharge(10);
    expect(ultimate.charge).toBe(20);
    ultimate.addCharge(-5);
    expect(ultimate.charge).toBe(20);
  });

  it("needs a full meter and a ready cooldown", () => {
    const clock = new SimulationClock();
    const ultimate = new Ultimate("Shockwave", clock);
    ultimate.setCharge(100);
    expect(ultimate.activate()).toBe(true);
    expect(ultimate.charge).toBe(0);
    expect(ultimate.active()).toBeUndefined();

    ultimate.setCharge(100);
    expect(ultimate.activate()).toBe(false);
    clock.advance(20);
    expect(ultimate.activate()).toBe(true);
  });

  it("runs Ghost for ten seconds", () => {
    const clock = new SimulationClock();
    const ultimate = new Ultimate("Ghost", clock);
    ultimate.setCharge(100);
    ultimate.activate();

    clock.advance(4);
    expect(ultimate.isActive("Ghost")).toBe(true);
    expect(ultimate.remaining()).toBe(6);
    clock.advance(6);
    expect(ultimate.active()).toBeUndefined();
  });

  it("takes the new cooldown when the kind changes", () => {
    const clock = new SimulationClock();
    const ultimate = new Ultimate("Shockwave", clock);
    ultimate.setKind("Rage");
    ultimate.setCharge(100);
    ultimate.activate();
    clock.advance(44);
    expect(ultimate.cooldown.remaining()).toBe(1);
  });
});
