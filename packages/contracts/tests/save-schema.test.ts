import { describe, expect, it } from "vitest";
import { GOLD_MAX, loadSave } from "@crawl/contracts";

function validPlayer() {
  return {
    attackDamage: 5,
    attackLength: 2,
    attackWidth: 1,
    dashDistance: 5,
    health: 80,
    maxHealth: 100,
    gold: 120,
    enemiesKilled: 3,
  };
}

function validSave() {
  return {
    playerName: "Tester",
    player: validPlayer(),
    weapons: ["Iron Sword", "Wood Bow"],
    currentWeapon: 1,
    consumables: [{ kind: "BandageRoll", quantity: 2 }],
    skills: { Warrior: 1, Mage: 0, Rogue: 0, Balanced: 0 },
    chosenPath: "Warrior",
    ultimate: "Rage",
    runSeed: 12345,
    floorLevel: 3,
    maxLevels: 10,
    position: { x: 40, y: 12 },
    difficulty: "Normal",
    elapsedSeconds: 93.5,
  };
}

describe("loadSave", () => {
  it("accepts a valid save unchanged", () => {
    const res = loadSave(validSave());
    if (!res.success) throw new Error(res.error.message);
    expect(res.value.player).toEqual({
      attackDamage: 5,
      attackLength: 2,
      attackWidth: 1,
      dashDistance: 5,
      health: 80,
      maxHealth: 100,
      gold: 120,
      enemiesKilled: 3,
    });
    expect(res.value.position).toEqual({ x: 40, y: 12 });
    expect(res.value.floorLevel).toBe(3);
  });

  it("clamps health into [0, maxHealth] and gold into u32", () => {
    const save = {
      ...validSave(),
      player: { ...validPlayer(), health: 250, gold: 2 ** 40 },
    };
    const res = loadSave(save);
    if (!res.success) throw new Error(res.error.message);
    expect(res.value.player.health).toBe(100);
    expect(res.value.player.gold).toBe(GOLD_MAX);
  });

  it("replaces unknown enum values with defaults", () => {
    const save = { ...validSave(), difficulty: "Impossible", ultimate: "Meteor" };
    const res = loadSave(save);
    if (!res.success) throw new Error(res.error.message);
    expect(res.value.difficulty).toBe("Normal");
    expect(res.value.ultimate).toBe("Shockwave");
  });

  it("rejects a floor level beyond the run length", () => {
    const res = loadSave({ ...validSave(), floorLevel: 11 });
    expect(res.success).toBe(false);
    expect(res.error.code).toBe("SAVE_INVALID");
    expect(res.error.message).toBe("floorLevel: floorLevel exceeds maxLevels");
  });
});
