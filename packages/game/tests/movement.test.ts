import { Floor, Grid } from "@crawl/procgen";
import { describe, expect, it } from "vitest";
import { Element } from "../src/combat/damage";
import { findWeapon } from "../src/catalog/loader";
import {
  advanceEnemyMovement,
  chaseStep,
  enemyCanEnter,
  moveEnemy,
} from "../src/movement/enemy-ai";
import { applyKnockback } from "../src/movement/knockback";
import { dash, movePlayer } from "../src/movement/player-movement";
import { Simulation } from "../src/simulation";
import { createEffect, stun } from "../src/status/effects";
import { placeEnemy, testWorld } from "./fixtures";

const east = { dx: 1, dy: 0 };

/** A wall at x = 4 with a gap on the top row */
function wallFloor(): Floor {
  return Floor.fromGrid(
    Grid.fromRows([
      "##########",
      "#........#",
      "#...#....#",
      "#...#....#",
      "#...#....#",
      "##########",
    ]),
    3,
  );
}

describe("player movement", () => {
  it("steps onto an open tile and marks the player as having acted", () => {
    const world = testWorld();
    expect(movePlayer(world, east)).toBe(true);
    expect(world.player.position).toEqual({ x: 11, y: 10 });
    expect(world.player.ticksSinceMove).toBe(0);
    expect(world.playerHasActed).toBe(true);
  });

  it("turns without moving when blocked", () => {
    const world = testWorld({ playerPosition: { x: 1, y: 1 } });
    expect(movePlayer(world, { dx: -1, dy: 0 })).toBe(false);
    expect(world.player.position).toEqual({ x: 1, y: 1 });
    expect(world.player.lastDirection).toEqual({ dx: -1, dy: 0 });
    expect(world.playerHasActed).toBe(false);
  });

  it("cannot walk into an enemy", () => {
    const world = testWorld();
    placeEnemy(world, { x: 11, y: 10 });
    expect(movePlayer(world, east)).toBe(false);
  });

  it("moves at most once every two ticks", () => {
    const world = testWorld();
    // Keeps the floor from counting as cleared
    placeEnemy(world, { x: 30, y: 20 });
    const sim = new Simulation(world);
    for (let i = 0; i < 3; i++) {
      sim.send({ type: "move", direction: east });
      sim.step();
    }
    expect(world.player.position).toEqual({ x: 12, y: 10 });
  });

  it("slows down while crippled", () => {
    const world = testWorld();
    expect(world.player.moveInterval()).toBe(2);
    world.player.status.add(createEffect("Cripple", 5));
    expect(world.player.moveInterval()).toBe(4);
  });

  it("stays put while stunned", () => {
    const world = testWorld();
    world.player.status.add(stun(1));
    expect(movePlayer(world, east)).toBe(false);
  });

  it("picks up gold and consumables it walks over", () => {
    const world = testWorld();
    world.addItem({ x: 11, y: 10 }, { kind: "gold", amount: 25 }, "Common");
    world.addItem({ x: 11, y: 10 }, { kind: "consumable", consumable: "BandageRoll" }, "Common");

    movePlayer(world, east);
    expect(world.player.gold).toBe(25);
    expect(world.player.consumables.items).toEqual([{ kind: "BandageRoll", quantity: 1 }]);
    expect(world.items).toHaveLength(0);
  });

  it("leaves a weapon on the floor when every slot is taken", () => {
    const world = testWorld();
    const sword = findWeapon(world.catalogs, "Steel Sword");
    if (!sword) throw new Error("missing Steel Sword");
    for (let i = world.player.weapons.weapons.length; i < 9; i++) {
      world.giveWeapon(sword);
    }
    world.addItem({ x: 11, y: 10 }, { kind: "weapon", weapon: sword }, "Rare");

    movePlayer(world, east);
    expect(world.player.weapons.weapons).toHaveLength(9);
    expect(world.items).toHaveLength(1);
  });
});

describe("dash", () => {
  it("jumps the dash distance along the facing", () => {
    const world = testWorld();
    world.player.lastDirection = east;

    expect(dash(world)).toBe(true);
    expect(world.player.position).toEqual({ x: 15, y: 10 });
    expect(dash(world)).toBe(false);

    world.clock.advance(7);
    world.player.ticksSinceMove = 2;
    expect(dash(world)).toBe(true);
    expect(world.player.position).toEqual({ x: 20, y: 10 });
  });

  it("needs a facing", () => {
    expect(dash(testWorld())).toBe(false);
  });

  it("refuses a landing tile outside the floor", () => {
    const world = testWorld({ playerPosition: { x: 36, y: 10 } });
    world.player.lastDirection = east;
    expect(dash(world)).toBe(false);
    expect(world.player.cooldowns.dash.isReady()).toBe(true);
  });
});

describe("enemy movement", () => {
  it("paths around walls and caches the step", () => {
    const world = testWorld({ playerPosition: { x: 5, y: 3 } }, wallFloor());
    const enemy = placeEnemy(world, { x: 3, y: 3 }, { detectionRadius: 10 });

    expect(chaseStep(world, enemy)).toEqual({ x: 3, y: 2 });
    expect(world.paths.get("walker", { x: 3, y: 3 }, { x: 5, y: 3 })).toEqual({ x: 3, y: 2 });
  });

  it("lets ghosts chase straight through walls", () => {
    const world = testWorld({ playerPosition: { x: 5, y: 3 } }, wallFloor());
    const ghost = placeEnemy(world, { x: 3, y: 3 }, { element: Element.GHOST });
    const walker = placeEnemy(world, { x: 3, y: 4 });

    expect(chaseStep(world, ghost)).toEqual({ x: 4, y: 3 });
    expect(enemyCanEnter(world, ghost, { x: 4, y: 3 })).toBe(true);
    expect(enemyCanEnter(world, walker, { x: 4, y: 4 })).toBe(false);
  });

  it("moves once its accumulator fills", () => {
    const world = testWorld({ playerPosition: { x: 5, y: 3 } }, wallFloor());
    const enemy = placeEnemy(world, { x: 3, y: 3 }, { speed: 0.5, detectionRadius: 10 });

    advanceEnemyMovement(world, enemy);
    expect(enemy.position).toEqual({ x: 3, y: 3 });
    advanceEnemyMovement(world, enemy);
    expect(enemy.position).toEqual({ x: 3, y: 2 });
    expect(enemy.movementTicks).toBe(0);
  });

  it("halves speed when crippled and stops when stunned", () => {
    const world = testWorld({ playerPosition: { x: 5, y: 3 } }, wallFloor());
    const crippled = placeEnemy(world, { x: 3, y: 3 }, { speed: 0.5 });
    crippled.status.add(createEffect("Cripple", 5));
    advanceEnemyMovement(world, crippled);
    expect(crippled.movementTicks).toBe(0.25);

    const stunned = placeEnemy(world, { x: 2, y: 2 }, { speed: 0.5 });
    stunned.status.add(stun(5));
    advanceEnemyMovement(world, stunned);
    expect(stunned.movementTicks).toBe(0);
  });

  it("holds position next to the player", () => {
    const world = testWorld();
    const enemy = placeEnemy(world, { x: 11, y: 10 }, { detectionRadius: 10 });
    moveEnemy(world, enemy);
    expect(enemy.position).toEqual({ x: 11, y: 10 });
  });

  it("never leaves its leash or enters the player's tile", () => {
    const world = testWorld();
    const enemy = placeEnemy(world, { x: 20, y: 20 }, { leashRadius: 0 });
    expect(enemyCanEnter(world, enemy, { x: 21, y: 20 })).toBe(false);
    expect(enemyCanEnter(world, enemy, { x: 10, y: 10 })).toBe(false);
  });
});

describe("applyKnockback", () => {
  it("pushes a tile and damps the vector", () => {
    const knockback = { x: 1, y: 0 };
    expect(applyKnockback({ x: 5, y: 5 }, knockback, () => true)).toEqual({ x: 6, y: 5 });
    expect(knockback).toEqual({ x: 0.7, y: 0 });
  });

  it("pushes half-tile forces the same distance either way", () => {
    const start = { x: 10, y: 10 };
    expect(applyKnockback(start, { x: 0.5, y: 0 }, () => true)).toEqual({ x: 11, y: 10 });
    expect(applyKnockback(start, { x: -0.5, y: 0 }, () => true)).toEqual({ x: 9, y: 10 });
    expect(applyKnockback(start, { x: 0, y: -0.5 }, () => true)).toEqual({ x: 10, y: 9 });
  });

  it("slides along an axis when the diagonal is blocked", () => {
    const knockback = { x: 1, y: 1 };
    const next = applyKnockback({ x: 5, y: 5 }, knockback, (p) => p.x === 6 && p.y === 5);
    expect(next).toEqual({ x: 6, y: 5 });
  });

  it("zeroes a spent push", () => {
    const knockback = { x: 0.12, y: 0 };
    const start = { x: 5, y: 5 };
    expect(applyKnockback(start, knockback, () => true)).toBe(start);
    expect(knockback).toEqual({ x: 0, y: 0 });
  });
});
