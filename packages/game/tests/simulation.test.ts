import { describe, expect, it } from "vitest";
import { BossKind } from "../src/entities/boss";
import { MemoryLogger } from "../src/core/logger";
import { createBoss } from "../src/entities/enemy";
import { Simulation } from "../src/simulation";
import { poison } from "../src/status/effects";
import { placeEnemy, recordEvents, testWorld } from "./fixtures";

describe("Simulation", () => {
  it("advances the clock one tick at a time", () => {
    const sim = new Simulation(testWorld());
    sim.run(3);
    expect(sim.world.tick).toBe(3);
    expect(sim.world.clock.now()).toBeCloseTo(0.048);
  });

  it("reports how many ticks runUntil took", () => {
    const sim = new Simulation(testWorld());
    expect(sim.runUntil((world) => world.tick >= 5, 100)).toBe(5);
    expect(sim.runUntil(() => false, 3)).toBe(3);
    expect(sim.world.tick).toBe(8);
  });

  it("freezes time and gameplay input while paused", () => {
    const world = testWorld();
    placeEnemy(world, { x: 30, y: 20 });
    const recorded = recordEvents(world);
    const sim = new Simulation(world);

    sim.send({ type: "pause" });
    sim.step();
    expect(world.status).toBe("paused");
    expect(world.tick).toBe(1);

    sim.send({ type: "move", direction: { dx: 1, dy: 0 } });
    sim.step();
    sim.step();
    expect(world.tick).toBe(1);
    expect(world.clock.now()).toBeCloseTo(0.016);
    expect(world.player.position).toEqual({ x: 10, y: 10 });

    sim.send({ type: "pause" });
    sim.step();
    expect(world.status).toBe("playing");
    sim.step();
    expect(world.tick).toBe(2);

    expect(recorded).toEqual([
      { type: "run.paused", paused: true },
      { type: "run.paused", paused: false },
    ]);
  });

  it("logs delivered events with their tick", () => {
    const logger = new MemoryLogger();
    const sim = new Simulation(testWorld({ logger }));
    sim.run(2);
    sim.send({ type: "pause" });
    sim.step();

    const logged = logger.entries.find((entry) => entry.message === "run.paused");
    expect(logged?.fields).toEqual({ tick: 3, type: "run.paused", paused: true });
  });

  it("applies damage over time and reports expiry", () => {
    const world = testWorld();
    world.player.status.add(poison(3, 2));
    const recorded = recordEvents(world);
    const sim = new Simulation(world);

    sim.step(0.5);
    expect(world.player.health).toBe(99);
    sim.step(0.5);
    expect(world.player.health).toBe(98);

    for (let i = 0; i < 4; i++) sim.step(0.5);
    expect(world.player.health).toBe(95);
    expect(world.player.status.has("Poison")).toBe(false);
    expect(recorded).toEqual([
      { type: "status.removed", entity: 0, status: "Poison" },
    ]);
  });

  it("regenerates enemies once a second", () => {
    const world = testWorld();
    const enemy = placeEnemy(world, { x: 30, y: 20 }, {
      buffs: [{ kind: "Regeneration", perSecond: 3 }],
    });
    enemy.health = 4;
    const sim = new Simulation(world);

    sim.step(0.5);
    expect(enemy.health).toBe(4);
    sim.step(0.5);
    expect(enemy.health).toBe(7);
  });

  it("regenerates the warden every tick at its phase rate", () => {
    const world = testWorld();
    const warden = world.addEnemy(
      createBoss(BossKind.CORRUPTED_WARDEN, {
        id: world.allocateEntityId(),
        position: { x: 30, y: 20 },
        difficulty: "Normal",
        clock: world.clock,
      }),
    );
    warden.health = 50;
    warden.boss?.updatePhase(50);
    const sim = new Simulation(world);

    sim.step();
    expect(warden.health).toBe(53);
    sim.run(2);
    expect(warden.health).toBe(59);
  });
});

describe("deaths and floors", () => {
  it("drops gold beside a dead enemy and credits the kill", () => {
    const world = testWorld();
    const doomed = placeEnemy(world, { x: 20, y: 20 });
    const survivor = placeEnemy(world, { x: 30, y: 25 });
    const recorded = recordEvents(world);
    doomed.health = 0;

    new Simulation(world).step();
    expect(world.enemies).toEqual([survivor]);
    expect(world.player.enemiesKilled).toBe(1);

    const gold = world.items.filter((item) => item.payload.kind === "gold");
    expect(gold).toHaveLength(1);
    expect(gold[0]?.position).toEqual({ x: 21, y: 20 });
    expect(gold[0]?.payload).toEqual({ kind: "gold", amount: 10 });

    const deaths = recorded.filter((e) => e.type === "combat.death");
    expect(deaths).toEqual([
      { type: "combat.death", entity: doomed.id, name: "Test Ghoul", gold: 10 },
    ]);
  });

  it("ends the run when the player dies", () => {
    const world = testWorld();
    placeEnemy(world, { x: 30, y: 25 });
    world.player.health = 0;
    const sim = new Simulation(world);

    sim.step();
    expect(world.status).toBe("dead");
    sim.step();
    expect(world.tick).toBe(1);
  });

  it("waits for the player to act before leaving a cleared floor", () => {
    const world = testWorld({ runSeed: 12345 });
    const sim = new Simulation(world);

    sim.step();
    expect(world.floorLevel).toBe(1);

    world.playerHasActed = true;
    sim.step();
    expect(world.floorLevel).toBe(2);
    expect(world.floor.seed).toBe(12346);
    expect(world.enemies.length).toBeGreaterThan(0);
    expect(world.playerHasActed).toBe(false);
  });

  it("wins the run by clearing the last floor", () => {
    const world = testWorld({ difficulty: "Easy", floorLevel: 5 });
    world.playerHasActed = true;
    new Simulation(world).step();
    expect(world.status).toBe("victory");
  });
});
