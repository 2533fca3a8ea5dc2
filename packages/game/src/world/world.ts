import {
  Difficulty,
  difficultyProfile,
  SeededRandom,
} from "@crawl/contracts";
import { PathCache, pointsEqual, type Dimensions, type Floor, type Point } from "@crawl/procgen";
import { defaultCatalogs, findWeapon, type Catalogs } from "../catalog/loader";
import { SimulationClock } from "../core/clock";
import { EventQueue, type EntityId } from "../core/events";
import { ConsoleLogger, type Logger } from "../core/logger";
import { DEFAULT_RUN_SEED, DEFAULT_VIEWPORT, TICK_SECONDS } from "../constants";
import type { Enemy } from "../entities/enemy";
import { Player } from "../entities/player";
import { itemName, type ItemDrop, type ItemPayload } from "../items/drops";
import type { ItemTier } from "../items/tiers";
import type { Weapon } from "../items/weapons";
import type { ActiveAnimation } from "../patterns/animation";
import type { Projectile } from "../projectiles/projectile";
import type { SkillTree } from "../progression/skill-tree";
import { Camera } from "./camera";
import { InputQueue } from "./input";

export type RunStatus = "playing" | "paused" | "dead" | "victory";

/** Weapons every run starts with */
export const STARTING_WEAPONS = ["Iron Sword", "Wood Bow"] as const;

export interface WorldOptions {
  readonly difficulty?: Difficulty;
  readonly runSeed?: number;
  readonly floorLevel?: number;
  readonly playerName?: string;
  readonly playerPosition?: Point;
  readonly skills?: SkillTree;
  readonly logger?: Logger;
  readonly catalogs?: Catalogs;
  readonly viewport?: Dimensions;
  readonly clock?: SimulationClock;
  /** Clock time the run began; defaults to the clock's current time */
  readonly startedAt?: number;
}

/** Item drops try the tile east, west, south then north of the death tile */
const DROP_OFFSETS: readonly Point[] = [
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 },
];

/**
 * Everything one run owns. Tick systems read and mutate it; between ticks
 * it is a coherent snapshot.
 *
 * @example
 * const world = new World(generateFloor(180, 60, 12345), { difficulty: "Hard" });
 * world.inputs.push({ type: "move", direction: { dx: 1, dy: 0 } });
 */
export class World {
  floor: Floor;
  readonly player: Player;
  enemies: Enemy[] = [];
  projectiles: Projectile[] = [];
  items: ItemDrop[] = [];
  animations: ActiveAnimation[] = [];

  tick = 0;
  /** Seconds the current tick covers */
  deltaSeconds = TICK_SECONDS;
  readonly startedAt: number;
  readonly inputs = new InputQueue();

  readonly difficulty: Difficulty;
  readonly maxLevels: number;
  readonly runSeed: number;
  readonly playerName: string;
  floorLevel: number;
  status: RunStatus = "playing";
  /** Enemies hold their attacks until the player has acted on this floor */
  playerHasActed = false;
  inventoryOpen = false;

  readonly events: EventQueue;
  readonly logger: Logger;
  readonly clock: SimulationClock;
  readonly camera: Camera;
  readonly paths = new PathCache();
  readonly catalogs: Catalogs;
  /** World stream: wander order, crit rolls, drop rolls */
  rng: SeededRandom;

  private nextEntityId: EntityId = 1;
  private nextItemId = 1;

  constructor(floor: Floor, options: WorldOptions = {}) {
    this.floor = floor;
    this.difficulty = options.difficulty ?? Difficulty.NORMAL;
    this.maxLevels = difficultyProfile(this.difficulty).maxLevels;
    this.runSeed = options.runSeed ?? DEFAULT_RUN_SEED;
    this.floorLevel = Math.min(this.maxLevels, Math.max(1, options.floorLevel ?? 1));
    this.playerName = options.playerName ?? "Adventurer";
    this.logger = options.logger ?? new ConsoleLogger();
    this.events = new EventQueue(this.logger);
    this.clock = options.clock ?? new SimulationClock();
    this.startedAt = options.startedAt ?? this.clock.now();
    this.catalogs = options.catalogs ?? defaultCatalogs();
    this.camera = new Camera(options.viewport ?? DEFAULT_VIEWPORT, floor);
    this.rng = new SeededRandom(floor.seed);

    const weapons = STARTING_WEAPONS.flatMap((name) => {
      const weapon = findWeapon(this.catalogs, name);
      return weapon ? [weapon] : [];
    });
    this.player = new Player({
      position: options.playerPosition ?? floor.findWalkableTile() ?? { x: 0, y: 0 },
      clock: this.clock,
      weapons,
      skills: options.skills,
    });

    this.events.onAny((event) => this.logger.debug(event.type, { tick: this.tick, ...event }));
  }

  isPlaying(): boolean {
    return this.status === "playing";
  }

  isBossLevel(): boolean {
    return this.floorLevel >= this.maxLevels;
  }

  /** Seconds of simulated time since the run started */
  elapsedSeconds(): number {
    return this.clock.now() - this.startedAt;
  }

  allocateEntityId(): EntityId {
    return this.nextEntityId++;
  }

  // ===========================================================================
  // ENEMIES
  // ===========================================================================

  addEnemy(enemy: Enemy): Enemy {
    this.enemies.push(enemy);
    return enemy;
  }

  /** First live enemy standing on a tile */
  enemyAt(position: Point): Enemy | undefined {
    return this.enemies.find((e) => e.isAlive() && pointsEqual(e.position, position));
  }

  /** A live enemy that blocks movement onto the tile */
  blockingEnemyAt(position: Point): Enemy | undefined {
    return this.enemies.find(
      (e) => e.isAlive() && e.collisionEnabled && pointsEqual(e.position, position),
    );
  }

  enemyById(id: EntityId): Enemy | undefined {
    return this.enemies.find((e) => e.id === id);
  }

  // ===========================================================================
  // ITEMS
  // ===========================================================================

  addItem(position: Point, payload: ItemPayload, tier: ItemTier): ItemDrop {
    const drop: ItemDrop = { id: this.nextItemId++, position, payload, tier, age: 0 };
    this.items.push(drop);
    return drop;
  }

  itemsAt(position: Point): ItemDrop[] {
    return this.items.filter((item) => pointsEqual(item.position, position));
  }

  removeItem(id: number): void {
    this.items = this.items.filter((item) => item.id !== id);
  }

  /**
   * Drop an item beside `origin`: the first walkable neighbour without an
   * item or a blocking enemy, else the origin tile itself.
   */
  dropItemNear(origin: Point, payload: ItemPayload, tier: ItemTier): ItemDrop {
    const free = DROP_OFFSETS.map((o) => ({ x: origin.x + o.x, y: origin.y + o.y })).find(
      (p) =>
        this.floor.isWalkable(p.x, p.y) &&
        this.itemsAt(p).length === 0 &&
        this.blockingEnemyAt(p) === undefined,
    );
    const position = free ?? origin;
    const drop = this.addItem(position, payload, tier);
    this.events.emit({
      type: "item.drop",
      itemName: itemName(payload),
      x: position.x,
      y: position.y,
    });
    return drop;
  }

  // ===========================================================================
  // PLAYER
  // ===========================================================================

  movePlayerTo(position: Point): void {
    this.player.position = position;
    this.camera.markDirty();
  }

  /** Add a weapon to the inventory; false when all slots are taken */
  giveWeapon(weapon: Weapon): boolean {
    return this.player.weapons.add(weapon);
  }

  // ===========================================================================
  // FLOORS
  // ===========================================================================

  /**
   * Swap in a new floor. Entities, drops and cached paths belong to the
   * old floor and are discarded.
   */
  setFloor(floor: Floor, level: number): void {
    this.floor = floor;
    this.floorLevel = level;
    this.enemies = [];
    this.projectiles = [];
    this.items = [];
    this.animations = [];
    this.paths.clear();
    this.camera.reset(floor);
    this.rng = new SeededRandom(floor.seed);
    this.playerHasActed = false;
  }
}
