import type { Dimensions, Point } from "@crawl/procgen";
import type { ConsumableKind, UltimateKind } from "@crawl/contracts";
import type { BossPhase } from "./entities/boss";
import { itemGlyph, itemName } from "./items/drops";
import { TIER_COLOR } from "./items/tiers";
import type { StatusKind } from "./status/effects";
import type { RunStatus, World } from "./world/world";

export interface TileView {
  readonly glyph: string;
  readonly color: number;
}

export interface EnemyView {
  readonly id: number;
  readonly name: string;
  readonly position: Point;
  readonly glyph: string;
  readonly color: number;
  readonly health: number;
  readonly maxHealth: number;
  readonly bossPhase?: BossPhase;
}

export interface ProjectileView {
  readonly position: Point;
  readonly glyph: string;
}

export interface AnimationView {
  readonly tiles: readonly Point[];
  readonly glyph: string;
  readonly color: number;
}

export interface ItemView {
  readonly position: Point;
  readonly name: string;
  readonly glyph: string;
  readonly color: number;
}

export interface StatusView {
  readonly kind: StatusKind;
  readonly duration: number;
  readonly stacks: number;
}

export interface CooldownView {
  readonly dash: number;
  readonly attack: number;
  readonly ultimate: number;
}

/**
 * Read-only view of a world for whatever draws it. Positions are floor
 * coordinates; `camera` is the top-left floor tile of the viewport.
 */
export interface Snapshot {
  readonly tick: number;
  readonly status: RunStatus;
  readonly floorLevel: number;
  readonly maxLevels: number;
  readonly viewport: Dimensions;
  readonly camera: Point;
  /** Viewport rows, top to bottom */
  readonly tiles: readonly (readonly TileView[])[];
  readonly player: Point;
  readonly facing: Point;
  readonly enemies: readonly EnemyView[];
  readonly projectiles: readonly ProjectileView[];
  readonly animations: readonly AnimationView[];
  readonly items: readonly ItemView[];
  readonly banners: readonly string[];
  readonly cooldowns: CooldownView;
  readonly health: number;
  readonly maxHealth: number;
  readonly gold: number;
  readonly ultimate: UltimateKind;
  readonly ultimateCharge: number;
  readonly weapon: string | undefined;
  readonly consumables: readonly { readonly kind: ConsumableKind; readonly quantity: number }[];
  readonly statusEffects: readonly StatusView[];
}

const EMPTY_TILE: TileView = { glyph: " ", color: 0 };

function banners(world: World): string[] {
  const lines: string[] = [];
  switch (world.status) {
    case "paused":
      lines.push("PAUSED");
      break;
    case "dead":
      lines.push("YOU DIED");
      break;
    case "victory":
      lines.push("VICTORY");
      break;
    case "playing":
      break;
  }
  for (const enemy of world.enemies) {
    if (enemy.boss && enemy.isAlive()) {
      lines.push(`${enemy.name}: ${enemy.boss.phase} phase`);
    }
  }
  return lines;
}

export function buildSnapshot(world: World): Snapshot {
  const camera = world.camera.offset();
  const viewport = world.camera.viewport;
  const inView = (p: Point): boolean =>
    p.x >= camera.x &&
    p.x < camera.x + viewport.width &&
    p.y >= camera.y &&
    p.y < camera.y + viewport.height;

  const tiles: TileView[][] = [];
  for (let row = 0; row < viewport.height; row++) {
    const line: TileView[] = [];
    for (let col = 0; col < viewport.width; col++) {
      line.push(world.floor.appearance(camera.x + col, camera.y + row) ?? EMPTY_TILE);
    }
    tiles.push(line);
  }

  const player = world.player;
  return {
    tick: world.tick,
    status: world.status,
    floorLevel: world.floorLevel,
    maxLevels: world.maxLevels,
    viewport,
    camera,
    tiles,
    player: player.position,
    facing: { x: player.lastDirection.dx, y: player.lastDirection.dy },
    enemies: world.enemies
      .filter((e) => e.isAlive() && inView(e.position))
      .map((e) => ({
        id: e.id,
        name: e.name,
        position: e.position,
        glyph: e.glyph(),
        color: e.color(),
        health: e.health,
        maxHealth: e.maxHealth,
        bossPhase: e.boss?.phase,
      })),
    projectiles: world.projectiles
      .filter((p) => !p.dead)
      .map((p) => ({ position: p.tile(), glyph: p.glyph() })),
    animations: world.animations.flatMap((a) => {
      const frame = a.currentFrame();
      return frame ? [{ tiles: frame.tiles, glyph: frame.glyph, color: frame.color }] : [];
    }),
    items: world.items
      .filter((item) => inView(item.position))
      .map((item) => ({
        position: item.position,
        name: itemName(item.payload),
        glyph: itemGlyph(item.payload),
        color: TIER_COLOR[item.tier],
      })),
    banners: banners(world),
    cooldowns: {
      dash: player.cooldowns.dash.remaining(),
      attack: player.cooldowns.attack.remaining(),
      ultimate: player.ultimate.cooldown.remaining(),
    },
    health: player.health,
    maxHealth: player.maxHealth,
    gold: player.gold,
    ultimate: player.ultimate.kind,
    ultimateCharge: player.ultimate.charge,
    weapon: player.currentWeapon()?.name,
    consumables: player.consumables.items.map((s) => ({ kind: s.kind, quantity: s.quantity })),
    statusEffects: player.status
      .list()
      .map((s) => ({ kind: s.kind, duration: s.duration, stacks: s.stacks })),
  };
}
