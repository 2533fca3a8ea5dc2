/**
 * Attack patterns.
 *
 * A pattern is a tagged variant carrying its own parameters. Given an
 * origin and a facing direction it unrolls into ordered animation frames;
 * the tile set of the last frame is where the attack lands.
 */

import type { Direction, Point } from "@crawl/procgen";

export type AttackPattern =
  | { readonly kind: "BasicSlash" }
  | { readonly kind: "GroundSlam"; readonly radius: number }
  | { readonly kind: "WhirlwindAttack" }
  | { readonly kind: "SwordThrust"; readonly reach: number }
  | { readonly kind: "ArrowShot"; readonly reach: number }
  | { readonly kind: "PiercingShot"; readonly reach: number }
  | { readonly kind: "MultiShot"; readonly reach: number; readonly spread: number }
  | { readonly kind: "Barrage"; readonly reach: number }
  | { readonly kind: "Fireball"; readonly radius: number }
  | { readonly kind: "ChainLightning"; readonly reach: number }
  | { readonly kind: "FrostNova"; readonly radius: number }
  | { readonly kind: "MeteorShower"; readonly reach: number; readonly width: number }
  | { readonly kind: "CrescentSlash" }
  | { readonly kind: "Vortex"; readonly radius: number };

export type AttackPatternKind = AttackPattern["kind"];

/**
 * Pattern constructors.
 *
 * @example
 * const frames = animationFrames(Pattern.groundSlam(2), { x: 5, y: 5 }, { dx: 1, dy: 0 });
 */
export const Pattern = {
  basicSlash: (): AttackPattern => ({ kind: "BasicSlash" }),
  groundSlam: (radius: number): AttackPattern => ({ kind: "GroundSlam", radius }),
  whirlwind: (): AttackPattern => ({ kind: "WhirlwindAttack" }),
  swordThrust: (reach: number): AttackPattern => ({ kind: "SwordThrust", reach }),
  arrowShot: (reach: number): AttackPattern => ({ kind: "ArrowShot", reach }),
  piercingShot: (reach: number): AttackPattern => ({ kind: "PiercingShot", reach }),
  multiShot: (reach: number, spread: number): AttackPattern => ({
    kind: "MultiShot",
    reach,
    spread,
  }),
  barrage: (reach: number): AttackPattern => ({ kind: "Barrage", reach }),
  fireball: (radius: number): AttackPattern => ({ kind: "Fireball", radius }),
  chainLightning: (reach: number): AttackPattern => ({ kind: "ChainLightning", reach }),
  frostNova: (radius: number): AttackPattern => ({ kind: "FrostNova", radius }),
  meteorShower: (reach: number, width: number): AttackPattern => ({
    kind: "MeteorShower",
    reach,
    width,
  }),
  crescentSlash: (): AttackPattern => ({ kind: "CrescentSlash" }),
  vortex: (radius: number): AttackPattern => ({ kind: "Vortex", radius }),
} as const;

// =============================================================================
// FRAMES
// =============================================================================

export interface AnimationFrame {
  readonly tiles: readonly Point[];
  /** xterm-256 colour index */
  readonly color: number;
  readonly glyph: string;
  /** Seconds */
  readonly duration: number;
}

export const PatternColor = {
  RED: 1,
  YELLOW: 3,
  MAGENTA: 5,
  CYAN: 6,
  DARK_GRAY: 8,
  LIGHT_RED: 9,
  LIGHT_GREEN: 10,
  LIGHT_YELLOW: 11,
  LIGHT_BLUE: 12,
  LIGHT_MAGENTA: 13,
  LIGHT_CYAN: 14,
  WHITE: 15,
  ORANGE: 208,
} as const;

/** Facing used when an attack is made without one */
export const DEFAULT_FACING: Direction = { dx: 0, dy: 1 };

const WHIRLWIND_RING: readonly Point[] = [
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
  { x: -1, y: 1 },
  { x: -1, y: 0 },
  { x: -1, y: -1 },
];

function frame(
  tiles: Point[],
  color: number,
  glyph: string,
  duration: number,
): AnimationFrame {
  return { tiles: dedupe(tiles), color, glyph, duration };
}

function dedupe(tiles: readonly Point[]): Point[] {
  const seen = new Set<string>();
  const result: Point[] = [];
  for (const tile of tiles) {
    const key = `${tile.x},${tile.y}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(tile);
  }
  return result;
}

/** Unit vector perpendicular to a cardinal direction; diagonals get (1, 1) */
function perpendicular(dir: Direction): Direction {
  return { dx: dir.dy !== 0 ? 1 : 0, dy: dir.dx !== 0 ? 1 : 0 };
}

function along(origin: Point, dir: Direction, k: number): Point {
  return { x: origin.x + dir.dx * k, y: origin.y + dir.dy * k };
}

function offset(p: Point, dir: Direction, k: number): Point {
  return { x: p.x + dir.dx * k, y: p.y + dir.dy * k };
}

function ring(origin: Point, k: number): Point[] {
  const tiles: Point[] = [];
  for (let dy = -k; dy <= k; dy++) {
    for (let dx = -k; dx <= k; dx++) {
      if (Math.abs(dx) + Math.abs(dy) === k) {
        tiles.push({ x: origin.x + dx, y: origin.y + dy });
      }
    }
  }
  return tiles;
}

/** Tiles with inner² < dx²+dy² <= outer² */
function annulus(origin: Point, inner: number, outer: number): Point[] {
  const tiles: Point[] = [];
  const inner2 = inner < 0 ? -1 : inner * inner;
  const outer2 = outer * outer;
  for (let dy = -outer; dy <= outer; dy++) {
    for (let dx = -outer; dx <= outer; dx++) {
      const d2 = dx * dx + dy * dy;
      if (d2 > inner2 && d2 <= outer2) {
        tiles.push({ x: origin.x + dx, y: origin.y + dy });
      }
    }
  }
  return tiles;
}

function disk(origin: Point, radius: number): Point[] {
  return annulus(origin, -1, radius);
}

function cross(center: Point, halfWidth: number): Point[] {
  const tiles: Point[] = [center];
  for (let k = 1; k <= halfWidth; k++) {
    tiles.push(
      { x: center.x + k, y: center.y },
      { x: center.x - k, y: center.y },
      { x: center.x, y: center.y + k },
      { x: center.x, y: center.y - k },
    );
  }
  return tiles;
}

/**
 * Ordered frames of `pattern` fired from `origin` toward `dir`.
 *
 * Frames never consult the floor; a zero direction falls back to
 * DEFAULT_FACING. Non-positive reach or radius yields fewer frames
 * (possibly none).
 */
export function animationFrames(
  pattern: AttackPattern,
  origin: Point,
  direction: Direction,
): AnimationFrame[] {
  const dir = direction.dx === 0 && direction.dy === 0 ? DEFAULT_FACING : direction;
  const perp = perpendicular(dir);
  const frames: AnimationFrame[] = [];

  switch (pattern.kind) {
    case "BasicSlash": {
      const center = along(origin, dir, 1);
      const arc = [offset(center, perp, -1), center, offset(center, perp, 1)];
      frames.push(frame(arc, PatternColor.LIGHT_YELLOW, "X", 0.06));
      frames.push(frame(arc, PatternColor.YELLOW, "/", 0.04));
      break;
    }

    case "GroundSlam": {
      frames.push(frame([origin], PatternColor.WHITE, "●", 0.1));
      for (let k = 1; k <= pattern.radius; k++) {
        frames.push(frame(ring(origin, k), PatternColor.ORANGE, "#", 0.05));
      }
      break;
    }

    case "WhirlwindAttack": {
      for (let i = 0; i < 4; i++) {
        const a = WHIRLWIND_RING[2 * i]!;
        const b = WHIRLWIND_RING[2 * i + 1]!;
        frames.push(
          frame(
            [
              { x: origin.x + a.x, y: origin.y + a.y },
              { x: origin.x + b.x, y: origin.y + b.y },
            ],
            PatternColor.CYAN,
            i === 2 ? "@" : "~",
            0.05,
          ),
        );
      }
      break;
    }

    case "SwordThrust": {
      for (let k = 1; k <= pattern.reach; k++) {
        const tiles: Point[] = [];
        for (let i = 1; i <= k; i++) {
          const tile = along(origin, dir, i);
          tiles.push(tile);
          if (i >= k - 1) {
            tiles.push(offset(tile, perp, 1), offset(tile, perp, -1));
          }
        }
        const last = k === pattern.reach;
        frames.push(
          frame(
            tiles,
            last ? PatternColor.LIGHT_CYAN : PatternColor.CYAN,
            last ? "*" : "≡",
            last ? 0.1 : 0.05,
          ),
        );
      }
      break;
    }

    case "ArrowShot":
    case "PiercingShot": {
      const piercing = pattern.kind === "PiercingShot";
      const glyph = piercing ? "»" : Math.abs(dir.dx) > Math.abs(dir.dy) ? "-" : "|";
      for (let k = 1; k <= pattern.reach; k++) {
        const tiles = [along(origin, dir, k)];
        if (k > 1) tiles.push(along(origin, dir, k - 1));
        frames.push(
          frame(
            tiles,
            piercing ? PatternColor.MAGENTA : PatternColor.YELLOW,
            glyph,
            piercing ? 0.02 : 0.03,
          ),
        );
      }
      break;
    }

    case "MultiShot": {
      for (let d = 1; d <= pattern.reach; d++) {
        const center = along(origin, dir, d);
        const tiles = [center];
        if (d >= 2) {
          for (let s = 1; s <= pattern.spread; s++) {
            tiles.push(offset(center, perp, s), offset(center, perp, -s));
          }
        }
        frames.push(frame(tiles, PatternColor.LIGHT_GREEN, "v", 0.04));
      }
      break;
    }

    case "Barrage": {
      for (let k = 1; k <= pattern.reach; k++) {
        frames.push(frame([along(origin, dir, k)], PatternColor.LIGHT_YELLOW, "•", 0.03));
      }
      break;
    }

    case "Fireball": {
      for (let k = 1; k <= pattern.radius; k++) {
        const last = k === pattern.radius;
        frames.push(
          frame(
            disk(origin, k),
            last ? PatternColor.RED : PatternColor.LIGHT_RED,
            last ? "#" : "*",
            0.06,
          ),
        );
      }
      break;
    }

    case "ChainLightning": {
      const tiles: Point[] = [];
      for (let k = 1; k <= pattern.reach; k++) {
        tiles.push(offset(along(origin, dir, k), perp, k % 2 === 0 ? 1 : -1));
        frames.push(frame([...tiles], PatternColor.LIGHT_YELLOW, "⚡", 0.05));
      }
      break;
    }

    case "FrostNova": {
      for (let k = 1; k <= pattern.radius; k++) {
        const last = k === pattern.radius;
        frames.push(
          frame(ring(origin, k), PatternColor.LIGHT_BLUE, last ? "#" : "*", last ? 0.2 : 0.05),
        );
      }
      break;
    }

    case "MeteorShower": {
      for (let k = 1; k <= pattern.reach; k++) {
        frames.push(
          frame(cross(along(origin, dir, k), pattern.width), PatternColor.YELLOW, "*", 0.06),
        );
      }
      break;
    }

    case "CrescentSlash": {
      const arc: Point[] =
        dir.dx !== 0
          ? [
              { x: origin.x + dir.dx, y: origin.y - 1 },
              { x: origin.x + 2 * dir.dx, y: origin.y },
              { x: origin.x + dir.dx, y: origin.y + 1 },
            ]
          : [
              { x: origin.x - 1, y: origin.y + dir.dy },
              { x: origin.x, y: origin.y + 2 * dir.dy },
              { x: origin.x + 1, y: origin.y + dir.dy },
            ];
      frames.push(frame(arc, PatternColor.MAGENTA, ")", 0.06));
      frames.push(frame([...arc, along(origin, dir, 1)], PatternColor.LIGHT_MAGENTA, "D", 0.06));
      break;
    }

    case "Vortex": {
      for (let j = 0; j < pattern.radius; j++) {
        const rho = pattern.radius - j;
        frames.push(frame(annulus(origin, rho - 1, rho), PatternColor.MAGENTA, "%", 0.05));
      }
      break;
    }
  }

  return frames;
}

/**
 * Where the attack lands: the last frame's tiles, deduplicated.
 */
export function affectedTiles(
  pattern: AttackPattern,
  origin: Point,
  direction: Direction,
): Point[] {
  const frames = animationFrames(pattern, origin, direction);
  const last = frames[frames.length - 1];
  return last ? [...last.tiles] : [];
}

// =============================================================================
// METADATA
// =============================================================================

export type PatternCategory = "Melee" | "Ranged" | "Magic";

/** Knockback applied by melee-category hits, in tiles */
export const MELEE_KNOCKBACK_FORCE = 1.0;

export function patternName(pattern: AttackPattern): string {
  switch (pattern.kind) {
    case "BasicSlash":
      return "Basic Slash";
    case "GroundSlam":
      return "Ground Slam";
    case "WhirlwindAttack":
      return "Whirlwind";
    case "SwordThrust":
      return "Sword Thrust";
    case "ArrowShot":
      return "Arrow Shot";
    case "PiercingShot":
      return "Piercing Shot";
    case "MultiShot":
      return "Multi Shot";
    case "Barrage":
      return "Barrage";
    case "Fireball":
      return "Fireball";
    case "ChainLightning":
      return "Chain Lightning";
    case "FrostNova":
      return "Frost Nova";
    case "MeteorShower":
      return "Meteor Shower";
    case "CrescentSlash":
      return "Crescent Slash";
    case "Vortex":
      return "Vortex";
  }
}

export function patternDescription(pattern: AttackPattern): string {
  switch (pattern.kind) {
    case "BasicSlash":
      return "Quick 3-tile slash with wide coverage";
    case "GroundSlam":
      return `Shockwave expands ${pattern.radius} tiles in all directions`;
    case "WhirlwindAttack":
      return "Spin attack hitting all 8 directions";
    case "SwordThrust":
      return `Pierce forward ${pattern.reach} tiles with force`;
    case "ArrowShot":
      return `Single arrow projectile ${pattern.reach} tiles`;
    case "PiercingShot":
      return `Armor-piercing shot ${pattern.reach} tiles`;
    case "MultiShot":
      return `3 arrows spreading ${pattern.reach} tiles, ${pattern.spread} spread`;
    case "Barrage":
      return `Rapid successive hits along ${pattern.reach} tiles`;
    case "Fireball":
      return `Explosion with ${pattern.radius} tile radius`;
    case "ChainLightning":
      return `Lightning chains ${pattern.reach} tiles in zigzag`;
    case "FrostNova":
      return `Ice spreads ${pattern.radius} tiles in diamond pattern`;
    case "MeteorShower":
      return `Meteors rain ${pattern.width} tiles wide for ${pattern.reach} distance`;
    case "CrescentSlash":
      return "Curved slash with arcing pattern";
    case "Vortex":
      return `Magical vortex with ${pattern.radius} tile radius, pulls inward`;
  }
}

export function patternCategory(pattern: AttackPattern): PatternCategory {
  switch (pattern.kind) {
    case "BasicSlash":
    case "GroundSlam":
    case "WhirlwindAttack":
    case "SwordThrust":
    case "CrescentSlash":
      return "Melee";
    case "ArrowShot":
    case "MultiShot":
    case "Barrage":
    case "PiercingShot":
      return "Ranged";
    case "Fireball":
    case "ChainLightning":
    case "FrostNova":
    case "MeteorShower":
    case "Vortex":
      return "Magic";
  }
}

/** Knockback force of a hit, 0 for patterns that do not push */
export function patternKnockback(pattern: AttackPattern): number {
  return patternCategory(pattern) === "Melee" ? MELEE_KNOCKBACK_FORCE : 0;
}
