import {
  difficultyProfile,
  type Difficulty,
  type SeededRandom,
} from "@crawl/contracts";
import type { Point } from "@crawl/procgen";
import type { Clock } from "../core/clock";
import type { EntityId } from "../core/events";
import { Element, type Buff } from "../combat/damage";
import type {
  EnemyAttack,
  EnemyEffect,
  EnemyRarity,
  EnemyTemplate,
  EnemyUltimate,
  UltimatePower,
} from "../catalog/schema";
import { Pattern, type AttackPattern } from "../patterns/pattern";
import { Cooldown } from "../status/cooldown";
import { createEffect, poison, stun, StatusEffects, type StatusEffect } from "../status/effects";
import { BOSS_BASE_SPEED, BOSS_PROFILES, BossController, type BossKind } from "./boss";
import { BOSS_LOOT_MULTIPLIER } from "../constants";

export interface RarityProfile {
  readonly baseGold: number;
  readonly detectionRadius: number;
  /** Strike damage when the template lists no attack */
  readonly meleeDamage: number;
  readonly glyph: string;
  /** xterm-256 colour */
  readonly color: number;
  readonly strikePattern: AttackPattern;
}

export const RARITY_PROFILES: Readonly<Record<EnemyRarity, RarityProfile>> = {
  Fighter: {
    baseGold: 10,
    detectionRadius: 5,
    meleeDamage: 3,
    glyph: "x",
    color: 1,
    strikePattern: Pattern.basicSlash(),
  },
  Guard: {
    baseGold: 15,
    detectionRadius: 6,
    meleeDamage: 5,
    glyph: "⛊",
    color: 160,
    strikePattern: Pattern.basicSlash(),
  },
  Champion: {
    baseGold: 25,
    detectionRadius: 8,
    meleeDamage: 8,
    glyph: "◆",
    color: 199,
    strikePattern: Pattern.whirlwind(),
  },
  Elite: {
    baseGold: 50,
    detectionRadius: 10,
    meleeDamage: 12,
    glyph: "☠",
    color: 93,
    strikePattern: Pattern.groundSlam(1),
  },
  Boss: {
    baseGold: 150,
    detectionRadius: 15,
    meleeDamage: 20,
    glyph: "♛",
    color: 48,
    strikePattern: Pattern.basicSlash(),
  },
};

export const ULTIMATE_POWER_MULTIPLIER: Readonly<Record<UltimatePower, number>> = {
  Weak: 1.0,
  Average: 1.5,
  Devastating: 2.5,
};

export function goldDrop(rarity: EnemyRarity, difficulty: Difficulty): number {
  const lootMultiplier = rarity === "Boss" ? BOSS_LOOT_MULTIPLIER : 1;
  return Math.ceil(
    RARITY_PROFILES[rarity].baseGold * difficultyProfile(difficulty).goldMultiplier * lootMultiplier,
  );
}

export function detectionRadius(rarity: EnemyRarity, difficulty: Difficulty): number {
  return Math.ceil(
    RARITY_PROFILES[rarity].detectionRadius * difficultyProfile(difficulty).detectionMultiplier,
  );
}

/** Status an enemy attack effect puts on the player */
export function effectToStatus(effect: EnemyEffect): StatusEffect {
  switch (effect.kind) {
    case "Slow":
      return createEffect("Cripple", effect.duration);
    case "Poison":
      return poison(effect.duration, effect.damagePerSecond);
    case "Stun":
      return stun(effect.duration);
  }
}

export interface EnemyInit {
  readonly id: EntityId;
  readonly name: string;
  readonly rarity: EnemyRarity;
  readonly element: Element;
  readonly position: Point;
  readonly health: number;
  readonly speed: number;
  readonly detectionRadius: number;
  readonly goldDrop: number;
  /** Applied to rolled attack damage */
  readonly damageMultiplier?: number;
  readonly attacks?: readonly EnemyAttack[];
  readonly ultimate?: EnemyUltimate;
  readonly buffs?: readonly Buff[];
  readonly leashRadius?: number;
  readonly boss?: BossController;
  readonly clock: Clock;
}

/**
 * One enemy on the floor. Plain state; the tick systems drive it.
 */
export class Enemy {
  readonly id: EntityId;
  readonly name: string;
  readonly rarity: EnemyRarity;
  readonly element: Element;
  readonly spawnPoint: Point;
  readonly detectionRadius: number;
  readonly goldDrop: number;
  readonly damageMultiplier: number;
  readonly attacks: readonly EnemyAttack[];
  readonly ultimate?: EnemyUltimate;
  readonly ultimateCooldown?: Cooldown;
  readonly buffs: readonly Buff[];
  readonly leashRadius?: number;
  readonly boss?: BossController;

  position: Point;
  health: number;
  readonly maxHealth: number;
  /** Tiles per tick added to the movement accumulator */
  speed: number;
  collisionEnabled = true;

  movementTicks = 0;
  attackTicks = 0;
  private attackIndex = 0;
  knockback = { x: 0, y: 0 };
  readonly status = new StatusEffects();
  statusDamageCarry = 0;
  regenCarry = 0;
  /** Clock time of the last hit taken */
  damagedAt: number | undefined;

  constructor(init: EnemyInit) {
    this.id = init.id;
    this.name = init.name;
    this.rarity = init.rarity;
    this.element = init.element;
    this.position = init.position;
    this.spawnPoint = init.position;
    this.health = init.health;
    this.maxHealth = init.health;
    this.speed = init.speed;
    this.detectionRadius = init.detectionRadius;
    this.goldDrop = init.goldDrop;
    this.damageMultiplier = init.damageMultiplier ?? 1;
    this.attacks = init.attacks ?? [];
    this.buffs = init.buffs ?? [];
    this.leashRadius = init.leashRadius;
    this.boss = init.boss;
    this.ultimate = init.ultimate;
    if (init.ultimate) {
      this.ultimateCooldown = new Cooldown(init.ultimate.cooldown, init.clock);
    }
  }

  isAlive(): boolean {
    return this.health > 0;
  }

  /** Ghosts move through walls */
  isGhost(): boolean {
    return this.element === Element.GHOST;
  }

  /** Reduce health, never below 0. Returns the damage actually taken. */
  takeDamage(amount: number): number {
    const taken = Math.min(this.health, Math.max(0, amount));
    this.health -= taken;
    return taken;
  }

  heal(amount: number): number {
    const before = this.health;
    this.health = Math.min(this.maxHealth, this.health + Math.max(0, amount));
    return this.health - before;
  }

  /** The attack to use next; attacks rotate in catalog order */
  nextAttack(): EnemyAttack | undefined {
    if (this.attacks.length === 0) return undefined;
    const attack = this.attacks[this.attackIndex % this.attacks.length];
    this.attackIndex = (this.attackIndex + 1) % this.attacks.length;
    return attack;
  }

  /**
   * Roll strike damage for an attack, scaled by the difficulty
   * multiplier, or the rarity's flat damage when there is no attack.
   */
  rollDamage(attack: EnemyAttack | undefined, rng: SeededRandom): number {
    if (this.boss) return this.boss.effectiveDamage();
    const base = attack
      ? rng.range(attack.damage[0], attack.damage[1])
      : RARITY_PROFILES[this.rarity].meleeDamage;
    return Math.max(1, Math.ceil(base * this.damageMultiplier));
  }

  hasBuff(kind: Buff["kind"]): boolean {
    return this.buffs.some((b) => b.kind === kind);
  }

  regenerationPerSecond(): number {
    return this.buffs.reduce((sum, b) => (b.kind === "Regeneration" ? sum + b.perSecond : sum), 0);
  }

  glyph(): string {
    return RARITY_PROFILES[this.rarity].glyph;
  }

  color(): number {
    return RARITY_PROFILES[this.rarity].color;
  }
}

export interface SpawnOptions {
  readonly id: EntityId;
  readonly position: Point;
  readonly difficulty: Difficulty;
  readonly clock: Clock;
  readonly leashRadius?: number;
}

/**
 * Instantiate a catalog template. Health scales by the difficulty stat
 * multiplier; Speed buffs raise the movement rate.
 */
export function enemyFromTemplate(template: EnemyTemplate, options: SpawnOptions): Enemy {
  const profile = difficultyProfile(options.difficulty);
  const speedBonus = template.buffs.reduce(
    (sum, b) => (b.kind === "Speed" ? sum + b.percent : sum),
    0,
  );

  return new Enemy({
    id: options.id,
    name: template.name,
    rarity: template.rarity,
    element: template.element,
    position: options.position,
    health: Math.max(1, Math.round(template.health * profile.enemyStatMultiplier)),
    speed: template.speed * (1 + speedBonus / 100),
    detectionRadius: detectionRadius(template.rarity, options.difficulty),
    goldDrop: goldDrop(template.rarity, options.difficulty),
    damageMultiplier: profile.enemyStatMultiplier,
    attacks: template.attacks,
    ultimate: template.ultimate,
    buffs: template.buffs,
    leashRadius: options.leashRadius,
    clock: options.clock,
  });
}

export function createBoss(kind: BossKind, options: SpawnOptions): Enemy {
  const profile = BOSS_PROFILES[kind];
  return new Enemy({
    id: options.id,
    name: profile.name,
    rarity: "Boss",
    element: profile.element,
    position: options.position,
    health: profile.health,
    speed: BOSS_BASE_SPEED,
    detectionRadius: detectionRadius("Boss", options.difficulty),
    goldDrop: goldDrop("Boss", options.difficulty),
    leashRadius: options.leashRadius,
    boss: new BossController(kind, options.clock),
    clock: options.clock,
  });
}
