import { GOLD_MAX, type UltimateKind } from "@crawl/contracts";
import type { Direction, Point } from "@crawl/procgen";
import type { Clock } from "../core/clock";
import {
  ATTACK_COOLDOWN,
  BLOCK_COOLDOWN,
  BOW_COOLDOWN,
  DASH_COOLDOWN,
  PLAYER_BASE_DAMAGE,
  PLAYER_BASE_HEALTH,
  PLAYER_DASH_DISTANCE,
  PLAYER_TICK_RATE,
} from "../constants";
import { ConsumableInventory } from "../items/consumables";
import { totalDamage, WeaponInventory, type Weapon } from "../items/weapons";
import { SkillTree } from "../progression/skill-tree";
import { RAGE_MULTIPLIER, Ultimate } from "../progression/ultimate";
import { Cooldown } from "../status/cooldown";
import { StatusEffects } from "../status/effects";

export interface PlayerCooldowns {
  readonly dash: Cooldown;
  readonly attack: Cooldown;
  readonly bow: Cooldown;
  readonly block: Cooldown;
}

export interface PlayerInit {
  readonly position: Point;
  readonly clock: Clock;
  readonly weapons?: readonly Weapon[];
  readonly ultimate?: UltimateKind;
  readonly skills?: SkillTree;
}

/**
 * The player. Health stays within [0, maxHealth]; gold saturates at the
 * u32 maximum.
 */
export class Player {
  position: Point;
  /** Last non-zero direction attempted; zero until the first move */
  lastDirection: Direction = { dx: 0, dy: 0 };

  health: number;
  baseMaxHealth = PLAYER_BASE_HEALTH;
  baseDamage = PLAYER_BASE_DAMAGE;
  attackLength = 1;
  attackWidth = 1;
  dashDistance = PLAYER_DASH_DISTANCE;
  critChance = 0;

  gold = 0;
  enemiesKilled = 0;
  experience = 0;

  readonly cooldowns: PlayerCooldowns;
  readonly ultimate: Ultimate;
  readonly weapons: WeaponInventory;
  readonly consumables = new ConsumableInventory();
  readonly status = new StatusEffects();
  skills: SkillTree;

  knockback = { x: 0, y: 0 };
  statusDamageCarry = 0;
  /** Clock time until which the next hit is halved */
  blockUntil: number | undefined;
  /** Ticks since the last successful move */
  ticksSinceMove = PLAYER_TICK_RATE;

  constructor(init: PlayerInit) {
    this.position = init.position;
    this.cooldowns = {
      dash: new Cooldown(DASH_COOLDOWN, init.clock),
      attack: new Cooldown(ATTACK_COOLDOWN, init.clock),
      bow: new Cooldown(BOW_COOLDOWN, init.clock),
      block: new Cooldown(BLOCK_COOLDOWN, init.clock),
    };
    this.ultimate = new Ultimate(init.ultimate ?? "Shockwave", init.clock);
    this.weapons = new WeaponInventory(init.weapons ?? []);
    this.skills = init.skills ?? new SkillTree();
    this.health = this.maxHealth;
  }

  get maxHealth(): number {
    return Math.max(1, Math.round(this.baseMaxHealth * this.skills.totalBonus().health));
  }

  isAlive(): boolean {
    return this.health > 0;
  }

  /** Health / max health, with max health floored at 1 */
  healthPercentage(): number {
    return this.health / Math.max(this.maxHealth, 1);
  }

  heal(amount: number): number {
    const before = this.health;
    this.health = Math.min(this.maxHealth, this.health + Math.max(0, amount));
    return this.health - before;
  }

  takeDamage(amount: number): number {
    const taken = Math.min(this.health, Math.max(0, amount));
    this.health -= taken;
    return taken;
  }

  /** Clamp health after max health changed */
  clampHealth(): void {
    this.health = Math.min(this.maxHealth, Math.max(0, this.health));
  }

  addGold(amount: number): void {
    this.gold = Math.min(GOLD_MAX, this.gold + Math.max(0, Math.floor(amount)));
  }

  /** Returns false, leaving gold unchanged, when short */
  spendGold(amount: number): boolean {
    if (amount < 0 || amount > this.gold) return false;
    this.gold -= amount;
    return true;
  }

  currentWeapon(): Weapon | undefined {
    return this.weapons.current();
  }

  /**
   * Damage of a weapon swing: weapon damage plus enchants, scaled by the
   * skill damage bonus and doubled under Rage.
   */
  effectiveAttackDamage(): number {
    const weapon = this.currentWeapon();
    const base = weapon ? totalDamage(weapon) : this.baseDamage;
    const rage = this.ultimate.isActive("Rage") ? RAGE_MULTIPLIER : 1;
    return Math.max(1, Math.round(base * this.skills.totalBonus().damage * rage));
  }

  /** Ticks between moves after skill and Rage bonuses; Cripple doubles it */
  moveInterval(): number {
    const rage = this.ultimate.isActive("Rage") ? RAGE_MULTIPLIER : 1;
    const cripple = this.status.has("Cripple") ? 2 : 1;
    return Math.max(
      1,
      Math.ceil((PLAYER_TICK_RATE * cripple) / (this.skills.totalBonus().speed * rage)),
    );
  }

  canMove(): boolean {
    return this.ticksSinceMove >= this.moveInterval();
  }

  isInvulnerable(): boolean {
    return this.ultimate.isActive("Ghost");
  }

  isStunned(): boolean {
    return this.status.has("Stun");
  }
}
