import { MAX_WEAPON_SLOTS } from "@crawl/contracts";
import type { AttackPattern } from "../patterns/pattern";
import type { ItemTier } from "./tiers";

export const WEAPON_KINDS = ["Sword", "Bow", "Mace", "Spear", "Axe", "Staff"] as const;

export type WeaponKind = (typeof WEAPON_KINDS)[number];

export const WEAPON_GLYPH: Readonly<Record<WeaponKind, string>> = {
  Sword: "†",
  Bow: "}",
  Mace: "¶",
  Spear: "↑",
  Axe: "¥",
  Staff: "⌠",
};

export interface Enchant {
  readonly kind: "DamageIncrease" | "RadiusIncrease";
  readonly value: number;
}

export interface Weapon {
  readonly name: string;
  readonly kind: WeaponKind;
  readonly tier: ItemTier;
  readonly damage: number;
  /** Seconds between attacks */
  readonly cooldown: number;
  readonly pattern: AttackPattern;
  readonly enchants: readonly Enchant[];
}

export function totalDamage(weapon: Weapon): number {
  return weapon.enchants.reduce(
    (sum, e) => (e.kind === "DamageIncrease" ? sum + e.value : sum),
    weapon.damage,
  );
}

export function radiusBonus(weapon: Weapon): number {
  return weapon.enchants.reduce((sum, e) => (e.kind === "RadiusIncrease" ? sum + e.value : sum), 0);
}

export function withEnchant(weapon: Weapon, enchant: Enchant): Weapon {
  return { ...weapon, enchants: [...weapon.enchants, enchant] };
}

/**
 * The weapon's pattern grown by its RadiusIncrease enchants. Patterns
 * without a size parameter are unchanged.
 */
export function enchantedPattern(weapon: Weapon): AttackPattern {
  const bonus = radiusBonus(weapon);
  if (bonus === 0) return weapon.pattern;

  const p = weapon.pattern;
  switch (p.kind) {
    case "GroundSlam":
    case "Fireball":
    case "FrostNova":
    case "Vortex":
      return { ...p, radius: p.radius + bonus };
    case "SwordThrust":
    case "ArrowShot":
    case "PiercingShot":
    case "Barrage":
    case "ChainLightning":
    case "MultiShot":
    case "MeteorShower":
      return { ...p, reach: p.reach + bonus };
    default:
      return p;
  }
}

export function isBow(weapon: Weapon): boolean {
  return weapon.kind === "Bow";
}

/**
 * Ordered weapon slots (at most 9) and the selected one.
 */
export class WeaponInventory {
  private slots: Weapon[];
  private index = 0;

  constructor(weapons: readonly Weapon[] = []) {
    this.slots = weapons.slice(0, MAX_WEAPON_SLOTS);
  }

  get weapons(): readonly Weapon[] {
    return this.slots;
  }

  get currentIndex(): number {
    return this.index;
  }

  current(): Weapon | undefined {
    return this.slots[this.index];
  }

  /** Select a 0-based slot; out-of-range slots are ignored */
  switchTo(slot: number): boolean {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.slots.length) return false;
    this.index = slot;
    return true;
  }

  add(weapon: Weapon): boolean {
    if (this.isFull()) return false;
    this.slots.push(weapon);
    return true;
  }

  isFull(): boolean {
    return this.slots.length >= MAX_WEAPON_SLOTS;
  }

  remove(slot: number): Weapon | undefined {
    if (slot < 0 || slot >= this.slots.length) return undefined;
    const [removed] = this.slots.splice(slot, 1);
    if (this.index >= this.slots.length && this.slots.length > 0) {
      this.index = this.slots.length - 1;
    }
    return removed;
  }

  /** Replace every slot and select `slot`, falling back to the first */
  load(weapons: readonly Weapon[], slot = 0): void {
    this.slots = weapons.slice(0, MAX_WEAPON_SLOTS);
    this.index = Number.isInteger(slot) && slot >= 0 && slot < this.slots.length ? slot : 0;
  }

  /** Replace a slot, used when enchanting */
  replace(slot: number, weapon: Weapon): boolean {
    if (slot < 0 || slot >= this.slots.length) return false;
    this.slots[slot] = weapon;
    return true;
  }
}
