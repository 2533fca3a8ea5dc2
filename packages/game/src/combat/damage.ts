import type { AttackPattern } from "../patterns/pattern";

/**
 * Damage pipeline: attacker buffs, element multiplier, armor, critical
 * roll, then rounding up to at least 1.
 */

export const DamageType = {
  PHYSICAL: "Physical",
  FIRE: "Fire",
  HOLY: "Holy",
  POISON: "Poison",
  MAGIC: "Magic",
} as const;

export type DamageType = (typeof DamageType)[keyof typeof DamageType];

export const Element = {
  UNDEAD: "Undead",
  GHOST: "Ghost",
} as const;

export type Element = (typeof Element)[keyof typeof Element];

export type Buff =
  | { readonly kind: "Armor"; readonly percent: number }
  | { readonly kind: "Sharpness"; readonly percent: number }
  | { readonly kind: "Speed"; readonly percent: number }
  | { readonly kind: "Regeneration"; readonly perSecond: number }
  | { readonly kind: "BloodFrenzy" }
  | { readonly kind: "PhaseShift" }
  | { readonly kind: "EchoAmplification" };

export type BuffKind = Buff["kind"];

export const MAX_ARMOR_PERCENT = 75;
export const CRITICAL_MULTIPLIER = 1.5;
export const BLOOD_FRENZY_MULTIPLIER = 1.5;
export const ECHO_AMPLIFICATION_MULTIPLIER = 1.2;
/** Chance that a PhaseShift target ignores a hit */
export const PHASE_SHIFT_CHANCE = 0.2;

export function buffName(buff: Buff): string {
  switch (buff.kind) {
    case "Armor":
      return "Bone Plating";
    case "Sharpness":
      return "Bloodlust";
    case "Speed":
      return "Haste";
    case "Regeneration":
      return "Regeneration";
    case "BloodFrenzy":
      return "Blood Frenzy";
    case "PhaseShift":
      return "Phase Shift";
    case "EchoAmplification":
      return "Echo Amplification";
  }
}

/**
 * How much of `type` an element takes. A target without an element takes
 * everything at face value.
 */
export function elementMultiplier(element: Element | undefined, type: DamageType): number {
  switch (element) {
    case Element.UNDEAD:
      if (type === DamageType.FIRE || type === DamageType.HOLY) return 1.25;
      if (type === DamageType.POISON) return 0.5;
      return 1.0;
    case Element.GHOST:
      if (type === DamageType.PHYSICAL) return 0.7;
      if (type === DamageType.MAGIC || type === DamageType.HOLY) return 1.25;
      return 0.9;
    default:
      return 1.0;
  }
}

/** Sum of Armor buffs clamped to [0, 75] */
export function totalArmor(buffs: readonly Buff[]): number {
  let armor = 0;
  for (const buff of buffs) {
    if (buff.kind === "Armor") armor += buff.percent;
  }
  return Math.min(MAX_ARMOR_PERCENT, Math.max(0, armor));
}

export interface DamageRequest {
  readonly base: number;
  readonly type: DamageType;
  readonly attackerBuffs?: readonly Buff[];
  /** Attacker health / max health, for BloodFrenzy */
  readonly attackerHealthFraction?: number;
  readonly targetElement?: Element;
  readonly targetBuffs?: readonly Buff[];
  readonly critChance?: number;
  /** Uniform roll in [0, 1); a critical lands when roll < critChance */
  readonly roll?: number;
}

export interface DamageBreakdown {
  readonly base: number;
  readonly afterBuffs: number;
  readonly typeMultiplier: number;
  readonly armorPercent: number;
  readonly isCritical: boolean;
  readonly final: number;
}

/**
 * Run one hit through the pipeline.
 *
 * @example
 * resolveDamage({ base: 10, type: DamageType.FIRE, targetElement: Element.UNDEAD }).final; // 13
 */
export function resolveDamage(request: DamageRequest): DamageBreakdown {
  const attackerBuffs = request.attackerBuffs ?? [];
  let damage = request.base;

  for (const buff of attackerBuffs) {
    if (buff.kind === "Sharpness") {
      damage *= 1 + buff.percent / 100;
    } else if (buff.kind === "BloodFrenzy" && (request.attackerHealthFraction ?? 1) < 0.5) {
      damage *= BLOOD_FRENZY_MULTIPLIER;
    } else if (buff.kind === "EchoAmplification" && request.type === DamageType.MAGIC) {
      damage *= ECHO_AMPLIFICATION_MULTIPLIER;
    }
  }
  const afterBuffs = damage;

  const typeMultiplier = elementMultiplier(request.targetElement, request.type);
  damage *= typeMultiplier;

  const armorPercent = totalArmor(request.targetBuffs ?? []);
  damage *= 1 - armorPercent / 100;

  const isCritical = (request.roll ?? 1) < (request.critChance ?? 0);
  if (isCritical) {
    damage *= CRITICAL_MULTIPLIER;
  }

  return {
    base: request.base,
    afterBuffs,
    typeMultiplier,
    armorPercent,
    isCritical,
    final: Math.max(1, Math.ceil(damage)),
  };
}

/**
 * One-line summary for the log.
 *
 * @example
 * "Base: 10 | Type: 1.3x | Armor: -0% | 13"
 */
export function formatBreakdown(breakdown: DamageBreakdown): string {
  return (
    `Base: ${breakdown.base} | Type: ${breakdown.typeMultiplier.toFixed(1)}x | ` +
    `Armor: -${breakdown.armorPercent.toFixed(0)}% | ` +
    `${breakdown.isCritical ? "CRITICAL! " : ""}${breakdown.final}`
  );
}

/** Fire for fire spells, Magic for frost and lightning, Physical otherwise */
export function patternDamageType(pattern: AttackPattern): DamageType {
  switch (pattern.kind) {
    case "Fireball":
    case "MeteorShower":
      return DamageType.FIRE;
    case "FrostNova":
    case "ChainLightning":
    case "Vortex":
      return DamageType.MAGIC;
    default:
      return DamageType.PHYSICAL;
  }
}
