import type { Clock } from "../core/clock";
import { Element } from "../combat/damage";
import { Pattern, type AttackPattern } from "../patterns/pattern";
import { Cooldown } from "../status/cooldown";

export const BossKind = {
  GOBLIN_OVERLORD: "GoblinOverlord",
  SKELETAL_KNIGHT: "SkeletalKnight",
  FLAME_SORCERER: "FlameSorcerer",
  SHADOW_ASSASSIN: "ShadowAssassin",
  CORRUPTED_WARDEN: "CorruptedWarden",
} as const;

export type BossKind = (typeof BossKind)[keyof typeof BossKind];

export const BOSS_KINDS: readonly BossKind[] = Object.values(BossKind);

export const BossPhase = {
  FIRST: "First",
  SECOND: "Second",
  THIRD: "Third",
} as const;

export type BossPhase = (typeof BossPhase)[keyof typeof BossPhase];

export interface BossProfile {
  readonly name: string;
  readonly health: number;
  readonly element: Element;
  readonly patterns: readonly AttackPattern[];
  readonly baseDamage: number;
  /** Manhattan distance within which the boss strikes */
  readonly attackRadius: number;
  readonly experience: number;
  readonly special: string;
}

export const BOSS_PROFILES: Readonly<Record<BossKind, BossProfile>> = {
  GoblinOverlord: {
    name: "Goblin Overlord",
    health: 120,
    element: Element.UNDEAD,
    patterns: [Pattern.whirlwind(), Pattern.basicSlash(), Pattern.groundSlam(2)],
    baseDamage: 25,
    attackRadius: 2,
    experience: 200,
    special: "Frenzied Charge",
  },
  SkeletalKnight: {
    name: "Skeletal Knight",
    health: 180,
    element: Element.UNDEAD,
    patterns: [Pattern.basicSlash(), Pattern.swordThrust(2), Pattern.groundSlam(1)],
    baseDamage: 35,
    attackRadius: 3,
    experience: 250,
    special: "Defensive Stance",
  },
  FlameSorcerer: {
    name: "Flame Sorcerer",
    health: 100,
    element: Element.GHOST,
    patterns: [Pattern.fireball(3), Pattern.meteorShower(4, 2), Pattern.fireball(2)],
    baseDamage: 30,
    attackRadius: 4,
    experience: 220,
    special: "Fire Burst",
  },
  ShadowAssassin: {
    name: "Shadow Assassin",
    health: 110,
    element: Element.GHOST,
    patterns: [Pattern.swordThrust(2), Pattern.whirlwind(), Pattern.basicSlash()],
    baseDamage: 40,
    attackRadius: 2,
    experience: 240,
    special: "Shadow Dash",
  },
  CorruptedWarden: {
    name: "Corrupted Warden",
    health: 200,
    element: Element.UNDEAD,
    patterns: [Pattern.chainLightning(4), Pattern.fireball(3), Pattern.frostNova(3)],
    baseDamage: 28,
    attackRadius: 3,
    experience: 300,
    special: "Corruption Surge",
  },
};

/** Tiles per tick for a boss outside its special state */
export const BOSS_BASE_SPEED = 0.15;
export const SPECIAL_COOLDOWN_SECONDS = 8;
export const PHASE_TRANSITION_SECONDS = 1.5;

const ENRAGE: Record<BossPhase, number> = { First: 1.0, Second: 1.2, Third: 1.5 };
const PHASE_DAMAGE: Record<BossPhase, number> = { First: 1.0, Second: 1.1, Third: 1.3 };
const WARDEN_REGEN: Record<BossPhase, number> = { First: 1, Second: 2, Third: 3 };

/**
 * The part of an enemy the controller reads and writes.
 */
export interface BossBody {
  health: number;
  speed: number;
}

export interface BossSpecial {
  readonly name: string;
  /** Area attack centred on the boss, if the special has one */
  readonly burst?: AttackPattern;
  readonly healed: number;
}

export function phaseForHealth(health: number, maxHealth: number): BossPhase {
  const percent = (health / Math.max(1, maxHealth)) * 100;
  if (percent >= 66) return BossPhase.FIRST;
  if (percent >= 33) return BossPhase.SECOND;
  return BossPhase.THIRD;
}

/**
 * Boss state layered over an enemy: HP phases with enrage, a rotating
 * attack pattern list and an 8 s special ability.
 *
 * The controller holds no reference to its enemy; callers pass the body in.
 *
 * @example
 * const boss = new BossController(BossKind.SKELETAL_KNIGHT, clock);
 * boss.updatePhase(90); // "Second"
 * boss.effectiveDamage(); // 46
 */
export class BossController {
  readonly profile: BossProfile;
  private currentPhase: BossPhase = BossPhase.FIRST;
  private enrage = ENRAGE.First;
  private patternIndex = 0;
  private specialRemaining = 0;
  private readonly specialCooldown: Cooldown;
  private readonly transition: Cooldown;

  constructor(
    readonly kind: BossKind,
    clock: Clock,
  ) {
    this.profile = BOSS_PROFILES[kind];
    this.specialCooldown = new Cooldown(SPECIAL_COOLDOWN_SECONDS, clock);
    this.transition = new Cooldown(PHASE_TRANSITION_SECONDS, clock);
  }

  get phase(): BossPhase {
    return this.currentPhase;
  }

  get enrageMultiplier(): number {
    return this.enrage;
  }

  get maxHealth(): number {
    return this.profile.health;
  }

  /**
   * Recompute the phase from current health. Returns the new phase when it
   * changed, undefined otherwise.
   */
  updatePhase(health: number): BossPhase | undefined {
    const next = phaseForHealth(health, this.profile.health);
    if (next === this.currentPhase) return undefined;

    this.currentPhase = next;
    this.enrage = ENRAGE[next];
    this.transition.trigger();
    return next;
  }

  /** True during the short window after a phase change */
  isTransitioning(): boolean {
    return !this.transition.isReady();
  }

  effectiveDamage(): number {
    return Math.max(
      1,
      Math.floor(this.profile.baseDamage * PHASE_DAMAGE[this.currentPhase] * this.enrage),
    );
  }

  currentPattern(): AttackPattern {
    return this.profile.patterns[this.patternIndex] ?? Pattern.basicSlash();
  }

  /** Current pattern, then advance the rotation */
  nextPattern(): AttackPattern {
    const pattern = this.currentPattern();
    this.patternIndex = (this.patternIndex + 1) % Math.max(1, this.profile.patterns.length);
    return pattern;
  }

  canUseSpecial(): boolean {
    return this.specialCooldown.isReady() && !this.isTransitioning() && !this.isInSpecialState();
  }

  isInSpecialState(): boolean {
    return this.specialRemaining > 0;
  }

  triggerSpecial(body: BossBody): BossSpecial {
    this.specialCooldown.trigger();
    const name = this.profile.special;

    switch (this.kind) {
      case BossKind.GOBLIN_OVERLORD:
        body.speed = 0.24;
        this.specialRemaining = 2.0;
        return { name, healed: 0 };
      case BossKind.SKELETAL_KNIGHT:
        this.specialRemaining = 3.0;
        return { name, healed: 0 };
      case BossKind.FLAME_SORCERER:
        this.specialRemaining = 2.5;
        return { name, burst: Pattern.fireball(this.profile.attackRadius), healed: 0 };
      case BossKind.SHADOW_ASSASSIN:
        body.speed = 0.36;
        this.specialRemaining = 2.0;
        return { name, healed: 0 };
      case BossKind.CORRUPTED_WARDEN: {
        const before = body.health;
        body.health = Math.min(this.profile.health, body.health + Math.floor(this.profile.health / 4));
        return { name, healed: body.health - before };
      }
    }
  }

  /**
   * Count the special state down. Returns true on the tick it ends, after
   * restoring the base speed.
   */
  tickSpecial(body: BossBody, deltaSeconds: number): boolean {
    if (this.specialRemaining <= 0) return false;
    this.specialRemaining -= deltaSeconds;
    if (this.specialRemaining > 0) return false;
    this.resetSpecialState(body);
    return true;
  }

  resetSpecialState(body: BossBody): void {
    this.specialRemaining = 0;
    body.speed = BOSS_BASE_SPEED;
  }

  /** Knight halves incoming damage during its stance */
  incomingDamageMultiplier(): number {
    return this.kind === BossKind.SKELETAL_KNIGHT && this.isInSpecialState() ? 0.5 : 1;
  }

  /** Warden regeneration for one tick; returns HP restored */
  regenerate(body: BossBody): number {
    if (this.kind !== BossKind.CORRUPTED_WARDEN || body.health <= 0) return 0;
    const before = body.health;
    body.health = Math.min(this.profile.health, body.health + WARDEN_REGEN[this.currentPhase]);
    return body.health - before;
  }

  experienceReward(): number {
    const base = this.profile.experience;
    return base + Math.floor(base / 2);
  }
}
