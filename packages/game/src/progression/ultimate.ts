import type { UltimateKind } from "@crawl/contracts";
import type { Clock } from "../core/clock";
import { Cooldown } from "../status/cooldown";

export interface UltimateProfile {
  readonly description: string;
  readonly cooldown: number;
  /** Seconds the effect stays active; 0 for instant */
  readonly duration: number;
  readonly damage: number;
  readonly radius: number;
}

export const ULTIMATE_PROFILES: Readonly<Record<UltimateKind, UltimateProfile>> = {
  Rage: {
    description: "Become 2x faster and stronger for 30 seconds",
    cooldown: 45,
    duration: 30,
    damage: 0,
    radius: 0,
  },
  Shockwave: {
    description: "Send out a shockwave dealing damage",
    cooldown: 20,
    duration: 0,
    damage: 25,
    radius: 3,
  },
  Ghost: {
    description: "Become invulnerable for 10 seconds",
    cooldown: 60,
    duration: 10,
    damage: 0,
    radius: 0,
  },
};

export const MAX_CHARGE = 100;
/** Charge gained per point of damage dealt or taken */
export const CHARGE_PER_DAMAGE = 0.5;
export const MAX_CHARGE_PER_HIT = 15;

export const RAGE_MULTIPLIER = 2;

/**
 * The player's ultimate: a charge meter, a cooldown and the currently
 * running timed effect.
 */
export class Ultimate {
  private kindValue: UltimateKind;
  private chargeValue = 0;
  readonly cooldown: Cooldown;
  private activeUntil: number | undefined;

  constructor(
    kind: UltimateKind,
    private readonly clock: Clock,
  ) {
    this.kindValue = kind;
    this.cooldown = new Cooldown(ULTIMATE_PROFILES[kind].cooldown, clock);
  }

  get kind(): UltimateKind {
    return this.kindValue;
  }

  get charge(): number {
    return this.chargeValue;
  }

  get profile(): UltimateProfile {
    return ULTIMATE_PROFILES[this.kindValue];
  }

  setKind(kind: UltimateKind): void {
    this.kindValue = kind;
    this.cooldown.setDuration(ULTIMATE_PROFILES[kind].cooldown);
    this.activeUntil = undefined;
  }

  addCharge(damage: number): void {
    if (damage <= 0) return;
    const gain = Math.min(MAX_CHARGE_PER_HIT, damage * CHARGE_PER_DAMAGE);
    this.chargeValue = Math.min(MAX_CHARGE, this.chargeValue + gain);
  }

  setCharge(charge: number): void {
    this.chargeValue = Math.min(MAX_CHARGE, Math.max(0, charge));
  }

  isReady(): boolean {
    return this.chargeValue >= MAX_CHARGE && this.cooldown.isReady();
  }

  /**
   * Spend the full meter and start the cooldown. Returns false when not
   * ready.
   */
  activate(): boolean {
    if (!this.isReady()) return false;
    this.chargeValue = 0;
    this.cooldown.trigger();
    const duration = this.profile.duration;
    this.activeUntil = duration > 0 ? this.clock.now() + duration : undefined;
    return true;
  }

  /** The timed effect running now, if any */
  active(): UltimateKind | undefined {
    if (this.activeUntil === undefined) return undefined;
    if (this.clock.now() >= this.activeUntil) {
      this.activeUntil = undefined;
      return undefined;
    }
    return this.kindValue;
  }

  isActive(kind: UltimateKind): boolean {
    return this.active() === kind;
  }

  remaining(): number {
    if (this.activeUntil === undefined) return 0;
    return Math.max(0, this.activeUntil - this.clock.now());
  }
}
