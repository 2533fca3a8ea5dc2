/**
 * Timed status effects and their stacking rules.
 */

export const StatusKind = {
  BLEED: "Bleed",
  POISON: "Poison",
  BURN: "Burn",
  STUN: "Stun",
  CRIPPLE: "Cripple",
  FEAR: "Fear",
  POISON_IMMUNITY: "PoisonImmunity",
} as const;

export type StatusKind = (typeof StatusKind)[keyof typeof StatusKind];

export interface StatusEffect {
  readonly kind: StatusKind;
  /** Seconds left */
  duration: number;
  readonly damagePerSecond: number;
  /** Only Bleed stacks; 1 otherwise */
  stacks: number;
}

/** Bleed always refreshes to this many seconds */
export const BLEED_DURATION = 8;

const DEFAULT_DPS: Record<StatusKind, number> = {
  Bleed: 1,
  Poison: 1,
  Burn: 2,
  Stun: 0,
  Cripple: 0,
  Fear: 0,
  PoisonImmunity: 0,
};

export function createEffect(
  kind: StatusKind,
  duration: number,
  damagePerSecond: number = DEFAULT_DPS[kind],
): StatusEffect {
  return { kind, duration, damagePerSecond, stacks: 1 };
}

export function bleed(stacks: number): StatusEffect {
  return { kind: StatusKind.BLEED, duration: BLEED_DURATION, damagePerSecond: 1, stacks };
}

export function poison(duration: number, damagePerSecond = 1): StatusEffect {
  return createEffect(StatusKind.POISON, duration, damagePerSecond);
}

export function burn(duration: number): StatusEffect {
  return createEffect(StatusKind.BURN, duration, 2);
}

export function stun(duration: number): StatusEffect {
  return createEffect(StatusKind.STUN, duration);
}

export function poisonImmunity(duration: number): StatusEffect {
  return createEffect(StatusKind.POISON_IMMUNITY, duration);
}

/**
 * The effects on one entity.
 *
 * - Bleed adds stacks to an existing bleed and refreshes it to 8 s
 * - Poison refreshes an existing poison; PoisonImmunity blocks it
 * - Burn always adds a new instance
 * - Anything else replaces the instance of its kind
 */
export class StatusEffects {
  private effects: StatusEffect[] = [];

  /** Returns false when the effect was blocked */
  add(effect: StatusEffect): boolean {
    const incoming: StatusEffect = { ...effect };

    switch (incoming.kind) {
      case StatusKind.BLEED: {
        const existing = this.get(StatusKind.BLEED);
        if (existing) {
          existing.stacks += incoming.stacks;
          existing.duration = BLEED_DURATION;
          return true;
        }
        break;
      }
      case StatusKind.POISON: {
        if (this.has(StatusKind.POISON_IMMUNITY)) return false;
        const existing = this.get(StatusKind.POISON);
        if (existing) {
          existing.duration = incoming.duration;
          return true;
        }
        break;
      }
      case StatusKind.BURN:
        break;
      default:
        this.remove(incoming.kind);
    }

    this.effects.push(incoming);
    return true;
  }

  /** Remove every instance of a kind. Returns whether any was present. */
  remove(kind: StatusKind): boolean {
    const before = this.effects.length;
    this.effects = this.effects.filter((e) => e.kind !== kind);
    return this.effects.length !== before;
  }

  has(kind: StatusKind): boolean {
    return this.effects.some((e) => e.kind === kind);
  }

  get(kind: StatusKind): StatusEffect | undefined {
    return this.effects.find((e) => e.kind === kind);
  }

  /**
   * Count every effect down by `deltaSeconds` and drop the ones that ran
   * out. Returns the kinds that are no longer present.
   */
  update(deltaSeconds: number): StatusKind[] {
    const kindsBefore = new Set(this.effects.map((e) => e.kind));
    for (const effect of this.effects) {
      effect.duration -= deltaSeconds;
    }
    this.effects = this.effects.filter((e) => e.duration > 0);

    const remaining = new Set(this.effects.map((e) => e.kind));
    return [...kindsBefore].filter((kind) => !remaining.has(kind));
  }

  totalDamagePerSecond(): number {
    return this.effects.reduce((sum, e) => sum + e.damagePerSecond * e.stacks, 0);
  }

  list(): readonly StatusEffect[] {
    return this.effects;
  }

  get size(): number {
    return this.effects.length;
  }

  clear(): void {
    this.effects = [];
  }
}
