import type { ConsumableKind } from "@crawl/contracts";

export interface ConsumableInfo {
  readonly name: string;
  readonly description: string;
  readonly stackable: boolean;
  readonly glyph: string;
}

export const CONSUMABLE_INFO: Readonly<Record<ConsumableKind, ConsumableInfo>> = {
  WeakHealingDraught: {
    name: "Weak Healing Draught",
    description: "Sour, cloudy, and vaguely alive.",
    stackable: true,
    glyph: "!",
  },
  BandageRoll: {
    name: "Bandage Roll",
    description: "Clean-ish linen. Good enough.",
    stackable: true,
    glyph: "=",
  },
  AntitoxinVial: {
    name: "Antitoxin Vial",
    description: "Burns worse than the poison. That's how you know it's working.",
    stackable: true,
    glyph: "¡",
  },
  FireOilFlask: {
    name: "Fire Oil Flask",
    description: "Lamp oil with violent intent.",
    stackable: false,
    glyph: "δ",
  },
  BlessedBread: {
    name: "Blessed Bread",
    description: "Dry. Holy. Comforting.",
    stackable: true,
    glyph: "%",
  },
};

export interface ConsumableStack {
  readonly kind: ConsumableKind;
  quantity: number;
}

/**
 * Consumables in pickup order. Stackable kinds share one entry.
 */
export class ConsumableInventory {
  private stacks: ConsumableStack[] = [];

  get items(): readonly ConsumableStack[] {
    return this.stacks;
  }

  get size(): number {
    return this.stacks.length;
  }

  add(kind: ConsumableKind, quantity = 1): void {
    if (quantity <= 0) return;
    if (CONSUMABLE_INFO[kind].stackable) {
      const existing = this.stacks.find((s) => s.kind === kind);
      if (existing) {
        existing.quantity += quantity;
        return;
      }
      this.stacks.push({ kind, quantity });
      return;
    }
    for (let i = 0; i < quantity; i++) {
      this.stacks.push({ kind, quantity: 1 });
    }
  }

  get(index: number): ConsumableStack | undefined {
    return this.stacks[index];
  }

  /**
   * Take one item from a 0-based slot. The entry disappears when it runs
   * out. Returns the kind used, or undefined for an empty slot.
   */
  use(index: number): ConsumableKind | undefined {
    const stack = this.stacks[index];
    if (!stack) return undefined;

    stack.quantity -= 1;
    if (stack.quantity <= 0) {
      this.stacks.splice(index, 1);
    }
    return stack.kind;
  }

  clear(): void {
    this.stacks = [];
  }
}
