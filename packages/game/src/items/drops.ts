import type { ConsumableKind } from "@crawl/contracts";
import type { Point } from "@crawl/procgen";
import { CONSUMABLE_INFO } from "./consumables";
import type { ItemTier } from "./tiers";
import { WEAPON_GLYPH, type Weapon } from "./weapons";

export type ItemPayload =
  | { readonly kind: "consumable"; readonly consumable: ConsumableKind }
  | { readonly kind: "gold"; readonly amount: number }
  | { readonly kind: "weapon"; readonly weapon: Weapon };

/**
 * Something lying on the floor.
 */
export interface ItemDrop {
  readonly id: number;
  readonly position: Point;
  readonly payload: ItemPayload;
  readonly tier: ItemTier;
  /** Seconds on the ground */
  age: number;
}

export function itemName(payload: ItemPayload): string {
  switch (payload.kind) {
    case "consumable":
      return CONSUMABLE_INFO[payload.consumable].name;
    case "gold":
      return `${payload.amount} gold`;
    case "weapon":
      return payload.weapon.name;
  }
}

export function itemGlyph(payload: ItemPayload): string {
  switch (payload.kind) {
    case "consumable":
      return CONSUMABLE_INFO[payload.consumable].glyph;
    case "gold":
      return "$";
    case "weapon":
      return WEAPON_GLYPH[payload.weapon.kind];
  }
}
