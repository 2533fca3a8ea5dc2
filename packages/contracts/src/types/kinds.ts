/**
 * Enumerations shared between the game core and its persisted formats.
 */

export const CONSUMABLE_KINDS = [
  "WeakHealingDraught",
  "BandageRoll",
  "AntitoxinVial",
  "FireOilFlask",
  "BlessedBread",
] as const;

export type ConsumableKind = (typeof CONSUMABLE_KINDS)[number];

export const SKILL_PATHS = ["Warrior", "Mage", "Rogue", "Balanced"] as const;

export type SkillPath = (typeof SKILL_PATHS)[number];

export const ULTIMATE_KINDS = ["Rage", "Shockwave", "Ghost"] as const;

export type UltimateKind = (typeof ULTIMATE_KINDS)[number];

export const KEY_ACTIONS = [
  "moveUp",
  "moveLeft",
  "moveDown",
  "moveRight",
  "attack",
  "dash",
  "block",
  "toggleInventory",
  "specialItem",
  "inventoryUp",
  "inventoryDown",
  "itemDescribe",
  "pause",
] as const;

export type KeyAction = (typeof KEY_ACTIONS)[number];
