import { difficultyProfile, type Difficulty, type SeededRandom } from "@crawl/contracts";

export const ITEM_TIERS = [
  "Common",
  "Rare",
  "Epic",
  "Exotic",
  "Legendary",
  "Mythic",
  "Godly",
] as const;

export type ItemTier = (typeof ITEM_TIERS)[number];

/** Base drop chance in percent */
export const TIER_DROP_CHANCE: Readonly<Record<ItemTier, number>> = {
  Common: 50,
  Rare: 25,
  Epic: 15,
  Exotic: 5,
  Legendary: 3,
  Mythic: 1.5,
  Godly: 0.5,
};

/** xterm-256 colour per tier */
export const TIER_COLOR: Readonly<Record<ItemTier, number>> = {
  Common: 8,
  Rare: 6,
  Epic: 4,
  Exotic: 3,
  Legendary: 220,
  Mythic: 221,
  Godly: 230,
};

/** Tiers a defeated enemy's weapon can come from */
export const WEAPON_DROP_TIERS: Readonly<Record<Difficulty, readonly [ItemTier, ...ItemTier[]]>> = {
  Easy: ["Common", "Rare"],
  Normal: ["Rare", "Epic"],
  Hard: ["Epic", "Exotic"],
  Death: ["Exotic", "Legendary", "Mythic"],
};

export function tierDropChance(tier: ItemTier, difficulty: Difficulty): number {
  return Math.min(100, TIER_DROP_CHANCE[tier] * difficultyProfile(difficulty).dropChanceMultiplier);
}

/**
 * Roll a tier. The rarest tier is checked first against the cumulative
 * scaled chances; anything that misses them all is Common.
 */
export function rollTier(rng: SeededRandom, difficulty: Difficulty): ItemTier {
  const roll = rng.next() * 100;
  let cumulative = 0;
  for (let i = ITEM_TIERS.length - 1; i >= 0; i--) {
    const tier = ITEM_TIERS[i]!;
    cumulative += tierDropChance(tier, difficulty);
    if (roll < cumulative) return tier;
  }
  return "Common";
}
