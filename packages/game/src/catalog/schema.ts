import { DIFFICULTIES } from "@crawl/contracts";
import { z } from "zod";
import { DamageType, Element } from "../combat/damage";
import { ITEM_TIERS } from "../items/tiers";
import { WEAPON_KINDS } from "../items/weapons";

const Size = z.number().int().min(0).max(32);

export const AttackPatternSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("BasicSlash") }),
  z.object({ kind: z.literal("GroundSlam"), radius: Size }),
  z.object({ kind: z.literal("WhirlwindAttack") }),
  z.object({ kind: z.literal("SwordThrust"), reach: Size }),
  z.object({ kind: z.literal("ArrowShot"), reach: Size }),
  z.object({ kind: z.literal("PiercingShot"), reach: Size }),
  z.object({ kind: z.literal("MultiShot"), reach: Size, spread: Size }),
  z.object({ kind: z.literal("Barrage"), reach: Size }),
  z.object({ kind: z.literal("Fireball"), radius: Size }),
  z.object({ kind: z.literal("ChainLightning"), reach: Size }),
  z.object({ kind: z.literal("FrostNova"), radius: Size }),
  z.object({ kind: z.literal("MeteorShower"), reach: Size, width: Size }),
  z.object({ kind: z.literal("CrescentSlash") }),
  z.object({ kind: z.literal("Vortex"), radius: Size }),
]);

// =============================================================================
// ENEMIES
// =============================================================================

export const ENEMY_RARITIES = ["Fighter", "Guard", "Champion", "Elite", "Boss"] as const;

export const EnemyEffectSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("Slow"), duration: z.number().positive() }),
  z.object({
    kind: z.literal("Poison"),
    damagePerSecond: z.number().int().min(0),
    duration: z.number().positive(),
  }),
  z.object({ kind: z.literal("Stun"), duration: z.number().positive() }),
]);

export const BuffSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("Armor"), percent: z.number().int() }),
  z.object({ kind: z.literal("Sharpness"), percent: z.number().int() }),
  z.object({ kind: z.literal("Speed"), percent: z.number().int() }),
  z.object({ kind: z.literal("Regeneration"), perSecond: z.number().int().min(0) }),
  z.object({ kind: z.literal("BloodFrenzy") }),
  z.object({ kind: z.literal("PhaseShift") }),
  z.object({ kind: z.literal("EchoAmplification") }),
]);

export const EnemyAttackSchema = z
  .object({
    name: z.string().min(1),
    damage: z.tuple([z.number().int().min(0), z.number().int().min(0)]),
    type: z.enum(DamageType),
    reach: Size,
    area: Size,
    effect: EnemyEffectSchema.optional(),
    cooldown: z.number().min(0),
    pattern: AttackPatternSchema,
  })
  .refine((attack) => attack.damage[0] <= attack.damage[1], {
    message: "damage range is reversed",
    path: ["damage"],
  });

export const ULTIMATE_POWERS = ["Weak", "Average", "Devastating"] as const;

export const EnemyUltimateSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  power: z.enum(ULTIMATE_POWERS),
  damage: z.number().int().min(0),
  radius: Size,
  cooldown: z.number().min(0),
  pattern: AttackPatternSchema,
});

export const EnemyTemplateSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/),
  name: z.string().min(1),
  description: z.string(),
  rarity: z.enum(ENEMY_RARITIES),
  element: z.enum(Element),
  health: z.number().int().min(1),
  speed: z.number().min(0).max(1),
  attacks: z.array(EnemyAttackSchema),
  ultimate: EnemyUltimateSchema.optional(),
  buffs: z.array(BuffSchema),
});

export const EnemyCatalogSchema = z
  .object({
    templates: z.array(EnemyTemplateSchema).min(1),
    byDifficulty: z.record(z.enum(DIFFICULTIES), z.array(z.string()).min(1)),
  })
  .superRefine((catalog, ctx) => {
    const ids = new Set(catalog.templates.map((t) => t.id));
    for (const difficulty of DIFFICULTIES) {
      for (const id of catalog.byDifficulty[difficulty]) {
        if (!ids.has(id)) {
          ctx.addIssue({
            code: "custom",
            message: `Unknown template "${id}"`,
            path: ["byDifficulty", difficulty],
          });
        }
      }
    }
  });

// =============================================================================
// WEAPONS
// =============================================================================

export const WeaponSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(WEAPON_KINDS),
  tier: z.enum(ITEM_TIERS),
  damage: z.number().int().min(0),
  cooldown: z.number().min(0),
  pattern: AttackPatternSchema,
  enchants: z
    .array(
      z.object({
        kind: z.enum(["DamageIncrease", "RadiusIncrease"]),
        value: z.number().int(),
      }),
    )
    .default([]),
});

export const WeaponCatalogSchema = z
  .object({
    weapons: z.array(WeaponSchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.weapons.forEach((weapon, index) => {
      if (seen.has(weapon.name)) {
        ctx.addIssue({
          code: "custom",
          message: `Duplicate weapon "${weapon.name}"`,
          path: ["weapons", index, "name"],
        });
      }
      seen.add(weapon.name);
    });
  });

export type EnemyRarity = (typeof ENEMY_RARITIES)[number];
export type EnemyEffect = z.infer<typeof EnemyEffectSchema>;
export type EnemyAttack = z.infer<typeof EnemyAttackSchema>;
export type UltimatePower = (typeof ULTIMATE_POWERS)[number];
export type EnemyUltimate = z.infer<typeof EnemyUltimateSchema>;
export type EnemyTemplate = z.infer<typeof EnemyTemplateSchema>;
export type EnemyCatalog = z.infer<typeof EnemyCatalogSchema>;
export type WeaponCatalog = z.infer<typeof WeaponCatalogSchema>;
