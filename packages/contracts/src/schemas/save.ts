import { z } from "zod";
import { DIFFICULTIES, Difficulty } from "../types/difficulty";
import { CrawlError } from "../types/error";
import { CONSUMABLE_KINDS, SKILL_PATHS, ULTIMATE_KINDS } from "../types/kinds";
import { Err, Ok, type Result } from "../types/result";

export const GOLD_MAX = 0xffffffff;
export const MAX_WEAPON_SLOTS = 9;

const NonNegativeInt = z.number().int().min(0);

const PlayerStatsSchema = z
  .object({
    attackDamage: NonNegativeInt,
    attackLength: NonNegativeInt,
    attackWidth: NonNegativeInt,
    dashDistance: NonNegativeInt,
    health: z.number().int(),
    maxHealth: z.number().int().min(1),
    gold: z
      .number()
      .int()
      .transform((g) => Math.min(GOLD_MAX, Math.max(0, g))),
    enemiesKilled: NonNegativeInt.catch(0),
  })
  .transform((stats) => ({
    ...stats,
    health: Math.min(stats.maxHealth, Math.max(0, stats.health)),
  }));

const ConsumableStackSchema = z.object({
  kind: z.enum(CONSUMABLE_KINDS).catch("WeakHealingDraught"),
  quantity: z.number().int().min(1),
});

const SkillLevelsSchema = z.object({
  Warrior: NonNegativeInt.catch(0),
  Mage: NonNegativeInt.catch(0),
  Rogue: NonNegativeInt.catch(0),
  Balanced: NonNegativeInt.catch(0),
});

export const GameSaveSchema = z
  .object({
    playerName: z.string().catch("Adventurer"),
    player: PlayerStatsSchema,
    weapons: z.array(z.string()).max(MAX_WEAPON_SLOTS).catch([]),
    currentWeapon: NonNegativeInt.catch(0),
    consumables: z.array(ConsumableStackSchema).catch([]),
    skills: SkillLevelsSchema.catch({ Warrior: 0, Mage: 0, Rogue: 0, Balanced: 0 }),
    chosenPath: z.enum(SKILL_PATHS).optional().catch(undefined),
    ultimate: z.enum(ULTIMATE_KINDS).catch("Shockwave"),
    runSeed: NonNegativeInt,
    floorLevel: z.number().int().min(1),
    maxLevels: z.number().int().min(1),
    position: z.object({ x: z.number().int(), y: z.number().int() }),
    difficulty: z.enum(DIFFICULTIES).catch(Difficulty.NORMAL),
    elapsedSeconds: z.number().min(0).catch(0),
  })
  .superRefine((save, ctx) => {
    if (save.floorLevel > save.maxLevels) {
      ctx.addIssue({
        code: "custom",
        message: "floorLevel exceeds maxLevels",
        path: ["floorLevel"],
      });
    }
  });

export type GameSave = z.infer<typeof GameSaveSchema>;
export type PlayerStats = GameSave["player"];

/**
 * Validate a save payload. Health is clamped into [0, maxHealth], gold into
 * the u32 range and unknown enum values take their defaults.
 */
export function loadSave(input: unknown): Result<GameSave, CrawlError> {
  const parsed = GameSaveSchema.safeParse(input);
  if (!parsed.success) {
    return Err(CrawlError.fromZod("SAVE_INVALID", parsed.error));
  }
  return Ok(parsed.data);
}
