import { z } from "zod";
import { DIFFICULTIES, Difficulty } from "../types/difficulty";
import { CrawlError } from "../types/error";
import type { KeyAction } from "../types/kinds";
import { Err, Ok, type Result } from "../types/result";

const NAMED_KEYS = [
  "Space",
  "Return",
  "Up",
  "Down",
  "Left",
  "Right",
  "Escape",
  "Tab",
  "Backspace",
] as const;

const MOUSE_BUTTONS = ["LeftClick", "RightClick"] as const;

const KEY_PATTERN = new RegExp(
  `^(?:[A-Z0-9]|${[...NAMED_KEYS, ...MOUSE_BUTTONS].join("|")})$`,
);

export const DEFAULT_KEYBINDINGS: Readonly<Record<KeyAction, string>> = {
  moveUp: "W",
  moveLeft: "A",
  moveDown: "S",
  moveRight: "D",
  attack: "LeftClick",
  dash: "Space",
  block: "RightClick",
  toggleInventory: "C",
  specialItem: "Q",
  inventoryUp: "Up",
  inventoryDown: "Down",
  itemDescribe: "Return",
  pause: "P",
};

export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

/**
 * A key string that falls back to the action's default when malformed.
 */
function keyFor(action: KeyAction) {
  return z
    .string()
    .refine(isValidKey, { message: `Invalid key for ${action}` })
    .catch(DEFAULT_KEYBINDINGS[action]);
}

const VolumeSchema = z
  .number()
  .catch(50)
  .transform((v) => Math.round(Math.min(100, Math.max(0, v))));

export const KeybindingsSchema = z.object({
  moveUp: keyFor("moveUp"),
  moveLeft: keyFor("moveLeft"),
  moveDown: keyFor("moveDown"),
  moveRight: keyFor("moveRight"),
  attack: keyFor("attack"),
  dash: keyFor("dash"),
  block: keyFor("block"),
  toggleInventory: keyFor("toggleInventory"),
  specialItem: keyFor("specialItem"),
  inventoryUp: keyFor("inventoryUp"),
  inventoryDown: keyFor("inventoryDown"),
  itemDescribe: keyFor("itemDescribe"),
  pause: keyFor("pause"),
});

export const SettingsSchema = z.object({
  keybindings: KeybindingsSchema.catch({ ...DEFAULT_KEYBINDINGS }),
  difficulty: z.enum(DIFFICULTIES).catch(Difficulty.NORMAL),
  defaultDifficulty: z.enum(DIFFICULTIES).catch(Difficulty.NORMAL),
  musicVolume: VolumeSchema,
  soundVolume: VolumeSchema,
  skipLogo: z.boolean().catch(false),
});

export type Keybindings = z.infer<typeof KeybindingsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  keybindings: { ...DEFAULT_KEYBINDINGS },
  difficulty: Difficulty.NORMAL,
  defaultDifficulty: Difficulty.NORMAL,
  musicVolume: 50,
  soundVolume: 50,
  skipLogo: false,
};

/**
 * Parse a settings payload. Unknown or malformed fields take their defaults;
 * only a payload that is not an object at all is rejected.
 */
export function parseSettings(input: unknown): Result<Settings, CrawlError> {
  const parsed = SettingsSchema.safeParse(input);
  if (!parsed.success) {
    return Err(CrawlError.fromZod("SETTINGS_INVALID", parsed.error));
  }
  return Ok(parsed.data);
}
