/**
 * Game tuning constants.
 */

// =============================================================================
// TICKS
// =============================================================================

/** Nominal tick length in milliseconds (~60 Hz) */
export const TICK_MS = 16;
export const TICK_SECONDS = TICK_MS / 1000;

/** The player moves at most once per this many ticks */
export const PLAYER_TICK_RATE = 2;

/**
 * Advisory only. Enemy movement runs on the per-enemy speed accumulator;
 * nothing reads this value.
 */
export const ENEMY_TICK_RATE = 12;

/** An enemy strikes once its attack accumulator reaches this many ticks */
export const ENEMY_ATTACK_TICKS = 65;

// =============================================================================
// FLOORS
// =============================================================================

export const FLOOR_WIDTH = 180;
export const FLOOR_HEIGHT = 60;
export const DEFAULT_RUN_SEED = 12345;
export const ITEMS_PER_FLOOR = 10;

/** Offsets added to the floor seed for the spawn streams */
export const ENEMY_SEED_OFFSET = 1337;
export const ITEM_SEED_OFFSET = 999;

export const ENEMY_MIN_PLAYER_DISTANCE = 10;
export const ITEM_MIN_PLAYER_DISTANCE = 3;
export const ITEM_MIN_SPACING = 2;

// =============================================================================
// PLAYER
// =============================================================================

export const PLAYER_BASE_HEALTH = 100;
export const PLAYER_BASE_DAMAGE = 5;
export const PLAYER_DASH_DISTANCE = 5;

export const ATTACK_COOLDOWN = 0.5;
export const BOW_COOLDOWN = 0.3;
export const DASH_COOLDOWN = 7.0;
export const BLOCK_COOLDOWN = 6.0;

/** Seconds after a block during which the next hit is halved */
export const BLOCK_WINDOW = 1.0;

/** Force applied to the player when an enemy hit lands */
export const PLAYER_KNOCKBACK_FORCE = 0.5;

export const KNOCKBACK_DAMPING = 0.7;
export const KNOCKBACK_EPSILON = 0.1;

// =============================================================================
// PROJECTILES
// =============================================================================

export const ARROW_SPEED = 8;
export const ARROW_MAX_DISTANCE = 50;
export const FIRE_OIL_SPEED = 10;
export const FIRE_OIL_MAX_DISTANCE = 50;
export const FIRE_OIL_RADIUS = 4;
export const FIRE_OIL_DAMAGE = 8;
export const FIRE_OIL_BURN_SECONDS = 3;

// =============================================================================
// LOOT
// =============================================================================

export const WEAPON_DROP_CHANCE = 0.33;
export const BOSS_LOOT_MULTIPLIER = 3;

// =============================================================================
// CAMERA
// =============================================================================

export const CAMERA_EASE = 0.05;
export const CAMERA_SNAP = 0.1;
export const DEFAULT_VIEWPORT = { width: 80, height: 24 } as const;
