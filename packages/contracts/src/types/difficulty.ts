/**
 * Run difficulty and the scalars every system derives from it.
 */
export const Difficulty = {
  EASY: "Easy",
  NORMAL: "Normal",
  HARD: "Hard",
  DEATH: "Death",
} as const;

export type Difficulty = (typeof Difficulty)[keyof typeof Difficulty];

export const DIFFICULTIES = [
  Difficulty.EASY,
  Difficulty.NORMAL,
  Difficulty.HARD,
  Difficulty.DEATH,
] as const;

export interface DifficultyProfile {
  /** Applied to enemy gold drops */
  readonly goldMultiplier: number;
  /** Applied to rarity base detection radius */
  readonly detectionMultiplier: number;
  /** Applied to item tier drop chances */
  readonly dropChanceMultiplier: number;
  /** Applied to enemy health and damage */
  readonly enemyStatMultiplier: number;
  readonly maxLevels: number;
  /** Inclusive range of regular enemies per floor */
  readonly enemyCount: readonly [number, number];
}

export const DIFFICULTY_PROFILES: Readonly<Record<Difficulty, DifficultyProfile>> = {
  Easy: {
    goldMultiplier: 1.0,
    detectionMultiplier: 0.7,
    dropChanceMultiplier: 0.5,
    enemyStatMultiplier: 0.8,
    maxLevels: 5,
    enemyCount: [5, 7],
  },
  Normal: {
    goldMultiplier: 1.5,
    detectionMultiplier: 1.0,
    dropChanceMultiplier: 1.0,
    enemyStatMultiplier: 1.0,
    maxLevels: 10,
    enemyCount: [8, 11],
  },
  Hard: {
    goldMultiplier: 2.0,
    detectionMultiplier: 1.4,
    dropChanceMultiplier: 1.5,
    enemyStatMultiplier: 1.4,
    maxLevels: 15,
    enemyCount: [12, 15],
  },
  Death: {
    goldMultiplier: 3.0,
    detectionMultiplier: 1.8,
    dropChanceMultiplier: 2.5,
    enemyStatMultiplier: 2.0,
    maxLevels: 20,
    enemyCount: [15, 19],
  },
};

export function difficultyProfile(difficulty: Difficulty): DifficultyProfile {
  return DIFFICULTY_PROFILES[difficulty];
}
