import { SKILL_PATHS, type SkillPath } from "@crawl/contracts";

export interface StatBonus {
  readonly health: number;
  readonly damage: number;
  readonly speed: number;
}

export const NO_BONUS: StatBonus = { health: 1, damage: 1, speed: 1 };

export const PATH_DESCRIPTIONS: Readonly<Record<SkillPath, string>> = {
  Warrior: "Increase maximum health by 15% per level",
  Mage: "Increase attack damage by 20% per level",
  Rogue: "Increase movement speed by 25% per level",
  Balanced: "Increase all stats by 8% per level",
};

export function pathCost(level: number): number {
  return 100 + level * 50;
}

/** Warrior, Mage and Rogue exclude one another; Balanced mixes with all */
export function pathsConflict(a: SkillPath, b: SkillPath): boolean {
  if (a === b || a === "Balanced" || b === "Balanced") return false;
  return true;
}

export function pathBonus(path: SkillPath, level: number): StatBonus {
  if (level <= 0) return NO_BONUS;
  switch (path) {
    case "Warrior":
      return { health: 1 + 0.15 * level, damage: 1, speed: 1 };
    case "Mage":
      return { health: 1, damage: 1 + 0.2 * level, speed: 1 };
    case "Rogue":
      return { health: 1, damage: 1, speed: 1 + 0.25 * level };
    case "Balanced": {
      const m = 1 + 0.08 * level;
      return { health: m, damage: m, speed: m };
    }
  }
}

export type SkillLevels = Record<SkillPath, number>;

export interface PurchaseResult {
  readonly purchased: boolean;
  /** Gold left after the purchase (unchanged when refused) */
  readonly gold: number;
}

/**
 * Gold-bought stat paths. The first path bought becomes the chosen path
 * and blocks the paths it conflicts with.
 *
 * @example
 * const tree = new SkillTree();
 * tree.purchase("Warrior", 150); // { purchased: true, gold: 50 }
 * tree.purchase("Mage", 500).purchased; // false
 */
export class SkillTree {
  private readonly levels: SkillLevels = { Warrior: 0, Mage: 0, Rogue: 0, Balanced: 0 };
  private chosen: SkillPath | undefined;

  constructor(levels?: Partial<SkillLevels>, chosenPath?: SkillPath) {
    for (const path of SKILL_PATHS) {
      this.levels[path] = Math.max(0, Math.floor(levels?.[path] ?? 0));
    }
    this.chosen = chosenPath;
  }

  get chosenPath(): SkillPath | undefined {
    return this.chosen;
  }

  level(path: SkillPath): number {
    return this.levels[path];
  }

  snapshot(): SkillLevels {
    return { ...this.levels };
  }

  nextCost(path: SkillPath): number {
    return pathCost(this.levels[path]);
  }

  isBlocked(path: SkillPath): boolean {
    return this.chosen !== undefined && pathsConflict(path, this.chosen);
  }

  availablePaths(): SkillPath[] {
    return SKILL_PATHS.filter((path) => !this.isBlocked(path));
  }

  purchase(path: SkillPath, gold: number): PurchaseResult {
    const cost = this.nextCost(path);
    if (this.isBlocked(path) || gold < cost) {
      return { purchased: false, gold };
    }
    this.levels[path] += 1;
    this.chosen ??= path;
    return { purchased: true, gold: gold - cost };
  }

  /** Product of every purchased path's bonus */
  totalBonus(): StatBonus {
    let health = 1;
    let damage = 1;
    let speed = 1;
    for (const path of SKILL_PATHS) {
      const bonus = pathBonus(path, this.levels[path]);
      health *= bonus.health;
      damage *= bonus.damage;
      speed *= bonus.speed;
    }
    return { health, damage, speed };
  }
}
