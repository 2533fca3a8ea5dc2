import { CrawlError, Err, Ok, type Difficulty, type Result } from "@crawl/contracts";
import enemiesData from "./data/enemies.json";
import weaponsData from "./data/weapons.json";
import {
  EnemyCatalogSchema,
  WeaponCatalogSchema,
  type EnemyTemplate,
} from "./schema";
import type { ItemTier } from "../items/tiers";
import type { Weapon } from "../items/weapons";

/**
 * Validated content: enemy templates by difficulty and the weapon list.
 */
export interface Catalogs {
  readonly enemies: ReadonlyMap<string, EnemyTemplate>;
  readonly enemiesByDifficulty: Readonly<Record<Difficulty, readonly EnemyTemplate[]>>;
  readonly weapons: readonly Weapon[];
}

export interface EnemyCatalogData {
  readonly templates: ReadonlyMap<string, EnemyTemplate>;
  readonly byDifficulty: Readonly<Record<Difficulty, readonly EnemyTemplate[]>>;
}

export function parseEnemyCatalog(input: unknown): Result<EnemyCatalogData, CrawlError> {
  const parsed = EnemyCatalogSchema.safeParse(input);
  if (!parsed.success) {
    return Err(CrawlError.fromZod("CATALOG_INVALID", parsed.error));
  }

  const templates = new Map(parsed.data.templates.map((t) => [t.id, t] as const));
  const resolve = (ids: readonly string[]): EnemyTemplate[] =>
    ids.flatMap((id) => {
      const template = templates.get(id);
      return template ? [template] : [];
    });

  const lists = parsed.data.byDifficulty;
  return Ok({
    templates,
    byDifficulty: {
      Easy: resolve(lists.Easy),
      Normal: resolve(lists.Normal),
      Hard: resolve(lists.Hard),
      Death: resolve(lists.Death),
    },
  });
}

export function parseWeaponCatalog(input: unknown): Result<Weapon[], CrawlError> {
  const parsed = WeaponCatalogSchema.safeParse(input);
  if (!parsed.success) {
    return Err(CrawlError.fromZod("CATALOG_INVALID", parsed.error));
  }
  return Ok(parsed.data.weapons);
}

export function buildCatalogs(
  enemyInput: unknown,
  weaponInput: unknown,
): Result<Catalogs, CrawlError> {
  return parseEnemyCatalog(enemyInput).andThen((enemies) =>
    parseWeaponCatalog(weaponInput).map((weapons) => ({
      enemies: enemies.templates,
      enemiesByDifficulty: enemies.byDifficulty,
      weapons,
    })),
  );
}

let bundled: Catalogs | undefined;

/**
 * The catalogs shipped with the package, parsed once.
 *
 * @throws {CrawlError} If the bundled JSON is invalid
 */
export function defaultCatalogs(): Catalogs {
  bundled ??= buildCatalogs(enemiesData, weaponsData).getOrThrow();
  return bundled;
}

export function findWeapon(catalogs: Catalogs, name: string): Weapon | undefined {
  return catalogs.weapons.find((w) => w.name === name);
}

export function weaponsOfTier(catalogs: Catalogs, tier: ItemTier): Weapon[] {
  return catalogs.weapons.filter((w) => w.tier === tier);
}
