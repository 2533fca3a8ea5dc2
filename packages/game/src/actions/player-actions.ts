import { isZeroDirection, type Direction } from "@crawl/procgen";
import { DamageType, patternDamageType } from "../combat/damage";
import { PLAYER_ID } from "../core/events";
import { BLOCK_WINDOW, FIRE_OIL_DAMAGE } from "../constants";
import { CONSUMABLE_INFO } from "../items/consumables";
import { enchantedPattern, isBow } from "../items/weapons";
import { ActiveAnimation } from "../patterns/animation";
import {
  animationFrames,
  DEFAULT_FACING,
  Pattern,
  patternCategory,
  patternKnockback,
} from "../patterns/pattern";
import { Projectile } from "../projectiles/projectile";
import { ULTIMATE_PROFILES } from "../progression/ultimate";
import { poisonImmunity } from "../status/effects";
import type { World } from "../world/world";

/** Antitoxin immunity window in seconds */
export const ANTITOXIN_IMMUNITY_SECONDS = 5;

/** Last move direction, or straight down before the first move */
export function facing(world: World): Direction {
  const direction = world.player.lastDirection;
  return isZeroDirection(direction) ? DEFAULT_FACING : direction;
}

/**
 * Swing or shoot the current weapon. Bows fire an arrow on the bow
 * cooldown; everything else plays its pattern on the attack cooldown.
 * Without a weapon the player punches with a basic slash.
 */
export function attack(world: World): boolean {
  const player = world.player;
  if (player.isStunned()) return false;

  const weapon = player.currentWeapon();
  const direction = facing(world);
  const damage = player.effectiveAttackDamage();

  if (weapon && isBow(weapon)) {
    const cooldown = player.cooldowns.bow;
    if (!cooldown.isReady()) return false;
    cooldown.setDuration(weapon.cooldown);
    cooldown.trigger();
    world.projectiles.push(
      new Projectile({
        kind: "Arrow",
        origin: player.position,
        direction,
        owner: PLAYER_ID,
        damage,
        damageType: DamageType.PHYSICAL,
        spawnTime: world.clock.now(),
      }),
    );
    world.playerHasActed = true;
    return true;
  }

  const cooldown = player.cooldowns.attack;
  if (!cooldown.isReady()) return false;
  if (weapon) cooldown.setDuration(weapon.cooldown);
  cooldown.trigger();

  const pattern = weapon ? enchantedPattern(weapon) : Pattern.basicSlash();
  world.animations.push(
    new ActiveAnimation(
      animationFrames(pattern, player.position, direction),
      patternCategory(pattern),
      {
        owner: PLAYER_ID,
        damage,
        damageType: patternDamageType(pattern),
        knockback: patternKnockback(pattern),
        origin: player.position,
      },
    ),
  );
  world.playerHasActed = true;
  return true;
}

/** Halve the next enemy hit taken within the block window */
export function block(world: World): boolean {
  const player = world.player;
  if (player.isStunned() || !player.cooldowns.block.isReady()) return false;
  player.cooldowns.block.trigger();
  player.blockUntil = world.clock.now() + BLOCK_WINDOW;
  return true;
}

function healPlayer(world: World, amount: number): void {
  const healed = world.player.heal(amount);
  if (healed > 0) {
    world.events.emit({ type: "combat.heal", entity: PLAYER_ID, amount: healed });
  }
}

function removePlayerStatus(world: World, kind: "Bleed" | "Poison"): void {
  if (world.player.status.remove(kind)) {
    world.events.emit({ type: "status.removed", entity: PLAYER_ID, status: kind });
  }
}

/**
 * Use one item from a consumable slot. Empty slots are ignored.
 */
export function useConsumable(world: World, slot: number): boolean {
  const player = world.player;
  const kind = player.consumables.use(slot);
  if (kind === undefined) return false;

  switch (kind) {
    case "WeakHealingDraught":
      healPlayer(world, 10);
      break;
    case "BandageRoll":
      healPlayer(world, 6);
      removePlayerStatus(world, "Bleed");
      break;
    case "AntitoxinVial": {
      removePlayerStatus(world, "Poison");
      const immunity = poisonImmunity(ANTITOXIN_IMMUNITY_SECONDS);
      player.status.add(immunity);
      world.events.emit({
        type: "status.applied",
        entity: PLAYER_ID,
        status: immunity.kind,
        duration: immunity.duration,
      });
      break;
    }
    case "FireOilFlask":
      world.projectiles.push(
        new Projectile({
          kind: "FireOil",
          origin: player.position,
          direction: facing(world),
          owner: PLAYER_ID,
          damage: FIRE_OIL_DAMAGE,
          damageType: DamageType.FIRE,
          spawnTime: world.clock.now(),
        }),
      );
      break;
    case "BlessedBread":
      healPlayer(world, 8);
      break;
  }

  world.events.emit({ type: "item.use", itemName: CONSUMABLE_INFO[kind].name });
  return true;
}

export function switchWeapon(world: World, slot: number): boolean {
  const weapons = world.player.weapons;
  if (!weapons.switchTo(slot)) return false;
  const current = weapons.current();
  if (current) {
    world.events.emit({ type: "weapon.switched", slot, weaponName: current.name });
  }
  return true;
}

/**
 * Spend a full ultimate meter. Shockwave lands at once as a fire disk
 * around the player; Rage and Ghost run as timed effects.
 */
export function activateUltimate(world: World): boolean {
  const player = world.player;
  if (player.isStunned() || !player.ultimate.activate()) return false;

  const kind = player.ultimate.kind;
  world.events.emit({ type: "ultimate.used", ultimate: kind });

  if (kind === "Shockwave") {
    const profile = ULTIMATE_PROFILES.Shockwave;
    const pattern = Pattern.fireball(profile.radius);
    world.animations.push(
      new ActiveAnimation(
        animationFrames(pattern, player.position, facing(world)),
        patternCategory(pattern),
        {
          owner: PLAYER_ID,
          damage: profile.damage,
          damageType: DamageType.FIRE,
          knockback: 0,
          origin: player.position,
        },
      ),
    );
  }
  return true;
}
