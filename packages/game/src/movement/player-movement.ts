import { isZeroDirection, type Direction, type Point } from "@crawl/procgen";
import { itemName } from "../items/drops";
import type { World } from "../world/world";

/** Walkable and free of blocking enemies */
export function playerCanEnter(world: World, target: Point): boolean {
  return (
    world.floor.isInBounds(target.x, target.y) &&
    world.floor.isWalkable(target.x, target.y) &&
    world.blockingEnemyAt(target) === undefined
  );
}

/**
 * Take every item on the player's tile. A weapon stays on the floor when
 * all weapon slots are taken.
 */
export function pickUpItems(world: World): void {
  const player = world.player;
  for (const item of world.itemsAt(player.position)) {
    const payload = item.payload;
    switch (payload.kind) {
      case "consumable":
        player.consumables.add(payload.consumable);
        break;
      case "gold":
        player.addGold(payload.amount);
        break;
      case "weapon":
        if (!world.giveWeapon(payload.weapon)) continue;
        break;
    }
    world.removeItem(item.id);
    world.events.emit({ type: "item.pickup", itemName: itemName(payload), quantity: 1 });
  }
}

function completeMove(world: World, target: Point): void {
  world.movePlayerTo(target);
  world.player.ticksSinceMove = 0;
  world.playerHasActed = true;
  pickUpItems(world);
}

/**
 * Step one tile. The facing updates on any non-zero attempt; a rejected
 * step leaves everything else untouched, the move gate included.
 */
export function movePlayer(world: World, direction: Direction): boolean {
  const player = world.player;
  if (isZeroDirection(direction)) return false;
  player.lastDirection = direction;

  if (player.isStunned() || !player.canMove()) return false;

  const target = {
    x: player.position.x + direction.dx,
    y: player.position.y + direction.dy,
  };
  if (!playerCanEnter(world, target)) return false;

  completeMove(world, target);
  return true;
}

/**
 * Teleport `dashDistance` tiles along the facing. Only the landing tile
 * is checked.
 */
export function dash(world: World): boolean {
  const player = world.player;
  if (!player.cooldowns.dash.isReady() || !player.canMove() || player.isStunned()) return false;
  if (isZeroDirection(player.lastDirection)) return false;

  const target = {
    x: player.position.x + player.lastDirection.dx * player.dashDistance,
    y: player.position.y + player.lastDirection.dy * player.dashDistance,
  };
  if (!playerCanEnter(world, target)) return false;

  completeMove(world, target);
  player.cooldowns.dash.trigger();
  return true;
}
