import { dash, movePlayer } from "../movement/player-movement";
import { PAUSED_INPUTS, type InputEvent } from "../world/input";
import type { World } from "../world/world";
import {
  activateUltimate,
  attack,
  block,
  switchWeapon,
  useConsumable,
} from "./player-actions";

function togglePause(world: World): void {
  if (world.status === "playing") {
    world.status = "paused";
  } else if (world.status === "paused") {
    world.status = "playing";
  } else {
    return;
  }
  world.events.emit({ type: "run.paused", paused: world.status === "paused" });
}

/**
 * Apply one input. While paused only pause and inventory toggles apply;
 * once the run has ended nothing does. Returns whether anything happened.
 */
export function applyInput(world: World, input: InputEvent): boolean {
  if (world.status === "dead" || world.status === "victory") return false;
  if (world.status === "paused" && !PAUSED_INPUTS.has(input.type)) return false;

  switch (input.type) {
    case "move":
      return movePlayer(world, input.direction);
    case "attack":
      return attack(world);
    case "dash":
      return dash(world);
    case "block":
      return block(world);
    case "useConsumable":
      return useConsumable(world, input.slot);
    case "switchWeapon":
      return switchWeapon(world, input.slot);
    case "ultimate":
      return activateUltimate(world);
    case "toggleInventory":
      world.inventoryOpen = !world.inventoryOpen;
      return true;
    case "pause":
      togglePause(world);
      return true;
  }
}
