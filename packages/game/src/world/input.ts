import { KEY_ACTIONS, type KeyAction } from "@crawl/contracts";
import type { Direction } from "@crawl/procgen";

/**
 * A decoded player intent. Slots are 0-based.
 */
export type InputEvent =
  | { readonly type: "move"; readonly direction: Direction }
  | { readonly type: "attack" }
  | { readonly type: "dash" }
  | { readonly type: "block" }
  | { readonly type: "useConsumable"; readonly slot: number }
  | { readonly type: "switchWeapon"; readonly slot: number }
  | { readonly type: "ultimate" }
  | { readonly type: "toggleInventory" }
  | { readonly type: "pause" };

export type InputType = InputEvent["type"];

/** Input kinds still honoured while the run is paused */
export const PAUSED_INPUTS: ReadonlySet<InputType> = new Set(["pause", "toggleInventory"]);

/**
 * Inputs waiting for the next tick, in arrival order.
 */
export class InputQueue {
  private pending: InputEvent[] = [];

  push(input: InputEvent): void {
    this.pending.push(input);
  }

  /** Take every pending input, leaving the queue empty */
  drain(): InputEvent[] {
    const inputs = this.pending;
    this.pending = [];
    return inputs;
  }

  get size(): number {
    return this.pending.length;
  }

  clear(): void {
    this.pending = [];
  }
}

const ACTION_INPUTS: Partial<Record<KeyAction, InputEvent>> = {
  moveUp: { type: "move", direction: { dx: 0, dy: -1 } },
  moveDown: { type: "move", direction: { dx: 0, dy: 1 } },
  moveLeft: { type: "move", direction: { dx: -1, dy: 0 } },
  moveRight: { type: "move", direction: { dx: 1, dy: 0 } },
  attack: { type: "attack" },
  dash: { type: "dash" },
  block: { type: "block" },
  specialItem: { type: "ultimate" },
  toggleInventory: { type: "toggleInventory" },
  pause: { type: "pause" },
};

/**
 * Map a key name to an input using the player's bindings. Digits 1-9
 * select weapon slots. Unbound keys give undefined.
 *
 * @example
 * inputForKey("W", DEFAULT_KEYBINDINGS); // { type: "move", direction: { dx: 0, dy: -1 } }
 * inputForKey("3", DEFAULT_KEYBINDINGS); // { type: "switchWeapon", slot: 2 }
 */
export function inputForKey(
  key: string,
  bindings: Readonly<Record<KeyAction, string>>,
): InputEvent | undefined {
  if (/^[1-9]$/.test(key)) {
    return { type: "switchWeapon", slot: Number(key) - 1 };
  }

  for (const action of KEY_ACTIONS) {
    const input = ACTION_INPUTS[action];
    if (input && bindings[action] === key) {
      return input;
    }
  }
  return undefined;
}
