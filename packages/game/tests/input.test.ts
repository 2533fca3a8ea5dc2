import { describe, expect, it } from "vitest";
import { DEFAULT_KEYBINDINGS } from "@crawl/contracts";
import { InputQueue, inputForKey } from "../src/world/input";

describe("inputForKey", () => {
  it("maps the default bindings", () => {
    expect(inputForKey("W", DEFAULT_KEYBINDINGS)).toEqual({
      type: "move",
      direction: { dx: 0, dy: -1 },
    });
    expect(inputForKey("D", DEFAULT_KEYBINDINGS)).toEqual({
      type: "move",
      direction: { dx: 1, dy: 0 },
    });
    expect(inputForKey("LeftClick", DEFAULT_KEYBINDINGS)).toEqual({ type: "attack" });
    expect(inputForKey("RightClick", DEFAULT_KEYBINDINGS)).toEqual({ type: "block" });
    expect(inputForKey("Space", DEFAULT_KEYBINDINGS)).toEqual({ type: "dash" });
    expect(inputForKey("Q", DEFAULT_KEYBINDINGS)).toEqual({ type: "ultimate" });
    expect(inputForKey("P", DEFAULT_KEYBINDINGS)).toEqual({ type: "pause" });
    expect(inputForKey("C", DEFAULT_KEYBINDINGS)).toEqual({ type: "toggleInventory" });
  });

  it("selects weapon slots with digits", () => {
    expect(inputForKey("1", DEFAULT_KEYBINDINGS)).toEqual({ type: "switchWeapon", slot: 0 });
    expect(inputForKey("3", DEFAULT_KEYBINDINGS)).toEqual({ type: "switchWeapon", slot: 2 });
    expect(inputForKey("0", DEFAULT_KEYBINDINGS)).toBeUndefined();
  });

  it("ignores unbound keys and menu-only actions", () => {
    expect(inputForKey("Z", DEFAULT_KEYBINDINGS)).toBeUndefined();
    expect(inputForKey("Up", DEFAULT_KEYBINDINGS)).toBeUndefined();
    expect(inputForKey("Return", DEFAULT_KEYBINDINGS)).toBeUndefined();
  });

  it("follows rebound keys", () => {
    const bindings = { ...DEFAULT_KEYBINDINGS, moveUp: "I" };
    expect(inputForKey("I", bindings)).toEqual({ type: "move", direction: { dx: 0, dy: -1 } });
    expect(inputForKey("W", bindings)).toBeUndefined();
  });
});

describe("InputQueue", () => {
  it("drains in arrival order", () => {
    const queue = new InputQueue();
    queue.push({ type: "attack" });
    queue.push({ type: "dash" });
    expect(queue.size).toBe(2);
    expect(queue.drain()).toEqual([{ type: "attack" }, { type: "dash" }]);
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });
});
