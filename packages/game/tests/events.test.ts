import { describe, expect, it } from "vitest";
import { EventQueue, type GameEvent } from "../src/core/events";
import { MemoryLogger, SilentLogger } from "../src/core/logger";

function queue(): EventQueue {
  return new EventQueue(new SilentLogger());
}

describe("EventQueue", () => {
  it("delivers in emission order", () => {
    const events = queue();
    const seen: string[] = [];
    events.onAny((event) => seen.push(event.type === "message" ? event.text : event.type));

    events.emit({ type: "message", text: "first" });
    events.emit({ type: "combat.heal", entity: 0, amount: 3 });
    events.emit({ type: "message", text: "second" });
    events.flush();

    expect(seen).toEqual(["first", "combat.heal", "second"]);
    expect(events.pendingCount).toBe(0);
  });

  it("runs typed handlers before onAny handlers", () => {
    const events = queue();
    const order: string[] = [];
    events.onAny(() => order.push("any"));
    events.on("run.paused", () => order.push("first"));
    events.on("run.paused", () => order.push("second"));

    events.emit({ type: "run.paused", paused: true });
    events.flush();
    expect(order).toEqual(["first", "second", "any"]);
  });

  it("holds events until flushed", () => {
    const events = queue();
    events.emit({ type: "item.use", itemName: "Blessed Bread" });
    events.emit({ type: "message", text: "crumbs" });

    expect(events.peek("item.use")).toEqual([{ type: "item.use", itemName: "Blessed Bread" }]);
    expect(events.pendingCount).toBe(2);
    events.flush();
    expect(events.peek("item.use")).toEqual([]);
  });

  it("delivers events emitted by handlers in the same flush", () => {
    const events = queue();
    const texts: string[] = [];
    events.on("combat.death", (event) => {
      events.emit({ type: "message", text: `${event.name} dies` });
    });
    events.on("message", (event) => texts.push(event.text));

    events.emit({ type: "combat.death", entity: 4, name: "Bog Rat", gold: 10 });
    events.flush();
    expect(texts).toEqual(["Bog Rat dies"]);
  });

  it("refuses to flush from inside a handler", () => {
    const events = queue();
    events.on("message", () => events.flush());
    events.emit({ type: "message", text: "x" });
    expect(() => events.flush()).toThrow("Cannot flush events from inside an event handler");
  });

  it("warns when handlers keep emitting past the pass limit", () => {
    const logger = new MemoryLogger();
    const events = new EventQueue(logger);
    events.on("message", () => events.emit({ type: "message", text: "again" }));

    events.emit({ type: "message", text: "start" });
    events.flush(3);
    expect(logger.messages("warn")).toEqual(["Events still pending after flush"]);
    expect(logger.entries[0]?.fields).toEqual({ maxPasses: 3, pending: 1 });
  });

  it("stops delivering after unsubscribe", () => {
    const events = queue();
    const seen: GameEvent[] = [];
    const off = events.on("item.use", (event) => seen.push(event));

    events.emit({ type: "item.use", itemName: "Blessed Bread" });
    events.flush();
    off();
    events.emit({ type: "item.use", itemName: "Blessed Bread" });
    events.flush();
    expect(seen).toHaveLength(1);
  });
});
