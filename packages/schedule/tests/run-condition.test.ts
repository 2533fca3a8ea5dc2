import { describe, expect, it } from "vitest";
import { condition, isCondition } from "../src";

interface Ctx {
  tick: number;
}

describe("run conditions", () => {
  const even = condition<Ctx>((ctx) => ctx.tick % 2 === 0);

  it("chains with and", () => {
    const evenPositive = even.and((ctx) => ctx.tick > 0);
    expect(evenPositive({ tick: 0 })).toBe(false);
    expect(evenPositive({ tick: 3 })).toBe(false);
    expect(evenPositive({ tick: 4 })).toBe(true);
  });

  it("skips the right-hand side once the left fails", () => {
    let calls = 0;
    const counted = (ctx: Ctx) => {
      calls++;
      return ctx.tick > 0;
    };
    even.and(counted)({ tick: 1 });
    expect(calls).toBe(0);
    even.and(counted)({ tick: 2 });
    expect(calls).toBe(1);
  });

  it("does not mutate the wrapped predicate", () => {
    const predicate = (ctx: Ctx) => ctx.tick > 0;
    condition(predicate);
    expect(isCondition(predicate)).toBe(false);
    expect(isCondition(condition(predicate))).toBe(true);
  });
});
