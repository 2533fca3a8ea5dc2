/**
 * A run condition decides whether a system executes this tick.
 */
export type RunCondition<C> = (ctx: C) => boolean;

/**
 * A condition that can be chained with others.
 */
export interface Condition<C> {
  (ctx: C): boolean;

  /** Both must hold; `other` is skipped when this one fails */
  and(other: Condition<C> | RunCondition<C>): Condition<C>;
}

/**
 * Wrap a predicate. The predicate itself is left untouched.
 */
export function condition<C>(predicate: RunCondition<C>): Condition<C> {
  const fn = ((ctx: C) => predicate(ctx)) as Condition<C>;
  fn.and = (other) => condition((ctx: C) => fn(ctx) && other(ctx));
  return fn;
}

export function isCondition<C>(cond: Condition<C> | RunCondition<C>): cond is Condition<C> {
  return "and" in cond && typeof cond.and === "function";
}
