/**
 * Core module - grid primitives and search algorithms.
 */

export * from "./algorithms/union-find";
export * from "./data-structures";
export * from "./geometry";
export * from "./grid";
export * from "./pathfinding";
