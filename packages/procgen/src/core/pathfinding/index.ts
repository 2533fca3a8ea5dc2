/**
 * Pathfinding Module
 */

export * from "./astar";
export * from "./path-cache";
