/**
 * Generators module - floor generation algorithms.
 */

export * from "./cellular";
