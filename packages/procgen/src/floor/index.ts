export * from "./appearance";
export * from "./floor";
export * from "./generate";
