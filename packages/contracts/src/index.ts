export * from "./random/seeded-random";
export * from "./schemas/floor";
export * from "./schemas/save";
export * from "./schemas/settings";
export * from "./types/difficulty";
export * from "./types/error";
export * from "./types/kinds";
export * from "./types/result";
