export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/generation";
export * from "./schemas/level";
export * from "./schemas/seed";
export * from "./types/error";
export * from "./types/puzzle";
export * from "./types/result";
export * from "./utils/builder";
