export * from "./game-state";
export * from "./layout";
export * from "./moves";
