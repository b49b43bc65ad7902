export * from "./derivation";
