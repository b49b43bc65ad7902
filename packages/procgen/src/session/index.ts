export * from "./puzzle-session";
