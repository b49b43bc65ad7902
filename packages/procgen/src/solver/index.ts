export * from "./bfs";
