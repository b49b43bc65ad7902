export * from "./bank";
export * from "./levels";
