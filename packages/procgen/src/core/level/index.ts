export { parseLevel, serializeLevel } from "./codec";
