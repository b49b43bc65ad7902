/**
 * Data structures shared by the search code
 */

export { FastQueue } from "./fast-queue";
