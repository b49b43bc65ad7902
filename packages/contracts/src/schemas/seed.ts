import { z } from "zod";

const UINT32_MAX = 0xffffffff;

export const SeedSchema = z
  .number()
  .int({ message: "Seed must be an integer" })
  .min(0, { message: "Seed must be non-negative" })
  .max(UINT32_MAX, { message: "Seed must fit in uint32" });
