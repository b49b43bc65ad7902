/**
 * Config and level schema unit tests
 */

import { describe, expect, it } from "vitest";
import {
  GenerationConfigSchema,
  LevelRecordSchema,
  LevelTextSchema,
  resolveGenerationConfig,
  resolveSeed,
  SolutionSchema,
} from "../src";

describe("GenerationConfigSchema", () => {
  it("fills every default from an empty object", () => {
    const res = GenerationConfigSchema.safeParse({});
    expect(res.success).toBe(true);
    if (!res.success) return;
    expect(res.data).toEqual({
      rows: [7, 10],
      cols: [7, 10],
      boxes: [1, 3],
      complexity: [0.1, 0.3],
      steps: [15, 30],
      minSteps: 10,
      maxAttempts: 100,
      solverIterations: 100_000,
    });
  });

  it("rejects inverted ranges", () => {
    const res = GenerationConfigSchema.safeParse({ rows: [9, 7] });
    expect(res.success).toBe(false);
  });

  it("rejects a minimum step count above the step range", () => {
    const res = GenerationConfigSchema.safeParse({ steps: [5, 8], minSteps: 10 });
    expect(res.success).toBe(false);
  });

  it("rejects more boxes than the smallest grid can hold", () => {
    const res = GenerationConfigSchema.safeParse({
      rows: [5, 5],
      cols: [5, 5],
      boxes: [9, 9],
    });
    expect(res.success).toBe(false);
  });
});

describe("resolveGenerationConfig", () => {
  it("returns CONFIG_INVALID with issue paths", () => {
    const result = resolveGenerationConfig({ maxAttempts: 0 });
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("CONFIG_INVALID");
    expect(result.error.details?.issues).toEqual([
      expect.objectContaining({ path: "maxAttempts" }),
    ]);
  });

  it("keeps explicit values", () => {
    const config = resolveGenerationConfig({ boxes: [2, 2] }).getOrThrow();
    expect(config.boxes).toEqual([2, 2]);
    expect(config.rows).toEqual([7, 10]);
  });
});

describe("resolveSeed", () => {
  it("accepts uint32 values", () => {
    expect(resolveSeed(0xffffffff).value).toBe(0xffffffff);
  });

  it("rejects negative and fractional seeds", () => {
    expect(resolveSeed(-1).error.code).toBe("SEED_INVALID");
    expect(resolveSeed(1.5).error.code).toBe("SEED_INVALID");
  });
});

describe("level schemas", () => {
  it("accepts the standard alphabet", () => {
    expect(LevelTextSchema.safeParse("#####\n#@$.#\n#####").success).toBe(true);
  });

  it("rejects unknown symbols and blank text", () => {
    expect(LevelTextSchema.safeParse("#x#").success).toBe(false);
    expect(LevelTextSchema.safeParse("   \n").success).toBe(false);
  });

  it("validates solutions and level records", () => {
    expect(SolutionSchema.safeParse(["U", "R"]).success).toBe(true);
    expect(SolutionSchema.safeParse(["N"]).success).toBe(false);
    expect(
      LevelRecordSchema.safeParse({ text: "#@$.#", solution: ["R"] }).success,
    ).toBe(true);
  });
});
