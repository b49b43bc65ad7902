import { z } from "zod";

function intRange(label: string, min: number, max: number) {
  const bound = z.number().int(`${label} bounds must be integers`).min(min).max(max);
  return z
    .tuple([bound, bound])
    .refine(([lo, hi]) => lo <= hi, {
      message: `Minimum ${label} must be ≤ maximum ${label}`,
    });
}

const ComplexityRange = z
  .tuple([z.number().min(0).max(1), z.number().min(0).max(1)])
  .refine(([lo, hi]) => lo <= hi, {
    message: "Minimum complexity must be ≤ maximum complexity",
  });

/**
 * Generation settings. Every field has a default, so `{}` is a valid
 * input and yields the standard 7–10 square levels with 1–3 boxes.
 */
export const GenerationConfigSchema = z
  .object({
    rows: intRange("rows", 5, 64).default([7, 10]),
    cols: intRange("cols", 5, 64).default([7, 10]),
    boxes: intRange("boxes", 1, 16).default([1, 3]),
    complexity: ComplexityRange.default([0.1, 0.3]),
    steps: intRange("steps", 1, 1000).default([15, 30]),
    minSteps: z.number().int().min(0).default(10),
    maxAttempts: z.number().int().min(1).max(10_000).default(100),
    solverIterations: z.number().int().min(1).default(100_000),
  })
  .superRefine((data, ctx) => {
    if (data.minSteps > data.steps[1]) {
      ctx.addIssue({
        code: "custom",
        message: "Minimum step count exceeds the largest step target",
        path: ["minSteps"],
      });
    }
    // A box on every goal plus a free cell for the player
    const smallestInterior = (data.rows[0] - 2) * (data.cols[0] - 2);
    if (data.boxes[1] >= smallestInterior) {
      ctx.addIssue({
        code: "custom",
        message: "Too many boxes for the smallest grid",
        path: ["boxes"],
      });
    }
  });

export type GenerationConfig = z.output<typeof GenerationConfigSchema>;
export type GenerationConfigInput = z.input<typeof GenerationConfigSchema>;
