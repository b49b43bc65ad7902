import type { z } from "zod";
import {
  type GenerationConfig,
  GenerationConfigSchema,
} from "../schemas/generation";
import { SeedSchema } from "../schemas/seed";
import { PuzzleError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

function describeIssues(issues: z.ZodError["issues"]): {
  message: string;
  issues: Array<{ path: string; message: string }>;
} {
  const flat = issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
  const message = flat
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");
  return { message, issues: flat };
}

/**
 * Validate generation settings and fill in defaults.
 *
 * @example
 * ```typescript
 * const config = resolveGenerationConfig({ boxes: [2, 2] }).getOrThrow();
 * config.rows; // [7, 10]
 * ```
 */
export function resolveGenerationConfig(
  input: unknown = {},
): Result<GenerationConfig, PuzzleError> {
  const parsed = GenerationConfigSchema.safeParse(input);
  if (!parsed.success) {
    const { message, issues } = describeIssues(parsed.error.issues);
    return Err(
      PuzzleError.configInvalid(`Invalid generation config: ${message}`, {
        issues,
      }),
    );
  }
  return Ok(parsed.data);
}

export function resolveSeed(input: unknown): Result<number, PuzzleError> {
  const parsed = SeedSchema.safeParse(input);
  if (!parsed.success) {
    const { message } = describeIssues(parsed.error.issues);
    return Err(
      new PuzzleError("SEED_INVALID", `Invalid seed: ${message}`, {
        seed: input,
      }),
    );
  }
  return Ok(parsed.data);
}
