import { z } from "zod";

export const DirectionSchema = z.enum(["U", "D", "L", "R"]);

export const SolutionSchema = z.array(DirectionSchema);

/**
 * Level text in the common `#$.@*+` notation, one row per line.
 */
export const LevelTextSchema = z
  .string()
  .regex(/^[#@+$*. \r\n]*$/, {
    message: "Level text may only contain # @ + $ * . space and newlines",
  })
  .refine((text) => text.trim().length > 0, {
    message: "Level text cannot be empty",
  });

/**
 * A level as exchanged with collaborators: its text and a known solution.
 */
export const LevelRecordSchema = z.object({
  text: LevelTextSchema,
  solution: SolutionSchema,
});

export type LevelRecord = z.infer<typeof LevelRecordSchema>;
