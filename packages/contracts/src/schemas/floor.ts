import { z } from "zod";

export const FLOOR_DEFAULTS = {
  width: 180,
  height: 60,
  seed: 12345,
  fillProbability: 0.45,
  iterations: 5,
  bigAreaCutoff: 3,
} as const;

export const FloorConfigSchema = z
  .object({
    width: z.number().int().min(1).max(4096).default(FLOOR_DEFAULTS.width),
    height: z.number().int().min(1).max(4096).default(FLOOR_DEFAULTS.height),
    seed: z.number().int().min(0).default(FLOOR_DEFAULTS.seed),
    fillProbability: z
      .number()
      .min(0, { message: "fillProbability must be within [0, 1]" })
      .max(1, { message: "fillProbability must be within [0, 1]" })
      .default(FLOOR_DEFAULTS.fillProbability),
    iterations: z.number().int().min(0).max(64).default(FLOOR_DEFAULTS.iterations),
    bigAreaCutoff: z
      .number()
      .int()
      .min(0)
      .default(FLOOR_DEFAULTS.bigAreaCutoff),
    trace: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    if (config.bigAreaCutoff > config.iterations) {
      ctx.addIssue({
        code: "custom",
        message: "bigAreaCutoff cannot exceed iterations",
        path: ["bigAreaCutoff"],
      });
    }
  });

export type FloorConfigInput = z.input<typeof FloorConfigSchema>;
export type FloorConfig = z.output<typeof FloorConfigSchema>;
