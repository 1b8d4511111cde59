import { z } from "zod";

/**
 * Validation schemas for the YAML configuration and CLI input.
 */

export const MalformedLinePolicySchema = z.enum(["abort", "skip"]);

export const ConfigSchema = z.object({
  logging: z.object({
    dir: z.string().min(1, "logging.dir is required"),
    fileName: z.string().min(1, "logging.fileName is required"),
  }),
  analysis: z.object({
    recentWindowMinutes: z.coerce
      .number()
      .int()
      .positive("recentWindowMinutes must be a positive integer"),
    onMalformed: MalformedLinePolicySchema.default("abort"),
  }),
  export: z.object({
    level: z
      .string()
      .min(1, "export.level is required")
      .refine((v) => !/[\]\n]/.test(v), "export.level must not contain ] or a newline"),
    outputDir: z.string().min(1, "export.outputDir is required"),
    fileName: z.string().min(1, "export.fileName is required"),
  }),
  demo: z.object({
    workDir: z.string().min(1, "demo.workDir is required"),
  }),
});

export const WindowMinutesSchema = z.coerce
  .number()
  .int()
  .positive("--window-minutes must be a positive integer");
