/**
 * Shared settings for the generate and validate tasks.
 * Both scripts run with these defaults; tests override them per call.
 */

import { z } from "zod";
import { DEFAULT_PREFIX } from "./theme/generator";

export const DEFAULT_OUTPUT_DIR = "assets/themes";

export const ConfigSchema = z.object({
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR).describe("Directory holding theme files"),
  prefix: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/, "Prefix must be a lowercase slug")
    .default(DEFAULT_PREFIX)
    .describe("Theme id and file name prefix"),
});

export type Config = z.infer<typeof ConfigSchema>;
