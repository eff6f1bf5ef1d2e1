/**
 * Configuration Validation Schema
 *
 * Zod schema the stored settings are checked against before anything starts.
 */

import { z } from "zod";
import { SHOT_FORMATS, type ShotFormat } from "@ompd/types";

const isShotFormat = (value: string): value is ShotFormat =>
  SHOT_FORMATS.some((format) => format === value);

const shotFormatSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .refine(isShotFormat, {
    message: `Shot type must be one of: ${SHOT_FORMATS.join(", ")}`,
  });

/**
 * File extension without the leading dot
 */
const extensionSchema = z
  .string()
  .min(1, "Extension cannot be empty")
  .regex(/^[a-z0-9]+$/i, "Extension must be alphanumeric");

const directorySchema = z.string().min(1, "Directory cannot be empty");

export const configSchema = z.object({
  interval: z.number().int().positive(),
  maxSleepSecs: z.number().positive("Max sleep must be greater than 0"),
  shotOutputDir: directorySchema,
  vidOutputDir: directorySchema,
  logDir: directorySchema,
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  ffmpeg: z.string(),
  handleOldDirsOnStartup: z.boolean(),
  shotType: shotFormatSchema,
  videoType: extensionSchema,
  vidScaleFactor: z.number().positive("Scale factor must be greater than 0"),
  keepShotsDays: z.number().int().nonnegative().nullable(),
  compressShots: z.boolean(),
  compressedExt: extensionSchema,
  dailyCaptureHours: z.number().positive().max(24),
  targetVideoSeconds: z.number().positive(),
});
