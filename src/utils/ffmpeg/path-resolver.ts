/**
 * FFmpeg Path Resolver
 *
 * Resolves the encoder binary: the configured path when one is set,
 * otherwise the binary shipped with @ffmpeg-installer/ffmpeg.
 */

import * as fs from "fs";
import { createRequire } from "module";
import { z } from "zod";
import { ConfigError, toError } from "../../core/app-error";
import { logger } from "../logger";

const installerSchema = z.object({ path: z.string().min(1) });

const requireModule = createRequire(import.meta.url);

/**
 * Path of the bundled FFmpeg binary
 */
export function getBundledFFmpegPath(): string {
  try {
    return installerSchema.parse(requireModule("@ffmpeg-installer/ffmpeg")).path;
  } catch (error) {
    throw new ConfigError("Bundled FFmpeg binary is not available", toError(error));
  }
}

/**
 * Resolve and check the encoder path. Fails when it is not a file.
 */
export function resolveFFmpegPath(configured: string): string {
  const ffmpegPath = configured.length > 0 ? configured : getBundledFFmpegPath();

  let isFile = false;
  try {
    isFile = fs.statSync(ffmpegPath).isFile();
  } catch (error) {
    throw new ConfigError(`FFmpeg not found at ${ffmpegPath}`, toError(error), {
      path: ffmpegPath,
    });
  }

  if (!isFile) {
    throw new ConfigError(`FFmpeg path is not a file: ${ffmpegPath}`, undefined, {
      path: ffmpegPath,
    });
  }

  logger.debug("FFmpeg resolved", { path: ffmpegPath, bundled: configured.length === 0 });
  return ffmpegPath;
}
