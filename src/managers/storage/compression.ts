/**
 * Shot Compression
 *
 * Per-file gzip of frames and the metadata sidecar. Each file is handled on
 * its own: one failure is logged and the rest still get processed.
 */

import { createReadStream, createWriteStream } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { pipeline } from "stream/promises";
import { createGzip, createGunzip } from "zlib";
import { SHOT_DIR_FILES, type CompressionSummary } from "@ompd/types";
import { toError } from "../../core/app-error";
import { logger } from "../../utils/logger";
import { isNotFound } from "./shot-paths";

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (error) {
    logger.warn("Failed to remove partial file", {
      path: filePath,
      error: toError(error).message,
    });
  }
}

export async function compressFile(source: string, target: string): Promise<void> {
  try {
    await pipeline(createReadStream(source), createGzip(), createWriteStream(target));
  } catch (error) {
    await removeQuietly(target);
    throw error;
  }
  await fs.unlink(source);
}

export async function decompressFile(source: string, target: string): Promise<void> {
  try {
    await pipeline(createReadStream(source), createGunzip(), createWriteStream(target));
  } catch (error) {
    await removeQuietly(target);
    throw error;
  }
  await fs.unlink(source);
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Replace every regular frame file (and the sidecar) with a compressed
 * sibling `<name>.<compressedExt>`
 */
export async function compressShotDir(
  dir: string,
  extension: string,
  compressedExt: string
): Promise<CompressionSummary> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const summary: CompressionSummary = { processed: 0, failed: [] };

  const targets = entries.filter(
    (entry) =>
      entry.isFile() &&
      (entry.name.endsWith(`.${extension}`) || entry.name === SHOT_DIR_FILES.METADATA)
  );

  for (const entry of targets) {
    const source = path.join(dir, entry.name);
    try {
      await compressFile(source, `${source}.${compressedExt}`);
      summary.processed += 1;
    } catch (error) {
      logger.warn("Failed to compress file", { path: source, error: toError(error).message });
      summary.failed.push(source);
    }
  }

  logger.debug("Compressed shot directory", { dir, processed: summary.processed });
  return summary;
}

/**
 * Restore every `<name>.<compressedExt>` file. When the plain file already
 * exists it wins and the compressed copy is dropped.
 */
export async function decompressShotDir(
  dir: string,
  compressedExt: string
): Promise<CompressionSummary> {
  const suffix = `.${compressedExt}`;
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const summary: CompressionSummary = { processed: 0, failed: [] };

  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.endsWith(suffix)) {
      continue;
    }
    const source = path.join(dir, entry.name);
    const target = source.slice(0, -suffix.length);

    try {
      if (await pathExists(target)) {
        await fs.unlink(source);
      } else {
        await decompressFile(source, target);
      }
      summary.processed += 1;
    } catch (error) {
      logger.warn("Failed to decompress file", { path: source, error: toError(error).message });
      summary.failed.push(source);
    }
  }

  if (summary.processed > 0) {
    logger.debug("Decompressed shot directory", { dir, processed: summary.processed });
  }
  return summary;
}
