/**
 * Frame Metadata
 *
 * Per-directory sidecar (frame_metadata.csv) recording the pixel size of
 * every frame. Rows are appended during capture, or the whole file is
 * rebuilt from the frames when it is missing.
 */

import * as fs from "fs/promises";
import * as path from "path";
import sharp from "sharp";
import { z } from "zod";
import {
  FRAMES,
  SHOT_DIR_FILES,
  type FrameDimensions,
  type FrameMetadata,
  type FrameRecord,
} from "@ompd/types";
import { MetadataError, NoFramesError, toError } from "../../core/app-error";
import { logger } from "../../utils/logger";
import { decompressFile } from "./compression";
import { isNotFound, parseFrameIndex } from "./shot-paths";

export interface FrameFile {
  index: number;
  name: string;
  path: string;
}

const dimension = z.coerce.number().int().nonnegative();

const rowSchema = z.tuple([dimension, dimension, dimension]);

export function metadataPath(dir: string): string {
  return path.join(dir, SHOT_DIR_FILES.METADATA);
}

/**
 * Regular frame files in a directory, sorted by index. Symlinked filler
 * references are left out.
 */
export async function listFrameFiles(dir: string, extension: string): Promise<FrameFile[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const frames: FrameFile[] = [];

  for (const entry of entries) {
    if (entry.isSymbolicLink() || !entry.isFile()) {
      continue;
    }
    const index = parseFrameIndex(entry.name, extension);
    if (index !== null) {
      frames.push({ index, name: entry.name, path: path.join(dir, entry.name) });
    }
  }

  return frames.sort((a, b) => a.index - b.index);
}

function formatRow(record: FrameRecord): string {
  return `${record.frame},${record.width},${record.height}`;
}

/**
 * Rebuild the sidecar from the frame files on disk
 */
export async function generateMetadata(dir: string, extension: string): Promise<FrameMetadata> {
  const files = await listFrameFiles(dir, extension);
  if (files.length === 0) {
    throw new NoFramesError(dir, extension);
  }

  logger.info(`Generating metadata from ${files.length} frames`, { dir });

  const frames: FrameRecord[] = [];
  for (const file of files) {
    try {
      const { width, height } = await sharp(file.path).metadata();
      if (width === undefined || height === undefined) {
        logger.warn("Frame has no dimensions", { path: file.path });
        continue;
      }
      frames.push({ frame: file.index, width, height });
    } catch (error) {
      logger.warn("Failed to read frame dimensions", {
        path: file.path,
        error: toError(error).message,
      });
    }
  }

  const lines = [SHOT_DIR_FILES.METADATA_HEADER, ...frames.map(formatRow)];
  await fs.writeFile(metadataPath(dir), `${lines.join("\n")}\n`, "utf8");

  if (frames.length > 0) {
    const widths = frames.map((f) => f.width);
    const heights = frames.map((f) => f.height);
    const minW = Math.min(...widths);
    const minH = Math.min(...heights);

    if (minW < FRAMES.MIN_WIDTH || minH < FRAMES.MIN_HEIGHT) {
      logger.error(`Unusually small frame dimensions detected: ${minW}x${minH}`, { dir });
    }
    logger.info(
      `Detected dimensions range: ${minW}x${minH} to ${Math.max(...widths)}x${Math.max(...heights)}`
    );
  }

  return { frames };
}

/**
 * Parse an existing sidecar
 */
export async function readMetadataFromCsv(csvPath: string): Promise<FrameMetadata> {
  let content: string;
  try {
    content = await fs.readFile(csvPath, "utf8");
  } catch (error) {
    throw new MetadataError("Failed to read frame metadata", toError(error), { path: csvPath });
  }

  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const frames: FrameRecord[] = [];

  lines.forEach((line, lineIndex) => {
    if (lineIndex === 0 && line.trim() === SHOT_DIR_FILES.METADATA_HEADER) {
      return;
    }
    const parsed = rowSchema.safeParse(line.split(",").map((cell) => cell.trim()));
    if (!parsed.success) {
      throw new MetadataError(`Malformed frame metadata row ${lineIndex + 1}`, undefined, {
        path: csvPath,
        line,
      });
    }
    const [frame, width, height] = parsed.data;
    frames.push({ frame, width, height });
  });

  return { frames };
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Read the sidecar, restoring it from its compressed sibling first if
 * that is all there is, or regenerate it from the frames
 */
export async function getOrGenerateMetadata(
  dir: string,
  extension: string,
  compressedExt: string
): Promise<FrameMetadata> {
  const csvPath = metadataPath(dir);

  if (await exists(csvPath)) {
    return readMetadataFromCsv(csvPath);
  }

  const compressedPath = `${csvPath}.${compressedExt}`;
  if (await exists(compressedPath)) {
    await decompressFile(compressedPath, csvPath);
    return readMetadataFromCsv(csvPath);
  }

  return generateMetadata(dir, extension);
}

export async function hasMetadata(dir: string): Promise<boolean> {
  return exists(metadataPath(dir));
}

/**
 * Append one row, writing the header first when the sidecar is new
 */
export async function appendFrameRecord(dir: string, record: FrameRecord): Promise<void> {
  await appendFrameRecords(dir, [record]);
}

export async function appendFrameRecords(dir: string, records: FrameRecord[]): Promise<void> {
  if (records.length === 0) {
    return;
  }
  const csvPath = metadataPath(dir);
  const needsHeader = !(await exists(csvPath));
  const rows = records.map(formatRow);
  const lines = needsHeader ? [SHOT_DIR_FILES.METADATA_HEADER, ...rows] : rows;
  await fs.appendFile(csvPath, `${lines.join("\n")}\n`, "utf8");
}

/**
 * Replace the sidecar with `records`, ordered by frame number
 */
export async function writeFrameRecords(dir: string, records: FrameRecord[]): Promise<void> {
  const sorted = [...records].sort((a, b) => a.frame - b.frame);
  const lines = [SHOT_DIR_FILES.METADATA_HEADER, ...sorted.map(formatRow)];
  await fs.writeFile(metadataPath(dir), `${lines.join("\n")}\n`, "utf8");
}

/**
 * Size of the last frame recorded in a directory, or null with no rows
 */
export async function readLastFrameDimensions(dir: string): Promise<FrameDimensions | null> {
  const csvPath = metadataPath(dir);
  if (!(await exists(csvPath))) {
    return null;
  }
  const { frames } = await readMetadataFromCsv(csvPath);
  const last = frames.at(-1);
  return last ? { width: last.width, height: last.height } : null;
}
