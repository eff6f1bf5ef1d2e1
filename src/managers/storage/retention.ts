/**
 * Retention
 *
 * Deletes old shot directories once their video exists, keeping the most
 * recent N finished days. Today's directory is never touched.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { ShotDate, ShotDirectory } from "@ompd/types";
import { toError } from "../../core/app-error";
import { logger } from "../../utils/logger";
import { compareShotDates, isSameShotDate } from "../../utils/shot-date";
import { enumerateShotDirs, isNotFound, videoPathForDate } from "./shot-paths";

export interface RetentionOptions {
  shotRoot: string;
  vidRoot: string;
  videoExt: string;
  keepCount: number;
  today: ShotDate;
}

async function videoSize(videoPath: string): Promise<number | null> {
  try {
    return (await fs.stat(videoPath)).size;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a shot directory, then every ancestor left empty by that, up to
 * but not including the shot root
 */
export async function removeShotDir(shotDir: string, shotRoot: string): Promise<boolean> {
  try {
    await fs.rm(shotDir, { recursive: true, force: true });
  } catch (error) {
    logger.warn(`Failed to remove shot dir ${shotDir}`, { error: toError(error).message });
    return false;
  }

  const root = path.resolve(shotRoot);
  let current = path.dirname(path.resolve(shotDir));

  while (current !== root && current.startsWith(root + path.sep)) {
    try {
      // rmdir only succeeds on an empty directory
      await fs.rmdir(current);
    } catch {
      break;
    }
    current = path.dirname(current);
  }

  return true;
}

/**
 * Returns the directories that were removed
 */
export async function cleanupOldShotDirs(options: RetentionOptions): Promise<ShotDirectory[]> {
  const { shotRoot, vidRoot, videoExt, keepCount, today } = options;
  logger.info(`Checking for old shot dirs to clean up (keeping ${keepCount} days)`);

  let dirs: ShotDirectory[];
  try {
    dirs = await enumerateShotDirs(shotRoot);
  } catch (error) {
    logger.warn("Failed to list shot directories", { error: toError(error).message });
    return [];
  }

  const candidates = dirs
    .filter((dir) => !isSameShotDate(dir.date, today))
    .sort((a, b) => compareShotDates(b.date, a.date))
    .slice(keepCount);

  const removed: ShotDirectory[] = [];

  for (const dir of candidates) {
    const videoPath = videoPathForDate(vidRoot, dir.date, videoExt);

    let size: number | null;
    try {
      size = await videoSize(videoPath);
    } catch (error) {
      logger.warn(`Could not check video ${videoPath}`, { error: toError(error).message });
      continue;
    }

    if (size === null) {
      logger.debug(`Skipping ${dir.path}: no video at ${videoPath}`);
      continue;
    }
    if (size === 0) {
      logger.debug(`Skipping ${dir.path}: video file is empty`);
      continue;
    }

    logger.info(`Cleaning up shot dir ${dir.path} (video exists at ${videoPath})`);
    if (await removeShotDir(dir.path, shotRoot)) {
      removed.push(dir);
    }
  }

  return removed;
}
