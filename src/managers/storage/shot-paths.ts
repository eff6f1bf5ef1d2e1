/**
 * Shot Paths
 *
 * Date <-> path mapping for shot directories and videos.
 *
 * Layout:
 *   <shotRoot>/<YYYY>/<MM>/<DD>/<00000..N>.<ext>
 *   <vidRoot>/ompd-<YYYY>-<MM>-<DD>.<videoExt>
 */

import * as fs from "fs/promises";
import * as path from "path";
import { FRAMES, VIDEO, type ShotDate, type ShotDirectory, type VideoArtifact } from "@ompd/types";
import { formatShotDate, parseShotDate } from "../../utils/shot-date";

const VIDEO_NAME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function shotDirForDate(root: string, date: ShotDate): string {
  return path.join(
    root,
    String(date.year).padStart(4, "0"),
    String(date.month).padStart(2, "0"),
    String(date.day).padStart(2, "0")
  );
}

export function shotDirectoryFor(root: string, date: ShotDate): ShotDirectory {
  return { date, path: shotDirForDate(root, date) };
}

/**
 * Read the last three path components as year/month/day
 */
export function parseDateFromShotDir(dir: string): ShotDate | null {
  const parts = path.resolve(dir).split(path.sep).filter((part) => part.length > 0);
  if (parts.length < 3) {
    return null;
  }
  const [year, month, day] = parts.slice(-3);
  return parseShotDate(year, month, day);
}

export function videoFileName(date: ShotDate, videoExt: string): string {
  return `${VIDEO.FILE_PREFIX}-${formatShotDate(date)}.${videoExt}`;
}

export function videoPathForDate(vidRoot: string, date: ShotDate, videoExt: string): string {
  return path.join(vidRoot, videoFileName(date, videoExt));
}

/**
 * Date encoded in a video file name, or null for anything else
 */
export function parseVideoFileName(fileName: string, videoExt: string): ShotDate | null {
  const prefix = `${VIDEO.FILE_PREFIX}-`;
  const suffix = `.${videoExt}`;
  if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) {
    return null;
  }
  const middle = fileName.slice(prefix.length, fileName.length - suffix.length);
  const match = VIDEO_NAME_PATTERN.exec(middle);
  if (!match) {
    return null;
  }
  return parseShotDate(match[1], match[2], match[3]);
}

/**
 * Frame file name for an index: 00042.webp
 */
export function frameFileName(index: number, extension: string): string {
  return `${String(index).padStart(FRAMES.INDEX_DIGITS, "0")}.${extension}`;
}

/**
 * Index of a frame file name, or null if the stem is not a number or the
 * extension differs
 */
export function parseFrameIndex(fileName: string, extension: string): number | null {
  const suffix = `.${extension}`;
  if (!fileName.endsWith(suffix)) {
    return null;
  }
  const stem = fileName.slice(0, -suffix.length);
  return /^\d+$/.test(stem) ? Number(stem) : null;
}

const YEAR_DIR_PATTERN = /^\d{4}$/;
const MONTH_DAY_DIR_PATTERN = /^\d{2}$/;

async function listNumericDirs(dir: string, pattern: RegExp): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && pattern.test(entry.name))
    .map((entry) => entry.name);
}

/**
 * Every YYYY/MM/DD directory under the shot root. A missing root yields
 * an empty list; other read errors are thrown.
 */
export async function enumerateShotDirs(shotRoot: string): Promise<ShotDirectory[]> {
  let years: string[];
  try {
    years = await listNumericDirs(shotRoot, YEAR_DIR_PATTERN);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const dirs: ShotDirectory[] = [];
  for (const year of years) {
    for (const month of await listNumericDirs(path.join(shotRoot, year), MONTH_DAY_DIR_PATTERN)) {
      for (const day of await listNumericDirs(
        path.join(shotRoot, year, month),
        MONTH_DAY_DIR_PATTERN
      )) {
        const date = parseShotDate(year, month, day);
        if (date) {
          dirs.push({ date, path: path.join(shotRoot, year, month, day) });
        }
      }
    }
  }
  return dirs;
}

/**
 * Every video in the video root whose name parses to a date.
 * Other files are skipped.
 */
export async function enumerateVideos(
  vidRoot: string,
  videoExt: string
): Promise<VideoArtifact[]> {
  let names: string[];
  try {
    names = await fs.readdir(vidRoot);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const videos: VideoArtifact[] = [];
  for (const name of names) {
    const date = parseVideoFileName(name, videoExt);
    if (date) {
      videos.push({ date, path: path.join(vidRoot, name) });
    }
  }
  return videos;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
