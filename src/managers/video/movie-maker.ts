/**
 * Movie Maker
 *
 * Turns one finished shot directory into a video:
 * decompress -> fill frame gaps -> pick output size -> encode -> compress
 * -> retention sweep.
 */

import * as fs from "fs/promises";
import * as path from "path";
import {
  FRAMES,
  SHOT_DIR_FILES,
  type FrameDimensions,
  type FrameMetadata,
  type FrameRecord,
  type ShotDirectory,
} from "@ompd/types";
import type { FrozenConfig } from "../../config/types";
import { EncoderError, NoFramesError, toError } from "../../core/app-error";
import { logger } from "../../utils/logger";
import { formatShotDate, shotDateFrom } from "../../utils/shot-date";
import type { DirManager } from "../storage";
import { frameFileName } from "../storage/shot-paths";
import { buildEncoderArgs, deriveFrameRate } from "./ffmpeg-builder";
import { lastNonEmptyLine, type EncoderRunner } from "./encoder-runner";

export interface MovieMakerDeps {
  config: FrozenConfig;
  dirManager: DirManager;
  runner: EncoderRunner;
  ffmpegPath: string;
  now?: () => Date;
}

/**
 * Ask the encoder whether it can write `extension` files
 */
export async function hasMuxer(
  runner: EncoderRunner,
  ffmpegPath: string,
  extension: string
): Promise<boolean> {
  logger.debug(`Asking ${ffmpegPath} for its muxers`);
  const { stdout } = await runner.run(ffmpegPath, ["-muxers"]);
  const needle = ` ${extension}`;
  return stdout.split(/\r?\n/).some((line) => line.includes(needle));
}

/**
 * Round up to the next even number
 */
export function roundUpToEven(value: number): number {
  return value % 2 === 0 ? value : value + 1;
}

/**
 * Most common frame size, scaled and rounded up to even on both axes.
 * Ties go to the smallest width, then the smallest height.
 */
export function analyzeFrameDimensions(
  metadata: FrameMetadata,
  scaleFactor: number
): FrameDimensions {
  const counts = new Map<string, { width: number; height: number; count: number }>();
  for (const { width, height } of metadata.frames) {
    const key = `${width}x${height}`;
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { width, height, count: 1 });
    }
  }

  let base: FrameDimensions = FRAMES.DEFAULT_DIMENSIONS;
  let best: { width: number; height: number; count: number } | null = null;
  for (const entry of counts.values()) {
    if (
      !best ||
      entry.count > best.count ||
      (entry.count === best.count &&
        (entry.width < best.width || (entry.width === best.width && entry.height < best.height)))
    ) {
      best = entry;
    }
  }

  if (best) {
    const percentage = ((best.count / metadata.frames.length) * 100).toFixed(1);
    logger.info(`Most common resolution: ${best.width}x${best.height} (${percentage}% of frames)`);
    base = { width: best.width, height: best.height };
  } else {
    logger.warn(
      `No frame metadata, using default ${base.width}x${base.height}`
    );
  }

  const width = Math.max(2, roundUpToEven(Math.trunc(base.width * scaleFactor)));
  const height = Math.max(2, roundUpToEven(Math.trunc(base.height * scaleFactor)));

  if (scaleFactor !== 1) {
    logger.info(`Scaled by ${scaleFactor}: ${width}x${height}`);
  }

  return { width, height };
}

export class MovieMaker {
  private readonly config: FrozenConfig;
  private readonly dirManager: DirManager;
  private readonly runner: EncoderRunner;
  private readonly ffmpegPath: string;
  private readonly now: () => Date;

  constructor(deps: MovieMakerDeps) {
    this.config = deps.config;
    this.dirManager = deps.dirManager;
    this.runner = deps.runner;
    this.ffmpegPath = deps.ffmpegPath;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Make frame indices contiguous from 0 to the highest index present.
   * A missing slot 0 gets a copy of the earliest frame; every other gap
   * gets a copy of the frame just before it. Returns the filled indices.
   */
  async fixMissingFrames(dir: ShotDirectory): Promise<number[]> {
    const ext = this.dirManager.shotType;
    const frames = await this.dirManager.listFrameFiles(dir);
    if (frames.length === 0) {
      throw new NoFramesError(dir.path, ext);
    }

    const present = new Set<number>();
    for (const frame of frames) {
      present.add(frame.index);
    }
    // Filler references count as present; they are symlinks to a real frame
    for (const entry of await fs.readdir(dir.path, { withFileTypes: true })) {
      const match = /^(\d+)\./.exec(entry.name);
      if (entry.isSymbolicLink() && match && entry.name.endsWith(`.${ext}`)) {
        present.add(Number(match[1]));
      }
    }

    const filled: number[] = [];
    const slotPath = (index: number) => path.join(dir.path, frameFileName(index, ext));

    if (!present.has(0)) {
      logger.debug(`${slotPath(0)} is missing, copying earliest frame into position`);
      await fs.copyFile(frames[0].path, slotPath(0));
      present.add(0);
      filled.push(0);
    }

    let maxIndex = 0;
    for (const index of present) {
      if (index > maxIndex) {
        maxIndex = index;
      }
    }
    for (let index = 1; index <= maxIndex; index++) {
      if (present.has(index)) {
        continue;
      }
      logger.info(`Missing ${slotPath(index)}, copying ${slotPath(index - 1)} into place`);
      await fs.copyFile(slotPath(index - 1), slotPath(index));
      present.add(index);
      filled.push(index);
    }

    if (filled.length > 0 && (await this.dirManager.hasMetadata(dir))) {
      await this.recordFilledRows(dir, filled);
    }

    return filled;
  }

  private async recordFilledRows(dir: ShotDirectory, filled: number[]): Promise<void> {
    try {
      const { frames } = await this.dirManager.getOrGenerateMetadata(dir);
      const byFrame = new Map(frames.map((record) => [record.frame, record]));
      const rows: FrameRecord[] = [];

      for (const index of filled) {
        // Slot 0 is a copy of the earliest frame, others of their predecessor
        const source = index === 0 ? frames[0] : (byFrame.get(index - 1) ?? rows.at(-1));
        if (source) {
          rows.push({ frame: index, width: source.width, height: source.height });
          byFrame.set(index, rows[rows.length - 1]);
        }
      }

      await this.dirManager.writeFrameRecords(dir, [...frames, ...rows]);
    } catch (error) {
      logger.warn("Failed to record metadata for filled frames", {
        dir: dir.path,
        error: toError(error).message,
      });
    }
  }

  /**
   * Encode a shot directory into its video
   */
  async makeMovieFrom(dir: ShotDirectory): Promise<string> {
    const decompressed = await this.dirManager.decompress(dir);
    if (decompressed.failed.length > 0) {
      logger.warn("Some files could not be decompressed", {
        dir: dir.path,
        failed: decompressed.failed,
      });
    }

    await this.fixMissingFrames(dir);

    let metadata: FrameMetadata;
    try {
      metadata = await this.dirManager.getOrGenerateMetadata(dir);
    } catch (error) {
      logger.warn("Failed to get metadata, using default dimensions", {
        dir: dir.path,
        error: toError(error).message,
      });
      metadata = { frames: [] };
    }

    const { width, height } = analyzeFrameDimensions(metadata, this.config.vidScaleFactor);
    const outputFile = this.dirManager.videoPathFor(dir.date);
    const args = buildEncoderArgs({
      inputDir: dir.path,
      outputFile,
      width,
      height,
      frameRate: deriveFrameRate(this.config),
      shotType: this.dirManager.shotType,
    });

    logger.info(`Encoding ${formatShotDate(dir.date)}`, { outputFile, width, height });
    const result = await this.runner.run(this.ffmpegPath, args);
    logger.debug("Encoder finished", { exitCode: result.exitCode });

    await this.writeEncoderLog(dir, SHOT_DIR_FILES.ENCODER_STDOUT, result.stdout);
    await this.writeEncoderLog(dir, SHOT_DIR_FILES.ENCODER_STDERR, result.stderr);

    if (result.exitCode !== 0) {
      const lastLine = lastNonEmptyLine(result.stderr);
      const error = new EncoderError(
        `Issue with ffmpeg - last line of stderr: ${lastLine ?? "(no stderr)"}`,
        result.exitCode,
        lastLine
      );
      logger.error(error.message, error.toJSON());
      throw error;
    }

    if (this.config.compressShots) {
      const compressed = await this.dirManager.compress(dir);
      if (compressed.failed.length > 0) {
        logger.warn("Some files could not be compressed", {
          dir: dir.path,
          failed: compressed.failed,
        });
      }
    }

    if (this.config.keepShotsDays !== null) {
      await this.dirManager.cleanupOldShotDirs(
        this.config.keepShotsDays,
        shotDateFrom(this.now())
      );
    }

    logger.info(`All done with ${dir.path}`);
    return outputFile;
  }

  private async writeEncoderLog(dir: ShotDirectory, name: string, content: string): Promise<void> {
    const logPath = path.join(dir.path, name);
    try {
      await fs.writeFile(logPath, content, "utf8");
    } catch (error) {
      logger.warn(`Couldn't write encoder output to ${logPath}`, {
        error: toError(error).message,
      });
    }
  }
}
