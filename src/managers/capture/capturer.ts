/**
 * Capturer
 *
 * Owns the frame counter for the live shot directory. Stores screenshots
 * as sequentially numbered frames and patches same-day gaps with a filler
 * frame plus symlinks to it.
 */

import * as fs from "fs/promises";
import * as path from "path";
import sharp from "sharp";
import {
  FRAMES,
  type ChangeType,
  type FrameDimensions,
  type FrameRecord,
  type ShotDirectory,
  type ShotFormat,
} from "@ompd/types";
import { FrameSlotTakenError, toError } from "../../core/app-error";
import { logger } from "../../utils/logger";
import { isSameShotDate, shotDateFrom } from "../../utils/shot-date";
import type { DirManager } from "../storage";
import { frameFileName, isNotFound } from "../storage/shot-paths";
import { writeFillerFrame } from "./filler-frame";
import type { CaptureResult, ScreenshotSource } from "./screen-capture";

/**
 * Point `slotPath` at the filler with a relative symlink, or copy the
 * filler there when the filesystem refuses the link
 */
async function placeFillerReference(fillerPath: string, slotPath: string): Promise<void> {
  try {
    await fs.symlink(path.basename(fillerPath), slotPath);
  } catch (error) {
    logger.warn(`Could not link ${slotPath}, copying the filler instead`, {
      error: toError(error).message,
    });
    await fs.copyFile(fillerPath, slotPath, fs.constants.COPYFILE_EXCL);
  }
}

async function discardFrames(paths: string[]): Promise<void> {
  for (const filePath of paths) {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      logger.warn(`Failed to remove ${filePath}`, { error: toError(error).message });
    }
  }
}

export interface CapturerOptions {
  /** Seconds between ticks */
  interval: number;
  shotType: ShotFormat;
  dirManager: DirManager;
  source: ScreenshotSource;
}

async function slotTaken(filePath: string): Promise<boolean> {
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

export class Capturer {
  private currentFrame = 0;
  private readonly interval: number;
  private readonly shotType: ShotFormat;
  private readonly dirManager: DirManager;
  private readonly source: ScreenshotSource;

  constructor(options: CapturerOptions) {
    this.interval = options.interval;
    this.shotType = options.shotType;
    this.dirManager = options.dirManager;
    this.source = options.source;
  }

  getCurrentFrame(): number {
    return this.currentFrame;
  }

  setCurrentFrame(frame: number): void {
    this.currentFrame = frame;
  }

  /**
   * Pick up numbering where an earlier run left off: the counter becomes
   * the number of frame entries (files and filler links) in the directory
   */
  async discoverCurrentFrame(dir: ShotDirectory): Promise<number> {
    const suffix = `.${this.shotType}`;
    try {
      const names = await fs.readdir(dir.path);
      this.currentFrame = names.filter((name) => name.endsWith(suffix)).length;
      logger.debug(`Found ${this.currentFrame} existing ${this.shotType}s`, { dir: dir.path });
    } catch (error) {
      logger.error("Issue getting current frame", {
        dir: dir.path,
        error: toError(error).message,
      });
      this.currentFrame = 0;
    }
    return this.currentFrame;
  }

  captureScreen(): Promise<CaptureResult> {
    return this.source.capture();
  }

  /**
   * Write a screenshot into the next slot. Never overwrites.
   */
  async store(capture: CaptureResult, dir: ShotDirectory): Promise<string> {
    const filePath = path.join(dir.path, frameFileName(this.currentFrame, this.shotType));

    if (await slotTaken(filePath)) {
      throw new FrameSlotTakenError(filePath);
    }

    const info = await sharp(capture.buffer).toFormat(this.shotType).toFile(filePath);
    logger.debug(`Stored frame ${filePath}`, { width: info.width, height: info.height });

    await this.appendMetadata(dir, [
      { frame: this.currentFrame, width: info.width, height: info.height },
    ]);

    this.currentFrame += 1;
    return filePath;
  }

  /**
   * Classify the gap since the previous tick. A new calendar date means
   * rollover; anything else is a blackout, repaired in place.
   */
  async dealWithChange(
    dir: ShotDirectory,
    prevTime: Date,
    currTime: Date
  ): Promise<ChangeType> {
    if (!isSameShotDate(shotDateFrom(prevTime), shotDateFrom(currTime))) {
      return "new_day";
    }

    const elapsedSecs = Math.floor((currTime.getTime() - prevTime.getTime()) / 1000);
    await this.dealWithBlackout(dir, elapsedSecs);
    return "nop";
  }

  private async dealWithBlackout(dir: ShotDirectory, elapsedSecs: number): Promise<void> {
    logger.info(`Looks like we've been away for a while (${elapsedSecs} seconds)`);

    const missedFrames = Math.floor(elapsedSecs / this.interval);
    if (missedFrames < 1) {
      logger.debug("Gap shorter than one interval, nothing to fill");
      return;
    }

    const fillerName = frameFileName(this.currentFrame, this.shotType);
    const fillerPath = path.join(dir.path, fillerName);
    if (await slotTaken(fillerPath)) {
      throw new FrameSlotTakenError(fillerPath);
    }

    const dimensions = await this.currentDimensions(dir);
    logger.info(`Creating filler frame @ ${fillerPath}`, dimensions);

    const rows: FrameRecord[] = [{ frame: this.currentFrame, ...dimensions }];
    const written = [fillerPath];
    try {
      await writeFillerFrame(fillerPath, elapsedSecs, dimensions, this.shotType);
      for (let n = 1; n < missedFrames; n++) {
        const index = this.currentFrame + n;
        const slotPath = path.join(dir.path, frameFileName(index, this.shotType));
        await placeFillerReference(fillerPath, slotPath);
        written.push(slotPath);
        rows.push({ frame: index, ...dimensions });
      }
    } catch (error) {
      // Leave the slots free so the next tick can repair the gap again
      await discardFrames(written);
      throw error;
    }

    await this.appendMetadata(dir, rows);

    this.currentFrame += missedFrames;
    logger.debug(`New current frame = ${this.currentFrame}`);
  }

  /**
   * Size of the latest recorded frame, else the default
   */
  private async currentDimensions(dir: ShotDirectory): Promise<FrameDimensions> {
    try {
      const last = await this.dirManager.lastFrameDimensions(dir);
      if (last) {
        return last;
      }
    } catch (error) {
      logger.warn("Could not read frame metadata, using default dimensions", {
        error: toError(error).message,
      });
    }
    const { width, height } = FRAMES.DEFAULT_DIMENSIONS;
    return { width, height };
  }

  private async appendMetadata(dir: ShotDirectory, rows: FrameRecord[]): Promise<void> {
    try {
      await this.dirManager.appendFrameRecords(dir, rows);
    } catch (error) {
      logger.error("Failed to write frame metadata", {
        dir: dir.path,
        error: toError(error).message,
      });
    }
  }
}
