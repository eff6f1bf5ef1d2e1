/**
 * FFmpeg Command Builder
 *
 * Argument vectors for turning a directory of numbered frames into a video.
 */

import * as path from "path";
import { FRAMES, VIDEO, type ShotFormat } from "@ompd/types";

export interface EncoderArgsOptions {
  inputDir: string;
  outputFile: string;
  width: number;
  height: number;
  frameRate: number;
  shotType: ShotFormat;
}

export interface FrameRateOptions {
  interval: number;
  dailyCaptureHours: number;
  targetVideoSeconds: number;
}

/**
 * Output frame rate: a full capture day squeezed into the target length.
 * 9 hours at one frame per 20s into one minute gives 27.
 */
export function deriveFrameRate(options: FrameRateOptions): number {
  const framesPerDay = (options.dailyCaptureHours * 3600) / options.interval;
  return Math.max(1, Math.floor(framesPerDay / options.targetVideoSeconds));
}

/**
 * Scale each frame down into the target box keeping its aspect ratio, then
 * pad with black to the exact size
 */
export function buildScalePadFilter(width: number, height: number): string {
  return (
    `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:black`
  );
}

export function frameInputPattern(inputDir: string, shotType: ShotFormat): string {
  return path.join(inputDir, `%0${FRAMES.INDEX_DIGITS}d.${shotType}`);
}

/**
 * Build FFmpeg args for a frame-sequence encode
 */
export function buildEncoderArgs(options: EncoderArgsOptions): string[] {
  const { inputDir, outputFile, width, height, frameRate, shotType } = options;

  return [
    "-r",
    String(frameRate),
    "-i",
    frameInputPattern(inputDir, shotType),
    "-vf",
    buildScalePadFilter(width, height),
    "-pix_fmt",
    VIDEO.PIXEL_FORMAT,
    "-y",
    outputFile,
  ];
}
