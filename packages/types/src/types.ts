/**
 * ompd Shared Types
 * Data model shared by the capture loop, the movie maker and the backfiller
 */

// Dates & Directories

/**
 * A calendar date in local time. Months and days are 1-based.
 */
export interface ShotDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Still-image formats a frame can be stored as
 */
export type ShotFormat = "jpeg" | "jpg" | "png" | "webp" | "gif" | "tiff";

/**
 * A date-bucketed frame directory: `<shotRoot>/<YYYY>/<MM>/<DD>`
 */
export interface ShotDirectory {
  date: ShotDate;
  path: string;
}

// Frames

export interface FrameRecord {
  frame: number;
  width: number;
  height: number;
}

/**
 * Ordered frame rows for one shot directory
 */
export interface FrameMetadata {
  frames: FrameRecord[];
}

export interface FrameDimensions {
  width: number;
  height: number;
}

// Videos

export interface VideoArtifact {
  date: ShotDate;
  path: string;
}

// Capture loop

/**
 * Outcome of classifying the gap between two ticks
 */
export type ChangeType = "nop" | "new_day";

/**
 * Result of a per-file compression or decompression sweep
 */
export interface CompressionSummary {
  processed: number;
  failed: string[];
}
