/**
 * ompd Constants
 */

import type { FrameDimensions, ShotFormat } from "./types";

// Frames
export const FRAMES = {
  // Zero-padding width of frame file names (00000.webp)
  INDEX_DIGITS: 5,
  // Used for filler frames and empty metadata
  DEFAULT_DIMENSIONS: { width: 3420, height: 2224 } satisfies FrameDimensions,
  // Smaller frames than this get an error logged when metadata is generated
  MIN_WIDTH: 860,
  MIN_HEIGHT: 360,
} as const;

export const SHOT_FORMATS: readonly ShotFormat[] = [
  "jpeg",
  "jpg",
  "png",
  "webp",
  "gif",
  "tiff",
];

// Shot directory contents
export const SHOT_DIR_FILES = {
  METADATA: "frame_metadata.csv",
  METADATA_HEADER: "frame,width,height",
  ENCODER_STDOUT: "ffmpeg-stdout.log",
  ENCODER_STDERR: "ffmpeg-stderr.log",
} as const;

// Videos
export const VIDEO = {
  FILE_PREFIX: "ompd",
  PIXEL_FORMAT: "yuv420p",
} as const;

// Filler frames drawn over a blackout
export const FILLER = {
  // Initial font size relative to frame height
  FONT_HEIGHT_RATIO: 0.2,
  // Text never wider than this share of the frame
  MAX_TEXT_WIDTH_RATIO: 0.8,
  // Average advance of a sans-serif glyph relative to the font size
  GLYPH_WIDTH_RATIO: 0.6,
  BACKGROUND: "#000000",
  FOREGROUND: "#ffffff",
} as const;
