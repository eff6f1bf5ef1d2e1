/**
 * Configuration Types
 */

import type { ShotFormat } from "@ompd/types";
import type { LogLevel } from "../utils/logger";

/**
 * Settings persisted in ~/.ompd-config.json
 */
export type Config = {
  /** Seconds between captures */
  interval: number;
  /** Same-day gaps longer than this many seconds are treated as a blackout */
  maxSleepSecs: number;
  shotOutputDir: string;
  vidOutputDir: string;
  logDir: string;
  logLevel: LogLevel;
  /** Encoder binary; empty means the one bundled with @ffmpeg-installer/ffmpeg */
  ffmpeg: string;
  handleOldDirsOnStartup: boolean;
  shotType: ShotFormat;
  videoType: string;
  vidScaleFactor: number;
  /** Number of most recent finished days to keep frames for; null keeps everything */
  keepShotsDays: number | null;
  compressShots: boolean;
  compressedExt: string;
  dailyCaptureHours: number;
  targetVideoSeconds: number;
};

export type FrozenConfig = Readonly<Config>;
