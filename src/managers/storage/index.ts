/**
 * Dir Manager
 *
 * Owns the shot and video roots. Everything that touches the on-disk
 * layout goes through here; the actual work lives in the operation
 * modules next to this file.
 */

import * as fs from "fs/promises";
import type {
  CompressionSummary,
  FrameDimensions,
  FrameMetadata,
  FrameRecord,
  ShotDate,
  ShotDirectory,
  ShotFormat,
  VideoArtifact,
} from "@ompd/types";
import { FileSystemError, toError } from "../../core/app-error";
import { logger } from "../../utils/logger";
import { shotDateFrom } from "../../utils/shot-date";

import * as compression from "./compression";
import * as metadataOps from "./frame-metadata";
import * as paths from "./shot-paths";
import * as retention from "./retention";

export type { FrameFile } from "./frame-metadata";

export interface DirManagerOptions {
  shotRoot: string;
  vidRoot: string;
  shotType: ShotFormat;
  videoType: string;
  compressedExt: string;
}

export class DirManager {
  readonly shotRoot: string;
  readonly vidRoot: string;
  readonly shotType: ShotFormat;
  readonly videoType: string;
  readonly compressedExt: string;

  constructor(options: DirManagerOptions) {
    this.shotRoot = options.shotRoot;
    this.vidRoot = options.vidRoot;
    this.shotType = options.shotType;
    this.videoType = options.videoType;
    this.compressedExt = options.compressedExt;
  }

  /**
   * Create both roots if needed
   */
  async ensureRoots(): Promise<void> {
    for (const dir of [this.shotRoot, this.vidRoot]) {
      try {
        await fs.mkdir(dir, { recursive: true });
      } catch (error) {
        throw new FileSystemError(`Failed to create directory ${dir}`, toError(error), {
          path: dir,
        });
      }
    }
  }

  /**
   * Create the directory for the date of `now` and return it. Idempotent.
   */
  async makeShotOutputDir(now: Date = new Date()): Promise<ShotDirectory> {
    const dir = this.shotDirectoryFor(shotDateFrom(now));
    try {
      await fs.mkdir(dir.path, { recursive: true });
    } catch (error) {
      throw new FileSystemError(`Failed to create shot directory ${dir.path}`, toError(error), {
        path: dir.path,
      });
    }
    logger.debug("Shot output directory ready", { path: dir.path });
    return dir;
  }

  // ============ Paths ============

  shotDirectoryFor(date: ShotDate): ShotDirectory {
    return paths.shotDirectoryFor(this.shotRoot, date);
  }

  videoPathFor(date: ShotDate): string {
    return paths.videoPathForDate(this.vidRoot, date, this.videoType);
  }

  listShotDirs(): Promise<ShotDirectory[]> {
    return paths.enumerateShotDirs(this.shotRoot);
  }

  listVideos(): Promise<VideoArtifact[]> {
    return paths.enumerateVideos(this.vidRoot, this.videoType);
  }

  // ============ Metadata ============

  listFrameFiles(dir: ShotDirectory): Promise<metadataOps.FrameFile[]> {
    return metadataOps.listFrameFiles(dir.path, this.shotType);
  }

  generateMetadata(dir: ShotDirectory): Promise<FrameMetadata> {
    return metadataOps.generateMetadata(dir.path, this.shotType);
  }

  getOrGenerateMetadata(dir: ShotDirectory): Promise<FrameMetadata> {
    return metadataOps.getOrGenerateMetadata(dir.path, this.shotType, this.compressedExt);
  }

  hasMetadata(dir: ShotDirectory): Promise<boolean> {
    return metadataOps.hasMetadata(dir.path);
  }

  appendFrameRecords(dir: ShotDirectory, records: FrameRecord[]): Promise<void> {
    return metadataOps.appendFrameRecords(dir.path, records);
  }

  writeFrameRecords(dir: ShotDirectory, records: FrameRecord[]): Promise<void> {
    return metadataOps.writeFrameRecords(dir.path, records);
  }

  lastFrameDimensions(dir: ShotDirectory): Promise<FrameDimensions | null> {
    return metadataOps.readLastFrameDimensions(dir.path);
  }

  // ============ Compression ============

  compress(dir: ShotDirectory): Promise<CompressionSummary> {
    return compression.compressShotDir(dir.path, this.shotType, this.compressedExt);
  }

  decompress(dir: ShotDirectory): Promise<CompressionSummary> {
    return compression.decompressShotDir(dir.path, this.compressedExt);
  }

  // ============ Retention ============

  cleanupOldShotDirs(keepCount: number, today: ShotDate): Promise<ShotDirectory[]> {
    return retention.cleanupOldShotDirs({
      shotRoot: this.shotRoot,
      vidRoot: this.vidRoot,
      videoExt: this.videoType,
      keepCount,
      today,
    });
  }
}
