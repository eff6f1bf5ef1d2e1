/**
 * Back Filler
 *
 * Startup pass that makes videos for every past day that has frames but
 * no video yet, then runs the retention sweep.
 */

import type { ShotDate, ShotDirectory } from "@ompd/types";
import type { FrozenConfig } from "../../config/types";
import { CoverageError, toError } from "../../core/app-error";
import { logger } from "../../utils/logger";
import { formatShotDate } from "../../utils/shot-date";
import type { DirManager } from "../storage";
import type { MovieMaker } from "../video/movie-maker";
import { CoverageSet } from "./coverage-set";

export type VideoAssembler = Pick<MovieMaker, "makeMovieFrom">;

export interface BackFillerDeps {
  config: FrozenConfig;
  dirManager: DirManager;
  movieMaker: VideoAssembler;
  today: ShotDate;
}

export interface BackfillResult {
  processed: ShotDate[];
  failed: ShotDate[];
}

export class BackFiller {
  private readonly config: FrozenConfig;
  private readonly dirManager: DirManager;
  private readonly movieMaker: VideoAssembler;
  private readonly today: ShotDate;

  constructor(deps: BackFillerDeps) {
    this.config = deps.config;
    this.dirManager = deps.dirManager;
    this.movieMaker = deps.movieMaker;
    this.today = deps.today;
  }

  /**
   * Dates with a video, plus today so the live directory is never
   * mistaken for backlog
   */
  async discoverVideos(): Promise<CoverageSet> {
    try {
      const videos = await this.dirManager.listVideos();
      return new CoverageSet(videos.map((video) => video.date)).add(this.today);
    } catch (error) {
      throw new CoverageError("Couldn't discover videos", toError(error), {
        vidRoot: this.dirManager.vidRoot,
      });
    }
  }

  async discoverShots(): Promise<CoverageSet> {
    try {
      const dirs = await this.dirManager.listShotDirs();
      return new CoverageSet(dirs.map((dir) => dir.date));
    } catch (error) {
      throw new CoverageError("Couldn't discover shot directories", toError(error), {
        shotRoot: this.dirManager.shotRoot,
      });
    }
  }

  /**
   * Dates that still need a video, oldest first
   */
  async backlog(): Promise<ShotDate[]> {
    const videos = await this.discoverVideos();
    const shots = await this.discoverShots();
    return shots.difference(videos).sorted();
  }

  async run(): Promise<BackfillResult> {
    const backlog = await this.backlog();
    const result: BackfillResult = { processed: [], failed: [] };

    for (const date of backlog) {
      const dir = this.dirManager.shotDirectoryFor(date);
      logger.info(`Launching movie maker for ${formatShotDate(date)}`);

      try {
        await this.ensureMetadata(dir);
        await this.movieMaker.makeMovieFrom(dir);
        result.processed.push(date);
      } catch (error) {
        const err = toError(error);
        logger.error(`Backfill failed for ${formatShotDate(date)}`, {
          dir: dir.path,
          error: err.message,
        });
        result.failed.push(date);
      }
    }

    logger.info("Done backfilling movies", {
      processed: result.processed.length,
      failed: result.failed.length,
    });

    if (this.config.keepShotsDays !== null) {
      await this.dirManager.cleanupOldShotDirs(this.config.keepShotsDays, this.today);
    }

    return result;
  }

  /**
   * Old directories may predate the sidecar
   */
  private async ensureMetadata(dir: ShotDirectory): Promise<void> {
    if (await this.dirManager.hasMetadata(dir)) {
      return;
    }
    logger.info(`Generating missing metadata for ${dir.path}`);
    try {
      await this.dirManager.generateMetadata(dir);
    } catch (error) {
      logger.warn(`Failed to generate metadata for ${dir.path}`, {
        error: toError(error).message,
      });
    }
  }
}
