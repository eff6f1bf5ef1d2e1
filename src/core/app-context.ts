/**
 * Application Context
 *
 * Wires the managers together and drives the live capture loop:
 * capture -> classify the gap -> roll over or repair -> store -> wait.
 *
 * Only the loop touches the live shot directory. Finished directories are
 * handed by value to background tasks on the supervisor.
 */

import type { ChangeType, ShotDirectory } from "@ompd/types";
import type { FrozenConfig } from "../config/types";
import { BackFiller } from "../managers/backfill/back-filler";
import { CaptureLoop } from "../managers/capture/capture-loop";
import { Capturer } from "../managers/capture/capturer";
import type { CaptureResult, ScreenshotSource } from "../managers/capture/screen-capture";
import { DirManager } from "../managers/storage";
import type { EncoderRunner } from "../managers/video/encoder-runner";
import { MovieMaker } from "../managers/video/movie-maker";
import { logger } from "../utils/logger";
import { formatShotDate, isSameShotDate, shotDateFrom } from "../utils/shot-date";
import { AppError, FileSystemError, FrameSlotTakenError, toError } from "./app-error";
import { TaskSupervisor } from "./task-supervisor";

export interface AppContextDeps {
  config: FrozenConfig;
  source: ScreenshotSource;
  runner: EncoderRunner;
  ffmpegPath: string;
  now?: () => Date;
}

/**
 * Errors that stop the whole process
 */
function isFatal(error: unknown): boolean {
  return error instanceof FrameSlotTakenError || error instanceof FileSystemError;
}

export class AppContext {
  readonly config: FrozenConfig;
  readonly dirManager: DirManager;
  readonly capturer: Capturer;
  readonly movieMaker: MovieMaker;
  readonly supervisor = new TaskSupervisor();

  private readonly loop = new CaptureLoop();
  private readonly now: () => Date;
  private currentDir: ShotDirectory | null = null;
  private lastTime: Date | null = null;
  private settle: { resolve: () => void; reject: (error: Error) => void } | null = null;

  constructor(deps: AppContextDeps) {
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());

    this.dirManager = new DirManager({
      shotRoot: deps.config.shotOutputDir,
      vidRoot: deps.config.vidOutputDir,
      shotType: deps.config.shotType,
      videoType: deps.config.videoType,
      compressedExt: deps.config.compressedExt,
    });

    this.capturer = new Capturer({
      interval: deps.config.interval,
      shotType: deps.config.shotType,
      dirManager: this.dirManager,
      source: deps.source,
    });

    this.movieMaker = new MovieMaker({
      config: deps.config,
      dirManager: this.dirManager,
      runner: deps.runner,
      ffmpegPath: deps.ffmpegPath,
      now: this.now,
    });
  }

  getCurrentDir(): ShotDirectory | null {
    return this.currentDir;
  }

  /**
   * Startup: roots, backfill, today's directory, frame counter.
   * Failing to create a directory here is fatal.
   */
  async initialize(): Promise<ShotDirectory> {
    const startTime = this.now();

    await this.dirManager.ensureRoots();

    if (this.config.handleOldDirsOnStartup) {
      const backFiller = new BackFiller({
        config: this.config,
        dirManager: this.dirManager,
        movieMaker: this.movieMaker,
        today: shotDateFrom(startTime),
      });
      void this.supervisor.spawn("backfill", () => backFiller.run());
    }

    const dir = await this.dirManager.makeShotOutputDir(startTime);
    await this.capturer.discoverCurrentFrame(dir);

    this.currentDir = dir;
    this.lastTime = startTime;
    logger.info(`Capturing into ${dir.path}`, { frame: this.capturer.getCurrentFrame() });
    return dir;
  }

  /**
   * One pass of the capture loop
   */
  async tick(): Promise<void> {
    const dir = this.currentDir;
    const lastTime = this.lastTime;
    if (!dir || !lastTime) {
      throw new AppError("Capture loop ticked before initialize()", "NOT_INITIALIZED");
    }

    let capture: CaptureResult;
    try {
      capture = await this.capturer.captureScreen();
    } catch (error) {
      logger.info("Couldn't get a good screenshot, skip this frame", {
        error: toError(error).message,
      });
      return;
    }

    const now = this.now();
    let target = dir;

    const elapsedSecs = Math.floor((now.getTime() - lastTime.getTime()) / 1000);
    const dateChanged = !isSameShotDate(shotDateFrom(lastTime), shotDateFrom(now));

    if (dateChanged || elapsedSecs > this.config.maxSleepSecs) {
      let change: ChangeType;
      try {
        change = await this.capturer.dealWithChange(dir, lastTime, now);
      } catch (error) {
        if (isFatal(error)) {
          throw error;
        }
        logger.error("Some issue dealing with a time gap, will try again", {
          error: toError(error).message,
        });
        return;
      }

      // The gap is handled; a failed store below must not repeat it
      this.lastTime = now;
      if (change === "new_day") {
        target = await this.rollOver(dir, now);
      }
    }

    this.lastTime = now;
    await this.capturer.store(capture, target);
  }

  /**
   * Seal `sealed`, start its video in the background, switch to a fresh
   * directory for `now`
   */
  private async rollOver(sealed: ShotDirectory, now: Date): Promise<ShotDirectory> {
    logger.info("Brand new day!", { sealed: formatShotDate(sealed.date) });

    void this.supervisor.spawn(`movie ${formatShotDate(sealed.date)}`, () =>
      this.movieMaker.makeMovieFrom(sealed)
    );

    const next = await this.dirManager.makeShotOutputDir(now);
    this.currentDir = next;
    this.capturer.setCurrentFrame(0);
    return next;
  }

  /**
   * Initialize, then capture every interval until stop() or a fatal error
   */
  async start(): Promise<void> {
    await this.initialize();

    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
      this.loop.start(
        this.config.interval * 1000,
        () => this.tick(),
        (error) => this.handleTickError(error)
      );
    });
  }

  private handleTickError(error: unknown): void {
    const err = toError(error);
    const data = AppError.isAppError(err) ? err.toJSON() : { message: err.message };

    if (isFatal(err)) {
      logger.error("Fatal error in capture loop", data);
      this.loop.stop();
      this.settle?.reject(err);
      this.settle = null;
      return;
    }

    logger.error("Capture tick failed", data);
  }

  /**
   * Stop capturing. Background tasks keep running until they finish.
   */
  async stop(): Promise<void> {
    this.loop.stop();
    await this.loop.settle();
    this.settle?.resolve();
    this.settle = null;
  }
}
