/**
 * Entry Point
 *
 * Loads configuration, checks the encoder, then captures until killed.
 */

import { loadConfig } from "./config/store";
import { AppContext } from "./core/app-context";
import { AppError, MuxerUnavailableError, toError } from "./core/app-error";
import { PrimaryMonitorSource } from "./managers/capture/screen-capture";
import { SpawnEncoderRunner } from "./managers/video/encoder-runner";
import { hasMuxer } from "./managers/video/movie-maker";
import { resolveFFmpegPath } from "./utils/ffmpeg/path-resolver";
import { configureLogger, logger } from "./utils/logger";

let appContext: AppContext | null = null;

function installSignalHandlers(): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, exiting`, {
      runningTasks: appContext?.supervisor.runningTasks() ?? [],
    });
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger({ dir: config.logDir, level: config.logLevel });

  logger.info("ompd starting", {
    platform: process.platform,
    arch: process.arch,
    interval: config.interval,
    shotOutputDir: config.shotOutputDir,
    vidOutputDir: config.vidOutputDir,
  });

  const ffmpegPath = resolveFFmpegPath(config.ffmpeg);
  const runner = new SpawnEncoderRunner();

  if (!(await hasMuxer(runner, ffmpegPath, config.videoType))) {
    throw new MuxerUnavailableError(config.videoType);
  }

  installSignalHandlers();

  appContext = new AppContext({
    config,
    source: new PrimaryMonitorSource(),
    runner,
    ffmpegPath,
  });

  await appContext.start();
}

main().catch((error: unknown) => {
  const err = toError(error);
  logger.error("ompd stopped", AppError.isAppError(err) ? err.toJSON() : { message: err.message });
  process.exit(1);
});
