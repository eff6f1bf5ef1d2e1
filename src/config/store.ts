/**
 * Settings Store
 *
 * Persists the configuration as JSON in the user's home directory.
 * Missing fields are filled from the schema defaults on first load.
 */

import * as os from "os";
import * as path from "path";
import Conf, { type Schema } from "conf";
import { SHOT_FORMATS } from "@ompd/types";
import { ConfigError, toError } from "../core/app-error";
import { logger } from "../utils/logger";
import { configSchema } from "./schema";
import type { Config, FrozenConfig } from "./types";

export const CONFIG_NAME = ".ompd-config";

/**
 * Defaults for a given home directory
 */
export function defaultConfig(home: string = os.homedir()): Config {
  const root = path.join(home, "ompd");
  return {
    interval: 20,
    maxSleepSecs: 180,
    shotOutputDir: path.join(root, "shots"),
    vidOutputDir: path.join(root, "videos"),
    logDir: path.join(root, "logs"),
    logLevel: "info",
    ffmpeg: "",
    handleOldDirsOnStartup: true,
    shotType: "webp",
    videoType: "mp4",
    vidScaleFactor: 1.0,
    keepShotsDays: null,
    compressShots: false,
    compressedExt: "gz",
    dailyCaptureHours: 9,
    targetVideoSeconds: 60,
  };
}

function buildSchema(defaults: Config): Schema<Config> {
  return {
    interval: { type: "integer", default: defaults.interval, minimum: 1 },
    maxSleepSecs: { type: "number", default: defaults.maxSleepSecs, exclusiveMinimum: 0 },
    shotOutputDir: { type: "string", default: defaults.shotOutputDir },
    vidOutputDir: { type: "string", default: defaults.vidOutputDir },
    logDir: { type: "string", default: defaults.logDir },
    logLevel: {
      type: "string",
      default: defaults.logLevel,
      enum: ["debug", "info", "warn", "error"],
    },
    ffmpeg: { type: "string", default: defaults.ffmpeg },
    handleOldDirsOnStartup: { type: "boolean", default: defaults.handleOldDirsOnStartup },
    shotType: { type: "string", default: defaults.shotType, enum: [...SHOT_FORMATS] },
    videoType: { type: "string", default: defaults.videoType },
    vidScaleFactor: { type: "number", default: defaults.vidScaleFactor, exclusiveMinimum: 0 },
    keepShotsDays: { type: ["integer", "null"], default: defaults.keepShotsDays, minimum: 0 },
    compressShots: { type: "boolean", default: defaults.compressShots },
    compressedExt: { type: "string", default: defaults.compressedExt },
    dailyCaptureHours: {
      type: "number",
      default: defaults.dailyCaptureHours,
      exclusiveMinimum: 0,
      maximum: 24,
    },
    targetVideoSeconds: {
      type: "number",
      default: defaults.targetVideoSeconds,
      exclusiveMinimum: 0,
    },
  };
}

/**
 * Open the settings store. `home` points it somewhere other than the
 * user's home directory.
 */
export function createConfigStore(home: string = os.homedir()): Conf<Config> {
  try {
    return new Conf<Config>({
      cwd: home,
      configName: CONFIG_NAME,
      schema: buildSchema(defaultConfig(home)),
    });
  } catch (error) {
    throw new ConfigError("Failed to open config file", toError(error), {
      path: path.join(home, `${CONFIG_NAME}.json`),
    });
  }
}

/**
 * Load, validate and freeze the configuration. Nothing downstream may
 * change it.
 */
export function loadConfig(home: string = os.homedir()): FrozenConfig {
  const store = createConfigStore(home);
  const result = configSchema.safeParse(store.store);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError("Invalid configuration", undefined, {
      path: store.path,
      issues,
    });
  }

  logger.debug("Configuration loaded", { path: store.path });
  return Object.freeze(result.data);
}
