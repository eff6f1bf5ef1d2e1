import * as fs from "fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { configureLogger, logger } from "../../src/utils/logger";
import { makeTempDir, removeDir } from "../helpers/fixtures";

describe("logger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    configureLogger({ dir: null, level: "info" });
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it("stays on the console until a directory is configured", () => {
    expect(logger.getLogFilePath()).toBeNull();
    logger.info("console only");
    expect(console.log).toHaveBeenCalledWith("[INFO] console only", "");
  });

  it("writes entries at or above the level to the daily file", async () => {
    configureLogger({ dir, level: "warn" });

    logger.info("below the level");
    logger.warn("disk is filling up", { freeMb: 12 });

    const logPath = logger.getLogFilePath();
    expect(logPath).not.toBeNull();
    const content = await fs.readFile(logPath ?? "", "utf8");

    expect(content).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] disk is filling up\n/);
    expect(content).toContain('"freeMb": 12');
    expect(content).not.toContain("below the level");
    expect(console.log).not.toHaveBeenCalled();
  });
});
