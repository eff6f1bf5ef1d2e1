import * as fs from "fs/promises";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ShotDirectory } from "@ompd/types";
import { Capturer } from "../../src/managers/capture/capturer";
import { DirManager } from "../../src/managers/storage";
import { FakeScreenshotSource } from "../helpers/fake-source";
import { makeTempDir, removeDir } from "../helpers/fixtures";

// A filesystem without symlink support
vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return {
    ...actual,
    symlink: vi.fn(async () => {
      const error: NodeJS.ErrnoException = new Error("operation not permitted");
      error.code = "EPERM";
      throw error;
    }),
  };
});

describe("Capturer without symlinks", () => {
  let root: string;
  let dir: ShotDirectory;
  let capturer: Capturer;

  beforeEach(async () => {
    root = await makeTempDir();
    const dirManager = new DirManager({
      shotRoot: path.join(root, "shots"),
      vidRoot: path.join(root, "videos"),
      shotType: "png",
      videoType: "mp4",
      compressedExt: "gz",
    });
    dir = await dirManager.makeShotOutputDir(new Date(2024, 2, 7, 9, 0, 0));
    capturer = new Capturer({
      interval: 20,
      shotType: "png",
      dirManager,
      source: new FakeScreenshotSource(64, 32),
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("copies the filler into every missed slot", async () => {
    await capturer.store(await capturer.captureScreen(), dir);

    const change = await capturer.dealWithChange(
      dir,
      new Date(2024, 2, 7, 10, 0, 0),
      new Date(2024, 2, 7, 10, 1, 0) // 60s, 3 intervals
    );

    expect(change).toBe("nop");
    expect(capturer.getCurrentFrame()).toBe(4);

    const filler = await fs.readFile(path.join(dir.path, "00001.png"));
    for (const name of ["00002.png", "00003.png"]) {
      const slot = path.join(dir.path, name);
      expect((await fs.lstat(slot)).isSymbolicLink()).toBe(false);
      expect((await fs.readFile(slot)).equals(filler)).toBe(true);
    }
  });
});
