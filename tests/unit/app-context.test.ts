import * as fs from "fs/promises";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Config } from "../../src/config/types";
import { AppContext } from "../../src/core/app-context";
import { FrameSlotTakenError } from "../../src/core/app-error";
import { shotDirForDate, videoPathForDate } from "../../src/managers/storage/shot-paths";
import { FakeEncoderRunner } from "../helpers/fake-runner";
import { FakeScreenshotSource } from "../helpers/fake-source";
import { date, makeTempDir, pngBuffer, removeDir, testConfig } from "../helpers/fixtures";

describe("AppContext", () => {
  let root: string;
  let now: Date;
  let source: FakeScreenshotSource;
  let runner: FakeEncoderRunner;

  const advance = (seconds: number) => {
    now = new Date(now.getTime() + seconds * 1000);
  };

  const createApp = (overrides: Partial<Config> = {}) =>
    new AppContext({
      config: testConfig(root, overrides),
      source,
      runner,
      ffmpegPath: "ffmpeg",
      now: () => now,
    });

  beforeEach(async () => {
    root = await makeTempDir();
    now = new Date(2024, 2, 7, 10, 0, 0);
    source = new FakeScreenshotSource(64, 32);
    runner = new FakeEncoderRunner();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("creates today's directory on startup", async () => {
    const app = createApp();
    const dir = await app.initialize();

    expect(dir.path).toBe(shotDirForDate(path.join(root, "ompd", "shots"), date(2024, 3, 7)));
    await expect(fs.access(path.join(root, "ompd", "videos"))).resolves.toBeUndefined();
  });

  it("resumes numbering after a restart", async () => {
    const first = createApp();
    await first.initialize();
    await first.tick();
    advance(20);
    await first.tick();

    const second = createApp();
    await second.initialize();
    expect(second.capturer.getCurrentFrame()).toBe(2);
  });

  it("stores one frame per tick", async () => {
    const app = createApp();
    const dir = await app.initialize();

    for (let i = 0; i < 3; i++) {
      await app.tick();
      advance(20);
    }

    expect((await fs.readdir(dir.path)).sort()).toEqual([
      "00000.png",
      "00001.png",
      "00002.png",
      "frame_metadata.csv",
    ]);
  });

  it("skips a tick when the screen can't be captured", async () => {
    const app = createApp();
    const dir = await app.initialize();

    source.failing = true;
    await app.tick();
    source.failing = false;
    advance(20);
    await app.tick();

    expect(await fs.readdir(dir.path)).toContain("00000.png");
    expect(app.capturer.getCurrentFrame()).toBe(1);
  });

  it("repairs a blackout longer than the sleep threshold", async () => {
    const app = createApp();
    const dir = await app.initialize();

    await app.tick();
    advance(200);
    await app.tick();

    // one real frame, filler + 9 links for 200s / 20s, then the new capture
    expect(app.capturer.getCurrentFrame()).toBe(12);
    expect(await fs.readlink(path.join(dir.path, "00010.png"))).toBe("00001.png");
    await expect(fs.access(path.join(dir.path, "00011.png"))).resolves.toBeUndefined();
  });

  it("rolls over to a new directory and encodes the old one", async () => {
    const app = createApp();
    const first = await app.initialize();

    await app.tick();
    now = new Date(2024, 2, 8, 0, 0, 5);
    await app.tick();

    const second = app.getCurrentDir();
    expect(second?.path).toBe(shotDirForDate(path.join(root, "ompd", "shots"), date(2024, 3, 8)));
    expect(await fs.readdir(second?.path ?? "")).toContain("00000.png");

    const outcomes = await app.supervisor.drain();
    expect(outcomes).toEqual([{ name: "movie 2024-03-07", ok: true }]);
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].args).toContain(path.join(first.path, "%05d.png"));
    expect(runner.calls[0].args.at(-1)).toBe(
      videoPathForDate(path.join(root, "ompd", "videos"), date(2024, 3, 7), "mp4")
    );
  });

  it("backfills past days on startup", async () => {
    const shots = path.join(root, "ompd", "shots");
    const past = shotDirForDate(shots, date(2024, 3, 1));
    await fs.mkdir(past, { recursive: true });
    await fs.writeFile(path.join(past, "00000.png"), await pngBuffer(16, 8));

    const app = createApp({ handleOldDirsOnStartup: true });
    await app.initialize();
    const outcomes = await app.supervisor.drain();

    expect(outcomes).toEqual([{ name: "backfill", ok: true }]);
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].args).toContain(path.join(past, "%05d.png"));
  });

  it("treats a taken frame slot as fatal", async () => {
    const app = createApp();
    const dir = await app.initialize();
    await app.tick();
    await fs.writeFile(path.join(dir.path, "00001.png"), "stray");
    advance(20);

    await expect(app.tick()).rejects.toBeInstanceOf(FrameSlotTakenError);
  });

  it("does not repeat a blackout repair after the next store fails", async () => {
    const app = createApp();
    const dir = await app.initialize();

    await app.tick();
    advance(200);
    source.corrupt = true;
    await expect(app.tick()).rejects.toThrow();
    expect(app.capturer.getCurrentFrame()).toBe(11);

    source.corrupt = false;
    advance(20);
    await app.tick();

    expect(app.capturer.getCurrentFrame()).toBe(12);
    const frames = (await fs.readdir(dir.path)).filter((name) => name.endsWith(".png"));
    expect(frames).toHaveLength(12);
  });

  it("rolls over once even when the first store of the day fails", async () => {
    const app = createApp();
    await app.initialize();
    const spawn = vi.spyOn(app.supervisor, "spawn");

    await app.tick();
    now = new Date(2024, 2, 8, 0, 0, 5);
    source.corrupt = true;
    await expect(app.tick()).rejects.toThrow();

    source.corrupt = false;
    advance(20);
    await app.tick();

    const today = shotDirForDate(path.join(root, "ompd", "shots"), date(2024, 3, 8));
    expect(app.getCurrentDir()?.path).toBe(today);
    expect((await fs.readdir(today)).sort()).toEqual(["00000.png", "frame_metadata.csv"]);

    await app.supervisor.drain();
    expect(spawn.mock.calls.map(([name]) => name)).toEqual(["movie 2024-03-07"]);
    expect(runner.calls).toHaveLength(1);
  });
});

