import * as fs from "fs/promises";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FrameMetadata, ShotDirectory } from "@ompd/types";
import type { Config } from "../../src/config/types";
import { EncoderError, NoFramesError } from "../../src/core/app-error";
import { DirManager } from "../../src/managers/storage";
import { metadataPath } from "../../src/managers/storage/frame-metadata";
import { shotDirectoryFor, videoPathForDate } from "../../src/managers/storage/shot-paths";
import { buildEncoderArgs } from "../../src/managers/video/ffmpeg-builder";
import {
  MovieMaker,
  analyzeFrameDimensions,
  hasMuxer,
  roundUpToEven,
} from "../../src/managers/video/movie-maker";
import { FakeEncoderRunner } from "../helpers/fake-runner";
import { date, makeTempDir, removeDir, testConfig, writeFrame } from "../helpers/fixtures";

const metadataOf = (sizes: Array<[number, number]>): FrameMetadata => ({
  frames: sizes.map(([width, height], frame) => ({ frame, width, height })),
});

describe("analyzeFrameDimensions", () => {
  const mixed = metadataOf([
    [1920, 1080],
    [1920, 1080],
    [2560, 1440],
    [3420, 2224],
  ]);

  it("picks the most common size", () => {
    expect(analyzeFrameDimensions(mixed, 1.0)).toEqual({ width: 1920, height: 1080 });
  });

  it("scales the most common size", () => {
    expect(analyzeFrameDimensions(mixed, 0.5)).toEqual({ width: 960, height: 540 });
  });

  it("keeps both axes even for any scale", () => {
    for (const scale of [0.33, 0.7, 1.25, 2]) {
      const { width, height } = analyzeFrameDimensions(mixed, scale);
      expect(width % 2).toBe(0);
      expect(height % 2).toBe(0);
    }
  });

  it("rounds odd sizes up", () => {
    expect(analyzeFrameDimensions(metadataOf([[1001, 501]]), 1)).toEqual({ width: 1002, height: 502 });
    expect(roundUpToEven(7)).toBe(8);
    expect(roundUpToEven(8)).toBe(8);
  });

  it("breaks ties toward the smallest size", () => {
    const tied = metadataOf([
      [1280, 720],
      [1024, 768],
      [1280, 720],
      [1024, 768],
    ]);
    expect(analyzeFrameDimensions(tied, 1)).toEqual({ width: 1024, height: 768 });
  });

  it("falls back to the default size without metadata", () => {
    expect(analyzeFrameDimensions({ frames: [] }, 1)).toEqual({ width: 3420, height: 2224 });
  });
});

describe("hasMuxer", () => {
  const listing = [
    "File formats:",
    " D. = Demuxing supported",
    " .E = Muxing supported",
    " --",
    "  E matroska        Matroska",
    "  E mp4             MP4 (MPEG-4 Part 14)",
  ].join("\n");

  it("finds a listed container", async () => {
    const runner = new FakeEncoderRunner({ exitCode: 0, stdout: listing, stderr: "" });
    await expect(hasMuxer(runner, "ffmpeg", "mp4")).resolves.toBe(true);
    expect(runner.calls).toEqual([{ binary: "ffmpeg", args: ["-muxers"] }]);
  });

  it("reports a missing container", async () => {
    const runner = new FakeEncoderRunner({ exitCode: 0, stdout: listing, stderr: "" });
    await expect(hasMuxer(runner, "ffmpeg", "avi")).resolves.toBe(false);
  });
});

describe("MovieMaker", () => {
  let root: string;
  let dir: ShotDirectory;

  const build = (
    runner: FakeEncoderRunner,
    overrides: Partial<Config> = {},
    now = new Date(2024, 2, 8, 12, 0, 0)
  ) => {
    const config = testConfig(root, overrides);
    const dirManager = new DirManager({
      shotRoot: config.shotOutputDir,
      vidRoot: config.vidOutputDir,
      shotType: config.shotType,
      videoType: config.videoType,
      compressedExt: config.compressedExt,
    });
    return new MovieMaker({ config, dirManager, runner, ffmpegPath: "ffmpeg", now: () => now });
  };

  const frameBytes = (index: number) =>
    fs.readFile(path.join(dir.path, `${String(index).padStart(5, "0")}.png`));

  beforeEach(async () => {
    root = await makeTempDir();
    dir = shotDirectoryFor(path.join(root, "ompd", "shots"), date(2024, 3, 7));
    await fs.mkdir(dir.path, { recursive: true });
    await fs.mkdir(path.join(root, "ompd", "videos"), { recursive: true });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe("fixMissingFrames", () => {
    it("fills gaps with a copy of the previous frame", async () => {
      for (const index of [0, 2, 3, 5]) {
        await writeFrame(dir.path, index, 16, 8);
      }

      const filled = await build(new FakeEncoderRunner()).fixMissingFrames(dir);

      expect(filled).toEqual([1, 4]);
      expect((await fs.readdir(dir.path)).sort()).toEqual([
        "00000.png",
        "00001.png",
        "00002.png",
        "00003.png",
        "00004.png",
        "00005.png",
      ]);
      expect((await frameBytes(1)).equals(await frameBytes(0))).toBe(true);
      expect((await frameBytes(4)).equals(await frameBytes(3))).toBe(true);
      expect((await frameBytes(1)).equals(await frameBytes(2))).toBe(false);
    });

    it("copies the earliest frame into slot zero", async () => {
      await writeFrame(dir.path, 2, 16, 8);
      await writeFrame(dir.path, 3, 16, 8);

      const filled = await build(new FakeEncoderRunner()).fixMissingFrames(dir);

      expect(filled).toEqual([0, 1]);
      expect((await frameBytes(0)).equals(await frameBytes(2))).toBe(true);
      expect((await frameBytes(1)).equals(await frameBytes(2))).toBe(true);
    });

    it("does nothing on a contiguous directory", async () => {
      for (const index of [0, 2]) {
        await writeFrame(dir.path, index, 16, 8);
      }
      const maker = build(new FakeEncoderRunner());

      await maker.fixMissingFrames(dir);
      expect(await maker.fixMissingFrames(dir)).toEqual([]);
    });

    it("treats filler links as present", async () => {
      await writeFrame(dir.path, 0, 16, 8);
      await fs.symlink("00000.png", path.join(dir.path, "00001.png"));
      await writeFrame(dir.path, 2, 16, 8);

      expect(await build(new FakeEncoderRunner()).fixMissingFrames(dir)).toEqual([]);
      expect(await fs.readlink(path.join(dir.path, "00001.png"))).toBe("00000.png");
    });

    it("adds sidecar rows for filled slots in frame order", async () => {
      await writeFrame(dir.path, 0, 100, 50);
      await writeFrame(dir.path, 2, 120, 60);
      await fs.writeFile(metadataPath(dir.path), "frame,width,height\n0,100,50\n2,120,60\n");

      await build(new FakeEncoderRunner()).fixMissingFrames(dir);

      expect(await fs.readFile(metadataPath(dir.path), "utf8")).toBe(
        "frame,width,height\n0,100,50\n1,100,50\n2,120,60\n"
      );
    });

    it("fails on a directory with no frames", async () => {
      await expect(build(new FakeEncoderRunner()).fixMissingFrames(dir)).rejects.toBeInstanceOf(
        NoFramesError
      );
    });
  });

  describe("makeMovieFrom", () => {
    it("encodes the directory and keeps the encoder output", async () => {
      await writeFrame(dir.path, 0, 64, 32);
      await writeFrame(dir.path, 1, 64, 32);
      const runner = new FakeEncoderRunner({ exitCode: 0, stdout: "out", stderr: "progress\ndone\n" });

      const output = await build(runner).makeMovieFrom(dir);

      const expectedOutput = videoPathForDate(path.join(root, "ompd", "videos"), dir.date, "mp4");
      expect(output).toBe(expectedOutput);
      expect(runner.calls).toEqual([
        {
          binary: "ffmpeg",
          args: buildEncoderArgs({
            inputDir: dir.path,
            outputFile: expectedOutput,
            width: 64,
            height: 32,
            frameRate: 27,
            shotType: "png",
          }),
        },
      ]);
      expect(await fs.readFile(path.join(dir.path, "ffmpeg-stdout.log"), "utf8")).toBe("out");
      expect(await fs.readFile(path.join(dir.path, "ffmpeg-stderr.log"), "utf8")).toBe(
        "progress\ndone\n"
      );
    });

    it("surfaces the last stderr line when the encoder fails", async () => {
      await writeFrame(dir.path, 0, 64, 32);
      const runner = new FakeEncoderRunner({
        exitCode: 1,
        stdout: "",
        stderr: "Input #0\nCould not open output\n\n",
      });

      const error = await build(runner)
        .makeMovieFrom(dir)
        .then(
          () => null,
          (reason: unknown) => reason
        );

      expect(error).toBeInstanceOf(EncoderError);
      if (error instanceof EncoderError) {
        expect(error.exitCode).toBe(1);
        expect(error.lastStderrLine).toBe("Could not open output");
        expect(error.message).toBe("Issue with ffmpeg - last line of stderr: Could not open output");
      }
      expect(await fs.readFile(path.join(dir.path, "ffmpeg-stderr.log"), "utf8")).toBe(
        "Input #0\nCould not open output\n\n"
      );
    });

    it("compresses the frames after a successful encode", async () => {
      await writeFrame(dir.path, 0, 64, 32);

      await build(new FakeEncoderRunner(), { compressShots: true }).makeMovieFrom(dir);

      const names = await fs.readdir(dir.path);
      expect(names).toContain("00000.png.gz");
      expect(names).toContain("frame_metadata.csv.gz");
      expect(names).not.toContain("00000.png");
    });

    it("decompresses before encoding again", async () => {
      await writeFrame(dir.path, 0, 64, 32);
      const runner = new FakeEncoderRunner();
      const maker = build(runner, { compressShots: true });

      await maker.makeMovieFrom(dir);
      await maker.makeMovieFrom(dir);

      expect(runner.calls).toHaveLength(2);
      expect(runner.calls[1].args).toEqual(runner.calls[0].args);
    });

    it("runs the retention sweep when configured", async () => {
      await writeFrame(dir.path, 0, 64, 32);
      const older = shotDirectoryFor(path.join(root, "ompd", "shots"), date(2024, 3, 5));
      await fs.mkdir(older.path, { recursive: true });
      await fs.writeFile(
        videoPathForDate(path.join(root, "ompd", "videos"), older.date, "mp4"),
        "video"
      );

      await build(new FakeEncoderRunner(undefined, true), { keepShotsDays: 0 }).makeMovieFrom(dir);

      await expect(fs.access(older.path)).rejects.toThrow();
      await expect(fs.access(dir.path)).rejects.toThrow();
      await expect(fs.access(path.join(root, "ompd", "shots"))).resolves.toBeUndefined();
    });
  });
});
