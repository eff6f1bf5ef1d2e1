import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import sharp from "sharp";
import type { ShotDate, ShotFormat } from "@ompd/types";
import { defaultConfig } from "../../src/config/store";
import type { Config, FrozenConfig } from "../../src/config/types";
import { frameFileName } from "../../src/managers/storage/shot-paths";

export async function makeTempDir(prefix = "ompd-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Solid-colour image of the given size
 */
export function solidImage(
  width: number,
  height: number,
  colour = { r: 40, g: 80, b: 120 }
): sharp.Sharp {
  return sharp({ create: { width, height, channels: 3, background: colour } });
}

export async function pngBuffer(width: number, height: number): Promise<Buffer> {
  return solidImage(width, height).png().toBuffer();
}

/**
 * Write frame `index` into `dir`; `shade` makes frames distinguishable
 */
export async function writeFrame(
  dir: string,
  index: number,
  width: number,
  height: number,
  format: ShotFormat = "png",
  shade = index
): Promise<string> {
  const filePath = path.join(dir, frameFileName(index, format));
  await solidImage(width, height, { r: shade % 256, g: 10, b: 200 })
    .toFormat(format)
    .toFile(filePath);
  return filePath;
}

export function testConfig(root: string, overrides: Partial<Config> = {}): FrozenConfig {
  return Object.freeze({
    ...defaultConfig(root),
    ffmpeg: "/usr/bin/ffmpeg",
    shotType: "png",
    handleOldDirsOnStartup: false,
    ...overrides,
  });
}

export function date(year: number, month: number, day: number): ShotDate {
  return { year, month, day };
}
