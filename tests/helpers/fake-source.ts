import { CaptureError } from "../../src/core/app-error";
import type { CaptureResult, ScreenshotSource } from "../../src/managers/capture/screen-capture";
import { pngBuffer } from "./fixtures";

/**
 * Screenshot source that returns a solid PNG, or fails while `failing` is set.
 * While `corrupt` is set it returns bytes no image decoder accepts.
 */
export class FakeScreenshotSource implements ScreenshotSource {
  failing = false;
  corrupt = false;
  captures = 0;

  constructor(
    private readonly width = 64,
    private readonly height = 32
  ) {}

  async capture(): Promise<CaptureResult> {
    if (this.failing) {
      throw new CaptureError("Screen is locked");
    }
    this.captures += 1;
    if (this.corrupt) {
      return {
        buffer: Buffer.from("not an image"),
        width: this.width,
        height: this.height,
        captureTime: 0,
      };
    }
    return {
      buffer: await pngBuffer(this.width, this.height),
      width: this.width,
      height: this.height,
      captureTime: 0,
    };
  }
}
