/**
 * Screen Capture
 *
 * Screenshot of whichever monitor sits at the desktop origin, via
 * node-screenshots. The monitor is looked up again on every call because
 * displays come and go (laptop lid, external screen).
 */

import { Monitor } from "node-screenshots";
import { CaptureError, toError } from "../../core/app-error";

/**
 * One captured still, PNG encoded
 */
export interface CaptureResult {
  buffer: Buffer;
  width: number;
  height: number;
  captureTime: number;
}

export interface ScreenshotSource {
  capture(): Promise<CaptureResult>;
}

export class PrimaryMonitorSource implements ScreenshotSource {
  async capture(): Promise<CaptureResult> {
    const start = Date.now();

    let monitor: Monitor | null;
    try {
      monitor = Monitor.fromPoint(0, 0);
    } catch (error) {
      throw new CaptureError("Failed to look up monitor at origin", toError(error));
    }
    if (!monitor) {
      throw new CaptureError("No monitor at origin");
    }

    try {
      const image = monitor.captureImageSync();
      const buffer = image.toPngSync();
      if (buffer.length === 0) {
        throw new CaptureError("Screenshot came back empty");
      }
      return {
        buffer,
        width: image.width,
        height: image.height,
        captureTime: Date.now() - start,
      };
    } catch (error) {
      if (error instanceof CaptureError) {
        throw error;
      }
      throw new CaptureError("Screen capture failed", toError(error));
    }
  }
}
