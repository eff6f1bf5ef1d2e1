/**
 * Capture Loop
 *
 * Runs a tick callback, then waits one interval before the next. The wait
 * is measured from the end of the tick, so a slow tick delays the next one.
 */

/**
 * Capture loop callback function type
 */
export type CaptureLoopCallback = () => Promise<void>;

/**
 * Receives errors thrown by the callback. The loop keeps going unless
 * the handler stops it.
 */
export type CaptureLoopErrorHandler = (error: unknown) => void;

export class CaptureLoop {
  private timer: NodeJS.Timeout | null = null;
  private isActive = false;
  private interval = 1000;
  private callback: CaptureLoopCallback | null = null;
  private onError: CaptureLoopErrorHandler | null = null;
  private inFlight: Promise<void> | null = null;

  /**
   * Start the loop. The first tick runs right away.
   */
  start(intervalMs: number, callback: CaptureLoopCallback, onError: CaptureLoopErrorHandler): void {
    if (this.isActive) {
      this.stop();
    }

    this.interval = intervalMs;
    this.callback = callback;
    this.onError = onError;
    this.isActive = true;

    this.schedule(0);
  }

  private schedule(delay: number): void {
    this.timer = setTimeout(() => {
      this.inFlight = this.runLoop();
    }, delay);
  }

  private async runLoop(): Promise<void> {
    const callback = this.callback;
    if (!this.isActive || !callback) {
      return;
    }

    try {
      await callback();
    } catch (error) {
      this.onError?.(error);
    }

    if (this.isActive) {
      this.schedule(this.interval);
    }
  }

  stop(): void {
    this.isActive = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.callback = null;
  }

  /**
   * Resolves once the tick currently running (if any) has finished
   */
  async settle(): Promise<void> {
    await this.inFlight;
  }

  isRunning(): boolean {
    return this.isActive;
  }
}
