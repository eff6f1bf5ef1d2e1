/**
 * Encoder Runner
 *
 * Runs the encoder binary to completion and hands back everything it
 * printed. No timeout: a hung encoder blocks the task that started it.
 */

import { spawn } from "child_process";
import { EncoderError, toError } from "../../core/app-error";
import { logger } from "../../utils/logger";

export interface EncoderResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface EncoderRunner {
  run(binary: string, args: string[]): Promise<EncoderResult>;
}

/**
 * Spawns the binary as a child process
 */
export class SpawnEncoderRunner implements EncoderRunner {
  run(binary: string, args: string[]): Promise<EncoderResult> {
    return new Promise((resolve, reject) => {
      logger.debug("Starting encoder", { binary, args: args.join(" ") });

      const child = spawn(binary, args, { stdio: ["ignore", "pipe", "pipe"] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (error) => {
        reject(new EncoderError(`Failed to start ${binary}`, null, null, toError(error)));
      });

      child.on("close", (code) => {
        resolve({
          exitCode: code,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
        });
      });
    });
  }
}

/**
 * Last line with any text in it
 */
export function lastNonEmptyLine(output: string): string | null {
  const lines = output.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.at(-1)?.trim() ?? null;
}
