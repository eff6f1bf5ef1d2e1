/**
 * Task Supervisor
 *
 * Runs background work (video assembly, backfill) off the capture loop.
 * Failures are logged and never reach the caller.
 */

import { AppError, toError } from "./app-error";
import { logger } from "../utils/logger";

export interface TaskOutcome {
  name: string;
  ok: boolean;
  error?: Error;
}

export class TaskSupervisor {
  private readonly running = new Map<number, { name: string; promise: Promise<TaskOutcome> }>();
  private nextId = 1;

  /**
   * Start `task` in the background. The returned promise always resolves.
   */
  spawn(name: string, task: () => Promise<unknown>): Promise<TaskOutcome> {
    const id = this.nextId++;
    logger.info(`Task started: ${name}`);

    const promise = Promise.resolve()
      .then(task)
      .then(
        (): TaskOutcome => {
          logger.info(`Task finished: ${name}`);
          return { name, ok: true };
        },
        (reason: unknown): TaskOutcome => {
          const error = toError(reason);
          logger.error(
            `Task failed: ${name}`,
            AppError.isAppError(error) ? error.toJSON() : { message: error.message }
          );
          return { name, ok: false, error };
        }
      )
      .finally(() => {
        this.running.delete(id);
      });

    this.running.set(id, { name, promise });
    return promise;
  }

  runningTasks(): string[] {
    return [...this.running.values()].map((task) => task.name);
  }

  /**
   * Wait for every task running now, and any they spawn, to finish
   */
  async drain(): Promise<TaskOutcome[]> {
    const outcomes: TaskOutcome[] = [];
    while (this.running.size > 0) {
      outcomes.push(...(await Promise.all([...this.running.values()].map((t) => t.promise))));
    }
    return outcomes;
  }
}
