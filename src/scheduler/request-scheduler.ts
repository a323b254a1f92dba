// Request Scheduler for the daemon command socket
// Serializes request/response exchanges and keeps per-session statistics

import { isOk, type Result } from "option-t/plain_result";
import { toError } from "../errors.ts";

/**
 * Internal request structure with additional metadata
 */
interface InternalRequest {
  id: number;
  timestamp: Date;
  /** Runs the exchange and settles the caller's promise. Never rejects. */
  execute: (startTime: number) => Promise<void>;
  reject: (error: Error) => void;
}

/**
 * Scheduler statistics
 */
export interface SchedulerStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  queueLength: number;
  activeRequests: number;
  averageResponseTime: number;
}

/**
 * FIFO request scheduler.
 *
 * The daemon protocol is strictly request/response on one socket, so at most
 * one exchange runs at a time and exchanges start in submission order.
 */
export class RequestScheduler {
  private readonly queue: InternalRequest[] = [];
  private active: InternalRequest | null = null;
  private running = true;
  private nextId = 1;
  private readonly stats: SchedulerStats = {
    activeRequests: 0,
    averageResponseTime: 0,
    failedRequests: 0,
    queueLength: 0,
    successfulRequests: 0,
    totalRequests: 0,
  };

  /** True until {@link stop} is called. */
  isRunning(): boolean {
    return this.running;
  }

  /**
   * Queue `task` behind every previously scheduled task.
   *
   * The returned promise settles with the task's own result; it rejects if
   * the task throws or the scheduler is stopped before the task starts.
   */
  schedule<T, E>(task: () => Promise<Result<T, E>>): Promise<Result<T, E>> {
    if (!this.running) {
      return Promise.reject(new Error("Scheduler stopped"));
    }
    return new Promise((resolve, reject) => {
      this.queue.push({
        execute: async (startTime) => {
          try {
            const result = await task();
            this.recordCompletion(isOk(result), startTime);
            resolve(result);
          } catch (error) {
            this.recordCompletion(false, startTime);
            reject(toError(error));
          }
        },
        id: this.nextId++,
        reject,
        timestamp: new Date(),
      });
      this.stats.totalRequests++;
      this.processQueue();
    });
  }

  /**
   * Stop accepting work and reject every queued (not yet started) task.
   * The task in flight, if any, runs to completion.
   */
  stop(reason: Error = new Error("Scheduler stopped")): void {
    this.running = false;
    for (const request of this.queue.splice(0)) {
      request.reject(reason);
    }
  }

  /**
   * Get current scheduler statistics
   */
  getStats(): SchedulerStats {
    return {
      ...this.stats,
      activeRequests: this.active ? 1 : 0,
      queueLength: this.queue.length,
    };
  }

  /**
   * Get queue contents (for debugging)
   */
  getQueueContents(): Array<{ id: number; timestamp: Date }> {
    return this.queue.map(({ id, timestamp }) => ({ id, timestamp }));
  }

  private processQueue(): void {
    if (this.active) return;
    const request = this.queue.shift();
    if (!request) return;

    this.active = request;
    void request.execute(Date.now()).finally(() => {
      this.active = null;
      this.processQueue();
    });
  }

  // Stats are settled before the caller sees the result.
  private recordCompletion(succeeded: boolean, startTime: number): void {
    if (succeeded) this.stats.successfulRequests++;
    else this.stats.failedRequests++;
    this.updateResponseTimeStats(Date.now() - startTime);
  }

  private updateResponseTimeStats(responseTime: number): void {
    const totalCompleted =
      this.stats.successfulRequests + this.stats.failedRequests;
    if (totalCompleted <= 1) {
      this.stats.averageResponseTime = responseTime;
    } else {
      this.stats.averageResponseTime =
        (this.stats.averageResponseTime * (totalCompleted - 1) + responseTime) /
        totalCompleted;
    }
  }
}
