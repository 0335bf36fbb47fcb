import { Queue } from "bullmq";
import { getConfig } from "../lib/config.js";
import { getRedisClient } from "../lib/redis.js";
import {
  DISPATCH_QUEUE_NAME,
  type DispatchJobData,
  type DispatchJobResult,
} from "./dispatch/dispatch.types.js";

export type DispatchBullQueue = Queue<DispatchJobData, DispatchJobResult>;

let _dispatchQueue: DispatchBullQueue | null = null;

/**
 * Queue holding one job per dispatch request, created on first use.
 *
 * Retry strategy comes from config (DISPATCH_ATTEMPTS / DISPATCH_BACKOFF_MS).
 * BullMQ exponential backoff waits `delay * 2^(attemptsMade - 1)`, so the
 * default 60s gives 1m → 2m → 4m when attempts are raised above 1.
 * Every attempt writes its own log entry.
 */
export function getDispatchBullQueue(): DispatchBullQueue {
  if (!_dispatchQueue) {
    const { dispatch } = getConfig();
    _dispatchQueue = new Queue<DispatchJobData, DispatchJobResult>(
      DISPATCH_QUEUE_NAME,
      {
        connection: getRedisClient(),
        defaultJobOptions: {
          removeOnComplete: { count: 1000 },
          removeOnFail: { count: 5000 },
          attempts: dispatch.attempts,
          backoff: {
            type: "exponential",
            delay: dispatch.backoffMs,
          },
        },
      },
    );
  }
  return _dispatchQueue;
}

export async function closeQueues(): Promise<void> {
  if (_dispatchQueue) {
    await _dispatchQueue.close();
    _dispatchQueue = null;
  }
}
