import type { DispatchJobState } from "@wa-dispatch/shared-types";
import type { DispatchBullQueue } from "../queues.js";
import {
  JOB_NAMES,
  type DispatchJobData,
  type DispatchJobStatus,
} from "./dispatch.types.js";

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = "JobNotFoundError";
  }
}

export class JobNotCancellableError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly state: DispatchJobState,
  ) {
    super(`Job ${jobId} is ${state} and can no longer be cancelled`);
    this.name = "JobNotCancellableError";
  }
}

/**
 * Submission side of the worker pool: queue a dispatch, poll it, or withdraw
 * it before a worker picks it up.
 */
export interface DispatchQueue {
  /** Resolves with the job id as soon as the job is stored. */
  submit(request: DispatchJobData): Promise<string>;
  /** @throws {JobNotFoundError} */
  getStatus(jobId: string): Promise<DispatchJobStatus>;
  /** @throws {JobNotFoundError} | {JobNotCancellableError} */
  cancel(jobId: string): Promise<void>;
}

const CANCELLABLE_STATES: ReadonlySet<DispatchJobState> = new Set([
  "waiting",
  "delayed",
]);

/** Folds BullMQ's job states onto the ones exposed by the API. */
export function toDispatchJobState(state: string): DispatchJobState {
  switch (state) {
    case "waiting":
    case "prioritized":
      return "waiting";
    case "delayed":
    case "active":
    case "completed":
    case "failed":
      return state;
    default:
      return "unknown";
  }
}

export class BullDispatchQueue implements DispatchQueue {
  constructor(private readonly queue: DispatchBullQueue) {}

  async submit(request: DispatchJobData): Promise<string> {
    const job = await this.queue.add(JOB_NAMES.SEND_MESSAGE, request);
    if (!job.id) {
      throw new Error("BullMQ accepted the dispatch job without assigning an id");
    }
    return job.id;
  }

  async getStatus(jobId: string): Promise<DispatchJobStatus> {
    const job = await this.queue.getJob(jobId);
    if (!job) throw new JobNotFoundError(jobId);

    const state = toDispatchJobState(await job.getState());
    return {
      jobId,
      state,
      attemptsMade: job.attemptsMade,
      failedReason: job.failedReason ? job.failedReason : null,
      result: state === "completed" ? (job.returnvalue ?? null) : null,
    };
  }

  async cancel(jobId: string): Promise<void> {
    const job = await this.queue.getJob(jobId);
    if (!job) throw new JobNotFoundError(jobId);

    const state = toDispatchJobState(await job.getState());
    if (!CANCELLABLE_STATES.has(state)) {
      throw new JobNotCancellableError(jobId, state);
    }

    try {
      await job.remove();
    } catch {
      // A worker locked the job between the state check and the removal.
      throw new JobNotCancellableError(
        jobId,
        toDispatchJobState(await job.getState()),
      );
    }
  }
}
