import { UnrecoverableError, Worker, type Job } from "bullmq";
import { getRedisClient } from "../../lib/redis.js";
import { createModuleLogger } from "../../lib/logger.js";
import {
  dispatch,
  type DispatchDeps,
} from "../../modules/messages/dispatch.service.js";
import { GatewayNotFoundError } from "../../modules/gateways/gateways.errors.js";
import { InvalidInputError } from "../../modules/whatsapp/phone.js";
import {
  DISPATCH_QUEUE_NAME,
  JOB_NAMES,
  type DispatchJobData,
  type DispatchJobResult,
} from "./dispatch.types.js";

const log = createModuleLogger("dispatch-worker");

/**
 * Starts the dispatch worker pool: one BullMQ Worker processing up to
 * `config.dispatch.concurrency` jobs at a time.
 *
 * A missing gateway or an undialable number is raised as UnrecoverableError
 * and skips the remaining retries. Provider failures are re-thrown as-is and
 * follow the queue's backoff.
 */
export function startDispatchWorker(
  deps: DispatchDeps,
): Worker<DispatchJobData, DispatchJobResult> {
  const worker = new Worker<DispatchJobData, DispatchJobResult>(
    DISPATCH_QUEUE_NAME,
    async (job: Job<DispatchJobData, DispatchJobResult>) => {
      if (job.name !== JOB_NAMES.SEND_MESSAGE) {
        throw new UnrecoverableError(
          `Unsupported job "${job.name}" on ${DISPATCH_QUEUE_NAME}`,
        );
      }

      try {
        return await dispatch(deps, job.data, job.id ?? null);
      } catch (err) {
        if (err instanceof GatewayNotFoundError || err instanceof InvalidInputError) {
          throw new UnrecoverableError(err.message);
        }
        throw err;
      }
    },
    {
      connection: getRedisClient(),
      concurrency: deps.config.dispatch.concurrency,
    },
  );

  worker.on("completed", (job, result) => {
    log.info({ jobId: job.id, logId: result.logId }, "Dispatch job completed");
  });

  worker.on("failed", (job, err) => {
    log.error(
      { jobId: job?.id, attemptsMade: job?.attemptsMade, err },
      "Dispatch job failed",
    );
  });

  return worker;
}
