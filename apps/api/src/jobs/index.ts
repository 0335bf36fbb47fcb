import type { Worker } from "bullmq";
import { createModuleLogger } from "../lib/logger.js";
import type { DispatchDeps } from "../modules/messages/dispatch.service.js";
import { startDispatchWorker } from "./dispatch/dispatch.worker.js";
import { closeQueues } from "./queues.js";

const log = createModuleLogger("jobs");

/**
 * Module-level reference to started workers.
 * Used by `closeJobs()` to drain and close them.
 */
const _workers: Worker[] = [];

/**
 * Starts every BullMQ worker. Called once from `buildApp()`.
 */
export function registerJobs(deps: DispatchDeps): void {
  _workers.push(startDispatchWorker(deps));
  log.info(
    { concurrency: deps.config.dispatch.concurrency },
    "Dispatch worker started",
  );
}

/**
 * Lets in-flight jobs finish, then closes workers and queues.
 * Called from the Fastify `onClose` hook.
 */
export async function closeJobs(): Promise<void> {
  await Promise.all(_workers.map((w) => w.close()));
  _workers.length = 0;
  await closeQueues();
  log.info("All workers and queues closed");
}
