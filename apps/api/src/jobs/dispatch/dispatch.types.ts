import type { DispatchJobState } from "@wa-dispatch/shared-types";
import type {
  DispatchOutcome,
  SendRequest,
} from "../../modules/messages/dispatch.service.js";

export const DISPATCH_QUEUE_NAME = "whatsapp-dispatch";

/**
 * Job name constants. The dispatch queue carries one kind of job today; the
 * worker rejects anything else.
 */
export const JOB_NAMES = {
  SEND_MESSAGE: "send-message",
} as const;

export type DispatchJobData = SendRequest;

export type DispatchJobResult = DispatchOutcome;

/** Pollable view of one queued dispatch. */
export interface DispatchJobStatus {
  jobId: string;
  state: DispatchJobState;
  /** Attempts already run; each one wrote its own log entry. */
  attemptsMade: number;
  failedReason: string | null;
  result: DispatchJobResult | null;
}
