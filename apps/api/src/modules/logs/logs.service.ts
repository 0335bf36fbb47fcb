import type { LogEntry, PaginatedResponse } from "@wa-dispatch/shared-types";
import { createModuleLogger } from "../../lib/logger.js";
import type { AppServices } from "../../types/services.js";
import type { RecordHost } from "../records/records.interface.js";
import type { ListLogsQuery, LogEntryView, RetryResult } from "./logs.schema.js";

const log = createModuleLogger("logs");

export const DELETED_RECORD = "Deleted Record";
export const INVALID_RECORD = "Invalid Record";

export class LogEntryNotFoundError extends Error {
  constructor(public readonly logId: string) {
    super(`Log entry ${logId} not found`);
    this.name = "LogEntryNotFoundError";
  }
}

/**
 * Display name of the record a log entry was sent for. Best-effort: a lookup
 * failure yields a placeholder instead of failing the read.
 */
export async function resolveSourceName(
  records: RecordHost,
  entry: Pick<LogEntry, "sourceModel" | "sourceRecordId">,
): Promise<string> {
  if (!entry.sourceModel || !entry.sourceRecordId) return "";

  try {
    const name = await records.resolveDisplayName(
      entry.sourceModel,
      entry.sourceRecordId,
    );
    return name ?? DELETED_RECORD;
  } catch (err) {
    log.debug(
      { err, sourceModel: entry.sourceModel, sourceRecordId: entry.sourceRecordId },
      "Source record lookup failed",
    );
    return INVALID_RECORD;
  }
}

async function toView(records: RecordHost, entry: LogEntry): Promise<LogEntryView> {
  return { ...entry, sourceName: await resolveSourceName(records, entry) };
}

export async function listLogs(
  deps: Pick<AppServices, "logs" | "records">,
  query: ListLogsQuery,
): Promise<PaginatedResponse<LogEntryView>> {
  const page = await deps.logs.query(query);
  return {
    ...page,
    data: await Promise.all(page.data.map((entry) => toView(deps.records, entry))),
  };
}

export async function getLog(
  deps: Pick<AppServices, "logs" | "records">,
  logId: string,
): Promise<LogEntryView> {
  const entry = await deps.logs.findById(logId);
  if (!entry) throw new LogEntryNotFoundError(logId);
  return toView(deps.records, entry);
}

/**
 * Re-submits a failed attempt as a new dispatch. The original entry is left
 * untouched; the retry produces its own log entry when it runs.
 *
 * @throws {LogEntryNotFoundError}
 */
export async function retryLogEntry(
  deps: Pick<AppServices, "logs" | "gateways" | "dispatchQueue">,
  logId: string,
): Promise<RetryResult> {
  const entry = await deps.logs.findById(logId);
  if (!entry) throw new LogEntryNotFoundError(logId);

  if (entry.status === "success") {
    return { queued: false, warning: "Message was already sent successfully" };
  }

  const gateway = await deps.gateways.findById(entry.gatewayId);
  if (!gateway?.active) {
    return { queued: false, warning: "Gateway is not active or does not exist" };
  }

  const jobId = await deps.dispatchQueue.submit({
    gatewayId: entry.gatewayId,
    message: entry.message,
    phoneNumber: entry.phoneNumber,
    sourceModel: entry.sourceModel,
    sourceRecordId: entry.sourceRecordId,
    templateId: entry.templateId,
  });

  log.info({ logId, jobId }, "Log entry re-queued for dispatch");
  return { queued: true, jobId, message: "Message queued for retry" };
}
