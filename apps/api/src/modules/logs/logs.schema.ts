import { z } from "zod";
import type { LogEntry } from "@wa-dispatch/shared-types";

export const ListLogsQuerySchema = z
  .object({
    sourceModel: z.string().trim().min(1).optional(),
    sourceRecordId: z.string().trim().min(1).optional(),
    gatewayId: z.string().trim().min(1).optional(),
    status: z.enum(["success", "error"]).optional(),
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),
  })
  .refine((q) => (q.sourceRecordId === undefined) || q.sourceModel !== undefined, {
    message: "sourceRecordId requires sourceModel",
  });

export const LogParamsSchema = z.object({
  id: z.string().min(1),
});

export type ListLogsQuery = z.infer<typeof ListLogsQuerySchema>;

/** A log entry as served: the source record's display name resolved. */
export type LogEntryView = LogEntry & { sourceName: string };

export type RetryResult =
  | { queued: false; warning: string }
  | { queued: true; jobId: string; message: string };
