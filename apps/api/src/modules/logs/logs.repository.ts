import { randomUUID } from "node:crypto";
import type pg from "pg";
import { z } from "zod";
import type {
  LogEntry,
  LogStatus,
  PaginatedResponse,
} from "@wa-dispatch/shared-types";
import { GatewayTypeSchema } from "../gateways/gateways.schema.js";

export type NewLogEntry = Omit<LogEntry, "id" | "timestamp">;

export interface LogFilter {
  sourceModel?: string | undefined;
  sourceRecordId?: string | undefined;
  gatewayId?: string | undefined;
  status?: LogStatus | undefined;
  page: number;
  limit: number;
}

/**
 * Append-only store of dispatch attempts. Entries are never updated.
 */
export interface LogStore {
  append(entry: NewLogEntry): Promise<LogEntry>;
  findById(id: string): Promise<LogEntry | null>;
  /** Newest first. */
  query(filter: LogFilter): Promise<PaginatedResponse<LogEntry>>;
  countByGateway(gatewayId: string): Promise<number>;
}

type LogRow = {
  id: string;
  gatewayId: string;
  gatewayType: string;
  message: string;
  phoneNumber: string;
  status: string;
  responseCode: string;
  responseBody: string;
  timestamp: Date;
  sourceModel: string | null;
  sourceRecordId: string | null;
  templateId: string | null;
  jobId: string | null;
};

const LogStatusSchema = z.enum(["success", "error"]);

const COLUMNS = `"id", "gatewayId", "gatewayType", "message", "phoneNumber", "status",
  "responseCode", "responseBody", "timestamp", "sourceModel", "sourceRecordId",
  "templateId", "jobId"`;

export function toLogEntry(row: LogRow): LogEntry {
  return {
    ...row,
    gatewayType: GatewayTypeSchema.parse(row.gatewayType),
    status: LogStatusSchema.parse(row.status),
  };
}

export class PgLogStore implements LogStore {
  constructor(private readonly pool: pg.Pool) {}

  async append(entry: NewLogEntry): Promise<LogEntry> {
    const { rows } = await this.pool.query<LogRow>(
      `INSERT INTO "whatsapp_logs" ("id", "gatewayId", "gatewayType", "message",
         "phoneNumber", "status", "responseCode", "responseBody",
         "sourceModel", "sourceRecordId", "templateId", "jobId")
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       RETURNING ${COLUMNS}`,
      [
        randomUUID(),
        entry.gatewayId,
        entry.gatewayType,
        entry.message,
        entry.phoneNumber,
        entry.status,
        entry.responseCode,
        entry.responseBody,
        entry.sourceModel,
        entry.sourceRecordId,
        entry.templateId,
        entry.jobId,
      ],
    );
    const row = rows[0];
    if (!row) throw new Error("INSERT into whatsapp_logs returned no row");
    return toLogEntry(row);
  }

  async findById(id: string): Promise<LogEntry | null> {
    const { rows } = await this.pool.query<LogRow>(
      `SELECT ${COLUMNS} FROM "whatsapp_logs" WHERE "id" = $1`,
      [id],
    );
    const row = rows[0];
    return row ? toLogEntry(row) : null;
  }

  async query(filter: LogFilter): Promise<PaginatedResponse<LogEntry>> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    const where = (column: string, value: string | undefined): void => {
      if (value === undefined) return;
      values.push(value);
      conditions.push(`"${column}" = $${values.length}`);
    };

    where("sourceModel", filter.sourceModel);
    where("sourceRecordId", filter.sourceRecordId);
    where("gatewayId", filter.gatewayId);
    where("status", filter.status);

    const whereSql =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

    const countResult = await this.pool.query<{ total: number }>(
      `SELECT COUNT(*)::int AS "total" FROM "whatsapp_logs" ${whereSql}`,
      values,
    );

    const offset = (filter.page - 1) * filter.limit;
    const { rows } = await this.pool.query<LogRow>(
      `SELECT ${COLUMNS} FROM "whatsapp_logs" ${whereSql}
       ORDER BY "timestamp" DESC, "id" DESC
       LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
      [...values, filter.limit, offset],
    );

    return {
      data: rows.map(toLogEntry),
      total: countResult.rows[0]?.total ?? 0,
      page: filter.page,
      limit: filter.limit,
    };
  }

  async countByGateway(gatewayId: string): Promise<number> {
    const { rows } = await this.pool.query<{ total: number }>(
      `SELECT COUNT(*)::int AS "total" FROM "whatsapp_logs" WHERE "gatewayId" = $1`,
      [gatewayId],
    );
    return rows[0]?.total ?? 0;
  }
}
