import type pg from "pg";
import { withTransaction } from "./db.js";

// ---------------------------------------------------------------------------
// DDL constants
// ---------------------------------------------------------------------------
// Every block is idempotent and is re-applied on each boot.
// ---------------------------------------------------------------------------

/**
 * Gateway configuration. `config` holds the variant selected by `type`:
 * external_rest → url/httpMethod/params…, meta_cloud_api → phoneNumberId/…
 */
const GATEWAYS_DDL = `
  CREATE TABLE IF NOT EXISTS "whatsapp_gateways" (
    "id"        TEXT PRIMARY KEY,
    "name"      TEXT NOT NULL,
    "type"      TEXT NOT NULL
                CHECK ("type" IN ('external_rest', 'meta_cloud_api')),
    "active"    BOOLEAN NOT NULL DEFAULT TRUE,
    "config"    JSONB NOT NULL,
    "createdAt" TIMESTAMPTZ NOT NULL DEFAULT now(),
    "updatedAt" TIMESTAMPTZ NOT NULL DEFAULT now()
  );
`;

const TEMPLATES_DDL = `
  CREATE TABLE IF NOT EXISTS "whatsapp_templates" (
    "id"               TEXT PRIMARY KEY,
    "name"             TEXT NOT NULL,
    "modelName"        TEXT NOT NULL,
    "gatewayType"      TEXT NOT NULL DEFAULT 'both'
                       CHECK ("gatewayType" IN ('external_rest', 'meta_cloud_api', 'both')),
    "defaultGatewayId" TEXT REFERENCES "whatsapp_gateways" ("id") ON DELETE SET NULL,
    "body"             TEXT NOT NULL,
    "mediaUrl"         TEXT,
    "interactiveType"  TEXT NOT NULL DEFAULT 'none'
                       CHECK ("interactiveType" IN ('none', 'button', 'list')),
    "active"           BOOLEAN NOT NULL DEFAULT TRUE,
    "createdAt"        TIMESTAMPTZ NOT NULL DEFAULT now(),
    "updatedAt"        TIMESTAMPTZ NOT NULL DEFAULT now()
  );
`;

/**
 * Append-only audit trail: one row per dispatch attempt.
 * `jobId` links the row to the queue job that produced it.
 */
const LOGS_DDL = `
  CREATE TABLE IF NOT EXISTS "whatsapp_logs" (
    "id"             TEXT PRIMARY KEY,
    "gatewayId"      TEXT NOT NULL REFERENCES "whatsapp_gateways" ("id") ON DELETE CASCADE,
    "gatewayType"    TEXT NOT NULL,
    "message"        TEXT NOT NULL,
    "phoneNumber"    TEXT NOT NULL,
    "status"         TEXT NOT NULL CHECK ("status" IN ('success', 'error')),
    "responseCode"   TEXT NOT NULL,
    "responseBody"   TEXT NOT NULL DEFAULT '',
    "timestamp"      TIMESTAMPTZ NOT NULL DEFAULT now(),
    "sourceModel"    TEXT,
    "sourceRecordId" TEXT,
    "templateId"     TEXT,
    "jobId"          TEXT
  );

  CREATE INDEX IF NOT EXISTS "whatsapp_logs_source_idx"
    ON "whatsapp_logs" ("sourceModel", "sourceRecordId");
  CREATE INDEX IF NOT EXISTS "whatsapp_logs_gatewayId_idx"
    ON "whatsapp_logs" ("gatewayId");
  CREATE INDEX IF NOT EXISTS "whatsapp_logs_status_idx"
    ON "whatsapp_logs" ("status");
  CREATE INDEX IF NOT EXISTS "whatsapp_logs_timestamp_idx"
    ON "whatsapp_logs" ("timestamp" DESC);
`;

/**
 * Host-application records the service renders templates against, and the
 * chatter feed outcome notes are posted to.
 */
const RECORDS_DDL = `
  CREATE TABLE IF NOT EXISTS "source_records" (
    "model"       TEXT NOT NULL,
    "id"          TEXT NOT NULL,
    "displayName" TEXT NOT NULL,
    "fields"      JSONB NOT NULL DEFAULT '{}'::jsonb,
    PRIMARY KEY ("model", "id")
  );

  CREATE TABLE IF NOT EXISTS "record_notes" (
    "id"        TEXT PRIMARY KEY,
    "model"     TEXT NOT NULL,
    "recordId"  TEXT NOT NULL,
    "body"      TEXT NOT NULL,
    "kind"      TEXT NOT NULL CHECK ("kind" IN ('note', 'warning')),
    "createdAt" TIMESTAMPTZ NOT NULL DEFAULT now(),
    FOREIGN KEY ("model", "recordId")
      REFERENCES "source_records" ("model", "id") ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS "record_notes_record_idx"
    ON "record_notes" ("model", "recordId");
`;

export const SCHEMA_DDL = [
  GATEWAYS_DDL,
  TEMPLATES_DDL,
  LOGS_DDL,
  RECORDS_DDL,
] as const;

/**
 * Applies the full DDL inside one transaction: either every table and index
 * exists afterwards or nothing was committed.
 *
 * Called once from `buildApp()` before any repository is used.
 */
export async function applySchema(pool: pg.Pool): Promise<void> {
  await withTransaction(pool, async (client) => {
    for (const ddl of SCHEMA_DDL) {
      await client.query(ddl);
    }
  });
}
