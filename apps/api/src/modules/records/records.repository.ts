import { randomUUID } from "node:crypto";
import type pg from "pg";
import { isJsonObject } from "../../lib/json.js";
import type { NoteKind, RecordHost, SourceRecord } from "./records.interface.js";

type RecordRow = {
  model: string;
  id: string;
  displayName: string;
  fields: unknown;
};

function toSourceRecord(row: RecordRow): SourceRecord {
  return {
    model: row.model,
    id: row.id,
    displayName: row.displayName,
    fields: isJsonObject(row.fields) ? row.fields : {},
  };
}

/**
 * RecordHost backed by the `source_records` / `record_notes` tables the host
 * application writes to.
 */
export class PgRecordHost implements RecordHost {
  constructor(private readonly pool: pg.Pool) {}

  async findRecord(model: string, id: string): Promise<SourceRecord | null> {
    const { rows } = await this.pool.query<RecordRow>(
      `SELECT "model", "id", "displayName", "fields"
       FROM "source_records" WHERE "model" = $1 AND "id" = $2`,
      [model, id],
    );
    const row = rows[0];
    return row ? toSourceRecord(row) : null;
  }

  async findSample(model: string): Promise<SourceRecord | null> {
    const { rows } = await this.pool.query<RecordRow>(
      `SELECT "model", "id", "displayName", "fields"
       FROM "source_records" WHERE "model" = $1
       ORDER BY "id" ASC LIMIT 1`,
      [model],
    );
    const row = rows[0];
    return row ? toSourceRecord(row) : null;
  }

  async resolveDisplayName(model: string, id: string): Promise<string | null> {
    const { rows } = await this.pool.query<{ displayName: string }>(
      `SELECT "displayName" FROM "source_records" WHERE "model" = $1 AND "id" = $2`,
      [model, id],
    );
    return rows[0]?.displayName ?? null;
  }

  /** Notes on a record that no longer exists are dropped. */
  async postNote(
    model: string,
    id: string,
    body: string,
    kind: NoteKind,
  ): Promise<void> {
    await this.pool.query(
      `INSERT INTO "record_notes" ("id", "model", "recordId", "body", "kind")
       SELECT $1, $2, $3, $4, $5
       WHERE EXISTS (
         SELECT 1 FROM "source_records" WHERE "model" = $2 AND "id" = $3
       )`,
      [randomUUID(), model, id, body, kind],
    );
  }
}
