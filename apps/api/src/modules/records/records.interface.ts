import type { JsonObject } from "@wa-dispatch/shared-types";

/**
 * A record of the host application that messages are sent on behalf of
 * (a customer, a lead, ...). `model` names its kind, `fields` holds its data.
 */
export interface SourceRecord {
  model: string;
  id: string;
  displayName: string;
  fields: JsonObject;
}

export type NoteKind = "note" | "warning";

export class RecordNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecordNotFoundError";
  }
}

/**
 * Host-application collaborator: record lookup for template rendering and
 * log display, plus the chatter feed that receives dispatch outcome notes.
 */
export interface RecordHost {
  findRecord(model: string, id: string): Promise<SourceRecord | null>;

  /** First record of `model`, used to preview templates. */
  findSample(model: string): Promise<SourceRecord | null>;

  /** Display name of the record, or null when it no longer exists. */
  resolveDisplayName(model: string, id: string): Promise<string | null>;

  postNote(model: string, id: string, body: string, kind: NoteKind): Promise<void>;
}
