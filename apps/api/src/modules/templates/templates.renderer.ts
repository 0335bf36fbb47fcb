import type { JsonObject, JsonValue, Template } from "@wa-dispatch/shared-types";
import type { SourceRecord } from "../records/records.interface.js";

// ---------------------------------------------------------------------------
// Render context
// ---------------------------------------------------------------------------

export interface UserContext {
  id: string;
  name: string;
  email: string | null;
  phone: string | null;
  login: string | null;
}

export interface CompanyContext {
  id: string;
  name: string;
  email: string | null;
  phone: string | null;
  website: string | null;
  vat: string | null;
}

export interface RenderContext {
  user: UserContext;
  company: CompanyContext;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ModelMismatchError extends Error {
  constructor(expected: string, actual: string) {
    super(`Template is for model ${expected}, but record is from ${actual}`);
    this.name = "ModelMismatchError";
  }
}

export class UnknownFieldError extends Error {
  constructor(
    public readonly root: PlaceholderRoot,
    public readonly field: string,
  ) {
    super(`${ROOT_LABELS[root]}${field} not found`);
    this.name = "UnknownFieldError";
  }
}

export class UnknownPlaceholderRootError extends Error {
  constructor(public readonly root: string) {
    super(`Unknown placeholder root: ${root}`);
    this.name = "UnknownPlaceholderRootError";
  }
}

export class InvalidPlaceholderError extends Error {
  constructor(public readonly placeholder: string) {
    super(
      `Invalid placeholder: ${placeholder}. ` +
        "Use ${object.field_name}, ${user.field_name}, or ${company.field_name}",
    );
    this.name = "InvalidPlaceholderError";
  }
}

// ---------------------------------------------------------------------------
// Field accessor registries
// ---------------------------------------------------------------------------

export const PLACEHOLDER_ROOTS = ["object", "user", "company"] as const;
export type PlaceholderRoot = (typeof PLACEHOLDER_ROOTS)[number];

const ROOT_LABELS: Record<PlaceholderRoot, string> = {
  object: "Field ",
  user: "User field ",
  company: "Company field ",
};

type FieldAccessor<T> = (source: T) => JsonValue;

/** Built-ins every record exposes; its own fields are looked up after these. */
const RECORD_BUILTINS = new Map<string, FieldAccessor<SourceRecord>>([
  ["id", (r) => r.id],
  ["display_name", (r) => r.displayName],
  ["model", (r) => r.model],
]);

const USER_FIELDS = new Map<string, FieldAccessor<UserContext>>([
  ["id", (u) => u.id],
  ["name", (u) => u.name],
  ["email", (u) => u.email],
  ["phone", (u) => u.phone],
  ["login", (u) => u.login],
]);

const COMPANY_FIELDS = new Map<string, FieldAccessor<CompanyContext>>([
  ["id", (c) => c.id],
  ["name", (c) => c.name],
  ["email", (c) => c.email],
  ["phone", (c) => c.phone],
  ["website", (c) => c.website],
  ["vat", (c) => c.vat],
]);

function isRoot(value: string): value is PlaceholderRoot {
  return PLACEHOLDER_ROOTS.some((root) => root === value);
}

function ownField(obj: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(obj, key) ? obj[key] : undefined;
}

function resolveFirstSegment(
  root: PlaceholderRoot,
  field: string,
  record: SourceRecord,
  context: RenderContext,
): JsonValue | undefined {
  switch (root) {
    case "object": {
      const builtin = RECORD_BUILTINS.get(field);
      return builtin ? builtin(record) : ownField(record.fields, field);
    }
    case "user":
      return USER_FIELDS.get(field)?.(context.user);
    case "company":
      return COMPANY_FIELDS.get(field)?.(context.company);
  }
}

/**
 * Resolves one placeholder path ("object.partner.name") to a value.
 * A null on the way resolves to null; a missing segment throws.
 */
export function resolvePlaceholder(
  path: string,
  record: SourceRecord,
  context: RenderContext,
): JsonValue {
  const [rootName = "", ...segments] = path.trim().split(".");
  if (!isRoot(rootName)) {
    throw new UnknownPlaceholderRootError(rootName);
  }

  const [first, ...rest] = segments;
  if (first === undefined || first === "") {
    throw new InvalidPlaceholderError(`\${${path}}`);
  }

  const head = resolveFirstSegment(rootName, first, record, context);
  if (head === undefined) {
    throw new UnknownFieldError(rootName, first);
  }

  let current: JsonValue = head;

  for (const segment of rest) {
    if (current === null) return null;

    const next: JsonValue | undefined =
      typeof current === "object" && !Array.isArray(current)
        ? ownField(current, segment)
        : undefined;
    if (next === undefined) {
      throw new UnknownFieldError(rootName, segment);
    }
    current = next;
  }

  return current;
}

export function formatValue(value: JsonValue): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    return value.map((item) => formatValue(item)).join(", ");
  }
  return JSON.stringify(value);
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const PLACEHOLDER_PATTERN = /\$\{([^}]+)\}/g;
const FIELD_SEGMENT = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Substitutes every `${root.field...}` in `body`. Each placeholder is replaced
 * by its own span in one pass; a failing placeholder becomes
 * `[Error: <message>]` and the rest still render.
 */
export function renderBody(
  body: string,
  record: SourceRecord,
  context: RenderContext,
): string {
  return body.replace(PLACEHOLDER_PATTERN, (_match, path: string) => {
    try {
      return formatValue(resolvePlaceholder(path, record, context));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return `[Error: ${message}]`;
    }
  });
}

/**
 * @throws {ModelMismatchError} when the record is not of the template's model
 */
export function renderTemplate(
  template: Pick<Template, "body" | "modelName">,
  record: SourceRecord,
  context: RenderContext,
): string {
  if (record.model !== template.modelName) {
    throw new ModelMismatchError(template.modelName, record.model);
  }
  return renderBody(template.body, record, context);
}

/**
 * Save-time check: every placeholder must start with a known root and a dot.
 * Fields are only resolved at render time.
 *
 * @throws {InvalidPlaceholderError}
 */
export function validateTemplateBody(body: string): void {
  for (const match of body.matchAll(PLACEHOLDER_PATTERN)) {
    const [placeholder = "", path = ""] = match;
    const trimmed = path.trim();
    if (!PLACEHOLDER_ROOTS.some((root) => trimmed.startsWith(`${root}.`))) {
      throw new InvalidPlaceholderError(placeholder);
    }
  }
}

export interface PlaceholderInfo {
  placeholder: string;
  description: string;
}

/**
 * Placeholders usable with `record` (or with any record when omitted),
 * sorted by placeholder. A field holding an object with a `name` is offered
 * as `${object.<field>.name}`.
 */
export function listAvailablePlaceholders(record?: SourceRecord): PlaceholderInfo[] {
  const entries: PlaceholderInfo[] = [
    { placeholder: "${object.display_name}", description: "Display Name" },
    { placeholder: "${object.id}", description: "Record ID" },
    { placeholder: "${user.name}", description: "Current User Name" },
    { placeholder: "${company.name}", description: "Company Name" },
  ];

  for (const [key, value] of Object.entries(record?.fields ?? {})) {
    if (!FIELD_SEGMENT.test(key) || RECORD_BUILTINS.has(key)) continue;
    const nested =
      value !== null &&
      typeof value === "object" &&
      !Array.isArray(value) &&
      Object.hasOwn(value, "name");
    entries.push({
      placeholder: nested ? `\${object.${key}.name}` : `\${object.${key}}`,
      description: key,
    });
  }

  return entries.sort((a, b) => a.placeholder.localeCompare(b.placeholder));
}
