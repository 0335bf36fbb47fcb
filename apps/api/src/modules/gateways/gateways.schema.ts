import { z } from "zod";
import type { Gateway, JsonObject } from "@wa-dispatch/shared-types";
import { isJsonObject } from "../../lib/json.js";

export const GatewayTypeSchema = z.enum(["external_rest", "meta_cloud_api"]);
export const HttpMethodSchema = z.enum(["GET", "POST"]);

/** `headers` and `paramsTemplate` are accepted as JSON text or as objects. */
const StructuredFieldSchema = z.union([
  z.string(),
  z.record(z.string(), z.unknown()),
]);

const optionalParam = z
  .string()
  .trim()
  .nullable()
  .transform((v) => (v ? v : null));

export const ExternalRestConfigInputSchema = z.object({
  url: z.url("url must be a valid URL"),
  httpMethod: HttpMethodSchema.default("POST"),
  recipientParam: optionalParam.default("to"),
  messageParam: optionalParam.default("message"),
  apiKeyParam: optionalParam.default(null),
  apiKeyValue: z.string().nullable().default(null),
  headers: StructuredFieldSchema.nullable().default(null),
  paramsTemplate: StructuredFieldSchema.nullable().optional(),
});

export const MetaCloudApiConfigInputSchema = z.object({
  phoneNumberId: z.string().trim().min(1, "phoneNumberId is required"),
  accessToken: z.string().trim().min(1, "accessToken is required"),
  senderName: optionalParam.default(null),
});

const gatewayName = z.string().trim().min(1, "name is required").max(120);

export const CreateGatewaySchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("external_rest"),
    name: gatewayName,
    active: z.boolean().default(true),
    config: ExternalRestConfigInputSchema,
  }),
  z.object({
    type: z.literal("meta_cloud_api"),
    name: gatewayName,
    active: z.boolean().default(true),
    config: MetaCloudApiConfigInputSchema,
  }),
]);

// Patch schemas carry no defaults: an absent key keeps the stored value.
export const ExternalRestConfigPatchSchema = z.object({
  url: z.url("url must be a valid URL").optional(),
  httpMethod: HttpMethodSchema.optional(),
  recipientParam: optionalParam.optional(),
  messageParam: optionalParam.optional(),
  apiKeyParam: optionalParam.optional(),
  apiKeyValue: z.string().nullable().optional(),
  headers: StructuredFieldSchema.nullable().optional(),
  paramsTemplate: StructuredFieldSchema.nullable().optional(),
});

export const MetaCloudApiConfigPatchSchema = z.object({
  phoneNumberId: z.string().trim().min(1, "phoneNumberId is required").optional(),
  accessToken: z.string().trim().min(1, "accessToken is required").optional(),
  senderName: optionalParam.optional(),
});

export const UpdateGatewaySchema = z.object({
  name: gatewayName.optional(),
  active: z.boolean().optional(),
  /** Accepted only when it equals the stored type. */
  type: GatewayTypeSchema.optional(),
  config: z.record(z.string(), z.unknown()).optional(),
});

export const ListGatewaysQuerySchema = z.object({
  activeOnly: z
    .string()
    .optional()
    .transform((v) => v === "true"),
});

export const GatewayParamsSchema = z.object({
  id: z.string().min(1),
});

export type StructuredFieldInput = z.infer<typeof StructuredFieldSchema>;
export type CreateGatewayInput = z.infer<typeof CreateGatewaySchema>;
export type UpdateGatewayInput = z.infer<typeof UpdateGatewaySchema>;
export type ListGatewaysQuery = z.infer<typeof ListGatewaysQuerySchema>;

// ---------------------------------------------------------------------------
// Persistence shape
// ---------------------------------------------------------------------------
// Stored `config` JSONB is parsed on read; a malformed row raises
// InvalidConfigError instead of reaching a provider.
// ---------------------------------------------------------------------------

export const StoredExternalRestConfigSchema = z.object({
  url: z.string(),
  httpMethod: HttpMethodSchema,
  recipientParam: z.string().nullable(),
  messageParam: z.string().nullable(),
  apiKeyParam: z.string().nullable(),
  apiKeyValue: z.string().nullable(),
  headers: z.record(z.string(), z.string()).nullable(),
  paramsTemplate: z
    .custom<JsonObject>(isJsonObject, "paramsTemplate must be a JSON object")
    .nullable(),
});

export const StoredMetaCloudApiConfigSchema = z.object({
  phoneNumberId: z.string(),
  accessToken: z.string(),
  senderName: z.string().nullable(),
});

/** Public projection of a gateway: secrets masked, log count attached. */
export type GatewayResponse = Gateway & { logCount?: number };

export const TestMessageSchema = z.object({
  phoneNumber: z.string().trim().min(1, "phoneNumber is required"),
});

export type TestMessageInput = z.infer<typeof TestMessageSchema>;
