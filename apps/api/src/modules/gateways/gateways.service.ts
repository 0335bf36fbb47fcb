import type {
  ExternalRestConfig,
  Gateway,
  JsonObject,
  MetaCloudApiConfig,
} from "@wa-dispatch/shared-types";
import { isJsonObject } from "../../lib/json.js";
import type { AppServices } from "../../types/services.js";
import { DEFAULT_PARAMS_TEMPLATE } from "../whatsapp/providers/external-rest.provider.js";
import { submitMessage } from "../messages/messages.service.js";
import type { SubmitResult } from "../messages/messages.schema.js";
import {
  GatewayNotFoundError,
  InvalidConfigError,
} from "./gateways.errors.js";
import type { NewGateway } from "./gateways.repository.js";
import {
  ExternalRestConfigPatchSchema,
  MetaCloudApiConfigPatchSchema,
  type CreateGatewayInput,
  type GatewayResponse,
  type ListGatewaysQuery,
  type StructuredFieldInput,
  type TestMessageInput,
  type UpdateGatewayInput,
} from "./gateways.schema.js";

/** Shown in place of stored secrets; sending it back keeps the stored value. */
export const SECRET_MASK = "********";

export const TEST_MESSAGE = "Test message from WhatsApp Gateway";

function parseStructured(
  value: StructuredFieldInput,
  invalidJsonMessage: string,
): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    throw new InvalidConfigError(invalidJsonMessage);
  }
}

/**
 * @throws {InvalidConfigError} unless the value is a JSON object of strings
 */
export function parseHeaders(
  value: StructuredFieldInput | null,
): Record<string, string> | null {
  if (value === null || value === "") return null;

  const parsed = parseStructured(value, "Headers must be valid JSON");
  if (!isJsonObject(parsed)) {
    throw new InvalidConfigError("Headers must be a JSON object");
  }

  const headers: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(parsed)) {
    if (typeof headerValue !== "string") {
      throw new InvalidConfigError(`Header "${name}" must be a string`);
    }
    headers[name] = headerValue;
  }
  return headers;
}

/**
 * Absent → the default `{"to": "{phone}", "message": "{message}"}`.
 *
 * @throws {InvalidConfigError} unless the value is a JSON object
 */
export function parseParamsTemplate(
  value: StructuredFieldInput | null | undefined,
): JsonObject | null {
  if (value === undefined) return { ...DEFAULT_PARAMS_TEMPLATE };
  if (value === null || value === "") return null;

  const parsed = parseStructured(value, "Parameters template must be valid JSON");
  if (!isJsonObject(parsed)) {
    throw new InvalidConfigError("Parameters template must be a JSON object");
  }
  return parsed;
}

export function maskGateway(gateway: Gateway): Gateway {
  if (gateway.type === "external_rest") {
    return {
      ...gateway,
      config: {
        ...gateway.config,
        apiKeyValue: gateway.config.apiKeyValue ? SECRET_MASK : null,
      },
    };
  }
  return {
    ...gateway,
    config: { ...gateway.config, accessToken: SECRET_MASK },
  };
}

function keep<T>(patch: T | undefined, current: T): T {
  return patch === undefined ? current : patch;
}

function keepSecret(patch: string | null | undefined, current: string | null): string | null {
  if (patch === undefined || patch === SECRET_MASK) return current;
  return patch ? patch : null;
}

function patchExternalRestConfig(
  current: ExternalRestConfig,
  raw: Record<string, unknown>,
): ExternalRestConfig {
  const parsed = ExternalRestConfigPatchSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues[0]?.message ?? "Invalid external_rest config",
    );
  }
  const patch = parsed.data;

  return {
    url: keep(patch.url, current.url),
    httpMethod: keep(patch.httpMethod, current.httpMethod),
    recipientParam: keep(patch.recipientParam, current.recipientParam),
    messageParam: keep(patch.messageParam, current.messageParam),
    apiKeyParam: keep(patch.apiKeyParam, current.apiKeyParam),
    apiKeyValue: keepSecret(patch.apiKeyValue, current.apiKeyValue),
    headers:
      patch.headers === undefined ? current.headers : parseHeaders(patch.headers),
    paramsTemplate:
      patch.paramsTemplate === undefined
        ? current.paramsTemplate
        : parseParamsTemplate(patch.paramsTemplate),
  };
}

function patchMetaCloudApiConfig(
  current: MetaCloudApiConfig,
  raw: Record<string, unknown>,
): MetaCloudApiConfig {
  const parsed = MetaCloudApiConfigPatchSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues[0]?.message ?? "Invalid meta_cloud_api config",
    );
  }
  const patch = parsed.data;

  return {
    phoneNumberId: keep(patch.phoneNumberId, current.phoneNumberId),
    accessToken:
      patch.accessToken === undefined || patch.accessToken === SECRET_MASK
        ? current.accessToken
        : patch.accessToken,
    senderName: keep(patch.senderName, current.senderName),
  };
}

function toNewGateway(input: CreateGatewayInput): NewGateway {
  if (input.type === "external_rest") {
    const { config } = input;
    return {
      type: "external_rest",
      name: input.name,
      active: input.active,
      config: {
        url: config.url,
        httpMethod: config.httpMethod,
        recipientParam: config.recipientParam,
        messageParam: config.messageParam,
        apiKeyParam: config.apiKeyParam,
        apiKeyValue: config.apiKeyValue ? config.apiKeyValue : null,
        headers: parseHeaders(config.headers),
        paramsTemplate: parseParamsTemplate(config.paramsTemplate),
      },
    };
  }

  return {
    type: "meta_cloud_api",
    name: input.name,
    active: input.active,
    config: input.config,
  };
}

export async function listGateways(
  deps: Pick<AppServices, "gateways">,
  query: ListGatewaysQuery,
): Promise<Gateway[]> {
  const gateways = await deps.gateways.list({ activeOnly: query.activeOnly });
  return gateways.map(maskGateway);
}

/** Masked gateway with the number of log entries it produced. */
export async function getGateway(
  deps: Pick<AppServices, "gateways" | "logs">,
  gatewayId: string,
): Promise<GatewayResponse> {
  const gateway = await deps.gateways.findById(gatewayId);
  if (!gateway) throw new GatewayNotFoundError(gatewayId);

  const logCount = await deps.logs.countByGateway(gatewayId);
  return { ...maskGateway(gateway), logCount };
}

/**
 * @throws {InvalidConfigError} when headers or the params template are not
 *   valid structured data
 */
export async function createGateway(
  deps: Pick<AppServices, "gateways">,
  input: CreateGatewayInput,
): Promise<Gateway> {
  const created = await deps.gateways.create(toNewGateway(input));
  return maskGateway(created);
}

/**
 * Partial update. The gateway type is fixed at creation; `config` keys that
 * are absent keep their stored values.
 */
export async function updateGateway(
  deps: Pick<AppServices, "gateways">,
  gatewayId: string,
  input: UpdateGatewayInput,
): Promise<Gateway> {
  const existing = await deps.gateways.findById(gatewayId);
  if (!existing) throw new GatewayNotFoundError(gatewayId);

  if (input.type !== undefined && input.type !== existing.type) {
    throw new InvalidConfigError("Gateway type cannot be changed after creation");
  }

  const name = input.name ?? existing.name;
  const active = input.active ?? existing.active;
  const rawConfig = input.config ?? {};

  const updated: Gateway =
    existing.type === "external_rest"
      ? {
          ...existing,
          name,
          active,
          config: patchExternalRestConfig(existing.config, rawConfig),
        }
      : {
          ...existing,
          name,
          active,
          config: patchMetaCloudApiConfig(existing.config, rawConfig),
        };

  return maskGateway(await deps.gateways.save(updated));
}

/** Soft delete: log entries keep referencing the gateway. */
export async function deactivateGateway(
  deps: Pick<AppServices, "gateways">,
  gatewayId: string,
): Promise<void> {
  const existing = await deps.gateways.findById(gatewayId);
  if (!existing) throw new GatewayNotFoundError(gatewayId);
  await deps.gateways.save({ ...existing, active: false });
}

/** Queues the fixed test message through the gateway, without record linkage. */
export async function sendTestMessage(
  deps: Pick<AppServices, "gateways" | "templates" | "records" | "dispatchQueue" | "config">,
  gatewayId: string,
  input: TestMessageInput,
): Promise<SubmitResult> {
  return submitMessage(deps, {
    gatewayId,
    message: TEST_MESSAGE,
    phoneNumber: input.phoneNumber,
  });
}
