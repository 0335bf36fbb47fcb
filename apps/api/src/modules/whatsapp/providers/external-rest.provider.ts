import type {
  ExternalRestConfig,
  JsonObject,
  JsonValue,
} from "@wa-dispatch/shared-types";
import type { GatewayProvider, SendResult } from "../whatsapp.interface.js";
import { requestGateway } from "./http.js";

export const DEFAULT_PARAMS_TEMPLATE: JsonObject = {
  to: "{phone}",
  message: "{message}",
};

const TOKEN_PATTERN = /\{(phone|message|api_key)\}/g;

type TokenValues = ReadonlyMap<string, string>;

function substituteString(text: string, tokens: TokenValues): string {
  return text.replace(
    TOKEN_PATTERN,
    (match, name: string) => tokens.get(name) ?? match,
  );
}

/**
 * Deep copy of `value` with `{phone}`, `{message}` and `{api_key}` replaced in
 * every string leaf and every object key. Each string is scanned once, so a
 * message that itself contains "{phone}" is sent as typed.
 */
export function substituteTokens(value: JsonValue, tokens: TokenValues): JsonValue {
  if (typeof value === "string") return substituteString(value, tokens);
  if (Array.isArray(value)) return value.map((v) => substituteTokens(v, tokens));
  if (value !== null && typeof value === "object") {
    return substituteObject(value, tokens);
  }
  return value;
}

function substituteObject(obj: JsonObject, tokens: TokenValues): JsonObject {
  return Object.fromEntries(
    Object.entries(obj).map(([key, v]) => [
      substituteString(key, tokens),
      substituteTokens(v, tokens),
    ]),
  );
}

export function buildHeaders(config: ExternalRestConfig): Record<string, string> {
  return {
    "Content-Type": "application/json",
    ...(config.headers ?? {}),
  };
}

/**
 * Request parameters: the substituted template, then the explicit
 * recipient/message/api-key parameters on top.
 */
export function buildParams(
  config: ExternalRestConfig,
  message: string,
  address: string,
): JsonObject {
  const tokens = new Map([
    ["phone", address],
    ["message", message],
  ]);
  if (config.apiKeyValue) {
    tokens.set("api_key", config.apiKeyValue);
  }

  const params = substituteObject(
    config.paramsTemplate ?? DEFAULT_PARAMS_TEMPLATE,
    tokens,
  );

  if (config.recipientParam && address) {
    params[config.recipientParam] = address;
  }
  if (config.messageParam && message) {
    params[config.messageParam] = message;
  }
  if (config.apiKeyParam && config.apiKeyValue) {
    params[config.apiKeyParam] = config.apiKeyValue;
  }

  return params;
}

function queryValue(value: JsonValue): string {
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

/**
 * Scalars go as text, objects as JSON, and a list as one key per element.
 * Nulls are left out.
 */
export function buildQueryUrl(baseUrl: string, params: JsonObject): string {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(params)) {
    if (value === null) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (item !== null) url.searchParams.append(key, queryValue(item));
    }
  }
  return url.toString();
}

/**
 * Generic REST gateway: any HTTP endpoint that accepts the recipient and
 * text as query parameters (GET) or a JSON body (POST).
 */
export class ExternalRestProvider implements GatewayProvider {
  readonly type = "external_rest";

  constructor(private readonly config: ExternalRestConfig) {}

  async send(message: string, address: string): Promise<SendResult> {
    const params = buildParams(this.config, message, address);
    const headers = buildHeaders(this.config);

    if (this.config.httpMethod === "GET") {
      return requestGateway(
        this.type,
        "External REST gateway",
        buildQueryUrl(this.config.url, params),
        { method: "GET", headers },
      );
    }

    return requestGateway(this.type, "External REST gateway", this.config.url, {
      method: "POST",
      headers,
      body: JSON.stringify(params),
    });
  }
}
