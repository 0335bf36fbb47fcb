import type { GatewayType } from "@wa-dispatch/shared-types";
import {
  GatewaySendFailedError,
  SEND_TIMEOUT_MS,
  type SendResult,
} from "../whatsapp.interface.js";

/**
 * Performs one provider HTTP call and maps the outcome onto the
 * GatewayProvider error contract. Shared by every provider.
 */
export async function requestGateway(
  gatewayType: GatewayType,
  label: string,
  url: string,
  init: RequestInit,
): Promise<SendResult> {
  let response: Response;
  let body: string;
  try {
    response = await fetch(url, {
      ...init,
      signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
    });
    body = await response.text();
  } catch (networkErr) {
    const reason =
      networkErr instanceof Error
        ? networkErr.name === "TimeoutError"
          ? `timed out after ${SEND_TIMEOUT_MS}ms`
          : networkErr.message
        : "Unknown network failure";
    throw new GatewaySendFailedError(
      `${label} network error: ${reason}`,
      gatewayType,
      null,
      networkErr,
    );
  }

  if (!response.ok) {
    throw new GatewaySendFailedError(
      `${label} responded ${response.status}: ${body}`,
      gatewayType,
      String(response.status),
      body,
    );
  }

  return { statusCode: response.status, responseBody: body };
}
