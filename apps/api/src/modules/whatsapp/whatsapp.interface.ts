/**
 * Provider-agnostic WhatsApp gateway abstraction.
 *
 *   whatsapp.interface.ts   contract + errors
 *   whatsapp.registry.ts    gateway type → provider factory
 *   providers/*             one class per gateway variant
 */

import type { GatewayType } from "@wa-dispatch/shared-types";

/** Upper bound for one outbound HTTP call to a provider. */
export const SEND_TIMEOUT_MS = 30_000;

export interface SendResult {
  /** HTTP status returned by the provider. */
  statusCode: number;
  /** Raw response body, stored verbatim in the log entry. */
  responseBody: string;
}

/**
 * Thrown by providers on any send failure: non-2xx responses, transport
 * errors and timeouts.
 *
 * `responseCode` is set only when the provider actually answered.
 */
export class GatewaySendFailedError extends Error {
  constructor(
    message: string,
    public readonly gatewayType: GatewayType,
    public readonly responseCode: string | null = null,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = "GatewaySendFailedError";
  }
}

export class UnknownGatewayTypeError extends Error {
  constructor(public readonly gatewayType: string) {
    super(`No provider registered for gateway type "${gatewayType}"`);
    this.name = "UnknownGatewayTypeError";
  }
}

export interface GatewayProvider {
  readonly type: GatewayType;

  /**
   * Sends one text message.
   *
   * @param address normalized destination, "+<country><number>"
   * @throws {GatewaySendFailedError}
   */
  send(message: string, address: string): Promise<SendResult>;
}
