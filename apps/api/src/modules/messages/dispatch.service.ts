import { createModuleLogger } from "../../lib/logger.js";
import type { AppServices } from "../../types/services.js";
import { normalizePhone } from "../whatsapp/phone.js";
import { ProviderRegistry } from "../whatsapp/whatsapp.registry.js";
import {
  GatewaySendFailedError,
  type SendResult,
} from "../whatsapp/whatsapp.interface.js";
import { GatewayNotFoundError } from "../gateways/gateways.errors.js";
import type { RecordHost } from "../records/records.interface.js";

const log = createModuleLogger("dispatch");

/** One message to send. This is also the dispatch job payload. */
export interface SendRequest {
  gatewayId: string;
  message: string;
  /** Raw destination as entered; normalized at dispatch time. */
  phoneNumber: string;
  sourceModel: string | null;
  sourceRecordId: string | null;
  templateId: string | null;
}

export interface DispatchOutcome {
  logId: string;
  status: "success";
  responseCode: string;
  responseBody: string;
  phoneNumber: string;
}

export type DispatchDeps = Pick<AppServices, "gateways" | "logs" | "records" | "config">;

/** Code stored on the log entry when the provider never answered. */
export const SYNTHETIC_ERROR_CODE = "500";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function postOutcomeNote(
  records: RecordHost,
  request: SendRequest,
  address: string,
  error: string | null,
): Promise<void> {
  if (!request.sourceModel || !request.sourceRecordId) return;

  const body =
    error === null
      ? `WhatsApp message sent to ${address}: ${request.message}`
      : `WhatsApp message failed to ${address}: ${request.message}\nError: ${error}`;

  try {
    await records.postNote(
      request.sourceModel,
      request.sourceRecordId,
      body,
      error === null ? "note" : "warning",
    );
  } catch (err) {
    log.warn(
      { err, sourceModel: request.sourceModel, sourceRecordId: request.sourceRecordId },
      "Failed to write dispatch outcome to the record feed",
    );
  }
}

/**
 * Performs one send attempt.
 *
 * The gateway is loaded first; everything after that produces exactly one
 * log entry, success or error, and a best-effort note on the source record.
 * Failures are re-thrown after logging so the queue records the attempt as
 * failed.
 *
 * @throws {GatewayNotFoundError} before any attempt starts (no log entry)
 */
export async function dispatch(
  deps: DispatchDeps,
  request: SendRequest,
  jobId: string | null = null,
): Promise<DispatchOutcome> {
  const gateway = await deps.gateways.findById(request.gatewayId);
  if (!gateway) {
    throw new GatewayNotFoundError(request.gatewayId);
  }

  const entryBase = {
    gatewayId: gateway.id,
    gatewayType: gateway.type,
    message: request.message,
    sourceModel: request.sourceModel,
    sourceRecordId: request.sourceRecordId,
    templateId: request.templateId,
    jobId,
  };

  let address = request.phoneNumber;
  let result: SendResult;
  try {
    address = normalizePhone(request.phoneNumber, deps.config.defaultCountryCode);
    const provider = ProviderRegistry.forGateway(gateway);
    result = await provider.send(request.message, address);
  } catch (err) {
    const message = errorMessage(err);
    log.error({ err, gatewayId: gateway.id, jobId }, "WhatsApp send error");

    try {
      await deps.logs.append({
        ...entryBase,
        phoneNumber: address,
        status: "error",
        responseCode:
          err instanceof GatewaySendFailedError && err.responseCode
            ? err.responseCode
            : SYNTHETIC_ERROR_CODE,
        responseBody: message,
      });
    } catch (appendErr) {
      log.error(
        { err: appendErr, gatewayId: gateway.id, jobId },
        "Failed to write the error log entry",
      );
    }
    await postOutcomeNote(deps.records, request, address, message);
    throw err;
  }

  const entry = await deps.logs.append({
    ...entryBase,
    phoneNumber: address,
    status: "success",
    responseCode: String(result.statusCode),
    responseBody: result.responseBody,
  });
  await postOutcomeNote(deps.records, request, address, null);

  log.info(
    { gatewayId: gateway.id, jobId, logId: entry.id },
    "WhatsApp message sent",
  );

  return {
    logId: entry.id,
    status: "success",
    responseCode: entry.responseCode,
    responseBody: entry.responseBody,
    phoneNumber: address,
  };
}
