import type {
  Gateway,
  GatewayType,
  Template,
  TemplateGatewayType,
} from "@wa-dispatch/shared-types";
import { createModuleLogger } from "../../lib/logger.js";
import type { AppServices } from "../../types/services.js";
import { InvalidInputError, normalizePhone } from "../whatsapp/phone.js";
import {
  GatewayInactiveError,
  GatewayNotFoundError,
} from "../gateways/gateways.errors.js";
import {
  RecordNotFoundError,
  type SourceRecord,
} from "../records/records.interface.js";
import { renderTemplate } from "../templates/templates.renderer.js";
import {
  TemplateNotFoundError,
  systemRenderContext,
} from "../templates/templates.service.js";
import type { SubmitMessageInput, SubmitResult } from "./messages.schema.js";

const log = createModuleLogger("messages");

/** Record fields searched, in order, for a destination number. */
export const PHONE_FIELDS = ["whatsapp_number", "mobile", "phone", "phone_number"] as const;

const GATEWAY_TYPE_LABELS: Record<TemplateGatewayType, string> = {
  external_rest: "External REST API",
  meta_cloud_api: "Meta Cloud API",
  both: "all",
};

type SubmitDeps = Pick<
  AppServices,
  "gateways" | "templates" | "records" | "dispatchQueue" | "config"
>;

export function phoneFromRecord(record: SourceRecord): string | null {
  for (const field of PHONE_FIELDS) {
    const value = Object.hasOwn(record.fields, field) ? record.fields[field] : undefined;
    if (typeof value === "string" && value.trim() !== "") return value.trim();
    if (typeof value === "number") return String(value);
  }
  return null;
}

export function compatibilityWarning(
  template: Pick<Template, "gatewayType">,
  gatewayType: GatewayType,
): string | null {
  if (template.gatewayType === "both" || template.gatewayType === gatewayType) {
    return null;
  }
  return (
    `The selected template is designed for ${GATEWAY_TYPE_LABELS[template.gatewayType]} ` +
    `gateways, but you selected a ${GATEWAY_TYPE_LABELS[gatewayType]} gateway.`
  );
}

async function loadActiveGateway(
  deps: Pick<AppServices, "gateways">,
  gatewayId: string,
): Promise<Gateway> {
  const gateway = await deps.gateways.findById(gatewayId);
  if (!gateway) throw new GatewayNotFoundError(gatewayId);
  if (!gateway.active) throw new GatewayInactiveError(gatewayId);
  return gateway;
}

/**
 * Validates a send request, fills in what a template and the source record
 * can supply, and queues it. Returns as soon as the job is queued.
 *
 * @throws {InvalidInputError} missing message, phone or gateway
 * @throws {GatewayNotFoundError} | {GatewayInactiveError}
 * @throws {TemplateNotFoundError} | {RecordNotFoundError}
 */
export async function submitMessage(
  deps: SubmitDeps,
  input: SubmitMessageInput,
): Promise<SubmitResult> {
  let template: Template | null = null;
  if (input.templateId !== undefined) {
    template = await deps.templates.findById(input.templateId);
    if (!template) throw new TemplateNotFoundError(input.templateId);
  }

  const gatewayId = input.gatewayId ?? template?.defaultGatewayId;
  if (!gatewayId) {
    throw new InvalidInputError("gatewayId is required");
  }
  const gateway = await loadActiveGateway(deps, gatewayId);

  const sourceModel = input.sourceModel ?? null;
  const sourceRecordId = input.sourceRecordId ?? null;

  const needsMessage = !input.message?.trim();
  const needsPhone = !input.phoneNumber?.trim();

  let record: SourceRecord | null = null;
  if (sourceModel && sourceRecordId && (needsPhone || (needsMessage && template))) {
    record = await deps.records.findRecord(sourceModel, sourceRecordId);
    if (!record) {
      throw new RecordNotFoundError(`Record ${sourceModel}/${sourceRecordId} not found`);
    }
  }

  let message = input.message ?? "";
  if (needsMessage && template) {
    message = record
      ? renderTemplate(template, record, systemRenderContext(deps.config))
      : template.body;
  }
  if (!message.trim()) {
    throw new InvalidInputError("Message content is required");
  }

  const phoneNumber = needsPhone
    ? (record ? phoneFromRecord(record) : null)
    : (input.phoneNumber ?? null);
  if (!phoneNumber) {
    throw new InvalidInputError("Phone number is required");
  }
  // Throws InvalidInputError for input without digits.
  normalizePhone(phoneNumber, deps.config.defaultCountryCode);

  const warnings: string[] = [];
  const warning = template ? compatibilityWarning(template, gateway.type) : null;
  if (warning) warnings.push(warning);

  const jobId = await deps.dispatchQueue.submit({
    gatewayId: gateway.id,
    message,
    phoneNumber,
    sourceModel,
    sourceRecordId,
    templateId: template?.id ?? null,
  });

  log.info({ jobId, gatewayId: gateway.id, templateId: template?.id }, "Message queued");
  return { jobId, warnings };
}
