import type { Template } from "@wa-dispatch/shared-types";
import type { AppConfig } from "../../lib/config.js";
import type { AppServices } from "../../types/services.js";
import { GatewayNotFoundError } from "../gateways/gateways.errors.js";
import {
  RecordNotFoundError,
  type RecordHost,
  type SourceRecord,
} from "../records/records.interface.js";
import {
  listAvailablePlaceholders,
  renderTemplate,
  validateTemplateBody,
  type PlaceholderInfo,
  type RenderContext,
} from "./templates.renderer.js";
import type {
  CreateTemplateInput,
  ListTemplatesQuery,
  TemplatePreview,
  UpdateTemplateInput,
} from "./templates.schema.js";

export class TemplateNotFoundError extends Error {
  constructor(public readonly templateId: string) {
    super(`Template ${templateId} not found`);
    this.name = "TemplateNotFoundError";
  }
}

/** Render context for server-side renders: the configured system user. */
export function systemRenderContext(
  config: Pick<AppConfig, "company" | "systemUser">,
): RenderContext {
  return { user: config.systemUser, company: config.company };
}

async function assertGatewayExists(
  deps: Pick<AppServices, "gateways">,
  gatewayId: string | null,
): Promise<void> {
  if (gatewayId === null) return;
  const gateway = await deps.gateways.findById(gatewayId);
  if (!gateway) throw new GatewayNotFoundError(gatewayId);
}

export async function getTemplate(
  deps: Pick<AppServices, "templates">,
  templateId: string,
): Promise<Template> {
  const template = await deps.templates.findById(templateId);
  if (!template) throw new TemplateNotFoundError(templateId);
  return template;
}

export async function listTemplates(
  deps: Pick<AppServices, "templates">,
  query: ListTemplatesQuery,
): Promise<Template[]> {
  return deps.templates.list(query);
}

/**
 * @throws {InvalidPlaceholderError} when the body uses an unknown root
 * @throws {GatewayNotFoundError} when the default gateway does not exist
 */
export async function createTemplate(
  deps: Pick<AppServices, "templates" | "gateways">,
  input: CreateTemplateInput,
): Promise<Template> {
  validateTemplateBody(input.body);
  await assertGatewayExists(deps, input.defaultGatewayId);
  return deps.templates.create(input);
}

export async function updateTemplate(
  deps: Pick<AppServices, "templates" | "gateways">,
  templateId: string,
  input: UpdateTemplateInput,
): Promise<Template> {
  const existing = await getTemplate(deps, templateId);

  if (input.body !== undefined) validateTemplateBody(input.body);
  if (input.defaultGatewayId !== undefined) {
    await assertGatewayExists(deps, input.defaultGatewayId);
  }

  return deps.templates.save({
    ...existing,
    ...(input.name !== undefined && { name: input.name }),
    ...(input.modelName !== undefined && { modelName: input.modelName }),
    ...(input.gatewayType !== undefined && { gatewayType: input.gatewayType }),
    ...(input.defaultGatewayId !== undefined && {
      defaultGatewayId: input.defaultGatewayId,
    }),
    ...(input.body !== undefined && { body: input.body }),
    ...(input.mediaUrl !== undefined && { mediaUrl: input.mediaUrl }),
    ...(input.interactiveType !== undefined && {
      interactiveType: input.interactiveType,
    }),
    ...(input.active !== undefined && { active: input.active }),
  });
}

/** Soft delete: the template stays referenced by past log entries. */
export async function deactivateTemplate(
  deps: Pick<AppServices, "templates">,
  templateId: string,
): Promise<void> {
  const existing = await getTemplate(deps, templateId);
  await deps.templates.save({ ...existing, active: false });
}

async function pickRecord(
  records: RecordHost,
  modelName: string,
  recordId: string | undefined,
): Promise<SourceRecord> {
  if (recordId !== undefined) {
    const record = await records.findRecord(modelName, recordId);
    if (!record) {
      throw new RecordNotFoundError(`Record ${modelName}/${recordId} not found`);
    }
    return record;
  }

  const sample = await records.findSample(modelName);
  if (!sample) {
    throw new RecordNotFoundError(
      `No records found in model ${modelName} to test with`,
    );
  }
  return sample;
}

/**
 * Renders the template against one record of its model, the given one or
 * the first available.
 */
export async function previewTemplate(
  deps: Pick<AppServices, "templates" | "records" | "config">,
  templateId: string,
  recordId?: string,
): Promise<TemplatePreview> {
  const template = await getTemplate(deps, templateId);
  const record = await pickRecord(deps.records, template.modelName, recordId);

  return {
    rendered: renderTemplate(template, record, systemRenderContext(deps.config)),
    record: { model: record.model, id: record.id, displayName: record.displayName },
  };
}

/**
 * Placeholders for the template's model, derived from the given record or
 * the model's first record; the generic set when the model has none.
 */
export async function getTemplatePlaceholders(
  deps: Pick<AppServices, "templates" | "records">,
  templateId: string,
  recordId?: string,
): Promise<PlaceholderInfo[]> {
  const template = await getTemplate(deps, templateId);

  if (recordId !== undefined) {
    return listAvailablePlaceholders(
      await pickRecord(deps.records, template.modelName, recordId),
    );
  }

  const sample = await deps.records.findSample(template.modelName);
  return listAvailablePlaceholders(sample ?? undefined);
}
