import { randomUUID } from "node:crypto";
import type pg from "pg";
import type { Template } from "@wa-dispatch/shared-types";
import {
  InteractiveTypeSchema,
  TemplateGatewayTypeSchema,
} from "./templates.schema.js";

export type NewTemplate = Omit<Template, "id" | "createdAt" | "updatedAt">;

export interface TemplateFilter {
  modelName?: string | undefined;
  activeOnly: boolean;
}

export interface TemplateRepository {
  findById(id: string): Promise<Template | null>;
  list(filter: TemplateFilter): Promise<Template[]>;
  create(input: NewTemplate): Promise<Template>;
  save(template: Template): Promise<Template>;
}

type TemplateRow = {
  id: string;
  name: string;
  modelName: string;
  gatewayType: string;
  defaultGatewayId: string | null;
  body: string;
  mediaUrl: string | null;
  interactiveType: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
};

const COLUMNS = `"id", "name", "modelName", "gatewayType", "defaultGatewayId", "body",
  "mediaUrl", "interactiveType", "active", "createdAt", "updatedAt"`;

function toTemplate(row: TemplateRow): Template {
  return {
    ...row,
    gatewayType: TemplateGatewayTypeSchema.parse(row.gatewayType),
    interactiveType: InteractiveTypeSchema.parse(row.interactiveType),
  };
}

export class PgTemplateRepository implements TemplateRepository {
  constructor(private readonly pool: pg.Pool) {}

  async findById(id: string): Promise<Template | null> {
    const { rows } = await this.pool.query<TemplateRow>(
      `SELECT ${COLUMNS} FROM "whatsapp_templates" WHERE "id" = $1`,
      [id],
    );
    const row = rows[0];
    return row ? toTemplate(row) : null;
  }

  async list(filter: TemplateFilter): Promise<Template[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    if (filter.modelName !== undefined) {
      values.push(filter.modelName);
      conditions.push(`"modelName" = $${values.length}`);
    }
    if (filter.activeOnly) {
      conditions.push(`"active" = TRUE`);
    }
    const whereSql =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

    const { rows } = await this.pool.query<TemplateRow>(
      `SELECT ${COLUMNS} FROM "whatsapp_templates" ${whereSql} ORDER BY "name" ASC`,
      values,
    );
    return rows.map(toTemplate);
  }

  async create(input: NewTemplate): Promise<Template> {
    const { rows } = await this.pool.query<TemplateRow>(
      `INSERT INTO "whatsapp_templates" ("id", "name", "modelName", "gatewayType",
         "defaultGatewayId", "body", "mediaUrl", "interactiveType", "active")
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${COLUMNS}`,
      [
        randomUUID(),
        input.name,
        input.modelName,
        input.gatewayType,
        input.defaultGatewayId,
        input.body,
        input.mediaUrl,
        input.interactiveType,
        input.active,
      ],
    );
    const row = rows[0];
    if (!row) throw new Error("INSERT into whatsapp_templates returned no row");
    return toTemplate(row);
  }

  async save(template: Template): Promise<Template> {
    const { rows } = await this.pool.query<TemplateRow>(
      `UPDATE "whatsapp_templates"
       SET "name" = $2, "modelName" = $3, "gatewayType" = $4,
           "defaultGatewayId" = $5, "body" = $6, "mediaUrl" = $7,
           "interactiveType" = $8, "active" = $9, "updatedAt" = now()
       WHERE "id" = $1
       RETURNING ${COLUMNS}`,
      [
        template.id,
        template.name,
        template.modelName,
        template.gatewayType,
        template.defaultGatewayId,
        template.body,
        template.mediaUrl,
        template.interactiveType,
        template.active,
      ],
    );
    const row = rows[0];
    if (!row) throw new Error(`Template ${template.id} disappeared during update`);
    return toTemplate(row);
  }
}
