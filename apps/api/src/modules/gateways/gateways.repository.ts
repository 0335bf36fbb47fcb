import { randomUUID } from "node:crypto";
import type pg from "pg";
import type {
  ExternalRestGateway,
  Gateway,
  MetaCloudApiGateway,
} from "@wa-dispatch/shared-types";
import { UnknownGatewayTypeError } from "../whatsapp/whatsapp.interface.js";
import {
  StoredExternalRestConfigSchema,
  StoredMetaCloudApiConfigSchema,
} from "./gateways.schema.js";
import { InvalidConfigError } from "./gateways.errors.js";

type ServerAssigned = "id" | "createdAt" | "updatedAt";

export type NewGateway =
  | Omit<ExternalRestGateway, ServerAssigned>
  | Omit<MetaCloudApiGateway, ServerAssigned>;

export interface GatewayRepository {
  findById(id: string): Promise<Gateway | null>;
  list(filter: { activeOnly: boolean }): Promise<Gateway[]>;
  create(input: NewGateway): Promise<Gateway>;
  /** Persists name, active flag and config. `type` is never rewritten. */
  save(gateway: Gateway): Promise<Gateway>;
}

type GatewayRow = {
  id: string;
  name: string;
  type: string;
  active: boolean;
  config: unknown;
  createdAt: Date;
  updatedAt: Date;
};

const COLUMNS = `"id", "name", "type", "active", "config", "createdAt", "updatedAt"`;

export function toGateway(row: GatewayRow): Gateway {
  const base = {
    id: row.id,
    name: row.name,
    active: row.active,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };

  switch (row.type) {
    case "external_rest": {
      const parsed = StoredExternalRestConfigSchema.safeParse(row.config);
      if (!parsed.success) {
        throw new InvalidConfigError(
          `Gateway ${row.id} has an invalid external_rest config`,
        );
      }
      return { ...base, type: "external_rest", config: parsed.data };
    }
    case "meta_cloud_api": {
      const parsed = StoredMetaCloudApiConfigSchema.safeParse(row.config);
      if (!parsed.success) {
        throw new InvalidConfigError(
          `Gateway ${row.id} has an invalid meta_cloud_api config`,
        );
      }
      return { ...base, type: "meta_cloud_api", config: parsed.data };
    }
    default:
      throw new UnknownGatewayTypeError(row.type);
  }
}

export class PgGatewayRepository implements GatewayRepository {
  constructor(private readonly pool: pg.Pool) {}

  async findById(id: string): Promise<Gateway | null> {
    const { rows } = await this.pool.query<GatewayRow>(
      `SELECT ${COLUMNS} FROM "whatsapp_gateways" WHERE "id" = $1`,
      [id],
    );
    const row = rows[0];
    return row ? toGateway(row) : null;
  }

  async list(filter: { activeOnly: boolean }): Promise<Gateway[]> {
    const { rows } = await this.pool.query<GatewayRow>(
      `SELECT ${COLUMNS} FROM "whatsapp_gateways"
       ${filter.activeOnly ? `WHERE "active" = TRUE` : ""}
       ORDER BY "name" ASC`,
    );
    return rows.map(toGateway);
  }

  async create(input: NewGateway): Promise<Gateway> {
    const { rows } = await this.pool.query<GatewayRow>(
      `INSERT INTO "whatsapp_gateways" ("id", "name", "type", "active", "config")
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${COLUMNS}`,
      [
        randomUUID(),
        input.name,
        input.type,
        input.active,
        JSON.stringify(input.config),
      ],
    );
    const row = rows[0];
    if (!row) throw new Error("INSERT into whatsapp_gateways returned no row");
    return toGateway(row);
  }

  async save(gateway: Gateway): Promise<Gateway> {
    const { rows } = await this.pool.query<GatewayRow>(
      `UPDATE "whatsapp_gateways"
       SET "name" = $2, "active" = $3, "config" = $4, "updatedAt" = now()
       WHERE "id" = $1
       RETURNING ${COLUMNS}`,
      [gateway.id, gateway.name, gateway.active, JSON.stringify(gateway.config)],
    );
    const row = rows[0];
    if (!row) throw new Error(`Gateway ${gateway.id} disappeared during update`);
    return toGateway(row);
  }
}
