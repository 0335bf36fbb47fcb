import Fastify from "fastify";
import fastifyCors from "@fastify/cors";
import sensiblePlugin from "./plugins/sensible.plugin.js";
import { getConfig, type AppConfig } from "./lib/config.js";
import { createLoggerOptions } from "./lib/logger.js";
import { closePool, getPool } from "./lib/db.js";
import { closeRedisClient } from "./lib/redis.js";
import { applySchema } from "./lib/schema.js";
import { registerProviders } from "./modules/whatsapp/providers/index.js";
import { PgGatewayRepository } from "./modules/gateways/gateways.repository.js";
import { PgTemplateRepository } from "./modules/templates/templates.repository.js";
import { PgLogStore } from "./modules/logs/logs.repository.js";
import { PgRecordHost } from "./modules/records/records.repository.js";
import { gatewayRoutes } from "./modules/gateways/gateways.routes.js";
import { templateRoutes } from "./modules/templates/templates.routes.js";
import { logRoutes } from "./modules/logs/logs.routes.js";
import { messageRoutes } from "./modules/messages/messages.routes.js";
import { BullDispatchQueue } from "./jobs/dispatch/dispatch.queue.js";
import { getDispatchBullQueue } from "./jobs/queues.js";
import { registerJobs, closeJobs } from "./jobs/index.js";
import type { AppServices } from "./types/services.js";

export interface BuildAppOptions {
  /**
   * Pre-built services. When given, buildApp() touches neither PostgreSQL
   * nor Redis and starts no worker.
   */
  services?: AppServices | undefined;
}

/** Production wiring: PostgreSQL repositories and the BullMQ queue. */
export async function createServices(config: AppConfig): Promise<AppServices> {
  const pool = getPool();
  await applySchema(pool);

  return {
    config,
    gateways: new PgGatewayRepository(pool),
    templates: new PgTemplateRepository(pool),
    logs: new PgLogStore(pool),
    records: new PgRecordHost(pool),
    dispatchQueue: new BullDispatchQueue(getDispatchBullQueue()),
  };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const fastify = Fastify({ logger: createLoggerOptions() });

  registerProviders();

  const ownsInfrastructure = options.services === undefined;
  const services = options.services ?? (await createServices(getConfig()));
  const { config } = services;

  fastify.decorate("services", services);

  if (ownsInfrastructure) {
    registerJobs(services);
  }

  await fastify.register(fastifyCors, {
    origin: config.nodeEnv === "production" ? config.allowedOrigins : true,
  });

  await fastify.register(sensiblePlugin);

  await fastify.register(messageRoutes, { prefix: "/api/messages" });
  await fastify.register(gatewayRoutes, { prefix: "/api/gateways" });
  await fastify.register(templateRoutes, { prefix: "/api/templates" });
  await fastify.register(logRoutes, { prefix: "/api/logs" });

  fastify.get("/health", async (_request, _reply) => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  if (ownsInfrastructure) {
    fastify.addHook("onClose", async () => {
      await closeJobs();
      await closePool();
      await closeRedisClient();
    });
  }

  return fastify;
}
