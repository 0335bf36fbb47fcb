import type { AppServices } from "./services.js";

declare module "fastify" {
  interface FastifyInstance {
    /**
     * Repositories, record host, queue and config. Decorated once in
     * buildApp(); route handlers pass the slice each service needs.
     */
    services: AppServices;
  }
}
