import type { FastifyInstance } from "fastify";
import { ListLogsQuerySchema, LogParamsSchema } from "./logs.schema.js";
import { getLog, listLogs, retryLogEntry } from "./logs.service.js";

export async function logRoutes(fastify: FastifyInstance): Promise<void> {
  const { services } = fastify;

  /**
   * GET /api/logs
   * Newest first. Filters: sourceModel (+ sourceRecordId), gatewayId, status.
   * Paginated with `page` and `limit` (max 100).
   */
  fastify.get("/", async (request, reply) => {
    const parsed = ListLogsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: parsed.error.issues[0]?.message ?? "Invalid query params",
      });
    }

    const page = await listLogs(services, parsed.data);
    return reply.status(200).send(page);
  });

  fastify.get("/:id", async (request, reply) => {
    const params = LogParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: params.error.issues[0]?.message ?? "Invalid params",
      });
    }

    const entry = await getLog(services, params.data.id);
    return reply.status(200).send(entry);
  });

  /**
   * POST /api/logs/:id/retry
   * 202 when a new dispatch was queued; 200 with a warning when the entry
   * cannot be retried (already sent, gateway gone or inactive).
   */
  fastify.post("/:id/retry", async (request, reply) => {
    const params = LogParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: params.error.issues[0]?.message ?? "Invalid params",
      });
    }

    const result = await retryLogEntry(services, params.data.id);
    return reply.status(result.queued ? 202 : 200).send(result);
  });
}
