import type { FastifyInstance } from "fastify";
import { JobParamsSchema, SubmitMessageSchema } from "./messages.schema.js";
import { submitMessage } from "./messages.service.js";

export async function messageRoutes(fastify: FastifyInstance): Promise<void> {
  const { services } = fastify;

  /**
   * POST /api/messages
   * Validates and queues a message. Responds 202 with the job id to poll;
   * delivery happens in the dispatch worker.
   */
  fastify.post("/", async (request, reply) => {
    const parsed = SubmitMessageSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: parsed.error.issues[0]?.message ?? "Invalid input",
      });
    }

    const result = await submitMessage(services, parsed.data);
    return reply.status(202).send(result);
  });

  /**
   * GET /api/messages/jobs/:jobId
   * State of a queued dispatch; `result` holds the log entry id once completed.
   */
  fastify.get("/jobs/:jobId", async (request, reply) => {
    const params = JobParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: params.error.issues[0]?.message ?? "Invalid params",
      });
    }

    const status = await services.dispatchQueue.getStatus(params.data.jobId);
    return reply.status(200).send(status);
  });

  /**
   * DELETE /api/messages/jobs/:jobId
   * Withdraws a job that no worker has started. 409 once it is active or done.
   */
  fastify.delete("/jobs/:jobId", async (request, reply) => {
    const params = JobParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: params.error.issues[0]?.message ?? "Invalid params",
      });
    }

    await services.dispatchQueue.cancel(params.data.jobId);
    return reply.status(204).send();
  });
}
