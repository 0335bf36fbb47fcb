import { STATUS_CODES } from "node:http";
import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";

/**
 * Domain errors thrown by services, by `name`. Anything not listed keeps the
 * status Fastify gave it (body parsing, payload size) or becomes a 500.
 */
export const DOMAIN_ERROR_STATUS: ReadonlyMap<string, number> = new Map([
  ["InvalidInputError", 400],
  ["InvalidConfigError", 400],
  ["InvalidPlaceholderError", 400],
  ["UnknownPlaceholderRootError", 400],
  ["UnknownFieldError", 400],
  ["UnknownGatewayTypeError", 400],
  ["GatewayNotFoundError", 404],
  ["TemplateNotFoundError", 404],
  ["RecordNotFoundError", 404],
  ["LogEntryNotFoundError", 404],
  ["JobNotFoundError", 404],
  ["GatewayInactiveError", 409],
  ["JobNotCancellableError", 409],
  ["ModelMismatchError", 409],
]);

function statusOf(error: Error): number {
  const mapped = DOMAIN_ERROR_STATUS.get(error.name);
  if (mapped !== undefined) return mapped;
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

async function sensiblePlugin(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((unknownError, request, reply) => {
    const error =
      unknownError instanceof Error ? unknownError : new Error(String(unknownError));
    const statusCode = statusOf(error);

    if (statusCode >= 500) {
      request.log.error({ err: error }, "Unhandled error");
      return reply.status(statusCode).send({
        statusCode,
        error: "Internal Server Error",
        message: "An unexpected error occurred.",
      });
    }

    request.log.warn({ err: error, statusCode }, error.message);
    return reply.status(statusCode).send({
      statusCode,
      error: STATUS_CODES[statusCode] ?? "Error",
      message: error.message,
    });
  });

  fastify.setNotFoundHandler((_request, reply) => {
    reply.status(404).send({
      statusCode: 404,
      error: "Not Found",
      message: "Route not found.",
    });
  });
}

export default fp(sensiblePlugin, {
  name: "sensible",
  fastify: "5.x",
});
