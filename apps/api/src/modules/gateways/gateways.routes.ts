import type { FastifyInstance } from "fastify";
import {
  CreateGatewaySchema,
  GatewayParamsSchema,
  ListGatewaysQuerySchema,
  TestMessageSchema,
  UpdateGatewaySchema,
} from "./gateways.schema.js";
import {
  createGateway,
  deactivateGateway,
  getGateway,
  listGateways,
  sendTestMessage,
  updateGateway,
} from "./gateways.service.js";

export async function gatewayRoutes(fastify: FastifyInstance): Promise<void> {
  const { services } = fastify;

  /**
   * GET /api/gateways
   * Lists gateways with secrets masked. `?activeOnly=true` hides inactive ones.
   */
  fastify.get("/", async (request, reply) => {
    const parsed = ListGatewaysQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: parsed.error.issues[0]?.message ?? "Invalid query params",
      });
    }

    const gateways = await listGateways(services, parsed.data);
    return reply.status(200).send(gateways);
  });

  /**
   * POST /api/gateways
   * Creates a gateway. `config` is validated against the shape of `type`.
   */
  fastify.post("/", async (request, reply) => {
    const parsed = CreateGatewaySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: parsed.error.issues[0]?.message ?? "Invalid input",
      });
    }

    const gateway = await createGateway(services, parsed.data);
    return reply.status(201).send(gateway);
  });

  /**
   * GET /api/gateways/:id
   */
  fastify.get("/:id", async (request, reply) => {
    const params = GatewayParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: params.error.issues[0]?.message ?? "Invalid params",
      });
    }

    const gateway = await getGateway(services, params.data.id);
    return reply.status(200).send(gateway);
  });

  /**
   * PUT /api/gateways/:id
   * Partial update. Masked secrets sent back unchanged keep their stored value.
   */
  fastify.put("/:id", async (request, reply) => {
    const params = GatewayParamsSchema.safeParse(request.params);
    const parsed = UpdateGatewaySchema.safeParse(request.body);
    if (!params.success || !parsed.success) {
      const issues = [
        ...(params.error?.issues ?? []),
        ...(parsed.error?.issues ?? []),
      ];
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: issues[0]?.message ?? "Invalid input",
      });
    }

    const gateway = await updateGateway(services, params.data.id, parsed.data);
    return reply.status(200).send(gateway);
  });

  /**
   * DELETE /api/gateways/:id
   * Deactivates the gateway; its log entries are kept.
   */
  fastify.delete("/:id", async (request, reply) => {
    const params = GatewayParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: params.error.issues[0]?.message ?? "Invalid params",
      });
    }

    await deactivateGateway(services, params.data.id);
    return reply.status(204).send();
  });

  /**
   * POST /api/gateways/:id/test
   * Queues the fixed test message to `phoneNumber`.
   */
  fastify.post("/:id/test", async (request, reply) => {
    const params = GatewayParamsSchema.safeParse(request.params);
    const parsed = TestMessageSchema.safeParse(request.body);
    if (!params.success || !parsed.success) {
      const issues = [
        ...(params.error?.issues ?? []),
        ...(parsed.error?.issues ?? []),
      ];
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: issues[0]?.message ?? "Invalid input",
      });
    }

    const result = await sendTestMessage(services, params.data.id, parsed.data);
    return reply.status(202).send(result);
  });
}
