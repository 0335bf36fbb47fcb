import type { FastifyInstance } from "fastify";
import {
  CreateTemplateSchema,
  ListTemplatesQuerySchema,
  PlaceholdersQuerySchema,
  RenderTemplateSchema,
  TemplateParamsSchema,
  UpdateTemplateSchema,
} from "./templates.schema.js";
import {
  createTemplate,
  deactivateTemplate,
  getTemplate,
  getTemplatePlaceholders,
  listTemplates,
  previewTemplate,
  updateTemplate,
} from "./templates.service.js";

export async function templateRoutes(fastify: FastifyInstance): Promise<void> {
  const { services } = fastify;

  /**
   * GET /api/templates
   * `?modelName=` narrows to one model, `?activeOnly=true` hides inactive ones.
   */
  fastify.get("/", async (request, reply) => {
    const parsed = ListTemplatesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: parsed.error.issues[0]?.message ?? "Invalid query params",
      });
    }

    const templates = await listTemplates(services, parsed.data);
    return reply.status(200).send(templates);
  });

  /**
   * POST /api/templates
   * The body is checked for malformed placeholders before it is stored.
   */
  fastify.post("/", async (request, reply) => {
    const parsed = CreateTemplateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: parsed.error.issues[0]?.message ?? "Invalid input",
      });
    }

    const template = await createTemplate(services, parsed.data);
    return reply.status(201).send(template);
  });

  fastify.get("/:id", async (request, reply) => {
    const params = TemplateParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: params.error.issues[0]?.message ?? "Invalid params",
      });
    }

    const template = await getTemplate(services, params.data.id);
    return reply.status(200).send(template);
  });

  fastify.put("/:id", async (request, reply) => {
    const params = TemplateParamsSchema.safeParse(request.params);
    const parsed = UpdateTemplateSchema.safeParse(request.body);
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

    const template = await updateTemplate(services, params.data.id, parsed.data);
    return reply.status(200).send(template);
  });

  /**
   * DELETE /api/templates/:id
   * Deactivates the template.
   */
  fastify.delete("/:id", async (request, reply) => {
    const params = TemplateParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: params.error.issues[0]?.message ?? "Invalid params",
      });
    }

    await deactivateTemplate(services, params.data.id);
    return reply.status(204).send();
  });

  /**
   * POST /api/templates/:id/render
   * Preview: renders against `recordId`, or the first record of the model.
   */
  fastify.post("/:id/render", async (request, reply) => {
    const params = TemplateParamsSchema.safeParse(request.params);
    const parsed = RenderTemplateSchema.safeParse(request.body ?? {});
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

    const preview = await previewTemplate(
      services,
      params.data.id,
      parsed.data.recordId,
    );
    return reply.status(200).send(preview);
  });

  /**
   * GET /api/templates/:id/placeholders
   * Placeholders usable in the template's body, derived from a record of its
   * model (`?recordId=` or the first one).
   */
  fastify.get("/:id/placeholders", async (request, reply) => {
    const params = TemplateParamsSchema.safeParse(request.params);
    const parsed = PlaceholdersQuerySchema.safeParse(request.query);
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

    const placeholders = await getTemplatePlaceholders(
      services,
      params.data.id,
      parsed.data.recordId,
    );
    return reply.status(200).send(placeholders);
  });
}
