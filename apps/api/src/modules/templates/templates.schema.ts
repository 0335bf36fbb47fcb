import { z } from "zod";

export const TemplateGatewayTypeSchema = z.enum([
  "external_rest",
  "meta_cloud_api",
  "both",
]);

export const InteractiveTypeSchema = z.enum(["none", "button", "list"]);

export const CreateTemplateSchema = z.object({
  name: z.string().trim().min(1, "name is required").max(120),
  modelName: z.string().trim().min(1, "modelName is required"),
  gatewayType: TemplateGatewayTypeSchema.default("both"),
  defaultGatewayId: z.string().min(1).nullable().default(null),
  body: z.string().min(1, "body is required"),
  mediaUrl: z.url("mediaUrl must be a valid URL").nullable().default(null),
  interactiveType: InteractiveTypeSchema.default("none"),
  active: z.boolean().default(true),
});

export const UpdateTemplateSchema = z.object({
  name: z.string().trim().min(1, "name is required").max(120).optional(),
  modelName: z.string().trim().min(1, "modelName is required").optional(),
  gatewayType: TemplateGatewayTypeSchema.optional(),
  defaultGatewayId: z.string().min(1).nullable().optional(),
  body: z.string().min(1, "body is required").optional(),
  mediaUrl: z.url("mediaUrl must be a valid URL").nullable().optional(),
  interactiveType: InteractiveTypeSchema.optional(),
  active: z.boolean().optional(),
});

export const ListTemplatesQuerySchema = z.object({
  modelName: z.string().trim().min(1).optional(),
  activeOnly: z
    .string()
    .optional()
    .transform((v) => v === "true"),
});

export const TemplateParamsSchema = z.object({
  id: z.string().min(1),
});

/** Record to render against; the model's first record when omitted. */
export const RenderTemplateSchema = z.object({
  recordId: z.string().trim().min(1).optional(),
});

export const PlaceholdersQuerySchema = RenderTemplateSchema;

export type CreateTemplateInput = z.infer<typeof CreateTemplateSchema>;
export type UpdateTemplateInput = z.infer<typeof UpdateTemplateSchema>;
export type ListTemplatesQuery = z.infer<typeof ListTemplatesQuerySchema>;

export interface TemplatePreview {
  rendered: string;
  record: { model: string; id: string; displayName: string };
}
