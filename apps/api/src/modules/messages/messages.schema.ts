import { z } from "zod";

const optionalId = z.string().trim().min(1).optional();

/**
 * Body of POST /api/messages. `message`, `phoneNumber` and `gatewayId` may be
 * omitted when a template and source record can supply them.
 */
export const SubmitMessageSchema = z
  .object({
    gatewayId: optionalId,
    message: z.string().optional(),
    phoneNumber: z.string().optional(),
    sourceModel: optionalId,
    sourceRecordId: optionalId,
    templateId: optionalId,
  })
  .refine(
    (body) => (body.sourceModel === undefined) === (body.sourceRecordId === undefined),
    { message: "sourceModel and sourceRecordId must be given together" },
  );

export const JobParamsSchema = z.object({
  jobId: z.string().min(1),
});

export type SubmitMessageInput = z.infer<typeof SubmitMessageSchema>;

export interface SubmitResult {
  jobId: string;
  /** Non-blocking issues, e.g. a template meant for another gateway type. */
  warnings: string[];
}
