import { z } from "zod";

import { isBlobUrl } from "./blob";

// Optional metadata never fails the parse: missing or mistyped values become null.
const optionalString = z
  .string()
  .nullish()
  .catch(null)
  .transform((v) => v ?? null);

const optionalNumber = z
  .number()
  .nullish()
  .catch(null)
  .transform((v) => v ?? null);

/**
 * Storage BlobCreated event payload as delivered by Event Grid.
 * Only the fields forwarded to the queue are validated.
 */
export const BlobCreatedEventSchema = z.object({
  id: z.string().min(1),
  subject: z.string().min(1),
  eventType: z.string().min(1),
  topic: optionalString,
  data: z.object({
    url: z
      .string()
      .url()
      .refine(isBlobUrl, { message: "must name a container and a blob" }),
    blobType: optionalString,
    contentType: optionalString,
    contentLength: optionalNumber,
  }),
});

export type BlobCreatedNotification = z.output<typeof BlobCreatedEventSchema>;

export type ParsedNotification =
  | { success: true; notification: BlobCreatedNotification }
  | { success: false; issues: string[] };

/**
 * Subject looks like /blobServices/default/containers/{container}/blobs/{path}
 */
export function blobNameFromSubject(subject: string): string {
  return subject.split("/").pop() ?? "";
}

export function parseBlobCreatedEvent(event: unknown): ParsedNotification {
  const parsed = BlobCreatedEventSchema.safeParse(event);
  if (parsed.success) {
    return { success: true, notification: parsed.data };
  }

  return {
    success: false,
    issues: parsed.error.issues.map((issue) =>
      issue.path.length
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    ),
  };
}
