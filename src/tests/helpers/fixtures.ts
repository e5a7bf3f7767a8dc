import { InvocationContext, type EventGridEvent, type LogLevel } from "@azure/functions";

export const BLOB_URL =
  "https://teststorage.blob.core.windows.net/uploads/report-2024.csv";

export const TOPIC =
  "/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/test-rg/providers/Microsoft.Storage/storageAccounts/teststorage";

export const SUBJECT =
  "/blobServices/default/containers/uploads/blobs/report-2024.csv";

export function blobCreatedEvent(
  data: Record<string, unknown> = {}
): EventGridEvent {
  return {
    id: "evt-0001",
    topic: TOPIC,
    subject: SUBJECT,
    eventType: "Microsoft.Storage.BlobCreated",
    eventTime: "2024-05-01T12:00:00.000Z",
    dataVersion: "",
    metadataVersion: "1",
    data: {
      api: "PutBlob",
      url: BLOB_URL,
      blobType: "BlockBlob",
      contentType: "text/csv",
      contentLength: 2048,
      ...data,
    },
  };
}

export type LogEntry = { level: LogLevel; message: string };

export function createTestContext(): {
  context: InvocationContext;
  logs: LogEntry[];
} {
  const logs: LogEntry[] = [];
  const context = new InvocationContext({
    invocationId: "test-invocation",
    functionName: "blob-created-relay",
    logHandler: (level, ...args) => {
      logs.push({ level, message: args.map(String).join(" ") });
    },
  });
  return { context, logs };
}
