import { blobNameFromSubject, type BlobCreatedNotification } from "./notification";

/**
 * Queue message consumed downstream. Field names are snake_case on the wire.
 */
export type RelayMessage = {
  id: string;
  source: "file";
  blob_name: string;
  blob_url: string;
  blob_type: string | null;
  content_type: string | null;
  content_length: number | null;
  topic: string | null;
  subject: string;
  event_type: string;
};

export function buildRelayMessage(
  notification: BlobCreatedNotification
): RelayMessage {
  const { data } = notification;

  return {
    id: notification.id,
    source: "file",
    blob_name: blobNameFromSubject(notification.subject),
    blob_url: data.url,
    blob_type: data.blobType,
    content_type: data.contentType,
    content_length: data.contentLength,
    topic: notification.topic,
    subject: notification.subject,
    event_type: notification.eventType,
  };
}

export function serializeRelayMessage(message: RelayMessage): string {
  return JSON.stringify(message);
}
