import type {
  EventGridEvent,
  FunctionOutput,
  InvocationContext,
} from "@azure/functions";

import { classifyLeaseError, type BlobLease, type LeaseAcquirer } from "./blob";
import { parseBlobCreatedEvent } from "./notification";
import {
  buildRelayMessage,
  serializeRelayMessage,
  type RelayMessage,
} from "./relayMessage";

export type RelayOutcome =
  | { status: "relayed"; message: RelayMessage }
  | { status: "conflict"; blobName: string }
  | { status: "not-found"; blobUrl: string }
  | { status: "invalid"; issues: string[] }
  | { status: "failed"; error: Error };

export type RelayDependencies = {
  acquireLease: LeaseAcquirer;
  emit: (payload: string) => void | Promise<void>;
};

export type BlobCreatedRelayOptions = {
  acquireLease: LeaseAcquirer;
  queueOutput: FunctionOutput;
  failOnUnexpectedError: boolean;
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function failed(
  context: InvocationContext,
  message: RelayMessage,
  err: unknown
): RelayOutcome {
  const error = toError(err);
  context.error(
    `Unexpected error relaying blob ${message.blob_name}: ${error.message}`
  );
  return { status: "failed", error };
}

async function releaseLease(
  lease: BlobLease,
  message: RelayMessage,
  context: InvocationContext
): Promise<void> {
  try {
    await lease.release();
  } catch (err) {
    // The lease expires on its own unless it was taken with an infinite duration
    context.warn(
      `Failed to release lease ${lease.leaseId} on ${message.blob_url}: ${toError(err).message}`
    );
  }
}

/**
 * Relay one BlobCreated event: lease the blob, emit exactly one message,
 * release the lease on every path once it is held.
 */
export async function relayBlobCreated(
  event: unknown,
  context: InvocationContext,
  deps: RelayDependencies
): Promise<RelayOutcome> {
  const parsed = parseBlobCreatedEvent(event);
  if (!parsed.success) {
    context.error(`Invalid BlobCreated event: ${parsed.issues.join("; ")}`);
    return { status: "invalid", issues: parsed.issues };
  }

  const message = buildRelayMessage(parsed.notification);

  let lease: BlobLease;
  try {
    lease = await deps.acquireLease(message.blob_url);
  } catch (err) {
    switch (classifyLeaseError(err)) {
      case "conflict":
        context.info(
          `Another process is currently leasing the blob ${message.blob_name}. Exiting.`
        );
        return { status: "conflict", blobName: message.blob_name };
      case "not-found":
        context.error(`Blob not found: ${message.blob_url}. Processing halted.`);
        return { status: "not-found", blobUrl: message.blob_url };
      default:
        return failed(context, message, err);
    }
  }

  try {
    await deps.emit(serializeRelayMessage(message));
    context.info(`Relayed blob ${message.blob_name} (event ${message.id})`);
    return { status: "relayed", message };
  } catch (err) {
    return failed(context, message, err);
  } finally {
    await releaseLease(lease, message, context);
  }
}

/**
 * Event Grid handler writing the relay message to the queue output binding.
 * Unexpected failures are re-thrown after cleanup when failOnUnexpectedError
 * is set, so Event Grid redelivers the event. Conflicts, missing blobs and
 * invalid events always complete normally.
 */
export function createBlobCreatedRelay(options: BlobCreatedRelayOptions) {
  return async function blobCreatedRelay(
    event: EventGridEvent,
    context: InvocationContext
  ): Promise<void> {
    context.debug("EventGrid eventType:", event.eventType);
    context.debug("Subject:", event.subject);

    const outcome = await relayBlobCreated(event, context, {
      acquireLease: options.acquireLease,
      emit: (payload) => context.extraOutputs.set(options.queueOutput, payload),
    });

    if (outcome.status === "failed" && options.failOnUnexpectedError) {
      throw outcome.error;
    }
  };
}
