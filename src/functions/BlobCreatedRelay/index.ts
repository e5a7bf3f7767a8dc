import { app, output } from "@azure/functions";

import { blobLeaseAcquirer } from "../../shared/blob";
import { loadRelayConfig } from "../../shared/env";
import { createBlobCreatedRelay } from "../../shared/relay";

const config = loadRelayConfig();

const relayQueue = output.storageQueue({
  queueName: config.queueName,
  connection: config.storageConnection,
});

export const blobCreatedRelay = createBlobCreatedRelay({
  acquireLease: blobLeaseAcquirer(config.leaseDurationSeconds),
  queueOutput: relayQueue,
  failOnUnexpectedError: config.failOnUnexpectedError,
});

app.eventGrid("blob-created-relay", {
  handler: blobCreatedRelay,
  extraOutputs: [relayQueue],
});
