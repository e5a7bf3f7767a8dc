import { BlobClient, BlobLeaseClient, RestError } from "@azure/storage-blob";
import { DefaultAzureCredential, type TokenCredential } from "@azure/identity";

/**
 * Handle on an acquired blob lease. Only valid for the invocation holding it.
 */
export type BlobLease = {
  leaseId: string;
  release(): Promise<void>;
};

export type LeaseAcquirer = (blobUrl: string) => Promise<BlobLease>;

export type LeaseFailure = "conflict" | "not-found" | "other";

// Single shared credential per warm instance
let credential: TokenCredential | undefined;

function getCredential(): TokenCredential {
  if (!credential) credential = new DefaultAzureCredential();
  return credential;
}

function parseBlobUrl(blobUrl: string): {
  container: string;
  blobName: string;
} {
  const u = new URL(blobUrl);
  // pathname: /<container>/<blobName...>
  const parts = u.pathname.replace(/^\/+/, "").split("/");
  const container = parts.shift() || "";
  const blobName = parts.join("/");
  return { container, blobName };
}

/**
 * True when the url parses and names both a container and a blob.
 */
export function isBlobUrl(blobUrl: string): boolean {
  try {
    const { container, blobName } = parseBlobUrl(blobUrl);
    return !!container && !!blobName;
  } catch {
    return false;
  }
}

/**
 * Create a BlobClient for a plain blobUrl (no SAS), authenticated with the
 * ambient identity (managed identity in Azure, developer login locally).
 */
export function blobClientFromBlobUrl(blobUrl: string): BlobClient {
  const { container, blobName } = parseBlobUrl(blobUrl);
  if (!container || !blobName) {
    throw new Error("Invalid blobUrl (missing container/blobName)");
  }

  return new BlobClient(blobUrl, getCredential());
}

async function releaseProposedLease(
  leaseClient: BlobLeaseClient,
  acquireErr: unknown
): Promise<void> {
  try {
    await leaseClient.releaseLease();
  } catch (releaseErr) {
    const reason =
      releaseErr instanceof Error ? releaseErr.message : String(releaseErr);
    const message =
      acquireErr instanceof Error ? acquireErr.message : String(acquireErr);
    throw new AggregateError(
      [acquireErr, releaseErr],
      `${message} (release of lease ${leaseClient.leaseId} also failed: ${reason})`
    );
  }
}

/**
 * Lease acquirer backed by the blob service.
 * durationSeconds is -1 (infinite) or 15..60.
 */
export function blobLeaseAcquirer(durationSeconds: number): LeaseAcquirer {
  return async (blobUrl) => {
    const leaseClient = blobClientFromBlobUrl(blobUrl).getBlobLeaseClient();
    try {
      await leaseClient.acquireLease(durationSeconds);
    } catch (err) {
      // The service may have granted the proposed lease before the call failed
      if (classifyLeaseError(err) === "other") {
        await releaseProposedLease(leaseClient, err);
      }
      throw err;
    }

    return {
      leaseId: leaseClient.leaseId,
      release: async () => {
        await leaseClient.releaseLease();
      },
    };
  };
}

/**
 * 409 means another invocation holds the lease; 404 means the blob was
 * deleted or moved after the event was emitted.
 */
export function classifyLeaseError(err: unknown): LeaseFailure {
  if (err instanceof RestError) {
    if (err.statusCode === 409) return "conflict";
    if (err.statusCode === 404) return "not-found";
  }
  return "other";
}
