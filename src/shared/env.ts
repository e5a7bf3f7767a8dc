import { z } from "zod";

/**
 * App settings read by the relay, keyed by the config field they populate.
 */
const ENV_VARS = {
  queueName: "QUEUE_NAME",
  storageConnection: "QUEUE_CONNECTION",
  leaseDurationSeconds: "LEASE_DURATION_SECONDS",
  failOnUnexpectedError: "RELAY_FAIL_ON_UNEXPECTED_ERROR",
} as const;

export const RelayConfigSchema = z.object({
  queueName: z.string({ required_error: "is required" }).min(1, "is required"),
  // Name of the app setting holding the storage connection, not the connection string itself
  storageConnection: z.string().min(1).default("AzureWebJobsStorage"),
  leaseDurationSeconds: z.coerce
    .number()
    .int()
    .refine((v) => v === -1 || (v >= 15 && v <= 60), {
      message: "must be -1 or between 15 and 60",
    })
    .default(60),
  failOnUnexpectedError: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

function envName(key: PropertyKey | undefined): string {
  for (const [field, name] of Object.entries(ENV_VARS)) {
    if (field === key) return name;
  }
  return String(key);
}

export function loadRelayConfig(
  source: Record<string, string | undefined> = process.env
): RelayConfig {
  const raw = Object.fromEntries(
    Object.entries(ENV_VARS).map(([field, name]) => [field, source[name]])
  );

  const parsed = RelayConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${envName(issue.path[0])} ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return parsed.data;
}
