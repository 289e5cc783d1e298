/**
 * Configuration for the Compute client.
 */

import { z } from "zod";
import { InvalidArgumentError, OPERATION_POLL_INTERVAL_MS } from "@computekit/compute-common";
import type { ComputeLogCallback } from "@computekit/compute-common";

export const ServiceAccountCredentialsSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

export const ComputeClientConfigSchema = z
  .object({
    /** Project used for quota and authentication. Calls still name their project. */
    projectId: z.string().min(1).optional(),
    /**
     * Path to service account key file (JSON).
     * If not provided, Application Default Credentials will be used.
     */
    keyFilename: z.string().min(1).optional(),
    /** Service account credentials, alternative to keyFilename */
    credentials: ServiceAccountCredentialsSchema.optional(),
    /** Delay between two operation status queries */
    pollIntervalMs: z.number().int().positive().default(OPERATION_POLL_INTERVAL_MS),
  })
  .refine((config) => !(config.keyFilename && config.credentials), {
    message: "keyFilename and credentials are mutually exclusive",
    path: ["credentials"],
  });

export type ComputeClientSettings = z.infer<typeof ComputeClientConfigSchema>;

export type ComputeClientConfig = z.input<typeof ComputeClientConfigSchema> & {
  /** Default log sink for the client's components */
  log?: ComputeLogCallback;
};

/**
 * Validate a client configuration, filling in defaults.
 *
 * @throws InvalidArgumentError listing every problem found
 */
export function parseComputeClientConfig(config: ComputeClientConfig): ComputeClientSettings {
  // Unknown keys, the log callback included, are stripped
  const result = ComputeClientConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join(", ");
    throw new InvalidArgumentError(`Invalid compute client config: ${issues}`);
  }
  return result.data;
}
