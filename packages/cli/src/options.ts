/**
 * Global CLI options, resolved from flags first and the environment second.
 */

import { z } from "zod";
import { InvalidArgumentError, OPERATION_TIMEOUT_MS } from "@computekit/compute-common";

const PROJECT_REQUIRED = "--project or COMPUTEKIT_PROJECT is required";

export const CliOptionsSchema = z.object({
  project: z
    .string({ required_error: PROJECT_REQUIRED })
    .min(1, PROJECT_REQUIRED),
  zone: z.string().min(1).optional(),
  keyFile: z.string().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive().default(OPERATION_TIMEOUT_MS),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/** Raw global flags as commander hands them over. */
export type CliFlags = {
  project?: string;
  zone?: string;
  keyFile?: string;
  timeout?: string;
  verbose?: boolean;
};

export type CliEnv = Record<string, string | undefined>;

export function resolveCliOptions(flags: CliFlags, env: CliEnv = process.env): CliOptions {
  const result = CliOptionsSchema.safeParse({
    project: flags.project ?? env.COMPUTEKIT_PROJECT,
    zone: flags.zone ?? env.COMPUTEKIT_ZONE,
    keyFile: flags.keyFile ?? env.COMPUTEKIT_KEY_FILE,
    timeoutMs: flags.timeout ?? env.COMPUTEKIT_TIMEOUT_MS,
    verbose: flags.verbose ?? false,
  });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path[0] === "project" ? issue.message : `${issue.path.join(".")}: ${issue.message}`))
      .join(", ");
    throw new InvalidArgumentError(issues);
  }
  return result.data;
}

/** The zone of zonal commands; there is no default. */
export function requireZone(options: CliOptions): string {
  if (!options.zone) {
    throw new InvalidArgumentError("--zone or COMPUTEKIT_ZONE is required");
  }
  return options.zone;
}
