import { z } from "zod";
import { InvalidInputError } from "@skyforge/adapters-common";
import {
  ADDRESS_POLL_DELAY_MS,
  ADDRESS_POLL_MAX_ATTEMPTS,
  DEFAULT_DNS_TTL_SECONDS,
  DEFAULT_INSTANCE_TYPE,
  DEFAULT_REGION,
  IMAGE_IMPORT_MAX_ATTEMPTS,
  IMAGE_IMPORT_POLL_DELAY_MS,
} from "../constants";

export const PollSettingsSchema = z.object({
  delayMs: z.number().int().min(0),
  maxAttempts: z.number().int().min(1),
});

export const AwsCredentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
});

/**
 * Provisioner configuration. Only `bucketName` has no default; it names the
 * staging bucket raw images are uploaded to before import.
 */
export const ProvisionerConfigSchema = z.object({
  region: z.string().min(1).default(DEFAULT_REGION),
  credentials: AwsCredentialsSchema.optional(),
  bucketName: z.string().min(1),
  defaultInstanceType: z.string().min(1).default(DEFAULT_INSTANCE_TYPE),
  imageImport: PollSettingsSchema.default({
    delayMs: IMAGE_IMPORT_POLL_DELAY_MS,
    maxAttempts: IMAGE_IMPORT_MAX_ATTEMPTS,
  }),
  addressPoll: PollSettingsSchema.default({
    delayMs: ADDRESS_POLL_DELAY_MS,
    maxAttempts: ADDRESS_POLL_MAX_ATTEMPTS,
  }),
  dnsRecordTtlSeconds: z.number().int().min(1).default(DEFAULT_DNS_TTL_SECONDS),
});

export type ProvisionerConfig = z.infer<typeof ProvisionerConfigSchema>;
export type ProvisionerConfigInput = z.input<typeof ProvisionerConfigSchema>;

/**
 * Format zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseProvisionerConfig(input: unknown): ProvisionerConfig {
  const result = ProvisionerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError("Invalid provisioner config", formatIssues(result.error));
  }
  return result.data;
}

/**
 * Build the config from environment variables. Static credentials are only
 * used when both halves are set; otherwise the SDK's default chain applies.
 */
export function loadProvisionerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ProvisionerConfig {
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  return parseProvisionerConfig({
    region: env.AWS_REGION || undefined,
    credentials:
      accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
    bucketName: env.SKYFORGE_BUCKET,
    defaultInstanceType: env.SKYFORGE_INSTANCE_TYPE || undefined,
  });
}
