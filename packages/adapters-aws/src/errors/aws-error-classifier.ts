/**
 * Classifies AWS SDK errors into the provisioning taxonomy.
 *
 * Every call into an AWS client goes through `withAwsErrors` (or catches and
 * calls `classifyAwsError` itself), so code above this layer only ever sees
 * ProvisioningError subclasses.
 */

import {
  ProvisioningError,
  NotFoundError,
  AlreadyExistsError,
  ProviderApiError,
} from "@skyforge/adapters-common";

/**
 * Extract the service error code from an SDK error.
 * SDK v3 puts it on `name`; older shapes used `Code` or `code`.
 */
export function getAwsErrorName(error: unknown): string {
  if (typeof error !== "object" || error === null) return "";
  const candidates = [
    "Code" in error ? error.Code : undefined,
    "code" in error ? error.code : undefined,
    "name" in error ? error.name : undefined,
  ];
  for (const value of candidates) {
    if (typeof value === "string" && value !== "" && value !== "Error") return value;
  }
  return "";
}

export function isAwsNotFound(name: string): boolean {
  return name.includes("NotFound") || name.startsWith("NoSuch");
}

export function isAwsDuplicate(name: string): boolean {
  return name.endsWith(".Duplicate") || name.includes("AlreadyExists");
}

/**
 * Map an error raised by an AWS client to a ProvisioningError.
 *
 * @param error - Anything thrown by `client.send`
 * @param context - Short description of the failed operation, prefixed to the message
 */
export function classifyAwsError(error: unknown, context: string): ProvisioningError {
  if (error instanceof ProvisioningError) return error;

  const original = error instanceof Error ? error : new Error(String(error));
  const name = getAwsErrorName(error);
  const message = `${context}: ${original.message}`;

  if (isAwsNotFound(name)) {
    return new NotFoundError(message, original);
  }
  if (isAwsDuplicate(name)) {
    return new AlreadyExistsError(message, original);
  }
  return new ProviderApiError(message, original, name || undefined);
}

/**
 * Run an AWS call and rethrow any failure as a classified ProvisioningError.
 */
export async function withAwsErrors<T>(context: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error: unknown) {
    throw classifyAwsError(error, context);
  }
}
