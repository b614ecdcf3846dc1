import { InvalidInputError } from "../errors/provisioning-error";

/**
 * Sanitize a name for use in cloud resources.
 *
 * @param name - Raw name to sanitize
 * @param maxLength - Maximum length (default: 63 for most cloud resources)
 * @returns Sanitized name safe for cloud resources
 */
export function sanitizeName(name: string, maxLength = 63): string {
  const sanitized = name
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/-+/g, "-")
    .substring(0, maxLength);

  if (!sanitized) {
    throw new InvalidInputError(`Invalid name: "${name}" produces empty sanitized value`);
  }

  return sanitized;
}

/**
 * Sanitize a name for AWS resources.
 * Most AWS resources allow 63-256 chars depending on service.
 *
 * @param name - Raw name to sanitize
 * @param maxLength - Maximum length (default: 255)
 * @returns Sanitized name safe for AWS
 */
export function sanitizeAwsName(name: string, maxLength = 255): string {
  return sanitizeName(name, maxLength);
}
