/**
 * Provisioning error taxonomy.
 *
 * Provider errors are classified into these kinds at the API boundary, so
 * orchestration code never inspects provider-specific error codes.
 */

export enum ProvisioningErrorType {
  NOT_FOUND = "NOT_FOUND",
  CONFLICT = "CONFLICT",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  TIMEOUT = "TIMEOUT",
  PROVIDER = "PROVIDER",
  NOT_SUPPORTED = "NOT_SUPPORTED",
  INVALID_INPUT = "INVALID_INPUT",
  CANCELLED = "CANCELLED",
}

/**
 * Base class for every failure surfaced by the provisioning core.
 */
export class ProvisioningError extends Error {
  constructor(
    message: string,
    public readonly type: ProvisioningErrorType,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = "ProvisioningError";
  }
}

/** A network, subnet, security group, image or instance lookup came back empty */
export class NotFoundError extends ProvisioningError {
  constructor(message: string, originalError?: Error) {
    super(message, ProvisioningErrorType.NOT_FOUND, originalError);
    this.name = "NotFoundError";
  }
}

/** A security group's parent network differs from the declared one */
export class ConflictError extends ProvisioningError {
  constructor(message: string) {
    super(message, ProvisioningErrorType.CONFLICT);
    this.name = "ConflictError";
  }
}

/** A resource name is already taken */
export class AlreadyExistsError extends ProvisioningError {
  constructor(message: string, originalError?: Error) {
    super(message, ProvisioningErrorType.ALREADY_EXISTS, originalError);
    this.name = "AlreadyExistsError";
  }
}

/** A poll budget ran out before a terminal state was reached */
export class TimeoutError extends ProvisioningError {
  constructor(
    message: string,
    public readonly attempts: number,
  ) {
    super(message, ProvisioningErrorType.TIMEOUT);
    this.name = "TimeoutError";
  }
}

/** Opaque failure from the remote API; the message is the provider's own */
export class ProviderApiError extends ProvisioningError {
  constructor(
    message: string,
    originalError?: Error,
    public readonly code?: string,
  ) {
    super(message, ProvisioningErrorType.PROVIDER, originalError);
    this.name = "ProviderApiError";
  }
}

export class NotSupportedError extends ProvisioningError {
  constructor(operation: string) {
    super(`Operation not supported: ${operation}`, ProvisioningErrorType.NOT_SUPPORTED);
    this.name = "NotSupportedError";
  }
}

/** A request or configuration failed validation */
export class InvalidInputError extends ProvisioningError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, ProvisioningErrorType.INVALID_INPUT);
    this.name = "InvalidInputError";
  }
}

/** A poll was aborted by the caller between attempts */
export class CancelledError extends ProvisioningError {
  constructor(message: string) {
    super(message, ProvisioningErrorType.CANCELLED);
    this.name = "CancelledError";
  }
}

/**
 * Type guard for provisioning errors, optionally of a specific kind.
 */
export function isProvisioningError(
  error: unknown,
  type?: ProvisioningErrorType,
): error is ProvisioningError {
  if (!(error instanceof ProvisioningError)) return false;
  return type === undefined || error.type === type;
}
