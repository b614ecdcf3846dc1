// Interfaces
export type {
  IComputeService,
  IImageService,
  IBlobStorageService,
  IDnsService,
} from "./interfaces";

// Types
export type {
  Instance,
  InstanceStatus,
  MachineImage,
  ImageSummary,
  ImportTask,
  ImportTaskStatus,
} from "./types/compute";
export type {
  Network,
  Subnet,
  IngressProtocol,
  IngressRule,
  SecurityPolicy,
} from "./types/network";
export type { BlobRef } from "./types/storage";

// Errors
export {
  ProvisioningErrorType,
  ProvisioningError,
  NotFoundError,
  ConflictError,
  AlreadyExistsError,
  TimeoutError,
  ProviderApiError,
  NotSupportedError,
  InvalidInputError,
  CancelledError,
  isProvisioningError,
} from "./errors";

// Utilities
export { sanitizeName, sanitizeAwsName } from "./utils/sanitize";
