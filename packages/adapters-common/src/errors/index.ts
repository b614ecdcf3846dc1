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
} from "./provisioning-error";
