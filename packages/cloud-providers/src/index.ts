// Provisioning
export {
  InstanceProvisioner,
  type InstanceProvisionerDeps,
  type InstanceProvisionerOptions,
} from "./provisioner/instance-provisioner";

// Managers
export * from "./managers";

// Factory
export {
  AwsManagerFactory,
  type AwsProvisioningStack,
  type AwsManagerFactoryOptions,
} from "./aws-manager-factory";

// Configuration
export * from "./config";

// Types
export * from "./types";

// Constants
export * from "./constants";

// Utilities
export { pollUntil, type PollOptions, type PollResult } from "./utils/polling";
export { buildInstanceTags, imageBaseName, uniqueName, toAwsTags } from "./utils/provider-utils";
