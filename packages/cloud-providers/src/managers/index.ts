export { AwsNetworkManager } from "./aws-network-manager";
export { AwsSecurityGroupManager, buildIngressRules } from "./aws-security-group-manager";
export { AwsComputeManager } from "./aws-compute-manager";
export { AwsImageImportManager, type AwsImageImportManagerOptions } from "./aws-image-import-manager";
export type {
  IAwsNetworkManager,
  IAwsSecurityGroupManager,
  IAwsComputeManager,
  IAwsImageImportManager,
} from "./interfaces";
