export type { IAwsNetworkManager } from "./aws-network-manager.interface";
export type { IAwsSecurityGroupManager } from "./aws-security-group-manager.interface";
export type { IAwsComputeManager } from "./aws-compute-manager.interface";
export type { IAwsImageImportManager } from "./aws-image-import-manager.interface";
