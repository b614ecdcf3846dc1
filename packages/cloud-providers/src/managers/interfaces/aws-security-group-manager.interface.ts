import type { Network, SecurityPolicy } from "@skyforge/adapters-common";
import type { SecurityGroupRequest } from "../../types";

export interface IAwsSecurityGroupManager {
  /**
   * Reuse and validate the requested group, or create a new one scoped to
   * `network` with one ingress rule per declared port.
   */
  resolveOrCreate(network: Network, request: SecurityGroupRequest): Promise<SecurityPolicy>;
}
