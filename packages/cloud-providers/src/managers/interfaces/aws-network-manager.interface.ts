import type { Network, Subnet } from "@skyforge/adapters-common";

/**
 * Resolves where an instance is placed. Networks and subnets are only
 * looked up, never created.
 */
export interface IAwsNetworkManager {
  /**
   * Resolve a VPC. With a hint, that exact VPC; without one, the region
   * default, else the first VPC listed.
   */
  resolveNetwork(networkId?: string): Promise<Network>;

  /**
   * Resolve a subnet inside `network`, preferring the AZ default subnet.
   */
  resolveSubnet(network: Network, subnetId?: string): Promise<Subnet>;
}
