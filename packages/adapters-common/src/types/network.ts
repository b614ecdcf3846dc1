/**
 * Network type definitions.
 *
 * Networks and subnets are resolved, never owned: they exist independently in
 * the provider and are only looked up.
 */

export interface Network {
  /** Provider-assigned network (VPC) ID */
  id: string;
  /** Whether the provider flags this network as the region default */
  isDefault: boolean;
}

export interface Subnet {
  id: string;
  /** Parent network ID */
  networkId: string;
  /** Whether the provider flags this subnet as the default for its zone */
  isDefaultForAz: boolean;
  availabilityZone?: string;
}

export type IngressProtocol = "tcp" | "udp";

/**
 * Single-port ingress rule.
 */
export interface IngressRule {
  protocol: IngressProtocol | string;
  port?: number;
  /** Source CIDR blocks */
  cidrs: string[];
}

/**
 * Security group scoped to exactly one network.
 */
export interface SecurityPolicy {
  id: string;
  name: string;
  networkId: string;
  /** True when created for a single provisioning run */
  ephemeral: boolean;
  ingressRules: IngressRule[];
}
