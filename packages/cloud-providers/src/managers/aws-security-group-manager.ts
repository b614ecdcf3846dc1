/**
 * AWS Security Group Manager: reuses a declared security group or creates a
 * per-request one with the declared ingress ports.
 */

import {
  type EC2Client,
  type IpPermission,
  type SecurityGroup,
  AuthorizeSecurityGroupIngressCommand,
  CreateSecurityGroupCommand,
  DescribeSecurityGroupsCommand,
} from "@aws-sdk/client-ec2";
import {
  AlreadyExistsError,
  ConflictError,
  NotFoundError,
  ProviderApiError,
  sanitizeAwsName,
  type IngressRule,
  type Network,
  type SecurityPolicy,
} from "@skyforge/adapters-common";
import { getAwsErrorName, withAwsErrors } from "@skyforge/adapters-aws";
import type { IAwsSecurityGroupManager } from "./interfaces";
import type { Clock, LogCallback, PortSet, SecurityGroupRequest } from "../types";
import { ANY_IPV4_CIDR } from "../constants";
import { managedTags, uniqueName } from "../utils";

/** Group names are capped at 255 characters, suffix included */
const GROUP_NAME_MAX_BASE = 240;

/**
 * One single-port rule per declared port, TCP first, open to any IPv4 source.
 */
export function buildIngressRules(ports: PortSet): IngressRule[] {
  return [
    ...ports.tcp.map((port) => ({ protocol: "tcp", port, cidrs: [ANY_IPV4_CIDR] })),
    ...ports.udp.map((port) => ({ protocol: "udp", port, cidrs: [ANY_IPV4_CIDR] })),
  ];
}

function toIpPermission(rule: IngressRule): IpPermission {
  return {
    IpProtocol: rule.protocol,
    FromPort: rule.port,
    ToPort: rule.port,
    IpRanges: rule.cidrs.map((cidr) => ({ CidrIp: cidr })),
  };
}

function fromIpPermission(permission: IpPermission): IngressRule {
  return {
    protocol: permission.IpProtocol ?? "-1",
    port: permission.FromPort,
    cidrs: (permission.IpRanges ?? []).flatMap((range) => (range.CidrIp ? [range.CidrIp] : [])),
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class AwsSecurityGroupManager implements IAwsSecurityGroupManager {
  constructor(
    private readonly ec2: EC2Client,
    private readonly log: LogCallback,
    private readonly clock: Clock = Date.now,
  ) {}

  async resolveOrCreate(network: Network, request: SecurityGroupRequest): Promise<SecurityPolicy> {
    if (request.securityGroupId && request.networkId) {
      return this.getExisting(request.securityGroupId, network);
    }
    return this.create(network, request);
  }

  /**
   * Fetch and validate a declared group. Never cached: the group may have
   * been deleted or moved since the last request.
   */
  private async getExisting(groupId: string, network: Network): Promise<SecurityPolicy> {
    const result = await withAwsErrors(`Unable to describe security group ${groupId}`, () =>
      this.ec2.send(new DescribeSecurityGroupsCommand({ GroupIds: [groupId] })),
    );

    const group = result.SecurityGroups?.find((g) => g.GroupId === groupId);
    if (!group) {
      throw new NotFoundError(`Security group "${groupId}" not found`);
    }
    if (group.VpcId !== network.id) {
      throw new ConflictError(
        `Security group "${groupId}" belongs to VPC ${group.VpcId ?? "unknown"}, not ${network.id}`,
      );
    }

    this.log(`Using existing security group ${groupId}`);
    return toSecurityPolicy(group, network.id);
  }

  private async create(network: Network, request: SecurityGroupRequest): Promise<SecurityPolicy> {
    const name = uniqueName(sanitizeAwsName(request.baseName, GROUP_NAME_MAX_BASE), this.clock());
    const groupId = await this.createGroup(name, request.baseName, network);

    const ingressRules = buildIngressRules(request.ports);
    if (ingressRules.length > 0) {
      try {
        await this.ec2.send(
          new AuthorizeSecurityGroupIngressCommand({
            GroupId: groupId,
            IpPermissions: ingressRules.map(toIpPermission),
          }),
        );
      } catch (error: unknown) {
        const original = toError(error);
        throw new ProviderApiError(
          `Unable to authorize ingress on security group ${groupId}: ${original.message}`,
          original,
          getAwsErrorName(error) || undefined,
        );
      }
    }

    this.log(`Security group ${name} created (${groupId}) with ${ingressRules.length} ingress rule(s)`);
    return { id: groupId, name, networkId: network.id, ephemeral: true, ingressRules };
  }

  private async createGroup(name: string, baseName: string, network: Network): Promise<string> {
    try {
      const result = await this.ec2.send(
        new CreateSecurityGroupCommand({
          GroupName: name,
          Description: `security group for ${baseName}`,
          VpcId: network.id,
          TagSpecifications: [{ ResourceType: "security-group", Tags: managedTags(name) }],
        }),
      );
      if (!result.GroupId) {
        throw new ProviderApiError(`Unable to create security group ${name}: no group ID returned`);
      }
      return result.GroupId;
    } catch (error: unknown) {
      if (error instanceof ProviderApiError) throw error;

      const original = toError(error);
      const code = getAwsErrorName(error);
      if (code === "InvalidVpcID.NotFound") {
        throw new NotFoundError(`Unable to find VPC with ID "${network.id}"`, original);
      }
      if (code === "InvalidGroup.Duplicate") {
        throw new AlreadyExistsError(`Security group "${name}" already exists`, original);
      }
      throw new ProviderApiError(
        `Unable to create security group ${name}: ${original.message}`,
        original,
        code || undefined,
      );
    }
  }
}

function toSecurityPolicy(group: SecurityGroup, networkId: string): SecurityPolicy {
  return {
    id: group.GroupId ?? "",
    name: group.GroupName ?? "",
    networkId,
    ephemeral: false,
    ingressRules: (group.IpPermissions ?? []).map(fromIpPermission),
  };
}
