/**
 * AWS Network Manager: resolves the VPC and subnet an instance is placed in.
 */

import {
  type EC2Client,
  type Filter,
  DescribeVpcsCommand,
  DescribeSubnetsCommand,
} from "@aws-sdk/client-ec2";
import { NotFoundError, type Network, type Subnet } from "@skyforge/adapters-common";
import { withAwsErrors } from "@skyforge/adapters-aws";
import type { IAwsNetworkManager } from "./interfaces";
import type { LogCallback } from "../types";

export class AwsNetworkManager implements IAwsNetworkManager {
  constructor(
    private readonly ec2: EC2Client,
    private readonly log: LogCallback,
  ) {}

  async resolveNetwork(networkId?: string): Promise<Network> {
    const result = await withAwsErrors("Unable to describe VPCs", () =>
      this.ec2.send(new DescribeVpcsCommand(
          networkId ? { Filters: [{ Name: "vpc-id", Values: [networkId] }] } : {},
        )),
    );

    const networks: Network[] = (result.Vpcs ?? []).map((vpc) => ({
      id: vpc.VpcId ?? "",
      isDefault: vpc.IsDefault ?? false,
    }));

    if (networks.length === 0) {
      throw new NotFoundError(
        networkId ? `Unable to find VPC with ID "${networkId}"` : "No VPC found in region",
      );
    }

    const network = networks.find((n) => n.isDefault) ?? networks[0];
    this.log(`Using VPC ${network.id}`);
    return network;
  }

  async resolveSubnet(network: Network, subnetId?: string): Promise<Subnet> {
    const filters: Filter[] = [{ Name: "vpc-id", Values: [network.id] }];
    if (subnetId) {
      filters.push({ Name: "subnet-id", Values: [subnetId] });
    }

    const result = await withAwsErrors("Unable to describe subnets", () =>
      this.ec2.send(new DescribeSubnetsCommand({ Filters: filters })),
    );

    const subnets: Subnet[] = (result.Subnets ?? []).map((subnet) => ({
      id: subnet.SubnetId ?? "",
      networkId: subnet.VpcId ?? network.id,
      isDefaultForAz: subnet.DefaultForAz ?? false,
      availabilityZone: subnet.AvailabilityZone,
    }));

    if (subnets.length === 0) {
      throw new NotFoundError(
        subnetId
          ? `Unable to find subnet with ID "${subnetId}" in VPC ${network.id}`
          : `No subnet found in VPC ${network.id}`,
      );
    }

    const subnet = subnets.find((s) => s.isDefaultForAz) ?? subnets[0];
    this.log(`Using subnet ${subnet.id}`);
    return subnet;
  }
}
