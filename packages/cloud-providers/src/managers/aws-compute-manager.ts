/**
 * AWS Compute Manager: resolves images and launches single instances.
 */

import {
  type EC2Client,
  type _InstanceType,
  DescribeImagesCommand,
  RunInstancesCommand,
} from "@aws-sdk/client-ec2";
import { NotFoundError, ProviderApiError, type Instance } from "@skyforge/adapters-common";
import { mapInstance, withAwsErrors } from "@skyforge/adapters-aws";
import type { IAwsComputeManager } from "./interfaces";
import type { LaunchConfig, LogCallback } from "../types";
import { NAME_TAG } from "../constants";
import { toAwsTags } from "../utils";

const AMI_ID_PREFIX = "ami-";

export class AwsComputeManager implements IAwsComputeManager {
  constructor(
    private readonly ec2: EC2Client,
    private readonly log: LogCallback,
  ) {}

  async resolveImageId(image: string): Promise<string> {
    if (image.startsWith(AMI_ID_PREFIX)) {
      return image;
    }

    const result = await withAwsErrors(`Unable to describe images named ${image}`, () =>
      this.ec2.send(
        new DescribeImagesCommand({
          Owners: ["self"],
          Filters: [
            { Name: `tag:${NAME_TAG}`, Values: [image] },
            { Name: "state", Values: ["available"] },
          ],
        }),
      ),
    );

    const images = (result.Images ?? [])
      .filter((candidate) => candidate.ImageId)
      .sort((a, b) => (b.CreationDate ?? "").localeCompare(a.CreationDate ?? ""));
    const imageId = images[0]?.ImageId;
    if (!imageId) {
      throw new NotFoundError(`Image "${image}" not found`);
    }

    this.log(`Resolved image ${image}: ${imageId}`);
    return imageId;
  }

  async runInstance(config: LaunchConfig): Promise<Instance> {
    const tags = toAwsTags(config.tags);

    const result = await withAwsErrors("Unable to run instance", () =>
      this.ec2.send(
        new RunInstancesCommand({
          ImageId: config.imageId,
          InstanceType: config.instanceType as _InstanceType,
          MinCount: 1,
          MaxCount: 1,
          SubnetId: config.subnetId,
          SecurityGroupIds: config.securityGroupIds,
          TagSpecifications: [
            { ResourceType: "instance", Tags: tags },
            { ResourceType: "volume", Tags: tags },
          ],
        }),
      ),
    );

    const launched = result.Instances?.[0];
    if (!launched?.InstanceId) {
      throw new ProviderApiError("Unable to run instance: no instance returned");
    }

    const instance = mapInstance(launched);
    this.log(`Instance launched: ${instance.id} (${config.instanceType})`);
    return instance;
  }
}
