import {
  type EC2Client,
  DescribeImagesCommand,
  DeregisterImageCommand,
  DeleteSnapshotCommand,
} from "@aws-sdk/client-ec2";
import {
  NotFoundError,
  NotSupportedError,
  type IImageService,
  type ImageSummary,
} from "@skyforge/adapters-common";
import { withAwsErrors } from "../errors/aws-error-classifier";

/**
 * Listing and removal of self-owned AMIs.
 */
export class EC2ImageService implements IImageService {
  constructor(private readonly client: EC2Client) {}

  async listImages(): Promise<ImageSummary[]> {
    const result = await withAwsErrors("Unable to describe images", () =>
      this.client.send(new DescribeImagesCommand({ Owners: ["self"] })),
    );

    return (result.Images ?? []).map((image) => ({
      id: image.ImageId ?? "",
      name: image.Tags?.find((tag) => tag.Key === "Name")?.Value ?? "n/a",
      registeredName: image.Name ?? "",
      status: image.State ?? "unknown",
      createdAt: image.CreationDate ?? "",
    }));
  }

  /**
   * Deregister an AMI by its registered name, then delete its root snapshot.
   * Deregistering first is required: EC2 refuses to delete a snapshot that
   * still backs a registered image.
   */
  async deleteImage(registeredName: string): Promise<void> {
    const result = await withAwsErrors(`Unable to describe image ${registeredName}`, () =>
      this.client.send(
        new DescribeImagesCommand({
          Owners: ["self"],
          Filters: [{ Name: "name", Values: [registeredName] }],
        }),
      ),
    );

    const image = result.Images?.[0];
    if (!image?.ImageId) {
      throw new NotFoundError(`Image "${registeredName}" not found`);
    }
    const imageId = image.ImageId;
    const snapshotId = image.BlockDeviceMappings?.find((m) => m.Ebs?.SnapshotId)?.Ebs?.SnapshotId;

    await withAwsErrors(`Unable to deregister image ${imageId}`, () =>
      this.client.send(new DeregisterImageCommand({ ImageId: imageId })),
    );

    if (snapshotId) {
      await withAwsErrors(`Unable to delete snapshot ${snapshotId}`, () =>
        this.client.send(new DeleteSnapshotCommand({ SnapshotId: snapshotId })),
      );
    }
  }

  async resizeImage(_registeredName: string, _sizeGb: number): Promise<void> {
    throw new NotSupportedError("image resize");
  }
}
