/**
 * AWS Image Import Manager: raw disk image in S3 -> EBS snapshot -> AMI.
 *
 * Steps run strictly in order and any failure aborts the rest. Nothing is
 * rolled back: a timed-out import leaves its staging object in place so the
 * import can be retried.
 */

import {
  type EC2Client,
  CreateTagsCommand,
  DescribeImportSnapshotTasksCommand,
  ImportSnapshotCommand,
  RegisterImageCommand,
} from "@aws-sdk/client-ec2";
import {
  NotFoundError,
  ProviderApiError,
  type BlobRef,
  type IBlobStorageService,
  type ImportTask,
  type MachineImage,
} from "@skyforge/adapters-common";
import { withAwsErrors } from "@skyforge/adapters-aws";
import type { IAwsImageImportManager } from "./interfaces";
import type { Clock, LogCallback, OperationOptions, PollSettings, SleepFn } from "../types";
import {
  IMAGE_ARCHITECTURE,
  IMAGE_DISK_FORMAT,
  IMAGE_IMPORT_MAX_ATTEMPTS,
  IMAGE_IMPORT_POLL_DELAY_MS,
  MANAGED_TAG,
  NAME_TAG,
  ROOT_DEVICE_NAME,
  ROOT_VOLUME_TYPE,
} from "../constants";
import { managedTags, pollUntil, uniqueName, type PollResult } from "../utils";

const TOTAL_STEPS = 6;

const FAILED_STATUSES = new Set(["deleted", "deleting"]);

export interface AwsImageImportManagerOptions {
  poll?: PollSettings;
  sleep?: SleepFn;
  clock?: Clock;
}

export class AwsImageImportManager implements IAwsImageImportManager {
  private readonly poll: PollSettings;
  private readonly sleep?: SleepFn;
  private readonly clock: Clock;

  constructor(
    private readonly ec2: EC2Client,
    private readonly storage: IBlobStorageService,
    private readonly log: LogCallback,
    options: AwsImageImportManagerOptions = {},
  ) {
    this.poll = options.poll ?? {
      delayMs: IMAGE_IMPORT_POLL_DELAY_MS,
      maxAttempts: IMAGE_IMPORT_MAX_ATTEMPTS,
    };
    this.sleep = options.sleep;
    this.clock = options.clock ?? Date.now;
  }

  async buildFromFile(
    filePath: string,
    imageName: string,
    options: OperationOptions = {},
  ): Promise<MachineImage> {
    this.log(`Uploading ${filePath}...`);
    const blob = await this.storage.uploadBlob(imageName, filePath);
    this.log(`Uploaded to s3://${blob.bucket}/${blob.key}`);
    return this.importAndRegister(blob, imageName, options);
  }

  async importAndRegister(
    blob: BlobRef,
    imageName: string,
    options: OperationOptions = {},
  ): Promise<MachineImage> {
    this.log(`[1/${TOTAL_STEPS}] Importing snapshot from s3://${blob.bucket}/${blob.key}...`);
    const taskId = await this.submitImport(blob, imageName);

    this.log(`[2/${TOTAL_STEPS}] Waiting for import task ${taskId}...`);
    const snapshotId = await pollUntil((attempt) => this.checkImport(taskId, attempt), {
      ...this.poll,
      description: `import task ${taskId}`,
      sleep: this.sleep,
      signal: options.signal,
      log: this.log,
    });

    this.log(`[3/${TOTAL_STEPS}] Deleting staging object...`);
    await this.storage.deleteBlob(blob);

    this.log(`[4/${TOTAL_STEPS}] Tagging snapshot ${snapshotId}...`);
    await this.tagResource(snapshotId, imageName);

    const registeredName = uniqueName(imageName, this.clock());
    this.log(`[5/${TOTAL_STEPS}] Registering image ${registeredName}...`);
    const imageId = await this.registerImage(registeredName, imageName, snapshotId);

    this.log(`[6/${TOTAL_STEPS}] Tagging image ${imageId}...`);
    await this.tagResource(imageId, imageName);

    this.log(`Image ${imageName} ready: ${imageId}`);
    return {
      id: imageId,
      name: registeredName,
      snapshotId,
      tags: { [NAME_TAG]: imageName, [MANAGED_TAG.Key]: MANAGED_TAG.Value },
    };
  }

  async getImportTask(taskId: string): Promise<ImportTask> {
    const result = await withAwsErrors(`Unable to describe import task ${taskId}`, () =>
      this.ec2.send(new DescribeImportSnapshotTasksCommand({ ImportTaskIds: [taskId] })),
    );

    const task = result.ImportSnapshotTasks?.find((t) => t.ImportTaskId === taskId);
    if (!task) {
      throw new NotFoundError(`Import task "${taskId}" not found`);
    }

    const detail = task.SnapshotTaskDetail;
    const status = detail?.Status ?? "pending";
    return {
      id: taskId,
      status,
      snapshotId: status === "completed" ? detail?.SnapshotId : undefined,
      statusMessage: detail?.StatusMessage,
    };
  }

  private async submitImport(blob: BlobRef, imageName: string): Promise<string> {
    const result = await withAwsErrors(`Unable to import snapshot for ${imageName}`, () =>
      this.ec2.send(
        new ImportSnapshotCommand({
          Description: `image ${imageName}`,
          DiskContainer: {
            Description: `image ${imageName}`,
            Format: IMAGE_DISK_FORMAT,
            UserBucket: { S3Bucket: blob.bucket, S3Key: blob.key },
          },
        }),
      ),
    );

    if (!result.ImportTaskId) {
      throw new ProviderApiError(`Unable to import snapshot for ${imageName}: no task ID returned`);
    }
    return result.ImportTaskId;
  }

  /**
   * A failed status read spends one attempt, like a pending task. A failed or
   * snapshot-less task ends the poll without spending the remaining attempts.
   */
  private async checkImport(taskId: string, attempt: number): Promise<PollResult<string>> {
    let task: ImportTask;
    try {
      task = await this.getImportTask(taskId);
    } catch (error: unknown) {
      if (!(error instanceof ProviderApiError)) throw error;
      this.log(`Import status check ${attempt} failed: ${error.message}`);
      return { done: false };
    }

    if (task.status === "completed") {
      if (!task.snapshotId) {
        throw new ProviderApiError(`Import task ${taskId} completed without a snapshot`);
      }
      this.log(`Import task ${taskId} completed after ${attempt} check(s): ${task.snapshotId}`);
      return { done: true, value: task.snapshotId };
    }

    if (FAILED_STATUSES.has(task.status)) {
      throw new ProviderApiError(
        `Import task ${taskId} failed (${task.status}): ${task.statusMessage ?? "no status message"}`,
      );
    }

    return { done: false };
  }

  private async tagResource(resourceId: string, name: string): Promise<void> {
    await withAwsErrors(`Unable to tag ${resourceId}`, () =>
      this.ec2.send(new CreateTagsCommand({ Resources: [resourceId], Tags: managedTags(name) })),
    );
  }

  private async registerImage(
    registeredName: string,
    imageName: string,
    snapshotId: string,
  ): Promise<string> {
    const result = await withAwsErrors(`Unable to register image ${registeredName}`, () =>
      this.ec2.send(
        new RegisterImageCommand({
          Name: registeredName,
          Description: `image ${imageName}`,
          Architecture: IMAGE_ARCHITECTURE,
          RootDeviceName: ROOT_DEVICE_NAME,
          VirtualizationType: "hvm",
          EnaSupport: false,
          BlockDeviceMappings: [
            {
              DeviceName: ROOT_DEVICE_NAME,
              Ebs: {
                DeleteOnTermination: false,
                SnapshotId: snapshotId,
                VolumeType: ROOT_VOLUME_TYPE,
              },
            },
          ],
        }),
      ),
    );

    if (!result.ImageId) {
      throw new ProviderApiError(`Unable to register image ${registeredName}: no image ID returned`);
    }
    return result.ImageId;
  }
}
