import type { BlobRef, ImportTask, MachineImage } from "@skyforge/adapters-common";
import type { OperationOptions } from "../../types";

/**
 * Turns raw disk images into bootable AMIs.
 */
export interface IAwsImageImportManager {
  /**
   * Import a staged blob as a snapshot, wait for it, reclaim the blob, then
   * tag the snapshot and register and tag the image.
   */
  importAndRegister(
    blob: BlobRef,
    imageName: string,
    options?: OperationOptions,
  ): Promise<MachineImage>;

  /**
   * Upload a local raw image to the staging bucket, then import it.
   */
  buildFromFile(
    filePath: string,
    imageName: string,
    options?: OperationOptions,
  ): Promise<MachineImage>;

  getImportTask(taskId: string): Promise<ImportTask>;
}
