/**
 * Blob Storage Service Interface
 *
 * Stages raw disk images before import and reclaims them afterwards.
 */

import type { BlobRef } from "../types/storage";

export interface IBlobStorageService {
  /**
   * Upload a local file under the given key.
   *
   * @returns Reference to the stored blob
   */
  uploadBlob(key: string, filePath: string): Promise<BlobRef>;

  /**
   * Delete a blob. Deleting an absent blob succeeds.
   */
  deleteBlob(ref: BlobRef): Promise<void>;
}
