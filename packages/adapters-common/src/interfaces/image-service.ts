/**
 * Image Service Interface
 *
 * Listing and removal of registered machine images.
 */

import type { ImageSummary } from "../types/compute";

export interface IImageService {
  /**
   * List images owned by the caller.
   */
  listImages(): Promise<ImageSummary[]>;

  /**
   * Deregister the image with the given registered name and delete the
   * snapshot backing it.
   *
   * @throws NotFoundError when no image has that name
   */
  deleteImage(registeredName: string): Promise<void>;

  /**
   * @throws NotSupportedError on providers without in-place resize
   */
  resizeImage(registeredName: string, sizeGb: number): Promise<void>;
}
