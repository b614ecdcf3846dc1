/**
 * Reference to an object staged in blob storage.
 */
export interface BlobRef {
  bucket: string;
  key: string;
}
