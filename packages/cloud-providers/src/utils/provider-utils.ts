/**
 * Shared helpers for the AWS managers: sleeping, tag conversion and
 * generated resource names.
 */

import type { Tag } from "@aws-sdk/client-ec2";
import { MANAGED_TAG, NAME_TAG } from "../constants";

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Convert tags object to AWS format
 */
export function toAwsTags(tags: Record<string, string>): Tag[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}

/**
 * AWS tags for a resource we create: `Name` plus the managed marker.
 */
export function managedTags(name: string): Tag[] {
  return [{ Key: NAME_TAG, Value: name }, { ...MANAGED_TAG }];
}

/**
 * Append a uniqueness suffix. Two calls within the same clock tick produce
 * the same name; callers surface the resulting duplicate error as is.
 */
export function uniqueName(base: string, now: number): string {
  return `${base}-${now}`;
}

/**
 * Derive a human base name from an image reference, dropping any path and
 * extension (`images/web.raw` becomes `web`).
 */
export function imageBaseName(image: string): string {
  const file = image.split("/").pop() ?? image;
  const dot = file.lastIndexOf(".");
  return dot > 0 ? file.slice(0, dot) : file;
}

/**
 * Instance tags with a guaranteed `Name`. When the caller gave none, the
 * name is `<image>-<unix seconds>`; that name is also the key the address
 * poll searches by.
 */
export function buildInstanceTags(
  tags: Record<string, string>,
  image: string,
  nowMs: number,
): { name: string; tags: Record<string, string> } {
  const existing = tags[NAME_TAG];
  if (existing) {
    return { name: existing, tags: { ...tags, [MANAGED_TAG.Key]: MANAGED_TAG.Value } };
  }
  const name = `${image}-${Math.floor(nowMs / 1000)}`;
  return {
    name,
    tags: { ...tags, [NAME_TAG]: name, [MANAGED_TAG.Key]: MANAGED_TAG.Value },
  };
}
