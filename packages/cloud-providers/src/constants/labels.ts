/**
 * Standard tags for resources created by skyforge.
 */

export const LABEL_PREFIX = "skyforge";

export const NAME_TAG = "Name";

export const MANAGED_TAG = { Key: `${LABEL_PREFIX}:managed`, Value: "true" } as const;
