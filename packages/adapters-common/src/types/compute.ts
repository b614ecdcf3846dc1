/**
 * Compute type definitions.
 *
 * Shared types for instances and machine images across providers.
 */

/**
 * Lifecycle status of a compute instance.
 */
export type InstanceStatus =
  | "pending"
  | "running"
  | "shutting-down"
  | "stopping"
  | "stopped"
  | "terminated"
  | "unknown";

/**
 * A compute instance as reported by the provider.
 *
 * Addresses are not guaranteed to be populated when a launch is acknowledged;
 * they must be re-fetched.
 */
export interface Instance {
  /** Provider-assigned instance ID */
  id: string;
  /** Value of the `Name` tag, or "unknown" when the instance has none */
  name: string;
  status: InstanceStatus;
  /** One private address per attached interface, in interface order */
  privateIps: string[];
  /** Public addresses, present only once the provider assigns one */
  publicIps: string[];
  createdAt?: Date;
}

/**
 * A bootable machine image registered from a snapshot.
 */
export interface MachineImage {
  /** Provider-assigned image ID */
  id: string;
  /** Registered image name (unique per registration) */
  name: string;
  /** Snapshot backing the root device */
  snapshotId: string;
  tags: Record<string, string>;
}

/**
 * Summary row for image listings.
 */
export interface ImageSummary {
  id: string;
  /** Logical name from the `Name` tag, "n/a" when untagged */
  name: string;
  /** Registered image name */
  registeredName: string;
  status: string;
  createdAt: string;
}

/**
 * Status of an asynchronous snapshot import task.
 *
 * `completed` is terminal success; `deleted` and `deleting` are terminal
 * failures. Any other value is treated as still in progress.
 */
export type ImportTaskStatus = "pending" | "active" | "completed" | "deleting" | "deleted";

export interface ImportTask {
  id: string;
  status: ImportTaskStatus | string;
  /** Defined if and only if status is `completed` */
  snapshotId?: string;
  statusMessage?: string;
}
