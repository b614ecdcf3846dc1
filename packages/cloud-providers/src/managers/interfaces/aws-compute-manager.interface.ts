import type { Instance } from "@skyforge/adapters-common";
import type { LaunchConfig } from "../../types";

export interface IAwsComputeManager {
  /**
   * Turn an image reference into an AMI ID. `ami-` IDs pass through; any
   * other value is matched against the `Name` tag of self-owned images.
   */
  resolveImageId(image: string): Promise<string>;

  /**
   * Launch exactly one instance. The returned addresses are whatever the
   * launch acknowledgement carried, usually none.
   */
  runInstance(config: LaunchConfig): Promise<Instance>;
}
