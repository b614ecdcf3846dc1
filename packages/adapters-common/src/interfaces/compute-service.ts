/**
 * Compute Service Interface
 *
 * Request/response lifecycle operations on compute instances. Each call is a
 * direct passthrough to the provider with errors classified into the
 * provisioning taxonomy.
 */

import type { Instance } from "../types/compute";

export interface IComputeService {
  /**
   * List all instances visible in the configured region.
   */
  listInstances(): Promise<Instance[]>;

  /**
   * Get an instance by its provider ID.
   *
   * @throws NotFoundError when no instance has that ID
   */
  getInstance(instanceId: string): Promise<Instance>;

  /**
   * Get the first instance carrying the given `Name` tag.
   *
   * @throws NotFoundError when no instance carries that name
   */
  getInstanceByName(name: string): Promise<Instance>;

  /**
   * Every instance carrying the given `Name` tag, in provider order. Names
   * are not unique, so callers that know an ID should match on it.
   */
  listInstancesByName(name: string): Promise<Instance[]>;

  startInstance(instanceId: string): Promise<void>;

  stopInstance(instanceId: string): Promise<void>;

  terminateInstance(instanceId: string): Promise<void>;

  /**
   * Fetch the instance console output, decoded to text.
   */
  getConsoleOutput(instanceId: string): Promise<string>;
}
