/**
 * Instance Provisioner
 *
 * Drives one request from declared state to a running instance:
 * image -> network -> security group -> subnet -> launch -> address -> DNS.
 * Each step depends on the one before it, so nothing runs concurrently.
 * Resources created before a failure are left in place.
 */

import {
  TimeoutError,
  type IComputeService,
  type IDnsService,
  type Instance,
} from "@skyforge/adapters-common";
import type {
  IAwsComputeManager,
  IAwsNetworkManager,
  IAwsSecurityGroupManager,
} from "../managers/interfaces";
import type { Clock, LogCallback, OperationOptions, PollSettings, SleepFn } from "../types";
import { noopLog } from "../types";
import { parseProvisionRequest, type ProvisionRequestInput } from "../config/provision-request";
import {
  ADDRESS_POLL_DELAY_MS,
  ADDRESS_POLL_MAX_ATTEMPTS,
  DEFAULT_INSTANCE_TYPE,
} from "../constants";
import { buildInstanceTags, imageBaseName, pollUntil, type PollResult } from "../utils";

const TOTAL_STEPS = 6;

export interface InstanceProvisionerDeps {
  networkManager: IAwsNetworkManager;
  securityGroupManager: IAwsSecurityGroupManager;
  computeManager: IAwsComputeManager;
  computeService: IComputeService;
  dnsService: IDnsService;
}

export interface InstanceProvisionerOptions {
  defaultInstanceType?: string;
  addressPoll?: PollSettings;
  sleep?: SleepFn;
  clock?: Clock;
  log?: LogCallback;
}

export class InstanceProvisioner {
  private readonly defaultInstanceType: string;
  private readonly addressPoll: PollSettings;
  private readonly sleep?: SleepFn;
  private readonly clock: Clock;
  private readonly log: LogCallback;

  constructor(
    private readonly deps: InstanceProvisionerDeps,
    options: InstanceProvisionerOptions = {},
  ) {
    this.defaultInstanceType = options.defaultInstanceType ?? DEFAULT_INSTANCE_TYPE;
    this.addressPoll = options.addressPoll ?? {
      delayMs: ADDRESS_POLL_DELAY_MS,
      maxAttempts: ADDRESS_POLL_MAX_ATTEMPTS,
    };
    this.sleep = options.sleep;
    this.clock = options.clock ?? Date.now;
    this.log = options.log ?? noopLog;
  }

  /**
   * Provision one instance. Without a domain name this returns straight after
   * the launch is acknowledged, so the instance usually has no addresses yet.
   */
  async provision(
    input: ProvisionRequestInput,
    options: OperationOptions = {},
  ): Promise<Instance> {
    const request = parseProvisionRequest(input);
    const { networkManager, securityGroupManager, computeManager } = this.deps;

    this.log(`[1/${TOTAL_STEPS}] Resolving image ${request.image}...`);
    const imageId = await computeManager.resolveImageId(request.image);

    this.log(`[2/${TOTAL_STEPS}] Resolving network...`);
    const network = await networkManager.resolveNetwork(request.networkId);

    this.log(`[3/${TOTAL_STEPS}] Resolving security group...`);
    const securityPolicy = await securityGroupManager.resolveOrCreate(network, {
      baseName: imageBaseName(request.image),
      securityGroupId: request.securityGroupId,
      networkId: request.networkId,
      ports: request.ports,
    });

    this.log(`[4/${TOTAL_STEPS}] Resolving subnet...`);
    const subnet = await networkManager.resolveSubnet(network, request.subnetId);

    const { name, tags } = buildInstanceTags(request.tags, request.image, this.clock());
    const instanceType = request.instanceType ?? this.defaultInstanceType;

    this.log(`[5/${TOTAL_STEPS}] Launching instance ${name}...`);
    const launched = await computeManager.runInstance({
      imageId,
      instanceType,
      subnetId: subnet.id,
      securityGroupIds: [securityPolicy.id],
      tags,
    });

    if (!request.domainName) {
      this.log(`[6/${TOTAL_STEPS}] No domain name requested, done`);
      return launched;
    }

    this.log(`[6/${TOTAL_STEPS}] Waiting for a public address for ${name}...`);
    const instance = await this.waitForPublicAddress(launched, name, request.domainName, options);
    const address = instance.publicIps[0];
    await this.deps.dnsService.createRecord(request.domainName, address);
    this.log(`DNS record ${request.domainName} -> ${address}`);

    return instance;
  }

  private async waitForPublicAddress(
    launched: Instance,
    name: string,
    domainName: string,
    options: OperationOptions,
  ): Promise<Instance> {
    try {
      return await pollUntil((attempt) => this.checkAddress(name, launched.id, attempt), {
        ...this.addressPoll,
        description: `a public address on ${name}`,
        delayFirst: true,
        sleep: this.sleep,
        signal: options.signal,
      });
    } catch (error: unknown) {
      if (error instanceof TimeoutError) {
        throw new TimeoutError(
          `${error.message}; instance ${launched.id} is left running without DNS record ${domainName}`,
          error.attempts,
        );
      }
      throw error;
    }
  }

  /**
   * Searches by name tag but only accepts the launched instance: names are
   * reused across runs, so older instances may carry the same tag. A failed
   * lookup, a missing match and an empty address list each spend one attempt.
   */
  private async checkAddress(
    name: string,
    instanceId: string,
    attempt: number,
  ): Promise<PollResult<Instance>> {
    let candidates: Instance[];
    try {
      candidates = await this.deps.computeService.listInstancesByName(name);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.log(`Address lookup ${attempt} failed: ${message}`);
      return { done: false };
    }

    const instance = candidates.find((candidate) => candidate.id === instanceId);
    if (!instance || instance.publicIps.length === 0) {
      return { done: false };
    }
    return { done: true, value: instance };
  }
}
