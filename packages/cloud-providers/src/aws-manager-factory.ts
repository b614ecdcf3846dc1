/**
 * Factory that wires AWS SDK clients and injects them into services and managers.
 *
 * Single entry point: `AwsManagerFactory.create(config)`.
 * All SDK clients are created here and shared via constructor injection (DIP).
 */

import { EC2Client } from "@aws-sdk/client-ec2";
import { S3Client } from "@aws-sdk/client-s3";
import { Route53Client } from "@aws-sdk/client-route-53";
import type {
  IBlobStorageService,
  IComputeService,
  IDnsService,
  IImageService,
} from "@skyforge/adapters-common";
import {
  EC2ImageService,
  EC2Service,
  Route53DnsService,
  S3StorageService,
  type AWSConfig,
} from "@skyforge/adapters-aws";
import {
  AwsComputeManager,
  AwsImageImportManager,
  AwsNetworkManager,
  AwsSecurityGroupManager,
  type IAwsComputeManager,
  type IAwsImageImportManager,
  type IAwsNetworkManager,
  type IAwsSecurityGroupManager,
} from "./managers";
import { InstanceProvisioner } from "./provisioner/instance-provisioner";
import type { ProvisionerConfig } from "./config/provisioner-config";
import { noopLog, type Clock, type LogCallback, type SleepFn } from "./types";

/** Everything the factory builds, typed to interfaces (DIP) */
export interface AwsProvisioningStack {
  computeService: IComputeService;
  imageService: IImageService;
  storageService: IBlobStorageService;
  dnsService: IDnsService;
  networkManager: IAwsNetworkManager;
  securityGroupManager: IAwsSecurityGroupManager;
  computeManager: IAwsComputeManager;
  imageImportManager: IAwsImageImportManager;
  provisioner: InstanceProvisioner;
}

export interface AwsManagerFactoryOptions {
  log?: LogCallback;
  sleep?: SleepFn;
  clock?: Clock;
}

export class AwsManagerFactory {
  static create(config: ProvisionerConfig, options: AwsManagerFactoryOptions = {}): AwsProvisioningStack {
    const { log = noopLog, sleep, clock } = options;
    const clientConfig: AWSConfig = { region: config.region, credentials: config.credentials };

    const ec2Client = new EC2Client(clientConfig);
    const s3Client = new S3Client(clientConfig);
    const route53Client = new Route53Client(clientConfig);

    const computeService = new EC2Service(ec2Client);
    const imageService = new EC2ImageService(ec2Client);
    const storageService = new S3StorageService(s3Client, config.bucketName);
    const dnsService = new Route53DnsService(route53Client, config.dnsRecordTtlSeconds);

    const networkManager = new AwsNetworkManager(ec2Client, log);
    const securityGroupManager = new AwsSecurityGroupManager(ec2Client, log, clock);
    const computeManager = new AwsComputeManager(ec2Client, log);
    const imageImportManager = new AwsImageImportManager(ec2Client, storageService, log, {
      poll: config.imageImport,
      sleep,
      clock,
    });

    const provisioner = new InstanceProvisioner(
      { networkManager, securityGroupManager, computeManager, computeService, dnsService },
      {
        defaultInstanceType: config.defaultInstanceType,
        addressPoll: config.addressPoll,
        sleep,
        clock,
        log,
      },
    );

    return {
      computeService,
      imageService,
      storageService,
      dnsService,
      networkManager,
      securityGroupManager,
      computeManager,
      imageImportManager,
      provisioner,
    };
  }
}
