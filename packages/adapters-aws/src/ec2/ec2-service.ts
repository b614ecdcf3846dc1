import {
  type EC2Client,
  DescribeInstancesCommand,
  StartInstancesCommand,
  StopInstancesCommand,
  TerminateInstancesCommand,
  GetConsoleOutputCommand,
  type Instance as Ec2Instance,
  type Filter,
} from "@aws-sdk/client-ec2";
import {
  NotFoundError,
  type IComputeService,
  type Instance,
  type InstanceStatus,
} from "@skyforge/adapters-common";
import { withAwsErrors } from "../errors/aws-error-classifier";

const KNOWN_STATES: readonly InstanceStatus[] = [
  "pending",
  "running",
  "shutting-down",
  "stopping",
  "stopped",
  "terminated",
];

/**
 * Instance lifecycle passthroughs over EC2.
 */
export class EC2Service implements IComputeService {
  constructor(private readonly client: EC2Client) {}

  /**
   * Describe EC2 instances with optional filters, following pagination.
   */
  async describeInstances(options?: {
    instanceIds?: string[];
    filters?: { name: string; values: string[] }[];
  }): Promise<Instance[]> {
    const instances: Instance[] = [];
    let nextToken: string | undefined;

    const filters: Filter[] | undefined = options?.filters?.map((f) => ({
      Name: f.name,
      Values: f.values,
    }));

    do {
      const result = await withAwsErrors("Unable to describe instances", () =>
        this.client.send(
          new DescribeInstancesCommand({
            InstanceIds: options?.instanceIds,
            Filters: filters,
            NextToken: nextToken,
          }),
        ),
      );

      for (const reservation of result.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          instances.push(mapInstance(instance));
        }
      }

      nextToken = result.NextToken;
    } while (nextToken);

    return instances;
  }

  async listInstances(): Promise<Instance[]> {
    return this.describeInstances();
  }

  async getInstance(instanceId: string): Promise<Instance> {
    const instances = await this.describeInstances({ instanceIds: [instanceId] });
    const instance = instances[0];
    if (!instance) {
      throw new NotFoundError(`Instance "${instanceId}" not found`);
    }
    return instance;
  }

  async getInstanceByName(name: string): Promise<Instance> {
    const instances = await this.listInstancesByName(name);
    const instance = instances[0];
    if (!instance) {
      throw new NotFoundError(`Instance "${name}" not found`);
    }
    return instance;
  }

  async listInstancesByName(name: string): Promise<Instance[]> {
    return this.describeInstances({
      filters: [{ name: "tag:Name", values: [name] }],
    });
  }

  async startInstance(instanceId: string): Promise<void> {
    await withAwsErrors(`Unable to start instance ${instanceId}`, () =>
      this.client.send(new StartInstancesCommand({ InstanceIds: [instanceId] })),
    );
  }

  async stopInstance(instanceId: string): Promise<void> {
    await withAwsErrors(`Unable to stop instance ${instanceId}`, () =>
      this.client.send(new StopInstancesCommand({ InstanceIds: [instanceId] })),
    );
  }

  async terminateInstance(instanceId: string): Promise<void> {
    await withAwsErrors(`Unable to terminate instance ${instanceId}`, () =>
      this.client.send(new TerminateInstancesCommand({ InstanceIds: [instanceId] })),
    );
  }

  /**
   * Console output is returned base64-encoded by EC2. Non-nitro instances only
   * keep the last 64 KiB.
   */
  async getConsoleOutput(instanceId: string): Promise<string> {
    const result = await withAwsErrors(`Unable to get console output for ${instanceId}`, () =>
      this.client.send(new GetConsoleOutputCommand({ InstanceId: instanceId })),
    );
    return Buffer.from(result.Output ?? "", "base64").toString("utf8");
  }
}

/**
 * Map an SDK instance to the provider-neutral shape. Addresses come from the
 * network interfaces so that multi-interface instances list every one.
 */
export function mapInstance(instance: Ec2Instance): Instance {
  const name = instance.Tags?.find((tag) => tag.Key === "Name")?.Value ?? "unknown";

  const privateIps: string[] = [];
  const publicIps: string[] = [];
  for (const networkInterface of instance.NetworkInterfaces ?? []) {
    if (networkInterface.PrivateIpAddress) {
      privateIps.push(networkInterface.PrivateIpAddress);
    }
    if (networkInterface.Association?.PublicIp) {
      publicIps.push(networkInterface.Association.PublicIp);
    }
  }

  return {
    id: instance.InstanceId ?? "",
    name,
    status: toInstanceStatus(instance.State?.Name),
    privateIps,
    publicIps,
    createdAt: instance.LaunchTime,
  };
}

function toInstanceStatus(state: string | undefined): InstanceStatus {
  return KNOWN_STATES.find((known) => known === state) ?? "unknown";
}
