import { EC2Service, mapInstance } from "./ec2-service";
import type { EC2Client } from "@aws-sdk/client-ec2";
import {
  DescribeInstancesCommand,
  StartInstancesCommand,
  StopInstancesCommand,
  TerminateInstancesCommand,
  GetConsoleOutputCommand,
} from "@aws-sdk/client-ec2";
import { NotFoundError, ProviderApiError } from "@skyforge/adapters-common";

const RAW_INSTANCE = {
  InstanceId: "i-0abc",
  State: { Name: "running" as const },
  LaunchTime: new Date("2026-01-02T03:04:05Z"),
  Tags: [
    { Key: "env", Value: "test" },
    { Key: "Name", Value: "web-1" },
  ],
  NetworkInterfaces: [
    { PrivateIpAddress: "10.0.1.5", Association: { PublicIp: "203.0.113.10" } },
    { PrivateIpAddress: "10.0.2.7" },
  ],
};

describe("EC2Service", () => {
  let mockEc2Send: jest.Mock;
  let service: EC2Service;

  beforeEach(() => {
    mockEc2Send = jest.fn();
    service = new EC2Service({ send: mockEc2Send } as unknown as EC2Client);
  });

  describe("mapInstance", () => {
    it("collects addresses per network interface and the Name tag", () => {
      expect(mapInstance(RAW_INSTANCE)).toEqual({
        id: "i-0abc",
        name: "web-1",
        status: "running",
        privateIps: ["10.0.1.5", "10.0.2.7"],
        publicIps: ["203.0.113.10"],
        createdAt: new Date("2026-01-02T03:04:05Z"),
      });
    });

    it("falls back to unknown name and status", () => {
      const mapped = mapInstance({ InstanceId: "i-1" });
      expect(mapped.name).toBe("unknown");
      expect(mapped.status).toBe("unknown");
      expect(mapped.publicIps).toEqual([]);
    });
  });

  describe("describeInstances", () => {
    it("follows pagination tokens", async () => {
      mockEc2Send
        .mockResolvedValueOnce({
          Reservations: [{ Instances: [{ InstanceId: "i-1" }] }],
          NextToken: "page-2",
        })
        .mockResolvedValueOnce({
          Reservations: [{ Instances: [{ InstanceId: "i-2" }, { InstanceId: "i-3" }] }],
        });

      const instances = await service.listInstances();

      expect(instances.map((i) => i.id)).toEqual(["i-1", "i-2", "i-3"]);
      expect(mockEc2Send).toHaveBeenCalledTimes(2);
      const second = mockEc2Send.mock.calls[1][0] as DescribeInstancesCommand;
      expect(second.input.NextToken).toBe("page-2");
    });
  });

  describe("getInstance", () => {
    it("returns the instance with the requested ID", async () => {
      mockEc2Send.mockResolvedValue({ Reservations: [{ Instances: [RAW_INSTANCE] }] });

      const instance = await service.getInstance("i-0abc");

      expect(instance.id).toBe("i-0abc");
      const cmd = mockEc2Send.mock.calls[0][0] as DescribeInstancesCommand;
      expect(cmd.input.InstanceIds).toEqual(["i-0abc"]);
    });

    it("throws NotFoundError on an empty result", async () => {
      mockEc2Send.mockResolvedValue({ Reservations: [] });

      await expect(service.getInstance("i-missing")).rejects.toThrow(NotFoundError);
    });

    it("classifies provider errors", async () => {
      mockEc2Send.mockRejectedValue(
        Object.assign(new Error("The instance ID 'i-bad' is malformed"), {
          name: "InvalidInstanceID.Malformed",
        }),
      );

      await expect(service.getInstance("i-bad")).rejects.toThrow(ProviderApiError);
    });
  });

  describe("getInstanceByName", () => {
    it("filters by Name tag", async () => {
      mockEc2Send.mockResolvedValue({ Reservations: [{ Instances: [RAW_INSTANCE] }] });

      const instance = await service.getInstanceByName("web-1");

      expect(instance.name).toBe("web-1");
      const cmd = mockEc2Send.mock.calls[0][0] as DescribeInstancesCommand;
      expect(cmd.input.Filters).toEqual([{ Name: "tag:Name", Values: ["web-1"] }]);
    });

    it("throws NotFoundError naming the instance", async () => {
      mockEc2Send.mockResolvedValue({ Reservations: [] });

      await expect(service.getInstanceByName("ghost")).rejects.toThrow('Instance "ghost" not found');
    });
  });

  describe("listInstancesByName", () => {
    it("returns every instance sharing the Name tag", async () => {
      mockEc2Send.mockResolvedValue({
        Reservations: [
          { Instances: [{ InstanceId: "i-old", Tags: [{ Key: "Name", Value: "api" }] }] },
          { Instances: [{ InstanceId: "i-new", Tags: [{ Key: "Name", Value: "api" }] }] },
        ],
      });

      const instances = await service.listInstancesByName("api");

      expect(instances.map((i) => i.id)).toEqual(["i-old", "i-new"]);
      const cmd = mockEc2Send.mock.calls[0][0] as DescribeInstancesCommand;
      expect(cmd.input.Filters).toEqual([{ Name: "tag:Name", Values: ["api"] }]);
    });

    it("returns an empty list when nothing matches", async () => {
      mockEc2Send.mockResolvedValue({ Reservations: [] });

      await expect(service.listInstancesByName("ghost")).resolves.toEqual([]);
    });
  });

  describe("lifecycle passthroughs", () => {
    beforeEach(() => {
      mockEc2Send.mockResolvedValue({});
    });

    it("starts an instance", async () => {
      await service.startInstance("i-1");
      expect(mockEc2Send).toHaveBeenCalledWith(expect.any(StartInstancesCommand));
      expect((mockEc2Send.mock.calls[0][0] as StartInstancesCommand).input.InstanceIds).toEqual(["i-1"]);
    });

    it("stops an instance", async () => {
      await service.stopInstance("i-1");
      expect(mockEc2Send).toHaveBeenCalledWith(expect.any(StopInstancesCommand));
    });

    it("terminates an instance", async () => {
      await service.terminateInstance("i-1");
      expect(mockEc2Send).toHaveBeenCalledWith(expect.any(TerminateInstancesCommand));
    });

    it("maps a missing instance on stop to NotFoundError", async () => {
      mockEc2Send.mockRejectedValue(
        Object.assign(new Error("does not exist"), { name: "InvalidInstanceID.NotFound" }),
      );

      await expect(service.stopInstance("i-gone")).rejects.toThrow(
        "Unable to stop instance i-gone: does not exist",
      );
      await expect(service.stopInstance("i-gone")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("getConsoleOutput", () => {
    it("decodes base64 output", async () => {
      mockEc2Send.mockResolvedValue({
        Output: Buffer.from("booting kernel\nready\n").toString("base64"),
      });

      const output = await service.getConsoleOutput("i-1");

      expect(output).toBe("booting kernel\nready\n");
      expect(mockEc2Send).toHaveBeenCalledWith(expect.any(GetConsoleOutputCommand));
    });

    it("returns an empty string when there is no output yet", async () => {
      mockEc2Send.mockResolvedValue({});

      await expect(service.getConsoleOutput("i-1")).resolves.toBe("");
    });
  });
});
