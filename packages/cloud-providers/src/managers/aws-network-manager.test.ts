import { AwsNetworkManager } from "./aws-network-manager";
import type { EC2Client } from "@aws-sdk/client-ec2";
import { DescribeVpcsCommand, DescribeSubnetsCommand } from "@aws-sdk/client-ec2";
import { NotFoundError, ProviderApiError } from "@skyforge/adapters-common";

describe("AwsNetworkManager", () => {
  let mockEc2Send: jest.Mock;
  let ec2Client: EC2Client;
  let logCallback: jest.Mock;
  let manager: AwsNetworkManager;

  beforeEach(() => {
    mockEc2Send = jest.fn();
    ec2Client = { send: mockEc2Send } as unknown as EC2Client;
    logCallback = jest.fn();
    manager = new AwsNetworkManager(ec2Client, logCallback);
  });

  describe("resolveNetwork", () => {
    it("filters by the hinted VPC ID", async () => {
      mockEc2Send.mockResolvedValue({ Vpcs: [{ VpcId: "vpc-2", IsDefault: false }] });

      const network = await manager.resolveNetwork("vpc-2");

      expect(network).toEqual({ id: "vpc-2", isDefault: false });
      const cmd = mockEc2Send.mock.calls[0][0] as DescribeVpcsCommand;
      expect(cmd).toBeInstanceOf(DescribeVpcsCommand);
      expect(cmd.input.Filters).toEqual([{ Name: "vpc-id", Values: ["vpc-2"] }]);
    });

    it("throws NotFoundError naming the hint when nothing matches", async () => {
      mockEc2Send.mockResolvedValue({ Vpcs: [] });

      await expect(manager.resolveNetwork("vpc-missing")).rejects.toThrow(NotFoundError);
      await expect(manager.resolveNetwork("vpc-missing")).rejects.toThrow(
        'Unable to find VPC with ID "vpc-missing"',
      );
    });

    it("prefers the region default VPC without a hint", async () => {
      mockEc2Send.mockResolvedValue({
        Vpcs: [
          { VpcId: "vpc-a", IsDefault: false },
          { VpcId: "vpc-b", IsDefault: true },
        ],
      });

      const network = await manager.resolveNetwork();

      expect(network.id).toBe("vpc-b");
      const cmd = mockEc2Send.mock.calls[0][0] as DescribeVpcsCommand;
      expect(cmd.input.Filters).toBeUndefined();
      expect(logCallback).toHaveBeenCalledWith("Using VPC vpc-b");
    });

    it("falls back to the first VPC when none is default", async () => {
      mockEc2Send.mockResolvedValue({
        Vpcs: [{ VpcId: "vpc-a" }, { VpcId: "vpc-b" }],
      });

      const network = await manager.resolveNetwork();

      expect(network).toEqual({ id: "vpc-a", isDefault: false });
    });

    it("throws NotFoundError when the region has no VPC", async () => {
      mockEc2Send.mockResolvedValue({});

      await expect(manager.resolveNetwork()).rejects.toThrow("No VPC found in region");
    });

    it("classifies API failures", async () => {
      const err = new Error("Rate exceeded");
      err.name = "RequestLimitExceeded";
      mockEc2Send.mockRejectedValue(err);

      await expect(manager.resolveNetwork()).rejects.toThrow(ProviderApiError);
    });
  });

  describe("resolveSubnet", () => {
    const network = { id: "vpc-1", isDefault: true };

    it("filters by VPC only without a hint", async () => {
      mockEc2Send.mockResolvedValue({ Subnets: [{ SubnetId: "subnet-1", VpcId: "vpc-1" }] });

      const subnet = await manager.resolveSubnet(network);

      expect(subnet.id).toBe("subnet-1");
      const cmd = mockEc2Send.mock.calls[0][0] as DescribeSubnetsCommand;
      expect(cmd).toBeInstanceOf(DescribeSubnetsCommand);
      expect(cmd.input.Filters).toEqual([{ Name: "vpc-id", Values: ["vpc-1"] }]);
    });

    it("adds the subnet filter with a hint", async () => {
      mockEc2Send.mockResolvedValue({ Subnets: [{ SubnetId: "subnet-9", VpcId: "vpc-1" }] });

      await manager.resolveSubnet(network, "subnet-9");

      const cmd = mockEc2Send.mock.calls[0][0] as DescribeSubnetsCommand;
      expect(cmd.input.Filters).toEqual([
        { Name: "vpc-id", Values: ["vpc-1"] },
        { Name: "subnet-id", Values: ["subnet-9"] },
      ]);
    });

    it("prefers the AZ default subnet", async () => {
      mockEc2Send.mockResolvedValue({
        Subnets: [
          { SubnetId: "subnet-a", VpcId: "vpc-1", DefaultForAz: false },
          { SubnetId: "subnet-b", VpcId: "vpc-1", DefaultForAz: true, AvailabilityZone: "us-east-1b" },
        ],
      });

      const subnet = await manager.resolveSubnet(network);

      expect(subnet).toEqual({
        id: "subnet-b",
        networkId: "vpc-1",
        isDefaultForAz: true,
        availabilityZone: "us-east-1b",
      });
    });

    it("falls back to the first subnet listed", async () => {
      mockEc2Send.mockResolvedValue({
        Subnets: [{ SubnetId: "subnet-a" }, { SubnetId: "subnet-b" }],
      });

      const subnet = await manager.resolveSubnet(network);

      expect(subnet.id).toBe("subnet-a");
      expect(subnet.networkId).toBe("vpc-1");
    });

    it("names the hinted subnet when it is missing", async () => {
      mockEc2Send.mockResolvedValue({ Subnets: [] });

      await expect(manager.resolveSubnet(network, "subnet-x")).rejects.toThrow(
        'Unable to find subnet with ID "subnet-x" in VPC vpc-1',
      );
    });

    it("throws a generic NotFoundError without a hint", async () => {
      mockEc2Send.mockResolvedValue({ Subnets: [] });

      await expect(manager.resolveSubnet(network)).rejects.toThrow(NotFoundError);
      await expect(manager.resolveSubnet(network)).rejects.toThrow("No subnet found in VPC vpc-1");
    });
  });
});
