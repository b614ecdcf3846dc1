import { InvalidInputError } from "@skyforge/adapters-common";
import { parseProvisionRequest } from "./provision-request";

describe("parseProvisionRequest", () => {
  it("fills empty ports and tags", () => {
    expect(parseProvisionRequest({ image: "web" })).toEqual({
      image: "web",
      ports: { tcp: [], udp: [] },
      tags: {},
    });
  });

  it("keeps every optional field", () => {
    const request = parseProvisionRequest({
      image: "ami-123",
      networkId: "vpc-1",
      subnetId: "subnet-1",
      securityGroupId: "sg-1",
      ports: { tcp: [22, 80] },
      instanceType: "t3.small",
      tags: { env: "test" },
      domainName: "api.example.com",
    });

    expect(request.ports).toEqual({ tcp: [22, 80], udp: [] });
    expect(request.securityGroupId).toBe("sg-1");
    expect(request.domainName).toBe("api.example.com");
  });

  it("rejects an empty image", () => {
    expect(() => parseProvisionRequest({ image: "" })).toThrow(InvalidInputError);
  });

  it("rejects out-of-range ports", () => {
    expect(() => parseProvisionRequest({ image: "web", ports: { udp: [70000] } })).toThrow(
      /ports\.udp\.0/,
    );
  });

  it("rejects non-integer ports", () => {
    expect(() => parseProvisionRequest({ image: "web", ports: { tcp: [80.5] } })).toThrow(
      InvalidInputError,
    );
  });
});
