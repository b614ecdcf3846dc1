import { z } from "zod";
import { InvalidInputError } from "@skyforge/adapters-common";
import { formatIssues } from "./provisioner-config";

const PortSchema = z.number().int().min(1).max(65535);

export const ProvisionRequestSchema = z.object({
  /** Image id (`ami-...`) or the `Name` tag of a self-owned image */
  image: z.string().min(1),
  networkId: z.string().min(1).optional(),
  subnetId: z.string().min(1).optional(),
  /** Reused only when `networkId` is given too */
  securityGroupId: z.string().min(1).optional(),
  ports: z
    .object({
      tcp: z.array(PortSchema).default([]),
      udp: z.array(PortSchema).default([]),
    })
    .default({}),
  instanceType: z.string().min(1).optional(),
  tags: z.record(z.string()).default({}),
  domainName: z.string().min(1).optional(),
});

export type ProvisionRequest = z.infer<typeof ProvisionRequestSchema>;
export type ProvisionRequestInput = z.input<typeof ProvisionRequestSchema>;

export function parseProvisionRequest(input: unknown): ProvisionRequest {
  const result = ProvisionRequestSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError("Invalid provision request", formatIssues(result.error));
  }
  return result.data;
}
