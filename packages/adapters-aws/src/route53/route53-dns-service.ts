import {
  type Route53Client,
  ListHostedZonesByNameCommand,
  ChangeResourceRecordSetsCommand,
} from "@aws-sdk/client-route-53";
import { NotFoundError, type IDnsService } from "@skyforge/adapters-common";
import { withAwsErrors } from "../errors/aws-error-classifier";

const DEFAULT_TTL_SECONDS = 300;

/**
 * Binds instance addresses to names in an existing Route 53 hosted zone.
 * Zones are never created here.
 */
export class Route53DnsService implements IDnsService {
  constructor(
    private readonly client: Route53Client,
    private readonly ttlSeconds: number = DEFAULT_TTL_SECONDS,
  ) {}

  async createRecord(domainName: string, address: string): Promise<void> {
    const zoneName = apexZoneName(domainName);
    const zoneId = await this.findHostedZoneId(zoneName);
    const recordName = domainName.endsWith(".") ? domainName : `${domainName}.`;

    await withAwsErrors(`Unable to create DNS record ${recordName}`, () =>
      this.client.send(
        new ChangeResourceRecordSetsCommand({
          HostedZoneId: zoneId,
          ChangeBatch: {
            Changes: [
              {
                Action: "UPSERT",
                ResourceRecordSet: {
                  Name: recordName,
                  Type: "A",
                  TTL: this.ttlSeconds,
                  ResourceRecords: [{ Value: address }],
                },
              },
            ],
          },
        }),
      ),
    );
  }

  private async findHostedZoneId(zoneName: string): Promise<string> {
    const result = await withAwsErrors(`Unable to look up hosted zone ${zoneName}`, () =>
      this.client.send(new ListHostedZonesByNameCommand({ DNSName: zoneName, MaxItems: 1 })),
    );
    const zone = result.HostedZones?.find((z) => z.Name === zoneName);
    if (!zone?.Id) {
      throw new NotFoundError(`Hosted zone "${zoneName}" not found`);
    }
    return zone.Id;
  }
}

/**
 * "api.example.com" -> "example.com."
 */
export function apexZoneName(domainName: string): string {
  const labels = domainName.replace(/\.$/, "").split(".").filter(Boolean);
  return `${labels.slice(-2).join(".")}.`;
}
