/**
 * DNS Service Interface
 */
export interface IDnsService {
  /**
   * Bind a domain name to an IPv4 address. Fire-and-forget: propagation is
   * not verified.
   */
  createRecord(domainName: string, address: string): Promise<void>;
}
