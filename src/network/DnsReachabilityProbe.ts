import { lookup } from "node:dns/promises";
import type { IReachabilityProbe } from "./IReachabilityProbe";

export const DEFAULT_PROBE_HOST = "example.com";

export interface ResolvedAddress {
  address: string;
  family: number;
}

export type LookupFn = (host: string) => Promise<ResolvedAddress[]>;

const lookupAll: LookupFn = (host) => lookup(host, { all: true });

/**
 * Treats the network as available when a well-known hostname resolves to
 * at least one address. A DNS answer says nothing about the target API,
 * so this is a heuristic only.
 */
export class DnsReachabilityProbe implements IReachabilityProbe {
  constructor(
    private readonly host: string = DEFAULT_PROBE_HOST,
    private readonly resolve: LookupFn = lookupAll
  ) {}

  async isNetworkAvailable(): Promise<boolean> {
    try {
      const addresses = await this.resolve(this.host);
      return addresses.length > 0 && addresses[0].address.length > 0;
    } catch {
      return false;
    }
  }
}
