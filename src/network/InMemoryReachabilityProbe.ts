import type { IReachabilityProbe } from "./IReachabilityProbe";

export class InMemoryReachabilityProbe implements IReachabilityProbe {
  private calls = 0;

  constructor(private available = true) {}

  setAvailable(available: boolean): void {
    this.available = available;
  }

  getCallCount(): number {
    return this.calls;
  }

  async isNetworkAvailable(): Promise<boolean> {
    this.calls++;
    return this.available;
  }
}
