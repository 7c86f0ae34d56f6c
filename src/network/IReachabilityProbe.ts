export interface IReachabilityProbe {
  /** Resolves false when the network looks unusable. Never rejects. */
  isNetworkAvailable(): Promise<boolean>;
}
