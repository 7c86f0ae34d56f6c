export interface ITokenProvider {
  /** Bearer token for the Authorization header, or undefined when none is configured. */
  getToken(): Promise<string | undefined>;
}
