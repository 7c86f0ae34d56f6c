import type { ITokenProvider } from "./ITokenProvider";

export const DEFAULT_TOKEN_ENV_VAR = "API_TOKEN";

/**
 * Reads the token on every call, so a value exported after startup is
 * picked up by the next request.
 */
export class EnvTokenProvider implements ITokenProvider {
  constructor(
    private readonly env: Record<string, string | undefined> = process.env,
    private readonly key: string = DEFAULT_TOKEN_ENV_VAR
  ) {}

  async getToken(): Promise<string | undefined> {
    const value = this.env[this.key]?.trim();
    return value ? value : undefined;
  }
}
