import type { ITokenProvider } from "./ITokenProvider";

export class StaticTokenProvider implements ITokenProvider {
  constructor(private token?: string) {}

  setToken(token: string | undefined): void {
    this.token = token;
  }

  async getToken(): Promise<string | undefined> {
    return this.token || undefined;
  }
}
