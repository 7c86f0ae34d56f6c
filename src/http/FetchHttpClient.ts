import type { IHttpClient, HttpRequest, HttpResponse } from "./IHttpClient";

export const DEFAULT_TIMEOUT_MS = 30 * 1000;

/**
 * IHttpClient backed by the Node.js built-in fetch API.
 * The timeout covers both the round trip and reading the body; an expired
 * timer rejects with an AbortError.
 */
export class FetchHttpClient implements IHttpClient {
  constructor(private readonly defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();

      return {
        ok: response.ok,
        status: response.status,
        text: async () => body,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
