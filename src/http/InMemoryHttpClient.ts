import type { IHttpClient, HttpRequest, HttpResponse } from "./IHttpClient";

type QueuedResponse =
  | { kind: "response"; status: number; body: string }
  | { kind: "network-error"; message: string }
  | { kind: "timeout" };

/**
 * In-memory IHttpClient for unit tests.
 * Enqueue responses in order; each send() call consumes one.
 */
export class InMemoryHttpClient implements IHttpClient {
  private readonly responses: QueuedResponse[] = [];
  private readonly requests: HttpRequest[] = [];

  /** Queues a body that is JSON-encoded before being handed back. */
  enqueueJson(body: unknown, status = 200): void {
    this.responses.push({ kind: "response", status, body: JSON.stringify(body) });
  }

  /** Queues a raw body, returned verbatim (use for malformed JSON). */
  enqueueText(body: string, status = 200): void {
    this.responses.push({ kind: "response", status, body });
  }

  enqueueNetworkError(message: string): void {
    this.responses.push({ kind: "network-error", message });
  }

  enqueueTimeout(): void {
    this.responses.push({ kind: "timeout" });
  }

  getRequests(): HttpRequest[] {
    return [...this.requests];
  }

  reset(): void {
    this.responses.length = 0;
    this.requests.length = 0;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push({ ...request, headers: { ...request.headers } });

    const queued = this.responses.shift();
    if (!queued) {
      throw new Error("InMemoryHttpClient: no more queued responses");
    }

    if (queued.kind === "network-error") {
      throw Object.assign(new Error(queued.message), { code: "ECONNREFUSED" });
    }

    if (queued.kind === "timeout") {
      const err = new Error("This operation was aborted");
      err.name = "AbortError";
      throw err;
    }

    const { status, body } = queued;
    return {
      ok: status >= 200 && status < 300,
      status,
      text: async () => body,
    };
  }
}
