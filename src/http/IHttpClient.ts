import type { RequestMethod } from "../api/types";

/**
 * Transport seam for the request dispatcher. The fetch-based client is
 * swapped for an in-memory one in unit tests.
 */

export interface HttpRequest {
  method: RequestMethod;
  url: string;
  headers: Record<string, string>;
  /** Serialized request body. Absent for GET and for bodiless POST/PUT. */
  body?: string;
  timeoutMs?: number;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface IHttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}
