import type { ILogger } from "../logging";
import type { IHttpClient, HttpRequest, HttpResponse } from "../http/IHttpClient";
import type { IReachabilityProbe } from "../network/IReachabilityProbe";
import type { ITokenProvider } from "../auth/ITokenProvider";
import { ApiRequestError } from "./ApiRequestError";
import { ApiResponse } from "./ApiResponse";
import {
  COMMON_ERROR_MESSAGE,
  CONNECTIVITY_ERROR_MESSAGE,
  RequestMethod,
  type ApiErrorKind,
  type RequestOptions,
} from "./types";

const SUCCESS_STATUS_CODES = new Set([200, 201]);

export interface ApiRequestDispatcherOptions {
  /** Fail fast with a connectivity error when the probe reports no network (default: false). */
  enforceReachability?: boolean;
  /** Transport timeout applied when a call does not set its own. */
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function classifyFailure(err: unknown): ApiErrorKind {
  if (err instanceof SyntaxError) {
    return "decode";
  }
  if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
    return "timeout";
  }
  return "network";
}

function maskHeaders(headers: Record<string, string>): Record<string, string> {
  if (headers.Authorization === undefined) {
    return headers;
  }
  return { ...headers, Authorization: "Bearer ***" };
}

/**
 * Sends one JSON request and folds every outcome into an ApiResponse.
 *
 * 200 and 201 are SUCCESS; any other status is FAILED with the body's
 * `message` as error text when there is one. A transport error or an
 * undecodable body is FAILED with the generic message and no data.
 * Only precondition violations (empty URL, POST/PUT without payload)
 * reject the returned promise.
 */
export class ApiRequestDispatcher {
  constructor(
    private readonly httpClient: IHttpClient,
    private readonly probe: IReachabilityProbe,
    private readonly tokenProvider: ITokenProvider,
    private readonly logger: ILogger,
    private readonly settings: ApiRequestDispatcherOptions = {}
  ) {}

  get(url: string, options?: Omit<RequestOptions, "payload">): Promise<ApiResponse> {
    return this.performRequest(RequestMethod.GET, url, options);
  }

  post(url: string, payload: unknown, options?: Omit<RequestOptions, "payload">): Promise<ApiResponse> {
    return this.performRequest(RequestMethod.POST, url, { ...options, payload });
  }

  put(url: string, payload: unknown, options?: Omit<RequestOptions, "payload">): Promise<ApiResponse> {
    return this.performRequest(RequestMethod.PUT, url, { ...options, payload });
  }

  async performRequest(
    method: RequestMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<ApiResponse> {
    const { payload, includeToken = true } = options;
    const carriesBody = method === RequestMethod.POST || method === RequestMethod.PUT;

    if (url.length === 0) {
      throw new Error("URL must not be empty");
    }
    if (carriesBody && (payload === undefined || payload === null)) {
      throw new Error(`${method} request to ${url} requires a payload`);
    }

    const networkAvailable = await this.probe.isNetworkAvailable();
    if (!networkAvailable) {
      this.logger.debug("No internet connection");
      if (this.settings.enforceReachability) {
        return ApiResponse.failure(new ApiRequestError(CONNECTIVITY_ERROR_MESSAGE, "unreachable"));
      }
    }

    const headers = await this.prepareHeaders(includeToken);
    this.logger.debug(`Request: ${method} ${url}`);
    this.logger.verbose(`Headers: ${JSON.stringify(maskHeaders(headers))}`);

    try {
      const request: HttpRequest = {
        method,
        url,
        headers,
        timeoutMs: options.timeoutMs ?? this.settings.timeoutMs,
      };
      if (carriesBody) {
        request.body = JSON.stringify(payload);
        this.logger.verbose(`Payload: ${request.body}`);
      }

      const response = await this.httpClient.send(request);
      return await this.handleResponse(response);
    } catch (err) {
      const kind = classifyFailure(err);
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.debug(`Request failed (${kind}): ${method} ${url}: ${detail}`);
      return ApiResponse.failure(new ApiRequestError(COMMON_ERROR_MESSAGE, kind));
    }
  }

  private async handleResponse(response: HttpResponse): Promise<ApiResponse> {
    const body = await response.text();
    this.logger.debug(`Status: ${response.status}`);
    this.logger.verbose(`Response: ${body}`);

    const data: unknown = JSON.parse(body);

    if (SUCCESS_STATUS_CODES.has(response.status)) {
      return ApiResponse.success(data);
    }

    // Error bodies must be JSON objects; anything else counts as undecodable.
    if (!isRecord(data)) {
      this.logger.debug(`Error body for status ${response.status} is not a JSON object`);
      return ApiResponse.failure(new ApiRequestError(COMMON_ERROR_MESSAGE, "decode", response.status));
    }

    const bodyMessage = data.message === undefined || data.message === null ? undefined : String(data.message);
    const error = new ApiRequestError(bodyMessage ?? COMMON_ERROR_MESSAGE, "http-status", response.status);
    return ApiResponse.failure(error, data);
  }

  private async prepareHeaders(includeToken: boolean): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      "Content-type": "application/json",
      Accept: "application/json",
    };

    if (includeToken) {
      const token = await this.tokenProvider.getToken();
      if (!token) {
        this.logger.debug("No bearer token configured; sending an empty Authorization header");
      }
      headers.Authorization = `Bearer ${token ?? ""}`;
    }

    return headers;
  }
}
