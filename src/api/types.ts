export enum RequestMethod {
  GET = "GET",
  POST = "POST",
  PUT = "PUT",
}

export enum ResponseStatus {
  SUCCESS = "SUCCESS",
  FAILED = "FAILED",
}

/**
 * Why a request failed. The error text stays the same across transport
 * kinds; the kind is there for callers that want to branch on it.
 */
export type ApiErrorKind = "unreachable" | "network" | "timeout" | "decode" | "http-status";

export const COMMON_ERROR_MESSAGE = "Something went wrong. Please try again later.";
export const CONNECTIVITY_ERROR_MESSAGE = "Please check your internet connectivity and try again.";

export interface RequestOptions {
  /** JSON-serializable body. Required for POST and PUT, ignored for GET. */
  payload?: unknown;
  /** Send an Authorization header (default: true). */
  includeToken?: boolean;
  /** Overrides the engine-wide transport timeout for this call. */
  timeoutMs?: number;
}

export interface SerializedApiResponse {
  Response_Status: ResponseStatus;
  Response_Data: unknown;
  Response_Exception?: string;
  Response_Message?: string;
}
