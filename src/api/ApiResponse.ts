import type { ApiRequestError } from "./ApiRequestError";
import { ResponseStatus, type SerializedApiResponse } from "./types";

/**
 * Normalized outcome of one request attempt.
 *
 * Built only through `success()` and `failure()`, so `error` is set exactly
 * when the status is FAILED. `data` is whatever the decoded body produced,
 * or undefined when nothing was decoded.
 */
export class ApiResponse {
  private constructor(
    readonly status: ResponseStatus,
    readonly data: unknown,
    readonly error: ApiRequestError | undefined,
    readonly message: string
  ) {}

  static success(data: unknown, message = ""): ApiResponse {
    return new ApiResponse(ResponseStatus.SUCCESS, data, undefined, message);
  }

  static failure(error: ApiRequestError, data?: unknown, message = ""): ApiResponse {
    return new ApiResponse(ResponseStatus.FAILED, data, error, message);
  }

  isSuccess(): boolean {
    return this.status === ResponseStatus.SUCCESS;
  }

  toJSON(): SerializedApiResponse {
    const json: SerializedApiResponse = {
      Response_Status: this.status,
      Response_Data: this.data === undefined ? null : this.data,
    };

    if (this.error) {
      json.Response_Exception = this.error.message;
    }
    if (this.message.length > 0) {
      json.Response_Message = this.message;
    }

    return json;
  }
}
