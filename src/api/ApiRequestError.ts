import type { ApiErrorKind } from "./types";

export class ApiRequestError extends Error {
  constructor(
    message: string,
    readonly kind: ApiErrorKind,
    readonly statusCode?: number
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}
