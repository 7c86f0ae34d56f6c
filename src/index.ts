export { ApiRequestDispatcher, type ApiRequestDispatcherOptions } from "./api/ApiRequestDispatcher";
export { ApiResponse } from "./api/ApiResponse";
export { ApiRequestError } from "./api/ApiRequestError";
export {
  RequestMethod,
  ResponseStatus,
  COMMON_ERROR_MESSAGE,
  CONNECTIVITY_ERROR_MESSAGE,
  type ApiErrorKind,
  type RequestOptions,
  type SerializedApiResponse,
} from "./api/types";
export type { IHttpClient, HttpRequest, HttpResponse } from "./http/IHttpClient";
export { FetchHttpClient } from "./http/FetchHttpClient";
export { InMemoryHttpClient } from "./http/InMemoryHttpClient";
export type { IReachabilityProbe } from "./network/IReachabilityProbe";
export { DnsReachabilityProbe } from "./network/DnsReachabilityProbe";
export { InMemoryReachabilityProbe } from "./network/InMemoryReachabilityProbe";
export type { ITokenProvider } from "./auth/ITokenProvider";
export { StaticTokenProvider } from "./auth/StaticTokenProvider";
export { EnvTokenProvider } from "./auth/EnvTokenProvider";
export { InMemoryLogger, ConsoleLogger, FileLogger, type ILogger, type LogLevel } from "./logging";
export { resolveConfig, type ApiEngineConfig, type ResolveConfigOptions } from "./config";
export { createApiEngine, createLogger, type ApiEngineDependencies } from "./createApiEngine";
