import { ApiRequestDispatcher } from "./api/ApiRequestDispatcher";
import { EnvTokenProvider } from "./auth/EnvTokenProvider";
import type { ITokenProvider } from "./auth/ITokenProvider";
import type { ApiEngineConfig } from "./config";
import { FetchHttpClient } from "./http/FetchHttpClient";
import type { IHttpClient } from "./http/IHttpClient";
import { ConsoleLogger, FileLogger, type ILogger } from "./logging";
import { DnsReachabilityProbe } from "./network/DnsReachabilityProbe";
import type { IReachabilityProbe } from "./network/IReachabilityProbe";

export interface ApiEngineDependencies {
  httpClient?: IHttpClient;
  probe?: IReachabilityProbe;
  tokenProvider?: ITokenProvider;
  logger?: ILogger;
  env?: Record<string, string | undefined>;
}

export function createLogger(config: ApiEngineConfig): ILogger {
  if (config.logFile) {
    return new FileLogger(config.logFile, undefined, config.logLevel);
  }
  return new ConsoleLogger(config.logLevel);
}

/**
 * Wires a dispatcher from resolved config. Any collaborator can be
 * replaced, which is how tests run it without network or DNS.
 */
export function createApiEngine(
  config: ApiEngineConfig,
  deps: ApiEngineDependencies = {}
): ApiRequestDispatcher {
  const httpClient = deps.httpClient ?? new FetchHttpClient(config.timeoutMs);
  const probe = deps.probe ?? new DnsReachabilityProbe(config.probeHost);
  const tokenProvider = deps.tokenProvider ?? new EnvTokenProvider(deps.env ?? process.env, config.tokenEnvVar);
  const logger = deps.logger ?? createLogger(config);

  return new ApiRequestDispatcher(httpClient, probe, tokenProvider, logger, {
    enforceReachability: config.enforceReachability,
    timeoutMs: config.timeoutMs,
  });
}
