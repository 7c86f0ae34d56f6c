import * as path from "node:path";
import { z } from "zod";
import type { IFileSystem } from "./abstractions/IFileSystem";
import type { LogLevel } from "./logging";
import { DEFAULT_PROBE_HOST } from "./network/DnsReachabilityProbe";
import { DEFAULT_TIMEOUT_MS } from "./http/FetchHttpClient";
import { DEFAULT_TOKEN_ENV_VAR } from "./auth/EnvTokenProvider";

export const CONFIG_FILE_NAME = "api-engine.json";

export interface ApiEngineConfig {
  /** Hostname resolved by the reachability probe (default: example.com). */
  probeHost: string;
  /** Abort with a connectivity error when the probe fails (default: false; the probe is only logged). */
  enforceReachability: boolean;
  /** Transport timeout in ms (default: 30000). */
  timeoutMs: number;
  /** Log verbosity (default: "info"). "debug" adds headers, payloads and bodies. */
  logLevel: LogLevel;
  /** Append logs to this file instead of stderr. */
  logFile?: string;
  /** Environment variable holding the bearer token (default: API_TOKEN). */
  tokenEnvVar: string;
}

const configFileSchema = z
  .object({
    probeHost: z.string().min(1).optional(),
    enforceReachability: z.boolean().optional(),
    timeoutMs: z.number().int().positive().optional(),
    logLevel: z.enum(["info", "debug"]).optional(),
    logFile: z.string().min(1).optional(),
    tokenEnvVar: z.string().min(1).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export interface ResolveConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: Record<string, string | undefined>;
}

const DEFAULTS: ApiEngineConfig = {
  probeHost: DEFAULT_PROBE_HOST,
  enforceReachability: false,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  logLevel: "info",
  tokenEnvVar: DEFAULT_TOKEN_ENV_VAR,
};

async function loadConfigFile(fs: IFileSystem, filePath: string): Promise<ConfigFile> {
  const raw = await fs.readFile(filePath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Config file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${filePath}: ${issues}`);
  }
  return result.data;
}

function parseBooleanEnv(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw new Error(`Invalid ${key}: expected true or false, got "${value}"`);
}

function parsePositiveIntEnv(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${key}: expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Env vars > config file > defaults. The config file is the explicit
 * `configPath` when given (and must exist), otherwise `<cwd>/api-engine.json`
 * when present.
 */
export async function resolveConfig(
  fs: IFileSystem,
  options: ResolveConfigOptions = {}
): Promise<ApiEngineConfig> {
  const env = options.env ?? {};
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    if (!(await fs.exists(options.configPath))) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    fileConfig = await loadConfigFile(fs, options.configPath);
  } else if (options.cwd) {
    const cwdConfig = path.join(options.cwd, CONFIG_FILE_NAME);
    if (await fs.exists(cwdConfig)) {
      fileConfig = await loadConfigFile(fs, cwdConfig);
    }
  }

  const merged: ApiEngineConfig = {
    probeHost: fileConfig.probeHost ?? DEFAULTS.probeHost,
    enforceReachability: fileConfig.enforceReachability ?? DEFAULTS.enforceReachability,
    timeoutMs: fileConfig.timeoutMs ?? DEFAULTS.timeoutMs,
    logLevel: fileConfig.logLevel ?? DEFAULTS.logLevel,
    logFile: fileConfig.logFile,
    tokenEnvVar: fileConfig.tokenEnvVar ?? DEFAULTS.tokenEnvVar,
  };

  const probeHost = env.API_PROBE_HOST;
  if (probeHost) {
    merged.probeHost = probeHost;
  }
  const enforce = env.API_ENFORCE_REACHABILITY;
  if (enforce) {
    merged.enforceReachability = parseBooleanEnv("API_ENFORCE_REACHABILITY", enforce);
  }
  const timeout = env.API_TIMEOUT_MS;
  if (timeout) {
    merged.timeoutMs = parsePositiveIntEnv("API_TIMEOUT_MS", timeout);
  }
  const logLevel = env.API_LOG_LEVEL;
  if (logLevel) {
    const level = z.enum(["info", "debug"]).safeParse(logLevel);
    if (!level.success) {
      throw new Error(`Invalid API_LOG_LEVEL: expected info or debug, got "${logLevel}"`);
    }
    merged.logLevel = level.data;
  }

  return merged;
}
