#!/usr/bin/env node
/**
 * Sends one request and prints the normalized response as JSON.
 *
 * Usage:
 *   api-engine GET https://api.example.test/items
 *   api-engine POST https://api.example.test/items --data '{"name":"a"}' --no-token
 *
 * Exit codes:
 *   0 = SUCCESS
 *   1 = FAILED (or a config error)
 *   2 = bad arguments
 */

import { NodeFileSystem } from "./abstractions/NodeFileSystem";
import type { ApiRequestDispatcher } from "./api/ApiRequestDispatcher";
import { RequestMethod } from "./api/types";
import { resolveConfig } from "./config";
import { createApiEngine } from "./createApiEngine";

export const USAGE =
  "Usage: api-engine <GET|POST|PUT> <url> [--data <json>] [--no-token] [--config <path>] [--verbose]";

export interface ParsedArgs {
  method: RequestMethod;
  url: string;
  payload?: unknown;
  includeToken: boolean;
  configPath?: string;
  verbose: boolean;
}

function parseMethod(value: string): RequestMethod {
  switch (value.toUpperCase()) {
    case "GET":
      return RequestMethod.GET;
    case "POST":
      return RequestMethod.POST;
    case "PUT":
      return RequestMethod.PUT;
    default:
      throw new Error(`Unsupported method: ${value}`);
  }
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const positional: string[] = [];
  let payload: unknown;
  let includeToken = true;
  let configPath: string | undefined;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--no-token") {
      includeToken = false;
    } else if (arg === "--verbose") {
      verbose = true;
    } else if ((arg === "--config" || arg === "--data") && i + 1 >= args.length) {
      throw new Error(`${arg} requires a value`);
    } else if (arg === "--config") {
      configPath = args[++i];
    } else if (arg === "--data") {
      const raw = args[++i];
      try {
        payload = JSON.parse(raw);
      } catch {
        throw new Error(`--data is not valid JSON: ${raw}`);
      }
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    throw new Error("Expected a method and a URL");
  }

  const method = parseMethod(positional[0]);
  const url = positional[1];
  if (url.length === 0) {
    throw new Error("URL must not be empty");
  }
  if (method !== RequestMethod.GET && (payload === undefined || payload === null)) {
    throw new Error(`${method} requires non-null --data`);
  }

  return { method, url, payload, includeToken, configPath, verbose };
}

export async function runRequest(
  dispatcher: ApiRequestDispatcher,
  args: ParsedArgs,
  write: (text: string) => void
): Promise<number> {
  const response = await dispatcher.performRequest(args.method, args.url, {
    payload: args.payload,
    includeToken: args.includeToken,
  });
  write(`${JSON.stringify(response.toJSON(), null, 2)}\n`);
  return response.isSuccess() ? 0 : 1;
}

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const config = await resolveConfig(new NodeFileSystem(), {
    configPath: args.configPath,
    cwd: process.cwd(),
    env: process.env,
  });
  if (args.verbose) {
    config.logLevel = "debug";
  }

  const dispatcher = createApiEngine(config);
  process.exitCode = await runRequest(dispatcher, args, (text) => process.stdout.write(text));
}

// Skip main() in test runners (Jest sets JEST_WORKER_ID)
if (!process.env.JEST_WORKER_ID) {
  main().catch((err) => {
    console.error("Fatal:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
