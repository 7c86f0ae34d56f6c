import { appendFileSync, existsSync, renameSync, statSync } from "fs";
import * as path from "path";

/** Controls how much detail reaches the log.
 *  "info"  - request lines and status codes only.
 *  "debug" - also headers, payloads and raw response bodies. */
export type LogLevel = "info" | "debug";

export interface ILogger {
  /** Always written. Use for the request line and outcome. */
  debug(message: string): void;
  /** Only written when logLevel is "debug". Use for headers and bodies. */
  verbose(message: string): void;
}

export class InMemoryLogger implements ILogger {
  private entries: string[] = [];
  private verboseEntries: string[] = [];

  debug(message: string): void {
    this.entries.push(message);
  }

  verbose(message: string): void {
    this.verboseEntries.push(message);
  }

  getEntries(): string[] {
    return [...this.entries];
  }

  getVerboseEntries(): string[] {
    return [...this.verboseEntries];
  }
}

/**
 * Writes to stderr so stdout stays clean for the CLI's JSON output.
 */
export class ConsoleLogger implements ILogger {
  constructor(
    private readonly logLevel: LogLevel = "info",
    private readonly write: (line: string) => void = (line) => process.stderr.write(line)
  ) {}

  debug(message: string): void {
    this.write(`[api-engine] ${message}\n`);
  }

  verbose(message: string): void {
    if (this.logLevel !== "debug") {
      return;
    }
    this.write(`[api-engine] ${message}\n`);
  }
}

const MAX_LOG_SIZE_BYTES = 500 * 1024; // 500 KB

export class FileLogger implements ILogger {
  private readonly resolvedPath: string;
  private readonly logLevel: LogLevel;

  constructor(filePath: string, maxSizeBytes?: number, logLevel: LogLevel = "info") {
    this.resolvedPath = filePath;
    this.logLevel = logLevel;
    this.rotateIfNeeded(maxSizeBytes ?? MAX_LOG_SIZE_BYTES);
  }

  debug(message: string): void {
    this.append(message);
  }

  verbose(message: string): void {
    if (this.logLevel !== "debug") {
      return;
    }
    this.append(message);
  }

  getFilePath(): string {
    return this.resolvedPath;
  }

  private append(message: string): void {
    const timestamp = new Date().toISOString();
    appendFileSync(this.resolvedPath, `[${timestamp}] ${message}\n`);
  }

  private rotateIfNeeded(maxSizeBytes: number): void {
    if (!existsSync(this.resolvedPath)) {
      return;
    }

    if (statSync(this.resolvedPath).size < maxSizeBytes) {
      return;
    }

    const { dir, name, ext } = path.parse(this.resolvedPath);
    const stamp = new Date().toISOString().replace(/:/g, "-");
    renameSync(this.resolvedPath, path.join(dir, `${name}.${stamp}${ext}`));
  }
}
