import * as fs from "node:fs/promises";
import * as os from "node:os";
import type { IFileSystem } from "./IFileSystem";

/**
 * Node.js fs methods don't expand `~`, so config paths typed by hand
 * are expanded here.
 */
function expandTilde(filepath: string): string {
  if (filepath === "~") {
    return os.homedir();
  }
  if (filepath.startsWith("~/")) {
    return os.homedir() + filepath.slice(1);
  }
  return filepath;
}

export class NodeFileSystem implements IFileSystem {
  async readFile(path: string): Promise<string> {
    return fs.readFile(expandTilde(path), "utf-8");
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(expandTilde(path));
      return true;
    } catch {
      return false;
    }
  }
}
