import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["ONAIR_STATE_DIR"] ?? join(homedir(), ".onair");
}

export function getConfigPath(): string {
  return process.env["ONAIR_CONFIG_PATH"] ?? "onair.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
