import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { LogLevel } from "./logger.js";
import { isRecord } from "./utils.js";

/** Module-level config cache to avoid redundant fs.readFileSync calls. */
let cachedConfig: SideloadConfig | null = null;

export type SideloadTransport = "stdio";

/**
 * How a poll that sees more than one device is classified.
 *
 * - `first_ready`: connected when any device is ready; the first ready device is selected.
 * - `all_ready`: connected only when every reported device is ready.
 */
export type MultiDevicePolicy = "first_ready" | "all_ready";

export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const MIN_POLL_INTERVAL_MS = 250;
export const DEFAULT_LIST_TIMEOUT_MS = 10_000;
export const DEFAULT_INSTALL_TIMEOUT_MS = 60_000;

export interface SideloadConfig {
  /**
   * MCP transport mode.
   *
   * Currently only `stdio` is supported.
   */
  transport: SideloadTransport;

  /** Logging verbosity for the host process. */
  logLevel: LogLevel;

  /** Base directory for on-disk storage (operation logs). */
  dataDir: string;

  /**
   * Optional absolute path to the `adb` binary (e.g., `C:\\Android\\platform-tools\\adb.exe`).
   *
   * If omitted, `adb` is looked up on PATH and in the usual SDK locations.
   */
  adbPath?: string;

  /** Delay between device status polls. */
  pollIntervalMs: number;

  /** Upper bound for one `adb devices` call. */
  listTimeoutMs: number;

  /** Upper bound for one `adb install` call. */
  installTimeoutMs: number;

  /** Pass `-r` to `adb install` so an already-installed package is replaced. */
  replaceExisting: boolean;

  multiDevicePolicy: MultiDevicePolicy;
}

/**
 * Get the project root directory by resolving from this file's location.
 * Works regardless of the process's current working directory.
 */
export function getProjectRootDir(): string {
  const thisFile = fileURLToPath(import.meta.url);
  const thisDir = path.dirname(thisFile);
  // This file is dist/config.js (or src/config.ts under test), so project root is one level up
  return path.resolve(thisDir, "..");
}

function readPositiveInt(
  raw: unknown,
  field: string,
  fallback: number,
  configPath: string,
  min = 1
): number {
  if (raw === undefined) return fallback;
  if (typeof raw !== "number" || !Number.isInteger(raw) || raw < min) {
    throw new Error(`Invalid config.${field}: expected integer >= ${min} at ${configPath}`);
  }
  return raw;
}

/**
 * Validate a parsed `config.json` document.
 *
 * @param parsed - Result of `JSON.parse` on the config file.
 * @param configPath - Used in error messages only.
 * @throws If a field is missing or malformed.
 */
export function parseConfig(parsed: unknown, configPath: string): SideloadConfig {
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: expected JSON object at ${configPath}`);
  }

  const transport = parsed.transport;
  const logLevel = parsed.logLevel;
  const dataDir = parsed.dataDir;
  const adbPath = parsed.adbPath;
  const replaceExisting = parsed.replaceExisting;
  const multiDevicePolicy = parsed.multiDevicePolicy;

  if (transport !== "stdio") {
    throw new Error(`Invalid config.transport: expected "stdio" at ${configPath}`);
  }
  if (logLevel !== "debug" && logLevel !== "info" && logLevel !== "warn" && logLevel !== "error") {
    throw new Error(`Invalid config.logLevel: expected debug|info|warn|error at ${configPath}`);
  }
  if (typeof dataDir !== "string" || dataDir.trim().length === 0) {
    throw new Error(`Invalid config.dataDir: expected non-empty string at ${configPath}`);
  }
  if (adbPath !== undefined) {
    if (typeof adbPath !== "string" || adbPath.trim().length === 0) {
      throw new Error(`Invalid config.adbPath: expected non-empty string at ${configPath}`);
    }
  }
  if (replaceExisting !== undefined && typeof replaceExisting !== "boolean") {
    throw new Error(`Invalid config.replaceExisting: expected boolean at ${configPath}`);
  }
  if (
    multiDevicePolicy !== undefined &&
    multiDevicePolicy !== "first_ready" &&
    multiDevicePolicy !== "all_ready"
  ) {
    throw new Error(`Invalid config.multiDevicePolicy: expected first_ready|all_ready at ${configPath}`);
  }

  return {
    transport,
    logLevel,
    dataDir,
    adbPath: adbPath?.trim(),
    pollIntervalMs: readPositiveInt(
      parsed.pollIntervalMs,
      "pollIntervalMs",
      DEFAULT_POLL_INTERVAL_MS,
      configPath,
      MIN_POLL_INTERVAL_MS
    ),
    listTimeoutMs: readPositiveInt(parsed.listTimeoutMs, "listTimeoutMs", DEFAULT_LIST_TIMEOUT_MS, configPath),
    installTimeoutMs: readPositiveInt(
      parsed.installTimeoutMs,
      "installTimeoutMs",
      DEFAULT_INSTALL_TIMEOUT_MS,
      configPath
    ),
    replaceExisting: replaceExisting ?? true,
    multiDevicePolicy: multiDevicePolicy ?? "first_ready",
  };
}

/**
 * Load runtime configuration from `config.json`.
 *
 * Precedence:
 * - `SIDELOAD_CONFIG_PATH` env var
 * - `<projectRoot>/config.json` (project root detected via import.meta.url)
 *
 * @throws If the config file is missing or malformed.
 */
export function loadConfig(): SideloadConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = process.env.SIDELOAD_CONFIG_PATH
    ? path.resolve(process.env.SIDELOAD_CONFIG_PATH)
    : path.join(getProjectRootDir(), "config.json");

  const raw = fs.readFileSync(configPath, "utf-8");
  cachedConfig = parseConfig(JSON.parse(raw), configPath);
  return cachedConfig;
}

/**
 * Resolve the configured data directory to an absolute path.
 *
 * - If `config.dataDir` is absolute, it is returned as-is.
 * - If it is relative, it is resolved relative to the project root.
 */
export function resolveDataDir(config: SideloadConfig): string {
  const projectRoot = getProjectRootDir();
  return path.isAbsolute(config.dataDir) ? config.dataDir : path.resolve(projectRoot, config.dataDir);
}
