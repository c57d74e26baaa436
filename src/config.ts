import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { isNonEmptyString, isRecord } from "./utils.js";

/** Module-level config cache to avoid redundant fs.readFileSync calls. */
let cachedConfig: DeckhandConfig | null = null;

export type DeckhandTransport = "stdio";

/**
 * Polling cadence for backends that keep a live device list.
 */
export interface PollingConfig {
  /** Delay before the first background poll. */
  initialIntervalMs: number;
  /** Delay between later polls. */
  steadyIntervalMs: number;
  /** Budget for each later poll; an expired poll leaves the cache as it was. */
  tickTimeoutMs: number;
}

export const DEFAULT_POLLING: PollingConfig = {
  initialIntervalMs: 4_000,
  steadyIntervalMs: 30_000,
  tickTimeoutMs: 30_000,
};

export interface DeckhandConfig {
  /**
   * MCP transport mode.
   *
   * Currently only `stdio` is supported.
   */
  transport: DeckhandTransport;

  /** Logging verbosity for the host process. */
  logLevel: LogLevel;

  /**
   * Optional absolute path to the `adb` binary.
   *
   * If omitted, the server will attempt to use `adb` from PATH.
   */
  adbPath?: string;

  /**
   * Project directory used to decide which devices the project can target.
   * Relative paths resolve against the deckhand project root.
   */
  projectDir?: string;

  /**
   * Default device selection: a device id or name, or `"all"`.
   * Overridden by `--device` on the command line.
   */
  device?: string;

  polling: PollingConfig;
}

/**
 * Get the deckhand project root directory by resolving from this file's location.
 * Works regardless of the process's current working directory.
 */
function getProjectRootDir(): string {
  const thisFile = fileURLToPath(import.meta.url);
  const thisDir = path.dirname(thisFile);
  // This file is <root>/dist/config.js (or <root>/src/config.ts), so project root is one level up
  return path.resolve(thisDir, "..");
}

function isPositiveInt(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v > 0;
}

function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && LOG_LEVELS.some((level) => level === v);
}

function parsePolling(raw: unknown, configPath: string): PollingConfig {
  if (raw === undefined) {
    return { ...DEFAULT_POLLING };
  }
  if (!isRecord(raw)) {
    throw new Error(`Invalid config.polling: expected object at ${configPath}`);
  }

  const polling = { ...DEFAULT_POLLING };
  for (const key of ["initialIntervalMs", "steadyIntervalMs", "tickTimeoutMs"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isPositiveInt(value)) {
      throw new Error(`Invalid config.polling.${key}: expected positive integer at ${configPath}`);
    }
    polling[key] = value;
  }
  return polling;
}

/**
 * Load deckhand runtime configuration from `config.json`.
 *
 * Precedence:
 * - `DECKHAND_CONFIG_PATH` env var
 * - `<projectRoot>/config.json` (project root detected via import.meta.url)
 *
 * @throws If the config file is missing or malformed.
 */
export function loadConfig(): DeckhandConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const projectRoot = getProjectRootDir();
  const configPath = process.env.DECKHAND_CONFIG_PATH
    ? path.resolve(process.env.DECKHAND_CONFIG_PATH)
    : path.join(projectRoot, "config.json");

  const raw = fs.readFileSync(configPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: expected JSON object at ${configPath}`);
  }

  const { transport, logLevel, adbPath, projectDir, device } = parsed;

  if (transport !== "stdio") {
    throw new Error(`Invalid config.transport: expected "stdio" at ${configPath}`);
  }
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid config.logLevel: expected ${LOG_LEVELS.join("|")} at ${configPath}`);
  }
  for (const [key, value] of Object.entries({ adbPath, projectDir, device })) {
    if (value !== undefined && !isNonEmptyString(value)) {
      throw new Error(`Invalid config.${key}: expected non-empty string at ${configPath}`);
    }
  }

  cachedConfig = {
    transport,
    logLevel,
    adbPath: isNonEmptyString(adbPath) ? adbPath.trim() : undefined,
    projectDir: isNonEmptyString(projectDir) ? projectDir.trim() : undefined,
    device: isNonEmptyString(device) ? device.trim() : undefined,
    polling: parsePolling(parsed.polling, configPath),
  };

  return cachedConfig;
}

/**
 * Clear the cached config and re-read from disk.
 *
 * Call this if `config.json` (or `DECKHAND_CONFIG_PATH`) has been modified at runtime
 * and the process needs to pick up the changes.
 */
export function reloadConfig(): DeckhandConfig {
  cachedConfig = null;
  return loadConfig();
}

/**
 * Resolve a project directory to an absolute path.
 *
 * - Absolute paths are returned as-is.
 * - Relative paths resolve against the deckhand project root (the directory
 *   containing `config.json`).
 */
export function resolveProjectDir(projectDir: string): string {
  return path.isAbsolute(projectDir) ? projectDir : path.resolve(getProjectRootDir(), projectDir);
}
