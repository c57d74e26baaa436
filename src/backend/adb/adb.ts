import fs from "node:fs";
import { findOnPath } from "../host/pathEnv.js";
import { runTool, ToolError } from "../host/exec.js";

export interface AdbConfig {
  /** Explicit adb location used when adb is not on PATH. */
  adbPath?: string;
}

/**
 * Resolve an `adb` executable to use.
 *
 * Preference order:
 * - `adb` from PATH (so operators can manage their environment normally)
 * - `config.adbPath` (for environments where PATH is not configured)
 *
 * @returns Resolved executable path, or null when neither exists.
 */
export function resolveAdbExecutable(config: AdbConfig): string | null {
  const onPath = findOnPath("adb");
  if (onPath) {
    return onPath;
  }
  if (config.adbPath && fs.existsSync(config.adbPath)) {
    return config.adbPath;
  }
  return null;
}

export interface AdbExecOptions {
  /** ADB device serial; if provided, `-s <serial>` is prepended to args. */
  serial?: string;
  /** Optional timeout in milliseconds for the adb process. */
  timeoutMs?: number;
}

/** Runs an adb command and resolves to its trimmed stdout. */
export type AdbExec = (args: string[], options?: AdbExecOptions) => Promise<string>;

/**
 * Create an {@link AdbExec} bound to the configured adb.
 *
 * The executable is resolved on every call so that installing adb while the
 * server runs takes effect.
 *
 * @throws ToolError (kind `missing`) from the returned function when adb cannot be found.
 */
export function createAdbExec(config: AdbConfig): AdbExec {
  return async (args, options = {}) => {
    const adb = resolveAdbExecutable(config);
    if (!adb) {
      throw new ToolError("adb", "missing", "ADB not found on PATH and no usable config.adbPath was provided.", {
        adbPath: config.adbPath,
      });
    }
    const fullArgs = options.serial ? ["-s", options.serial, ...args] : args;
    return runTool("adb", adb, fullArgs, { timeoutMs: options.timeoutMs });
  };
}

/**
 * One row of `adb devices -l`.
 */
export interface AdbDeviceEntry {
  serial: string;
  /** `device`, `offline`, `unauthorized`, `no permissions`, ... */
  state: string;
  /** `key:value` attributes such as `model`, `product`, `device`. */
  attributes: Map<string, string>;
}

/**
 * Parse a single `adb devices -l` line.
 *
 * Example lines:
 * - "emulator-5554          device product:sdk_gphone64_x86_64 model:sdk_gphone64_x86_64 device:emu64xa transport_id:1"
 * - "192.168.0.10:5555     device product:... model:Pixel_7 device:panther transport_id:3"
 * - "XYZ                   unauthorized usb:1-1 transport_id:4"
 * - "0123456789ABCDEF      no permissions (user in plugdev group; are your udev rules wrong?)"
 */
export function parseAdbDevicesLine(line: string): AdbDeviceEntry | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("List of devices attached") || trimmed.startsWith("*")) {
    return null;
  }

  const tokens = trimmed.split(/\s+/g);
  if (tokens.length < 2) return null;

  const serial = tokens[0];
  let state = tokens[1];
  let rest = tokens.slice(2);
  if (state === "no" && rest[0] === "permissions") {
    state = "no permissions";
    rest = rest.slice(1);
  }

  const attributes = new Map<string, string>();
  for (const t of rest) {
    const idx = t.indexOf(":");
    if (idx <= 0) continue;
    const k = t.slice(0, idx);
    const v = t.slice(idx + 1);
    if (k && v) attributes.set(k, v);
  }

  return { serial, state, attributes };
}

export function parseAdbDevices(output: string): AdbDeviceEntry[] {
  const entries: AdbDeviceEntry[] = [];
  for (const line of output.split(/\r?\n/g)) {
    const entry = parseAdbDevicesLine(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

/**
 * Parse `adb shell getprop` output (`[key]: [value]` per line).
 */
export function parseGetprop(output: string): Map<string, string> {
  const props = new Map<string, string>();
  for (const line of output.split(/\r?\n/g)) {
    const match = /^\[([^\]]+)\]:\s*\[(.*)\]\s*$/.exec(line.trim());
    if (match) {
      props.set(match[1], match[2]);
    }
  }
  return props;
}
