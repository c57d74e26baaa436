import type { Device } from "../devices/types.js";
import type { DiscoveryFilter } from "./filters.js";

export interface DiscoverDevicesOptions {
  /** Budget for the fresh scan. Backends bound their enumeration by it. */
  timeoutMs?: number;
  filter?: DiscoveryFilter;
}

/**
 * A platform-specific source of devices.
 */
export interface DeviceDiscovery {
  /** Short backend name for logs and diagnostics (e.g. "android"). */
  readonly name: string;

  /** Whether this backend can produce anything on the current host. */
  readonly supportsPlatform: boolean;

  /** Whether listing is currently possible (e.g. the required tool is installed). */
  readonly canListAnything: boolean;

  /**
   * Device ids this backend resolves without any I/O, such as `"linux"` or
   * `"web-server"`. Empty when the backend has none.
   */
  readonly wellKnownIds: readonly string[];

  /** Known devices, from cache when one exists. */
  devices(filter?: DiscoveryFilter): Promise<Device[]>;

  /** Scan again, replacing any cache, then filter. */
  discoverDevices(options?: DiscoverDevicesOptions): Promise<Device[]>;

  /** Human-readable problem descriptions; empty when there are none. */
  getDiagnostics(): Promise<string[]>;

  /** Stop background work. */
  dispose(): void;
}

/**
 * Apply an optional filter to a device list.
 */
export async function applyFilter(
  devices: readonly Device[],
  filter: DiscoveryFilter | undefined
): Promise<Device[]> {
  return filter ? filter.filterDevices(devices) : [...devices];
}
