/**
 * Device Manager - aggregates discovery backends and applies the user's
 * device selection.
 *
 * Responsibilities:
 * - Query every backend that runs on this host, concurrently
 * - Resolve a device id/name against backends with different latencies,
 *   returning as soon as an exact match is known
 * - Derive eligibility filters from the selection intent and the project
 * - Tolerate backend failures: a failing backend contributes no devices
 *
 * Constructing a manager is cheap; no backend does I/O until queried.
 *
 * @module deviceManager
 */

import type { Logger } from "../../logger.js";
import { createDeferred, errorMessage } from "../../utils.js";
import type { Device, Project } from "../devices/types.js";
import type { DeviceDiscovery } from "./discovery.js";
import { DiscoveryFilter, SupportFilter } from "./filters.js";

/** Selection intent value that targets every eligible device. */
export const ALL_DEVICES = "all";

/**
 * Error class used by the Device Manager for contract violations.
 */
export class DeviceManagerError extends Error {
  public readonly code: "ALREADY_SPECIFIED" | "INVALID_ARGUMENT";
  public readonly details?: Record<string, unknown>;

  public constructor(code: DeviceManagerError["code"], message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "DeviceManagerError";
    this.code = code;
    this.details = details;
  }
}

export interface DeviceManagerOptions {
  /** Backends in registration order; aggregate results follow this order. */
  discoverers: readonly DeviceDiscovery[];
  logger: Logger;
  /** Current project, consulted when building project-aware filters. */
  projectProvider?: () => Project | null;
}

export interface FindTargetDevicesOptions {
  /** Treat every device as supported by the project. */
  includeDevicesUnsupportedByProject?: boolean;
}

export interface TargetDevicesResult {
  devices: Device[];
  /**
   * True when nothing was specified and more than one device remains with no
   * single ephemeral device to prefer.
   */
  ambiguous: boolean;
}

export class DeviceManager {
  private readonly discoverers: readonly DeviceDiscovery[];
  private readonly logger: Logger;
  private readonly projectProvider: () => Project | null;
  private selection: string | null = null;
  private selectionLocked = false;

  public constructor(options: DeviceManagerOptions) {
    this.discoverers = [...options.discoverers];
    this.logger = options.logger;
    this.projectProvider = options.projectProvider ?? (() => null);
  }

  /**
   * Record the user's device choice: an id or name, `"all"`, or null for the
   * default heuristic. Settable once per manager.
   *
   * @throws DeviceManagerError if a selection was already recorded.
   */
  public specifyDevice(id: string | null): void {
    if (this.selectionLocked) {
      throw new DeviceManagerError("ALREADY_SPECIFIED", "Device selection can only be set once.", {
        current: this.selection,
        requested: id,
      });
    }
    if (id !== null && id.trim().length === 0) {
      throw new DeviceManagerError("INVALID_ARGUMENT", "Device selection must be a non-empty string.");
    }
    this.selectionLocked = true;
    this.selection = id;
  }

  /** The user-specified device id, or null when unset or `"all"`. */
  public get specifiedDeviceId(): string | null {
    return this.selection === ALL_DEVICES ? null : this.selection;
  }

  public get hasSpecifiedDeviceId(): boolean {
    return this.specifiedDeviceId !== null;
  }

  public get hasSpecifiedAllDevices(): boolean {
    return this.selection === ALL_DEVICES;
  }

  /** The project eligibility is judged against, if any. */
  public get project(): Project | null {
    return this.projectProvider();
  }

  /** Names of the backends that run on this host, in registration order. */
  public get backendNames(): string[] {
    return this.platformDiscoverers.map((d) => d.name);
  }

  /** Whether any backend can list devices in the current environment. */
  public get canListAnything(): boolean {
    return this.platformDiscoverers.some((d) => d.canListAnything);
  }

  private get platformDiscoverers(): DeviceDiscovery[] {
    return this.discoverers.filter((d) => d.supportsPlatform);
  }

  /**
   * Devices matching `deviceId` exactly (case-insensitive id or name), or
   * failing that every prefix match.
   *
   * An exact match is returned as soon as any backend produces one; slower
   * backends keep running but their results are dropped. Otherwise all
   * backends are awaited and prefix matches are returned in backend order.
   * An empty result means no match.
   */
  public async getDevicesById(deviceId: string, filter: DiscoveryFilter = new DiscoveryFilter()): Promise<Device[]> {
    const lowerDeviceId = deviceId.toLowerCase();
    const exactlyMatches = (device: Device): boolean =>
      device.id.toLowerCase() === lowerDeviceId || device.name.toLowerCase() === lowerDeviceId;
    const startsWith = (device: Device): boolean =>
      device.id.toLowerCase().startsWith(lowerDeviceId) || device.name.toLowerCase().startsWith(lowerDeviceId);

    // Backends with hard-coded ids answer without I/O; when the id is one of
    // them there is no point waiting on the others.
    const candidates = this.platformDiscoverers;
    const isWellKnown = candidates.some((d) => d.wellKnownIds.includes(deviceId));
    const discoverers = isWellKnown ? candidates.filter((d) => d.wellKnownIds.includes(deviceId)) : candidates;

    const exactMatch = createDeferred<Device>();
    const prefixMatches: Device[][] = discoverers.map(() => []);

    const branches = discoverers.map(async (discoverer, index) => {
      let devices: Device[];
      try {
        devices = await discoverer.devices(filter);
      } catch (err) {
        // Return matches from other backends even if one fails.
        this.logger.trace(`Ignored error discovering ${deviceId}`, {
          backend: discoverer.name,
          error: errorMessage(err),
        });
        return;
      }
      if (exactMatch.settled) {
        return;
      }
      for (const device of devices) {
        if (exactlyMatches(device)) {
          exactMatch.resolve(device);
          return;
        }
        if (startsWith(device)) {
          prefixMatches[index].push(device);
        }
      }
    });

    const winner = await Promise.race([exactMatch.promise, Promise.all(branches).then(() => null)]);
    if (winner !== null) {
      return [winner];
    }
    return prefixMatches.flat();
  }

  /**
   * Devices for the current selection: everything when no id was specified
   * (or `"all"`), otherwise the id lookup.
   */
  public async getDevices(filter: DiscoveryFilter = new DiscoveryFilter()): Promise<Device[]> {
    const id = this.specifiedDeviceId;
    if (id === null) {
      return this.getAllDevices(filter);
    }
    return this.getDevicesById(id, filter);
  }

  /**
   * Cached devices from every backend, concatenated in backend order.
   */
  public async getAllDevices(filter: DiscoveryFilter = new DiscoveryFilter()): Promise<Device[]> {
    const lists = await Promise.all(
      this.platformDiscoverers.map((d) => this.guard(d, "list devices", () => d.devices(filter)))
    );
    return lists.flat();
  }

  /**
   * Fresh scan of every backend, each bounded by `timeoutMs` on its own.
   */
  public async refreshAllDevices(
    options: { timeoutMs?: number; filter?: DiscoveryFilter } = {}
  ): Promise<Device[]> {
    const filter = options.filter ?? new DiscoveryFilter();
    const lists = await Promise.all(
      this.platformDiscoverers.map((d) =>
        this.guard(d, "refresh devices", () => d.discoverDevices({ timeoutMs: options.timeoutMs, filter }))
      )
    );
    return lists.flat();
  }

  /**
   * Diagnostic messages from every backend, in backend order.
   */
  public async getDeviceDiagnostics(): Promise<string[]> {
    const messages: string[] = [];
    for (const discoverer of this.platformDiscoverers) {
      messages.push(...(await this.guard(discoverer, "collect diagnostics", () => discoverer.getDiagnostics())));
    }
    return messages;
  }

  /**
   * Support filter matching the selection intent:
   * - `"all"`: tool, project and all-devices support
   * - a specific id: tool support only (the user asked for it explicitly)
   * - nothing: tool and project support
   *
   * With `includeDevicesUnsupportedByProject` no project is consulted.
   */
  public deviceSupportFilter(options: FindTargetDevicesOptions = {}): SupportFilter {
    const project = options.includeDevicesUnsupportedByProject ? null : this.project;
    if (this.hasSpecifiedAllDevices) {
      return SupportFilter.excludeUnsupportedByToolOrProjectOrAll(project);
    }
    if (!this.hasSpecifiedDeviceId) {
      return SupportFilter.excludeUnsupportedByToolOrProject(project);
    }
    return SupportFilter.excludeUnsupportedByTool();
  }

  /**
   * With no device specified, prefer the only ephemeral device (a phone over
   * the desktop, say). Null unless exactly one ephemeral device exists.
   */
  public getSingleEphemeralDevice(devices: readonly Device[]): Device | null {
    if (this.hasSpecifiedDeviceId) {
      return null;
    }
    const ephemeral = devices.filter((d) => d.ephemeral);
    return ephemeral.length === 1 ? ephemeral[0] : null;
  }

  /**
   * Resolve the devices a command should run on for the current selection.
   */
  public async findTargetDevices(options: FindTargetDevicesOptions = {}): Promise<TargetDevicesResult> {
    const filter = new DiscoveryFilter({ supportFilter: this.deviceSupportFilter(options) });
    const devices = await this.getDevices(filter);

    if (devices.length <= 1 || this.hasSpecifiedAllDevices) {
      return { devices, ambiguous: false };
    }
    if (this.hasSpecifiedDeviceId) {
      // Several prefix matches for one id.
      return { devices, ambiguous: true };
    }
    const ephemeral = this.getSingleEphemeralDevice(devices);
    if (ephemeral) {
      return { devices: [ephemeral], ambiguous: false };
    }
    return { devices, ambiguous: true };
  }

  public dispose(): void {
    for (const discoverer of this.discoverers) {
      discoverer.dispose();
    }
  }

  private async guard<T>(
    discoverer: DeviceDiscovery,
    action: string,
    fn: () => Promise<T[]>
  ): Promise<T[]> {
    try {
      return await fn();
    } catch (err) {
      this.logger.trace(`Ignored error from ${discoverer.name} while trying to ${action}`, {
        error: errorMessage(err),
      });
      return [];
    }
  }
}
