import { connectionInterfaceOf, isDeviceConnected } from "../devices/device.js";
import { PLATFORMS_EXCLUDED_FROM_ALL } from "../devices/targetPlatform.js";
import type { ConnectionInterface, Device, Project } from "../devices/types.js";

/**
 * Decides whether a device is supported by the tool, by the current project,
 * and (for `--device all`) by an all-devices run.
 *
 * Build one with the static factories; instances are immutable.
 */
export class SupportFilter {
  private readonly project: Project | null;
  private readonly excludeUnsupportedByProject: boolean;
  private readonly excludeUnsupportedByAll: boolean;

  private constructor(
    project: Project | null,
    excludeUnsupportedByProject: boolean,
    excludeUnsupportedByAll: boolean
  ) {
    this.project = project;
    this.excludeUnsupportedByProject = excludeUnsupportedByProject;
    this.excludeUnsupportedByAll = excludeUnsupportedByAll;
  }

  /** Keep devices the tool supports. */
  public static excludeUnsupportedByTool(): SupportFilter {
    return new SupportFilter(null, false, false);
  }

  /**
   * Keep devices the tool and `project` support. A null project supports
   * every device.
   */
  public static excludeUnsupportedByToolOrProject(project: Project | null): SupportFilter {
    return new SupportFilter(project, true, false);
  }

  /**
   * Keep devices the tool and `project` support that can also join an
   * all-devices run.
   */
  public static excludeUnsupportedByToolOrProjectOrAll(project: Project | null): SupportFilter {
    return new SupportFilter(project, true, true);
  }

  public get scopesProject(): boolean {
    return this.excludeUnsupportedByProject;
  }

  public get scopesAll(): boolean {
    return this.excludeUnsupportedByAll;
  }

  public async matches(device: Device): Promise<boolean> {
    const supportedByTool = device.isSupported();
    const supportedForProject =
      !this.excludeUnsupportedByProject || this.isDeviceSupportedForProject(device);
    const supportedForAll = !this.excludeUnsupportedByAll || (await this.isDeviceSupportedForAll(device));

    return supportedByTool && supportedForProject && supportedForAll;
  }

  /**
   * Fuchsia and web targets never join an all-devices run.
   */
  public async isDeviceSupportedForAll(device: Device): Promise<boolean> {
    const targetPlatform = await device.targetPlatform();
    return (
      device.isSupported() &&
      !PLATFORMS_EXCLUDED_FROM_ALL.has(targetPlatform) &&
      this.isDeviceSupportedForProject(device)
    );
  }

  /**
   * A device may be supported by the tool but not by the project, e.g. when
   * the project has no directory for the device's platform.
   */
  public isDeviceSupportedForProject(device: Device): boolean {
    if (!device.isSupported()) {
      return false;
    }
    if (this.project === null) {
      return true;
    }
    return device.isSupportedForProject(this.project);
  }
}

export interface DiscoveryFilterOptions {
  /** Drop devices that report themselves disconnected. Defaults to `true`. */
  excludeDisconnected?: boolean;
  supportFilter?: SupportFilter;
  /** Keep only devices reached through this interface. */
  connectionInterface?: ConnectionInterface;
}

/**
 * Eligibility rules applied to every device list a backend returns.
 */
export class DiscoveryFilter {
  public readonly excludeDisconnected: boolean;
  public readonly supportFilter?: SupportFilter;
  public readonly connectionInterface?: ConnectionInterface;

  public constructor(options: DiscoveryFilterOptions = {}) {
    this.excludeDisconnected = options.excludeDisconnected ?? true;
    this.supportFilter = options.supportFilter;
    this.connectionInterface = options.connectionInterface;
  }

  public async matches(device: Device): Promise<boolean> {
    const meetsConnection = !this.excludeDisconnected || isDeviceConnected(device);
    const meetsSupport = this.supportFilter === undefined || (await this.supportFilter.matches(device));
    const meetsInterface =
      this.connectionInterface === undefined || connectionInterfaceOf(device) === this.connectionInterface;

    return meetsConnection && meetsSupport && meetsInterface;
  }

  /**
   * Keep matching devices in their original order.
   */
  public async filterDevices(devices: readonly Device[]): Promise<Device[]> {
    const kept: Device[] = [];
    for (const device of devices) {
      if (await this.matches(device)) {
        kept.push(device);
      }
    }
    return kept;
  }
}
