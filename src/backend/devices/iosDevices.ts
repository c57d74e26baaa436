import type { PollingConfig } from "../../config.js";
import type { Logger } from "../../logger.js";
import { errorMessage, TimeoutError } from "../../utils.js";
import { ToolError } from "../host/exec.js";
import type { DevicectlDevice, DevicectlList } from "../ios/devicectl.js";
import { PollingDeviceDiscovery } from "../discovery/pollingDiscovery.js";
import { projectSupportsPlatform } from "../project/project.js";
import type { TargetPlatform } from "./targetPlatform.js";
import type { ConnectionInterface, Device, DeviceCapabilities, Project } from "./types.js";

/**
 * A physical iOS device known to CoreDevice.
 */
export class IosDevice implements Device {
  public readonly id: string;
  public readonly name: string;
  public readonly category = "mobile" as const;
  public readonly platformType = "ios" as const;
  public readonly ephemeral = true;
  public readonly isConnected: boolean;
  public readonly connectionInterface: ConnectionInterface;
  public readonly capabilities: Partial<DeviceCapabilities> = { screenshot: true };

  private readonly osVersion: string;

  public constructor(entry: DevicectlDevice) {
    this.id = entry.hardwareProperties?.udid ?? entry.identifier;
    this.name = entry.deviceProperties?.name ?? this.id;
    this.osVersion = entry.deviceProperties?.osVersionNumber ?? "unknown";

    const connection = entry.connectionProperties;
    this.connectionInterface = connection?.transportType === "localNetwork" ? "wireless" : "attached";
    // A device paired but out of reach keeps showing up with no transport.
    this.isConnected = connection?.transportType !== undefined && connection.tunnelState !== "unavailable";
  }

  public isSupported(): boolean {
    return true;
  }

  public isSupportedForProject(project: Project): boolean {
    return projectSupportsPlatform(project, "ios");
  }

  public async targetPlatform(): Promise<TargetPlatform> {
    return "ios";
  }

  public async isLocalEmulator(): Promise<boolean> {
    return false;
  }

  public async sdkNameAndVersion(): Promise<string> {
    return `iOS ${this.osVersion}`;
  }

  public async dispose(): Promise<void> {}
}

export interface IosDiscoveryOptions {
  list: DevicectlList;
  /** Whether `xcrun` is currently available. */
  xcrunAvailable: () => boolean;
  logger: Logger;
  polling?: Partial<PollingConfig>;
  /** Defaults to the current process platform. */
  platform?: NodeJS.Platform;
}

/**
 * Discovers physical iOS devices through `xcrun devicectl`. Only runs on macOS.
 */
export class IosDeviceDiscovery extends PollingDeviceDiscovery {
  public readonly supportsPlatform: boolean;

  private readonly list: DevicectlList;
  private readonly xcrunAvailable: () => boolean;

  public constructor(options: IosDiscoveryOptions) {
    super("ios", { logger: options.logger, polling: options.polling });
    this.list = options.list;
    this.xcrunAvailable = options.xcrunAvailable;
    this.supportsPlatform = (options.platform ?? process.platform) === "darwin";
  }

  public get canListAnything(): boolean {
    return this.xcrunAvailable();
  }

  protected async pollingGetDevices(timeoutMs?: number): Promise<IosDevice[]> {
    if (!this.supportsPlatform || !this.canListAnything) {
      return [];
    }
    let entries: DevicectlDevice[];
    try {
      entries = await this.list(timeoutMs);
    } catch (err) {
      if (err instanceof ToolError && err.kind === "timeout") {
        throw new TimeoutError(err.message, timeoutMs ?? 0);
      }
      throw err;
    }
    return entries
      .filter((entry) => entry.hardwareProperties?.platform === "iOS" && entry.hardwareProperties.reality !== "virtual")
      .map((entry) => new IosDevice(entry));
  }

  public async getDiagnostics(): Promise<string[]> {
    if (!this.canListAnything) {
      return ["Unable to locate xcrun. Install Xcode to work with iOS devices."];
    }
    let entries: DevicectlDevice[];
    try {
      entries = await this.list(10_000);
    } catch (err) {
      return [`Unable to run "xcrun devicectl list devices": ${errorMessage(err)}`];
    }
    return entries
      .filter(
        (entry) =>
          entry.hardwareProperties?.platform === "iOS" &&
          entry.connectionProperties?.pairingState !== undefined &&
          entry.connectionProperties.pairingState !== "paired"
      )
      .map(
        (entry) =>
          `Device ${entry.deviceProperties?.name ?? entry.identifier} is not paired. Unlock it and trust this computer.`
      );
  }
}
