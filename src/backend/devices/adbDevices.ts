import type { PollingConfig } from "../../config.js";
import type { Logger } from "../../logger.js";
import { errorMessage, TimeoutError } from "../../utils.js";
import { parseAdbDevices, parseGetprop, type AdbDeviceEntry, type AdbExec } from "../adb/adb.js";
import { ToolError } from "../host/exec.js";
import { PollingDeviceDiscovery } from "../discovery/pollingDiscovery.js";
import { projectSupportsPlatform } from "../project/project.js";
import { androidTargetPlatformForAbi, type TargetPlatform } from "./targetPlatform.js";
import type { ConnectionInterface, Device, DeviceCapabilities, Project } from "./types.js";

/** Timeout for per-device property reads. */
const PROPERTY_TIMEOUT_MS = 5_000;

/**
 * An Android device or emulator reachable through adb.
 */
export class AndroidDevice implements Device {
  public readonly id: string;
  public readonly name: string;
  public readonly category = "mobile" as const;
  public readonly platformType = "android" as const;
  public readonly ephemeral = true;
  public readonly isConnected: boolean;
  public readonly connectionInterface: ConnectionInterface;
  public readonly capabilities: Partial<DeviceCapabilities> = { screenshot: true, fastStart: true };

  private readonly adb: AdbExec;
  private properties: Promise<Map<string, string>> | null = null;

  public constructor(entry: AdbDeviceEntry, adb: AdbExec) {
    this.id = entry.serial;
    this.name = (entry.attributes.get("model") ?? entry.serial).replace(/_/g, " ");
    this.isConnected = entry.state === "device";
    // Network devices show up as host:port or as an mDNS service name.
    this.connectionInterface =
      entry.serial.includes(":") || entry.serial.includes("._adb-tls-connect.") ? "wireless" : "attached";
    this.adb = adb;
  }

  public isSupported(): boolean {
    return true;
  }

  public isSupportedForProject(project: Project): boolean {
    return projectSupportsPlatform(project, "android");
  }

  public async targetPlatform(): Promise<TargetPlatform> {
    const abi = (await this.getProperties()).get("ro.product.cpu.abi");
    return abi ? androidTargetPlatformForAbi(abi) : "android";
  }

  public async isLocalEmulator(): Promise<boolean> {
    if (this.id.startsWith("emulator-")) {
      return true;
    }
    const characteristics = (await this.getProperties()).get("ro.build.characteristics") ?? "";
    return characteristics.split(",").includes("emulator");
  }

  public async sdkNameAndVersion(): Promise<string> {
    const props = await this.getProperties();
    const release = props.get("ro.build.version.release") ?? "unknown";
    const sdk = props.get("ro.build.version.sdk") ?? "unknown";
    return `Android ${release} (API ${sdk})`;
  }

  public async dispose(): Promise<void> {}

  /**
   * All system properties, read once per device instance.
   */
  private getProperties(): Promise<Map<string, string>> {
    if (!this.properties) {
      this.properties = this.adb(["shell", "getprop"], { serial: this.id, timeoutMs: PROPERTY_TIMEOUT_MS }).then(
        parseGetprop
      );
      // A failed read is retried on the next access.
      this.properties.catch(() => {
        this.properties = null;
      });
    }
    return this.properties;
  }
}

export interface AndroidDiscoveryOptions {
  adb: AdbExec;
  /** Whether an adb executable is currently available. */
  adbAvailable: () => boolean;
  logger: Logger;
  polling?: Partial<PollingConfig>;
}

/**
 * Discovers Android devices with `adb devices -l`.
 *
 * Rows in `device` state are connected devices and rows in `offline` state
 * are kept as disconnected ones; any other state (unauthorized, no
 * permissions) is reported through diagnostics instead.
 */
export class AndroidDeviceDiscovery extends PollingDeviceDiscovery {
  public readonly supportsPlatform = true;

  private readonly adb: AdbExec;
  private readonly adbAvailable: () => boolean;

  public constructor(options: AndroidDiscoveryOptions) {
    super("android", { logger: options.logger, polling: options.polling });
    this.adb = options.adb;
    this.adbAvailable = options.adbAvailable;
  }

  public get canListAnything(): boolean {
    return this.adbAvailable();
  }

  protected async pollingGetDevices(timeoutMs?: number): Promise<AndroidDevice[]> {
    if (!this.canListAnything) {
      return [];
    }
    const entries = await this.listEntries(timeoutMs);
    return entries
      .filter((entry) => entry.state === "device" || entry.state === "offline")
      .map((entry) => new AndroidDevice(entry, this.adb));
  }

  public async getDiagnostics(): Promise<string[]> {
    if (!this.canListAnything) {
      return ["Unable to locate adb. Install the Android platform tools or set adbPath in config.json."];
    }

    let entries: AdbDeviceEntry[];
    try {
      entries = await this.listEntries(PROPERTY_TIMEOUT_MS);
    } catch (err) {
      return [`Unable to run "adb devices -l": ${errorMessage(err)}`];
    }

    const messages: string[] = [];
    for (const entry of entries) {
      if (entry.state === "unauthorized") {
        messages.push(
          `Device ${entry.serial} is not authorized. Allow USB debugging on the device, then reconnect it.`
        );
      } else if (entry.state === "no permissions") {
        messages.push(`Device ${entry.serial} is not accessible: no permissions. Check the host's udev rules.`);
      } else if (entry.state !== "device" && entry.state !== "offline") {
        messages.push(`Device ${entry.serial} is in an unexpected state: ${entry.state}.`);
      }
    }
    return messages;
  }

  private async listEntries(timeoutMs: number | undefined): Promise<AdbDeviceEntry[]> {
    try {
      return parseAdbDevices(await this.adb(["devices", "-l"], { timeoutMs }));
    } catch (err) {
      if (err instanceof ToolError && err.kind === "timeout") {
        throw new TimeoutError(err.message, timeoutMs ?? 0);
      }
      throw err;
    }
  }
}
