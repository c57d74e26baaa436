import os from "node:os";
import { StaticDeviceDiscovery } from "../discovery/staticDiscovery.js";
import { projectSupportsPlatform } from "../project/project.js";
import type { TargetPlatform } from "./targetPlatform.js";
import type { Device, PlatformType, Project } from "./types.js";

type DesktopPlatformType = Extract<PlatformType, "linux" | "macos" | "windows">;

const DESKTOP_NAMES: Record<DesktopPlatformType, string> = {
  linux: "Linux",
  macos: "macOS",
  windows: "Windows",
};

const NODE_PLATFORMS: Record<DesktopPlatformType, NodeJS.Platform> = {
  linux: "linux",
  macos: "darwin",
  windows: "win32",
};

function desktopTargetPlatform(platformType: DesktopPlatformType, arch: string): TargetPlatform {
  switch (platformType) {
    case "linux":
      return arch === "arm64" ? "linux-arm64" : "linux-x64";
    case "windows":
      return arch === "arm64" ? "windows-arm64" : "windows-x64";
    case "macos":
      return "darwin";
  }
}

/**
 * The machine this server runs on, as a deployment target.
 */
export class DesktopDevice implements Device {
  public readonly id: DesktopPlatformType;
  public readonly name: string;
  public readonly category = "desktop" as const;
  public readonly platformType: DesktopPlatformType;
  public readonly ephemeral = false;

  private readonly arch: string;
  private readonly sdk: string;

  public constructor(platformType: DesktopPlatformType, arch: string, sdk: string) {
    this.id = platformType;
    this.name = DESKTOP_NAMES[platformType];
    this.platformType = platformType;
    this.arch = arch;
    this.sdk = sdk;
  }

  public isSupported(): boolean {
    return true;
  }

  public isSupportedForProject(project: Project): boolean {
    return projectSupportsPlatform(project, this.platformType);
  }

  public async targetPlatform(): Promise<TargetPlatform> {
    return desktopTargetPlatform(this.platformType, this.arch);
  }

  public async isLocalEmulator(): Promise<boolean> {
    return false;
  }

  public async sdkNameAndVersion(): Promise<string> {
    return this.sdk;
  }

  public async dispose(): Promise<void> {}
}

export interface HostDiscoveryOptions {
  /** Defaults to the current process platform. */
  platform?: NodeJS.Platform;
  /** Defaults to the current process architecture. */
  arch?: string;
  /** Defaults to the running OS version. */
  sdk?: string;
}

/**
 * Produces the host desktop device when the host runs `platformType`. One
 * instance is registered per desktop platform; only the matching one is active.
 */
export class HostDeviceDiscovery extends StaticDeviceDiscovery {
  public readonly supportsPlatform: boolean;
  public readonly wellKnownIds: readonly string[];

  private readonly platformType: DesktopPlatformType;
  private readonly arch: string;
  private readonly sdk: string;

  public constructor(platformType: DesktopPlatformType, options: HostDiscoveryOptions = {}) {
    super(platformType);
    this.platformType = platformType;
    this.supportsPlatform = (options.platform ?? process.platform) === NODE_PLATFORMS[platformType];
    this.wellKnownIds = [platformType];
    this.arch = options.arch ?? process.arch;
    this.sdk = options.sdk ?? `${os.type()} ${os.release()}`;
  }

  protected buildDevices(): Device[] {
    return [new DesktopDevice(this.platformType, this.arch, this.sdk)];
  }
}
