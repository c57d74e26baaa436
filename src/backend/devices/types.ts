import type { TargetPlatform } from "./targetPlatform.js";

/** Coarse workflow classification of a device. */
export type Category = "web" | "desktop" | "mobile";

/** Platform sub-family a device belongs to. */
export type PlatformType =
  | "web"
  | "android"
  | "ios"
  | "linux"
  | "macos"
  | "windows"
  | "fuchsia"
  | "custom";

/** How a device is reached from the host. */
export type ConnectionInterface = "attached" | "wireless";

/**
 * The project being deployed, as far as device eligibility is concerned.
 */
export interface Project {
  /** Absolute project directory. */
  readonly directory: string;
  /** Platform types the project carries a platform directory for. */
  readonly platforms: ReadonlySet<PlatformType>;
}

/**
 * Development features a device implements. Missing entries fall back to
 * {@link DEFAULT_CAPABILITIES}.
 */
export interface DeviceCapabilities {
  hotReload: boolean;
  hotRestart: boolean;
  screenshot: boolean;
  fastStart: boolean;
  /** Applications can be terminated through the runtime service. */
  cleanExit: boolean;
  startPaused: boolean;
}

export const DEFAULT_CAPABILITIES: Readonly<DeviceCapabilities> = {
  hotReload: true,
  hotRestart: true,
  screenshot: false,
  fastStart: false,
  cleanExit: true,
  startPaused: true,
};

/**
 * Reads a device's log output. Opaque to discovery; handed through to callers.
 */
export interface DeviceLogReader {
  readonly name: string;
  /** Subscribe to log lines; returns an unsubscribe function. */
  onLine(listener: (line: string) => void): () => void;
  dispose(): void;
}

/**
 * Forwards host ports to device ports. Opaque to discovery.
 */
export interface DevicePortForwarder {
  /** Forward `devicePort`; resolves to the host port in use. */
  forward(devicePort: number, hostPort?: number): Promise<number>;
  unforward(hostPort: number): Promise<void>;
  dispose(): Promise<void>;
}

/**
 * A physical or virtual target that can run an application.
 *
 * Devices are produced by discovery backends and shared by reference.
 * Identity is the `id` alone; the name and every other
 * attribute may change between polls.
 */
export interface Device {
  readonly id: string;
  readonly name: string;
  readonly category?: Category;
  readonly platformType?: PlatformType;
  /** Transient, primary candidate for default selection (phones, emulators). */
  readonly ephemeral: boolean;
  /** Defaults to `true` when omitted. */
  readonly isConnected?: boolean;
  /** Defaults to `"attached"` when omitted. */
  readonly connectionInterface?: ConnectionInterface;
  readonly capabilities?: Partial<DeviceCapabilities>;
  readonly portForwarder?: DevicePortForwarder;

  /** Whether the tool can deploy to this device at all. */
  isSupported(): boolean;
  /** Whether the device can run the given project. */
  isSupportedForProject(project: Project): boolean;
  targetPlatform(): Promise<TargetPlatform>;
  /** Best-effort guess at whether this is an emulator/simulator on this host. */
  isLocalEmulator(): Promise<boolean>;
  sdkNameAndVersion(): Promise<string>;
  /** Defaults to `true` when omitted. */
  supportsHardwareRendering?(): Promise<boolean>;
  getLogReader?(): DeviceLogReader;
  /** Release log readers, forwarders and similar resources. */
  dispose(): Promise<void>;
}

/**
 * Machine-readable device record for listings.
 */
export interface DeviceJson {
  name: string;
  id: string;
  isSupported: boolean;
  targetPlatform: string;
  emulator: boolean;
  sdk: string;
  capabilities: {
    hotReload: boolean;
    hotRestart: boolean;
    screenshot: boolean;
    fastStart: boolean;
    cleanExit: boolean;
    hardwareRendering: boolean;
    startPaused: boolean;
  };
}
