/**
 * In-process stand-ins for devices and discovery backends.
 */

import type { TargetPlatform } from "../../src/backend/devices/targetPlatform.js";
import type {
  Category,
  ConnectionInterface,
  Device,
  DeviceCapabilities,
  PlatformType,
  Project,
} from "../../src/backend/devices/types.js";
import { applyFilter, type DeviceDiscovery, type DiscoverDevicesOptions } from "../../src/backend/discovery/discovery.js";
import type { DiscoveryFilter } from "../../src/backend/discovery/filters.js";
import { PollingDeviceDiscovery } from "../../src/backend/discovery/pollingDiscovery.js";
import type { PollingConfig } from "../../src/config.js";
import { Logger, stripAnsi } from "../../src/logger.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface FakeDeviceOptions {
  id: string;
  name?: string;
  category?: Category;
  platformType?: PlatformType;
  ephemeral?: boolean;
  isConnected?: boolean;
  connectionInterface?: ConnectionInterface;
  supported?: boolean;
  targetPlatform?: TargetPlatform;
  emulator?: boolean;
  sdk?: string;
  capabilities?: Partial<DeviceCapabilities>;
  /** Makes `targetPlatform()` reject. */
  failWith?: Error;
}

export class FakeDevice implements Device {
  public readonly id: string;
  public readonly name: string;
  public readonly category?: Category;
  public readonly platformType?: PlatformType;
  public readonly ephemeral: boolean;
  public readonly isConnected?: boolean;
  public readonly connectionInterface?: ConnectionInterface;
  public readonly capabilities?: Partial<DeviceCapabilities>;
  public disposed = false;

  private readonly options: FakeDeviceOptions;

  public constructor(options: FakeDeviceOptions) {
    this.options = options;
    this.id = options.id;
    this.name = options.name ?? options.id;
    this.category = options.category;
    this.platformType = options.platformType;
    this.ephemeral = options.ephemeral ?? false;
    this.isConnected = options.isConnected;
    this.connectionInterface = options.connectionInterface;
    this.capabilities = options.capabilities;
  }

  public isSupported(): boolean {
    return this.options.supported ?? true;
  }

  public isSupportedForProject(project: Project): boolean {
    return this.platformType === undefined || project.platforms.has(this.platformType);
  }

  public async targetPlatform(): Promise<TargetPlatform> {
    if (this.options.failWith) {
      throw this.options.failWith;
    }
    return this.options.targetPlatform ?? "android";
  }

  public async isLocalEmulator(): Promise<boolean> {
    return this.options.emulator ?? false;
  }

  public async sdkNameAndVersion(): Promise<string> {
    return this.options.sdk ?? "Test SDK";
  }

  public async dispose(): Promise<void> {
    this.disposed = true;
  }
}

export interface FakeDiscoveryOptions {
  name: string;
  devices?: Device[];
  delayMs?: number;
  /** Never settle. */
  hang?: boolean;
  error?: Error;
  wellKnownIds?: string[];
  supportsPlatform?: boolean;
  canListAnything?: boolean;
  diagnostics?: string[];
}

/**
 * A backend answering from a fixed list, optionally slowly or never.
 */
export class FakeDiscovery implements DeviceDiscovery {
  public readonly name: string;
  public readonly supportsPlatform: boolean;
  public readonly canListAnything: boolean;
  public readonly wellKnownIds: readonly string[];
  public devicesCalls = 0;
  public discoverCalls: DiscoverDevicesOptions[] = [];
  public disposed = false;

  private readonly options: FakeDiscoveryOptions;

  public constructor(options: FakeDiscoveryOptions) {
    this.options = options;
    this.name = options.name;
    this.supportsPlatform = options.supportsPlatform ?? true;
    this.canListAnything = options.canListAnything ?? true;
    this.wellKnownIds = options.wellKnownIds ?? [];
  }

  public async devices(filter?: DiscoveryFilter): Promise<Device[]> {
    this.devicesCalls++;
    return this.answer(filter);
  }

  public async discoverDevices(options: DiscoverDevicesOptions = {}): Promise<Device[]> {
    this.discoverCalls.push(options);
    return this.answer(options.filter);
  }

  public async getDiagnostics(): Promise<string[]> {
    if (this.options.error) {
      throw this.options.error;
    }
    return this.options.diagnostics ?? [];
  }

  public dispose(): void {
    this.disposed = true;
  }

  private async answer(filter: DiscoveryFilter | undefined): Promise<Device[]> {
    if (this.options.hang) {
      return new Promise<Device[]>((resolve) => {
        this.hung.push(() => resolve([...this.next]));
      });
    }
    if (this.options.delayMs !== undefined) {
      await sleep(this.options.delayMs);
    }
    if (this.options.error) {
      throw this.options.error;
    }
    return applyFilter(this.options.devices ?? [], filter);
  }
}

/**
 * A polling backend whose enumeration result is set by the test.
 */
export class FakePollingDiscovery extends PollingDeviceDiscovery {
  public readonly supportsPlatform = true;
  public readonly canListAnything = true;

  /** What the next enumeration returns. */
  public next: Device[] = [];
  public delayMs = 0;
  public hang = false;
  public error: Error | null = null;
  /** Timeout passed to each enumeration, in call order. */
  public readonly timeouts: Array<number | undefined> = [];
  private readonly hung: Array<() => void> = [];

  public constructor(logger: Logger, polling?: Partial<PollingConfig>) {
    super("fake", { logger, polling });
  }

  public get calls(): number {
    return this.timeouts.length;
  }

  /** Let every hung enumeration finish with the current `next`. */
  public releaseHung(): void {
    for (const release of this.hung.splice(0)) {
      release();
    }
  }

  protected async pollingGetDevices(timeoutMs?: number): Promise<Device[]> {
    this.timeouts.push(timeoutMs);
    if (this.hang) {
      return new Promise<Device[]>((resolve) => {
        this.hung.push(() => resolve([...this.next]));
      });
    }
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
    if (this.error) {
      throw this.error;
    }
    return [...this.next];
  }
}

/**
 * A logger that keeps its output, ANSI codes stripped.
 */
export function capturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger("trace", (line) => {
    lines.push(stripAnsi(line));
  });
  return { logger, lines };
}

export function silentLogger(): Logger {
  return new Logger("error", () => {});
}
