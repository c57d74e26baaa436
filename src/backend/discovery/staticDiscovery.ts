import type { Device } from "../devices/types.js";
import { applyFilter, type DeviceDiscovery, type DiscoverDevicesOptions } from "./discovery.js";
import type { DiscoveryFilter } from "./filters.js";

/**
 * A backend whose devices are known without any I/O, such as the host
 * desktop. The list is built once, on first use.
 */
export abstract class StaticDeviceDiscovery implements DeviceDiscovery {
  public readonly name: string;
  public abstract readonly supportsPlatform: boolean;
  public abstract readonly wellKnownIds: readonly string[];

  private cached: Device[] | null = null;

  protected constructor(name: string) {
    this.name = name;
  }

  protected abstract buildDevices(): Device[];

  public get canListAnything(): boolean {
    return this.supportsPlatform;
  }

  public async devices(filter?: DiscoveryFilter): Promise<Device[]> {
    if (!this.cached) {
      this.cached = this.supportsPlatform ? this.buildDevices() : [];
    }
    return applyFilter(this.cached, filter);
  }

  public async discoverDevices(options: DiscoverDevicesOptions = {}): Promise<Device[]> {
    return this.devices(options.filter);
  }

  public async getDiagnostics(): Promise<string[]> {
    return [];
  }

  public dispose(): void {}
}
