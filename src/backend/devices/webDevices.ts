import { StaticDeviceDiscovery } from "../discovery/staticDiscovery.js";
import { projectSupportsPlatform } from "../project/project.js";
import type { TargetPlatform } from "./targetPlatform.js";
import type { Device, DeviceCapabilities, Project } from "./types.js";

export const WEB_SERVER_DEVICE_ID = "web-server";

/**
 * Serves the application over HTTP for any browser to open.
 */
export class WebServerDevice implements Device {
  public readonly id = WEB_SERVER_DEVICE_ID;
  public readonly name = "Web Server";
  public readonly category = "web" as const;
  public readonly platformType = "web" as const;
  public readonly ephemeral = false;
  public readonly capabilities: Partial<DeviceCapabilities> = { cleanExit: false };

  public isSupported(): boolean {
    return true;
  }

  public isSupportedForProject(project: Project): boolean {
    return projectSupportsPlatform(project, "web");
  }

  public async targetPlatform(): Promise<TargetPlatform> {
    return "web-javascript";
  }

  public async isLocalEmulator(): Promise<boolean> {
    return false;
  }

  public async sdkNameAndVersion(): Promise<string> {
    return "Web Server";
  }

  public async dispose(): Promise<void> {}
}

export class WebServerDiscovery extends StaticDeviceDiscovery {
  public readonly supportsPlatform = true;
  public readonly wellKnownIds: readonly string[] = [WEB_SERVER_DEVICE_ID];

  public constructor() {
    super("web");
  }

  protected buildDevices(): Device[] {
    return [new WebServerDevice()];
  }
}
