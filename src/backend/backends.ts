import type { DeckhandConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { createAdbExec, resolveAdbExecutable } from "./adb/adb.js";
import { AndroidDeviceDiscovery } from "./devices/adbDevices.js";
import { HostDeviceDiscovery } from "./devices/hostDevices.js";
import { IosDeviceDiscovery } from "./devices/iosDevices.js";
import { WebServerDiscovery } from "./devices/webDevices.js";
import type { DeviceDiscovery } from "./discovery/discovery.js";
import { createDevicectlList, isXcrunAvailable } from "./ios/devicectl.js";

/**
 * Build every discovery backend in registration order. Backends that cannot
 * run on this host are included and report `supportsPlatform: false`.
 */
export function createDiscoverers(config: DeckhandConfig, logger: Logger): DeviceDiscovery[] {
  return [
    new AndroidDeviceDiscovery({
      adb: createAdbExec(config),
      adbAvailable: () => resolveAdbExecutable(config) !== null,
      logger,
      polling: config.polling,
    }),
    new IosDeviceDiscovery({
      list: createDevicectlList(),
      xcrunAvailable: isXcrunAvailable,
      logger,
      polling: config.polling,
    }),
    new HostDeviceDiscovery("linux"),
    new HostDeviceDiscovery("macos"),
    new HostDeviceDiscovery("windows"),
    new WebServerDiscovery(),
  ];
}
