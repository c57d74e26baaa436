/**
 * Default behaviours for the {@link Device} contract.
 *
 * Backends implement only what is platform specific; everything that has a
 * sensible default is resolved here, so callers never read an optional
 * device field directly.
 *
 * @module device
 */

import {
  DEFAULT_CAPABILITIES,
  type ConnectionInterface,
  type Device,
  type DeviceCapabilities,
  type DeviceJson,
} from "./types.js";

export function isDeviceConnected(device: Device): boolean {
  return device.isConnected ?? true;
}

export function connectionInterfaceOf(device: Device): ConnectionInterface {
  return device.connectionInterface ?? "attached";
}

export function capabilitiesOf(device: Device): DeviceCapabilities {
  return { ...DEFAULT_CAPABILITIES, ...device.capabilities };
}

/**
 * Render devices as an aligned table, one line per device:
 * `name (category) • id • platform • sdk[ (unsupported)][ (emulator)]`.
 */
export async function describeDevices(devices: readonly Device[]): Promise<string[]> {
  if (devices.length === 0) {
    return [];
  }

  const table: string[][] = [];
  for (const device of devices) {
    let supportIndicator = device.isSupported() ? "" : " (unsupported)";
    const targetPlatform = await device.targetPlatform();
    if (await device.isLocalEmulator()) {
      const type = targetPlatform === "ios" ? "simulator" : "emulator";
      supportIndicator += ` (${type})`;
    }
    table.push([
      device.category ? `${device.name} (${device.category})` : device.name,
      device.id,
      targetPlatform,
      `${await device.sdkNameAndVersion()}${supportIndicator}`,
    ]);
  }

  // The last column is left unpadded.
  const widths = [0, 0, 0];
  for (const row of table) {
    for (let i = 0; i < widths.length; i++) {
      widths[i] = Math.max(widths[i], row[i].length);
    }
  }

  return table.map((row) =>
    [...widths.map((width, i) => row[i].padEnd(width)), row[3]].join(" • ")
  );
}

/**
 * Sorted, de-duplicated platform types of the given devices.
 */
export function devicesPlatformTypes(devices: readonly Device[]): string[] {
  const types = new Set<string>();
  for (const device of devices) {
    if (device.platformType) types.add(device.platformType);
  }
  return [...types].sort();
}

/**
 * Serialize a device for machine-readable listings.
 */
export async function deviceToJson(device: Device): Promise<DeviceJson> {
  const isLocalEmulator = await device.isLocalEmulator();
  const capabilities = capabilitiesOf(device);
  const hardwareRendering =
    isLocalEmulator && (device.supportsHardwareRendering ? await device.supportsHardwareRendering() : true);

  return {
    name: device.name,
    id: device.id,
    isSupported: device.isSupported(),
    targetPlatform: await device.targetPlatform(),
    emulator: isLocalEmulator,
    sdk: await device.sdkNameAndVersion(),
    capabilities: {
      hotReload: capabilities.hotReload,
      hotRestart: capabilities.hotRestart,
      screenshot: capabilities.screenshot,
      fastStart: capabilities.fastStart,
      cleanExit: capabilities.cleanExit,
      hardwareRendering,
      startPaused: capabilities.startPaused,
    },
  };
}
