import { describe, it } from "node:test";
import assert from "node:assert";
import type { AdbExec, AdbExecOptions } from "../../../src/backend/adb/adb.js";
import { AndroidDevice, AndroidDeviceDiscovery } from "../../../src/backend/devices/adbDevices.js";
import type { PlatformType } from "../../../src/backend/devices/types.js";
import { DiscoveryFilter } from "../../../src/backend/discovery/filters.js";
import { ToolError } from "../../../src/backend/host/exec.js";
import { silentLogger } from "../../helpers/fakes.js";

const DEVICES_OUTPUT = [
  "List of devices attached",
  "emulator-5554          device product:sdk_phone64 model:sdk_gphone64_arm64 device:emu64a transport_id:1",
  "192.168.1.20:5555      device product:panther model:Pixel_7 device:panther transport_id:2",
  "R58M00TEST             unauthorized usb:1-1 transport_id:3",
  "0123ABC                offline transport_id:4",
].join("\n");

const GETPROP: Record<string, string> = {
  "emulator-5554": [
    "[ro.product.cpu.abi]: [arm64-v8a]",
    "[ro.build.version.release]: [14]",
    "[ro.build.version.sdk]: [34]",
    "[ro.build.characteristics]: [emulator]",
  ].join("\n"),
  "192.168.1.20:5555": ["[ro.product.cpu.abi]: [armeabi-v7a]", "[ro.build.characteristics]: [nosdcard]"].join("\n"),
};

interface AdbCall {
  args: string[];
  options: AdbExecOptions;
}

function fakeAdb(devicesOutput = DEVICES_OUTPUT): { adb: AdbExec; calls: AdbCall[] } {
  const calls: AdbCall[] = [];
  const adb: AdbExec = async (args, options = {}) => {
    calls.push({ args, options });
    if (args[0] === "devices") {
      return devicesOutput;
    }
    if (args[0] === "shell" && options.serial !== undefined) {
      return GETPROP[options.serial] ?? "";
    }
    throw new Error(`unexpected adb call: ${args.join(" ")}`);
  };
  return { adb, calls };
}

function discovery(adb: AdbExec, available = true): AndroidDeviceDiscovery {
  return new AndroidDeviceDiscovery({ adb, adbAvailable: () => available, logger: silentLogger() });
}

describe("AndroidDeviceDiscovery", () => {
  it("lists connected and offline devices", async () => {
    const { adb } = fakeAdb();
    const devices = await discovery(adb).devices();

    assert.deepStrictEqual(
      devices.map((d) => [d.id, d.name, d.isConnected, d.connectionInterface]),
      [
        ["emulator-5554", "sdk gphone64 arm64", true, "attached"],
        ["192.168.1.20:5555", "Pixel 7", true, "wireless"],
        ["0123ABC", "0123ABC", false, "attached"],
      ]
    );
  });

  it("drops offline devices under the default filter", async () => {
    const { adb } = fakeAdb();
    const devices = await discovery(adb).devices(new DiscoveryFilter());
    assert.deepStrictEqual(
      devices.map((d) => d.id),
      ["emulator-5554", "192.168.1.20:5555"]
    );
  });

  it("reports unauthorized devices in diagnostics", async () => {
    const { adb } = fakeAdb();
    assert.deepStrictEqual(await discovery(adb).getDiagnostics(), [
      "Device R58M00TEST is not authorized. Allow USB debugging on the device, then reconnect it.",
    ]);
  });

  it("lists nothing without adb", async () => {
    const { adb, calls } = fakeAdb();
    const backend = discovery(adb, false);
    assert.strictEqual(backend.canListAnything, false);
    assert.deepStrictEqual(await backend.devices(), []);
    assert.strictEqual(calls.length, 0);
    assert.deepStrictEqual(await backend.getDiagnostics(), [
      "Unable to locate adb. Install the Android platform tools or set adbPath in config.json.",
    ]);
  });

  it("keeps the cache when adb times out", async () => {
    const adb: AdbExec = async () => {
      throw new ToolError("adb", "timeout", "adb devices -l timed out after 50ms", {});
    };
    const devices = await discovery(adb).discoverDevices({ timeoutMs: 50 });
    assert.deepStrictEqual(devices, []);
  });

  it("surfaces other adb failures", async () => {
    const adb: AdbExec = async () => {
      throw new ToolError("adb", "failed", "adb devices -l failed", {});
    };
    await assert.rejects(discovery(adb).discoverDevices(), /adb devices -l failed/);
  });
});

describe("AndroidDevice", () => {
  function deviceFor(serial: string, adb: AdbExec): AndroidDevice {
    return new AndroidDevice({ serial, state: "device", attributes: new Map() }, adb);
  }

  it("describes an emulator from its properties", async () => {
    const { adb } = fakeAdb();
    const device = deviceFor("emulator-5554", adb);

    assert.strictEqual(await device.targetPlatform(), "android-arm64");
    assert.strictEqual(await device.isLocalEmulator(), true);
    assert.strictEqual(await device.sdkNameAndVersion(), "Android 14 (API 34)");
    assert.strictEqual(device.category, "mobile");
    assert.strictEqual(device.ephemeral, true);
  });

  it("reads properties once per device", async () => {
    const { adb, calls } = fakeAdb();
    const device = deviceFor("192.168.1.20:5555", adb);

    assert.strictEqual(await device.targetPlatform(), "android-arm");
    assert.strictEqual(await device.isLocalEmulator(), false);
    assert.strictEqual(await device.sdkNameAndVersion(), "Android unknown (API unknown)");

    const shellCalls = calls.filter((c) => c.args[0] === "shell");
    assert.strictEqual(shellCalls.length, 1);
    assert.strictEqual(shellCalls[0].options.serial, "192.168.1.20:5555");
  });

  it("requires an android directory in the project", () => {
    const { adb } = fakeAdb();
    const device = deviceFor("emulator-5554", adb);
    assert.strictEqual(device.isSupportedForProject({ directory: "/work/app", platforms: new Set<PlatformType>(["android"]) }), true);
    assert.strictEqual(device.isSupportedForProject({ directory: "/work/app", platforms: new Set<PlatformType>(["ios"]) }), false);
  });
});
