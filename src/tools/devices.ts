import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeDevices, devicesPlatformTypes, deviceToJson } from "../backend/devices/device.js";
import type { ConnectionInterface, Device } from "../backend/devices/types.js";
import type { DeviceManager } from "../backend/discovery/deviceManager.js";
import { DiscoveryFilter, type SupportFilter } from "../backend/discovery/filters.js";
import { ToolError } from "../backend/host/exec.js";
import { errorMessage, TimeoutError } from "../utils.js";
import { toolErr, toolOk } from "./result.js";

function selectionOf(manager: DeviceManager, supportFilter: SupportFilter): Record<string, unknown> {
  return {
    device: manager.specifiedDeviceId,
    all_devices: manager.hasSpecifiedAllDevices,
    project_dir: manager.project?.directory ?? null,
    scopes_project: supportFilter.scopesProject,
    scopes_all: supportFilter.scopesAll,
  };
}

/**
 * Map a failure while describing devices to the standard error envelope.
 */
function deviceFailure(tool: string, err: unknown): CallToolResult {
  if (err instanceof TimeoutError || (err instanceof ToolError && err.kind === "timeout")) {
    return toolErr({
      code: "TIMEOUT",
      tool,
      message: err.message,
      retryable: true,
      suggestion: "Retry, or pass a larger timeout_ms",
    });
  }
  if (err instanceof ToolError) {
    return toolErr({
      code: "UNAVAILABLE",
      tool,
      message: err.message,
      retryable: true,
      details: { tool: err.tool, kind: err.kind, ...err.details },
      suggestion:
        err.kind === "missing"
          ? `Install ${err.tool} or configure its location in config.json`
          : "Check the device is connected and authorized, then retry",
    });
  }
  return toolErr({
    code: "INTERNAL",
    tool,
    message: `Failed to query devices: ${errorMessage(err)}`,
    retryable: false,
  });
}

export interface DevicesListArgs {
  refresh?: boolean;
  timeout_ms?: number;
  include_disconnected?: boolean;
  include_unsupported_by_project?: boolean;
  connection_interface?: ConnectionInterface;
}

/**
 * List devices for the current selection.
 *
 * With `refresh`, every backend is scanned again first; otherwise cached
 * lists are used.
 */
export async function deckhandDevicesList(manager: DeviceManager, args: DevicesListArgs): Promise<CallToolResult> {
  const tool = "deckhand_devices_list";

  const supportFilter = manager.deviceSupportFilter({
    includeDevicesUnsupportedByProject: args.include_unsupported_by_project,
  });
  const filter = new DiscoveryFilter({
    excludeDisconnected: !args.include_disconnected,
    supportFilter,
    connectionInterface: args.connection_interface,
  });

  try {
    if (args.refresh) {
      await manager.refreshAllDevices({ timeoutMs: args.timeout_ms, filter });
    }
    const devices = await manager.getDevices(filter);
    return toolOk({
      devices: await Promise.all(devices.map(deviceToJson)),
      table: await describeDevices(devices),
      platform_types: devicesPlatformTypes(devices),
      selection: selectionOf(manager, supportFilter),
    });
  } catch (err) {
    return deviceFailure(tool, err);
  }
}

/**
 * Resolve exactly one device by id or name.
 */
export async function deckhandDevicesGet(manager: DeviceManager, args: { device: string }): Promise<CallToolResult> {
  const tool = "deckhand_devices_get";

  let matches: Device[];
  try {
    matches = await manager.getDevicesById(args.device);
  } catch (err) {
    return deviceFailure(tool, err);
  }

  if (matches.length === 0) {
    return toolErr({
      code: "NOT_FOUND",
      tool,
      message: `No device matches "${args.device}"`,
      retryable: true,
      suggestion: "Verify the id using deckhand_devices_list",
    });
  }
  if (matches.length > 1) {
    return toolErr({
      code: "INVALID_ARGUMENT",
      tool,
      message: `"${args.device}" matches ${matches.length} devices`,
      retryable: false,
      details: { candidates: matches.map((d) => ({ id: d.id, name: d.name })) },
      suggestion: "Pass the full device id",
    });
  }

  try {
    return toolOk({ device: await deviceToJson(matches[0]) });
  } catch (err) {
    return deviceFailure(tool, err);
  }
}

/**
 * The devices the configured selection resolves to.
 */
export async function deckhandDevicesResolve(
  manager: DeviceManager,
  args: { include_unsupported_by_project?: boolean }
): Promise<CallToolResult> {
  const tool = "deckhand_devices_resolve";
  const options = { includeDevicesUnsupportedByProject: args.include_unsupported_by_project };

  try {
    const result = await manager.findTargetDevices(options);
    return toolOk({
      devices: await Promise.all(result.devices.map(deviceToJson)),
      ambiguous: result.ambiguous,
      selection: selectionOf(manager, manager.deviceSupportFilter(options)),
    });
  } catch (err) {
    return deviceFailure(tool, err);
  }
}

/**
 * Problems that may explain missing devices.
 */
export async function deckhandDevicesDiagnostics(manager: DeviceManager): Promise<CallToolResult> {
  return toolOk({
    can_list_anything: manager.canListAnything,
    backends: manager.backendNames,
    diagnostics: await manager.getDeviceDiagnostics(),
  });
}
