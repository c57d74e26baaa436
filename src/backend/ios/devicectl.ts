import { z } from "zod/v4";
import { findOnPath } from "../host/pathEnv.js";
import { runTool, ToolError } from "../host/exec.js";
import { errorMessage } from "../../utils.js";

/**
 * One entry of `xcrun devicectl list devices --json-output -`.
 *
 * Only the fields discovery needs are declared; everything else passes
 * through untouched.
 */
export const zDevicectlDevice = z
  .object({
    identifier: z.string().min(1),
    deviceProperties: z
      .object({
        name: z.string().optional(),
        osVersionNumber: z.string().optional(),
      })
      .passthrough()
      .optional(),
    hardwareProperties: z
      .object({
        platform: z.string().optional(),
        udid: z.string().optional(),
        productType: z.string().optional(),
        reality: z.string().optional(),
      })
      .passthrough()
      .optional(),
    connectionProperties: z
      .object({
        transportType: z.string().optional(),
        tunnelState: z.string().optional(),
        pairingState: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type DevicectlDevice = z.infer<typeof zDevicectlDevice>;

const zDevicectlOutput = z
  .object({
    result: z
      .object({
        devices: z.array(zDevicectlDevice),
      })
      .passthrough(),
  })
  .passthrough();

/**
 * Parse the JSON document devicectl writes to stdout.
 *
 * @throws ToolError (kind `failed`) when the document does not have the expected shape.
 */
export function parseDevicectlDevices(stdout: string): DevicectlDevice[] {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (err) {
    throw new ToolError("devicectl", "failed", "devicectl produced invalid JSON", {
      error: errorMessage(err),
    });
  }

  const parsed = zDevicectlOutput.safeParse(json);
  if (!parsed.success) {
    throw new ToolError("devicectl", "failed", "Unexpected devicectl output", {
      issues: parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
    });
  }
  return parsed.data.result.devices;
}

/** Lists devices known to CoreDevice. */
export type DevicectlList = (timeoutMs?: number) => Promise<DevicectlDevice[]>;

/** Whether `xcrun` can be found on PATH. */
export function isXcrunAvailable(): boolean {
  return findOnPath("xcrun") !== null;
}

/**
 * Create a {@link DevicectlList} backed by `xcrun devicectl`.
 */
export function createDevicectlList(): DevicectlList {
  return async (timeoutMs) => {
    const xcrun = findOnPath("xcrun");
    if (!xcrun) {
      throw new ToolError("devicectl", "missing", "xcrun not found on PATH. Install Xcode.", {});
    }
    const stdout = await runTool(
      "devicectl",
      xcrun,
      ["devicectl", "list", "devices", "--quiet", "--json-output", "-"],
      { timeoutMs }
    );
    return parseDevicectlDevices(stdout);
  };
}
