import { z } from "zod/v4";

/**
 * Shared Zod schemas for deckhand MCP tool inputs and outputs.
 *
 * Note: These schemas are designed to be AI-friendly:
 * - explicit enums (no magic strings)
 * - descriptive field docs
 */

export const zNonEmptyString = z
  .string()
  .min(1, "Must be a non-empty string")
  .describe("A non-empty string.");

export const zDeviceQuery = zNonEmptyString.describe(
  "Device id or name. Matched case-insensitively; an exact match wins, otherwise every device whose id or name starts with it."
);

export const zTimeoutMs = z
  .number()
  .int()
  .positive()
  .describe("Budget in milliseconds for a fresh scan of each backend.");

export const zConnectionInterface = z
  .enum(["attached", "wireless"])
  .describe("How a device is reached from the host: `attached` (USB or local) or `wireless` (network).");

export const zJsonObject = z
  .record(z.string(), z.unknown())
  .describe("A JSON object (string keys) used for metadata.");

/**
 * deckhand standardized tool result envelopes (success + error).
 */
export const zDeckhandErrorCode = z
  .enum(["INVALID_ARGUMENT", "NOT_FOUND", "UNAVAILABLE", "INTERNAL", "TIMEOUT"])
  .describe("Stable machine-readable error code.");

export const zDeckhandToolError = z
  .object({
    code: zDeckhandErrorCode,
    message: zNonEmptyString.describe("Human-readable error message."),
    tool: zNonEmptyString.describe("Tool name that produced this error."),
    retryable: z.boolean().optional().describe("Whether a retry may succeed."),
    details: zJsonObject.optional().describe("Optional structured details for debugging/triage."),
    suggestion: zNonEmptyString.optional().describe("Actionable suggestion for the AI/operator on how to resolve."),
  })
  .describe("Standard deckhand tool error envelope.");

/**
 * Create an object-shaped schema for deckhand tool outputs.
 *
 * NOTE: The MCP SDK normalizes tool output schemas to an object schema for
 * validation, so the envelope stays a `z.object(...)` rather than a union.
 *
 * @param dataSchema - Schema for the tool-specific success payload.
 */
export function zDeckhandToolResult<T extends z.ZodTypeAny>(dataSchema: T) {
  return z
    .object({
      ok: z.boolean().describe("True on success; false on failure."),
      data: dataSchema.optional().describe("Success payload when ok=true."),
      error: zDeckhandToolError.optional().describe("Error payload when ok=false."),
    })
    .passthrough()
    .describe("Standard deckhand tool result envelope.");
}

export const zDeviceCapabilities = z
  .object({
    hotReload: z.boolean(),
    hotRestart: z.boolean(),
    screenshot: z.boolean(),
    fastStart: z.boolean(),
    cleanExit: z.boolean(),
    hardwareRendering: z.boolean(),
    startPaused: z.boolean(),
  })
  .describe("Development features the device implements.");

export const zDevice = z
  .object({
    name: zNonEmptyString.describe("Human-readable device name."),
    id: zNonEmptyString.describe("Stable device identifier."),
    isSupported: z.boolean().describe("Whether deckhand can deploy to this device at all."),
    targetPlatform: zNonEmptyString.describe("Target platform display name (e.g., `android-arm64`)."),
    emulator: z.boolean().describe("Whether this is an emulator or simulator running on this host."),
    sdk: z.string().describe("SDK name and version (e.g., `Android 14 (API 34)`)."),
    capabilities: zDeviceCapabilities,
  })
  .passthrough()
  .describe("Machine-readable device record.");

export const zSelection = z
  .object({
    device: z.string().nullable().describe("Selected device id or name; null when nothing was specified."),
    all_devices: z.boolean().describe("True when the selection is `all`."),
    project_dir: z.string().nullable().describe("Project used for eligibility; null when none."),
    scopes_project: z.boolean().describe("Whether devices unsupported by the project are excluded."),
    scopes_all: z.boolean().describe("Whether devices that cannot join an all-devices run are excluded."),
  })
  .describe("Selection intent and the eligibility rules derived from it.");

/**
 * Tool output schemas (public contract).
 */
export const zOutMcpAbout = zDeckhandToolResult(
  z
    .object({
      schema_version: z.number().int().positive(),
      toolkit: z
        .object({
          name: zNonEmptyString,
          version: zNonEmptyString,
          transport: zNonEmptyString,
          log_level: zNonEmptyString,
          backends: z.array(zNonEmptyString),
        })
        .passthrough(),
    })
    .passthrough()
);

export const zOutDevicesList = zDeckhandToolResult(
  z.object({
    devices: z.array(zDevice),
    table: z.array(z.string()).describe("Human-readable aligned listing, one line per device."),
    platform_types: z.array(zNonEmptyString).describe("Sorted platform families of the listed devices."),
    selection: zSelection,
  })
);

export const zOutDevicesGet = zDeckhandToolResult(
  z.object({
    device: zDevice,
  })
);

export const zOutDevicesResolve = zDeckhandToolResult(
  z.object({
    devices: z.array(zDevice),
    ambiguous: z.boolean().describe("True when more than one device remains and none can be preferred."),
    selection: zSelection,
  })
);

export const zOutDevicesDiagnostics = zDeckhandToolResult(
  z.object({
    can_list_anything: z.boolean().describe("Whether any backend can list devices on this host."),
    backends: z.array(zNonEmptyString).describe("Backends active on this host, in registration order."),
    diagnostics: z.array(z.string()).describe("Problems reported by backends, in backend order."),
  })
);
