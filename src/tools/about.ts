import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { toolOk } from "./result.js";

export interface DeckhandAboutContext {
  serverName: string;
  serverVersion: string;
  transport: string;
  logLevel: string;
  /** Backends active on this host. */
  backends: string[];
  /** Configured selection: a device id or name, `all`, or null. */
  selection: string | null;
  projectDir: string | null;
}

/**
 * Return a compact, operational "contract" describing how deckhand works.
 *
 * Structured rather than prose so that agents can re-ingest it after long
 * sessions and plan consistently.
 */
export function deckhandAbout(ctx: DeckhandAboutContext): CallToolResult {
  const toolNames = {
    about: "deckhand_mcp_about",
    devices_list: "deckhand_devices_list",
    devices_get: "deckhand_devices_get",
    devices_resolve: "deckhand_devices_resolve",
    devices_diagnostics: "deckhand_devices_diagnostics",
  } as const;

  const payload = {
    schema_version: 1,
    toolkit: {
      name: ctx.serverName,
      version: ctx.serverVersion,
      transport: ctx.transport,
      log_level: ctx.logLevel,
      backends: ctx.backends,
      selection: ctx.selection,
      project_dir: ctx.projectDir,
    },

    concepts: {
      device: {
        summary: "A physical or virtual target that can run an application: a phone, an emulator, the host desktop or a web server.",
        identity: ["id"],
        key_fields: [
          "name",
          "targetPlatform (e.g. android-arm64, ios, linux-x64, web-javascript)",
          "emulator: true for emulators and simulators on this host",
          "sdk: platform name and version",
          "capabilities: hotReload, hotRestart, screenshot, fastStart, cleanExit, hardwareRendering, startPaused",
        ],
        invariants: [
          "Two devices are the same target when their ids match; names may change.",
          "Disconnected devices are hidden unless include_disconnected is set.",
        ],
      },
      backend: {
        summary: "A platform-specific source of devices (android, ios, linux, macos, windows, web).",
        invariants: [
          "Backends that poll keep a cached list, filled by the first query and refreshed in the background.",
          "A failing backend contributes no devices; others are unaffected. Use deckhand_devices_diagnostics to see why.",
          "A scan that exceeds its timeout leaves that backend's cached list unchanged.",
        ],
      },
      selection: {
        summary: "The device the server was started for: an id or name (--device), `all`, or nothing.",
        rules: [
          "An id or name is matched case-insensitively. An exact match on any backend wins; otherwise every prefix match is returned.",
          "With nothing selected, devices the project cannot target are excluded; a single phone or emulator is preferred over desktop and web targets.",
          "With `all`, fuchsia and web targets are excluded.",
          "A specific id only requires the device to be supported at all, not by the project.",
        ],
      },
    },

    workflows: [
      {
        name: "Pick a device",
        steps: [
          `${toolNames.devices_resolve} to see what the configured selection resolves to.`,
          `If ambiguous, ${toolNames.devices_list} and then ${toolNames.devices_get} with a full id.`,
        ],
      },
      {
        name: "A device is missing",
        steps: [
          `${toolNames.devices_list} with refresh=true to scan again.`,
          `${toolNames.devices_diagnostics} for backend problems (tool not installed, unauthorized device).`,
        ],
      },
    ],

    failure_modes: [
      { code: "NOT_FOUND", meaning: "No device matches the id or name." },
      { code: "INVALID_ARGUMENT", meaning: "A query matches several devices; details.candidates lists them." },
      { code: "UNAVAILABLE", meaning: "A host tool (adb, xcrun) is missing or failed." },
      { code: "TIMEOUT", meaning: "A device did not answer in time." },
    ],

    tools: Object.values(toolNames),
  };

  return toolOk(payload);
}
