import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod/v4";
import type { DeviceManager } from "../backend/discovery/deviceManager.js";
import { deckhandAbout, type DeckhandAboutContext } from "./about.js";
import {
  deckhandDevicesDiagnostics,
  deckhandDevicesGet,
  deckhandDevicesList,
  deckhandDevicesResolve,
} from "./devices.js";
import {
  zConnectionInterface,
  zDeviceQuery,
  zOutDevicesDiagnostics,
  zOutDevicesGet,
  zOutDevicesList,
  zOutDevicesResolve,
  zOutMcpAbout,
  zTimeoutMs,
} from "./schemas.js";

export interface ToolContext {
  manager: DeviceManager;
  about: DeckhandAboutContext;
}

/**
 * Register the MCP tool surface for deckhand.
 *
 * Schema-first: stable tool names, AI-friendly descriptions, strict
 * input/output schemas.
 */
export function registerTools(server: McpServer, ctx: ToolContext): void {
  registerAboutTool(server, ctx.about);
  registerDeviceTools(server, ctx.manager);
}

function registerAboutTool(server: McpServer, about: DeckhandAboutContext): void {
  server.registerTool(
    "deckhand_mcp_about",
    {
      title: "About deckhand (operational contract)",
      description:
        "Returns a compact, machine-usable contract for deckhand: what devices and backends are, how the configured device selection is resolved, typical workflows, and expected failure modes. Use this to re-ground yourself after long sessions.",
      inputSchema: {},
      outputSchema: zOutMcpAbout,
    },
    async () => deckhandAbout(about)
  );
}

function registerDeviceTools(server: McpServer, manager: DeviceManager): void {
  server.registerTool(
    "deckhand_devices_list",
    {
      title: "List devices",
      description:
        "Lists devices for the configured selection across every backend on this host (Android, iOS, desktop, web). Without a selection every eligible device is listed; with one, only devices matching it. Results come from each backend's cache unless `refresh` is set. Returns machine-readable records plus an aligned text table.",
      inputSchema: {
        refresh: z.boolean().optional().default(false).describe("Scan every backend again before listing."),
        timeout_ms: zTimeoutMs.optional().describe("Per-backend scan budget when refresh=true. A backend that runs out keeps its cached list."),
        include_disconnected: z.boolean().optional().default(false).describe("Also list devices that are known but not reachable."),
        include_unsupported_by_project: z
          .boolean()
          .optional()
          .default(false)
          .describe("Ignore whether the project has a platform directory for each device."),
        connection_interface: zConnectionInterface.optional(),
      },
      outputSchema: zOutDevicesList,
    },
    async (args) => deckhandDevicesList(manager, args)
  );

  server.registerTool(
    "deckhand_devices_get",
    {
      title: "Get one device",
      description:
        "Resolves a device id or name to exactly one device and returns its record. Fails with NOT_FOUND when nothing matches and with INVALID_ARGUMENT (listing candidates) when a prefix matches several devices.",
      inputSchema: {
        device: zDeviceQuery,
      },
      outputSchema: zOutDevicesGet,
    },
    async (args) => deckhandDevicesGet(manager, args)
  );

  server.registerTool(
    "deckhand_devices_resolve",
    {
      title: "Resolve the target devices",
      description:
        "Returns the devices the configured selection resolves to, applying the same eligibility rules a run would: project support, the all-devices exclusions, and the preference for a single phone or emulator when nothing was selected. `ambiguous` is true when several devices remain and none can be preferred.",
      inputSchema: {
        include_unsupported_by_project: z
          .boolean()
          .optional()
          .default(false)
          .describe("Ignore whether the project has a platform directory for each device."),
      },
      outputSchema: zOutDevicesResolve,
    },
    async (args) => deckhandDevicesResolve(manager, args)
  );

  server.registerTool(
    "deckhand_devices_diagnostics",
    {
      title: "Device diagnostics",
      description:
        "Reports why devices may be missing: host tools that cannot be found, unauthorized or unpaired devices, and whether any backend can list devices at all.",
      inputSchema: {},
      outputSchema: zOutDevicesDiagnostics,
    },
    async () => deckhandDevicesDiagnostics(manager)
  );
}
