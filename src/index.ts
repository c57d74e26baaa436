#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDiscoverers } from "./backend/backends.js";
import { DeviceManager } from "./backend/discovery/deviceManager.js";
import { PollingDeviceDiscovery } from "./backend/discovery/pollingDiscovery.js";
import { detectProject } from "./backend/project/project.js";
import { parseCliArgs, USAGE } from "./cli.js";
import { loadConfig, resolveProjectDir } from "./config.js";
import { Logger } from "./logger.js";
import { loadPackageMeta } from "./meta.js";
import { registerTools } from "./tools/register.js";
import { errorMessage } from "./utils.js";

/**
 * MCP server entrypoint.
 *
 * This process hosts the deckhand MCP server and wires discovery backends,
 * the device manager and tool registration to the runtime configuration.
 */
async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    process.stderr.write(`${USAGE}\n`);
    return;
  }

  const config = loadConfig();
  const pkg = loadPackageMeta();
  const logger = new Logger(config.logLevel);

  const projectDirSetting = cli.project ?? config.projectDir;
  const project = projectDirSetting ? detectProject(resolveProjectDir(projectDirSetting)) : null;
  if (projectDirSetting && !project) {
    logger.warn("Project directory not found; device eligibility ignores the project", {
      projectDir: projectDirSetting,
    });
  }

  const discoverers = createDiscoverers(config, logger);
  const manager = new DeviceManager({ discoverers, logger, projectProvider: () => project });
  const selection = cli.device ?? config.device ?? null;
  manager.specifyDevice(selection);

  for (const discoverer of discoverers) {
    if (!(discoverer instanceof PollingDeviceDiscovery) || !discoverer.supportsPlatform) {
      continue;
    }
    discoverer.onAdded((device) => logger.info("Device connected", { backend: discoverer.name, id: device.id, name: device.name }));
    discoverer.onRemoved((device) => logger.info("Device removed", { backend: discoverer.name, id: device.id, name: device.name }));
    discoverer.startPolling();
  }

  const server = new McpServer({ name: "deckhand", version: pkg.version });

  // IMPORTANT: tools must be registered before connecting to a transport, since
  // registration mutates server capabilities and request handlers.
  registerTools(server, {
    manager,
    about: {
      serverName: "deckhand",
      serverVersion: pkg.version,
      transport: config.transport,
      logLevel: config.logLevel,
      backends: manager.backendNames,
      selection,
      projectDir: project?.directory ?? null,
    },
  });

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    manager.dispose();
    void server
      .close()
      .catch((err: unknown) => {
        logger.error("Failed to close server", { error: errorMessage(err) });
      })
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.printBanner({
    transport: config.transport,
    selection: selection ?? "(default)",
    projectDir: project?.directory,
    backends: manager.backendNames,
  });
}

main().catch((err) => {
  const msg = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  process.stderr.write(`[deckhand-mcp] fatal ${msg}\n`);
  process.exitCode = 1;
});
