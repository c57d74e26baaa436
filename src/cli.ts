import { parseArgs } from "node:util";

export interface CliOptions {
  /** Device id or name, or `all`. */
  device?: string;
  /** Project directory override. */
  project?: string;
  help: boolean;
}

export const USAGE = `Usage: deckhand-mcp [options]

Options:
  -d, --device <id|all>  Target a device by id or name, or every eligible device
      --project <dir>    Project used to decide which devices it can target
  -h, --help             Show this help

Configuration is read from config.json, or from DECKHAND_CONFIG_PATH.`;

/**
 * Parse command-line flags.
 *
 * @throws TypeError on unknown flags or a flag missing its value.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      device: { type: "string", short: "d" },
      project: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    device: values.device,
    project: values.project,
    help: values.help ?? false,
  };
}
