/**
 * Terminal logger for deckhand-mcp.
 *
 * Provides ANSI-colored, structured output with box-drawing characters.
 * Everything goes to stderr: stdout carries MCP traffic.
 */

/** ANSI escape codes for colors and styles. */
const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
} as const;

/** Box-drawing characters for structured output. */
const BOX = {
  topLeft: "╔",
  topRight: "╗",
  bottomLeft: "╚",
  bottomRight: "╝",
  horizontal: "═",
  vertical: "║",
} as const;

/** Log level type (matches config schema). */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/** Destination for rendered lines. */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

function renderBanner(): string {
  return `  ${ANSI.cyan}${ANSI.bold}deckhand${ANSI.reset} ${ANSI.dim}device discovery & selection${ANSI.reset}`;
}

/**
 * Strip ANSI escape codes from a string to get its display length.
 */
export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Render a boxed section with a centered title, sized to its content.
 */
function renderBox(title: string, content: string[], color: string = ANSI.cyan): string {
  const lines: string[] = [];

  // Each content line is rendered as `║␠<content><pad>␠║`, so the inner
  // width must fit the widest line plus two spaces.
  const titleText = ` ${title} `;
  const maxContentLen = content.reduce((max, line) => {
    const len = stripAnsi(line).length;
    return len > max ? len : max;
  }, 0);
  const innerWidth = Math.max(maxContentLen + 2, titleText.length);

  const remainingWidth = innerWidth - titleText.length;
  const leftPad = Math.floor(remainingWidth / 2);
  const rightPad = remainingWidth - leftPad;

  lines.push(
    `${color}${BOX.topLeft}${BOX.horizontal.repeat(leftPad)}${ANSI.bold}${titleText}${ANSI.reset}${color}${BOX.horizontal.repeat(rightPad)}${BOX.topRight}${ANSI.reset}`
  );

  for (const line of content) {
    const padding = Math.max(0, innerWidth - (stripAnsi(line).length + 2));
    lines.push(
      `${color}${BOX.vertical}${ANSI.reset} ${line}${" ".repeat(padding)} ${color}${BOX.vertical}${ANSI.reset}`
    );
  }

  lines.push(
    `${color}${BOX.bottomLeft}${BOX.horizontal.repeat(innerWidth)}${BOX.bottomRight}${ANSI.reset}`
  );

  return lines.join("\n");
}

function formatTimestamp(): string {
  const now = new Date();
  const h = String(now.getHours()).padStart(2, "0");
  const m = String(now.getMinutes()).padStart(2, "0");
  const s = String(now.getSeconds()).padStart(2, "0");
  const ms = String(now.getMilliseconds()).padStart(3, "0");
  return `${ANSI.dim}${ANSI.gray}${h}:${m}:${s}.${ms}${ANSI.reset}`;
}

function getLevelIndicator(level: LogLevel): string {
  switch (level) {
    case "trace":
      return `${ANSI.dim}${ANSI.gray}[TRACE]${ANSI.reset}`;
    case "debug":
      return `${ANSI.dim}${ANSI.blue}[DEBUG]${ANSI.reset}`;
    case "info":
      return `${ANSI.cyan}[INFO ]${ANSI.reset}`;
    case "warn":
      return `${ANSI.yellow}[WARN ]${ANSI.reset}`;
    case "error":
      return `${ANSI.red}[ERROR]${ANSI.reset}`;
  }
}

/**
 * Logger instance with configurable minimum level.
 */
export class Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(minLevel: LogLevel = "info", sink: LogSink = stderrSink) {
    this.minLevel = minLevel;
    this.sink = sink;
  }

  /**
   * Print the startup banner with configuration summary.
   */
  printBanner(info: {
    transport: string;
    selection: string;
    projectDir?: string;
    backends: string[];
  }): void {
    const output: string[] = [];

    output.push("");
    output.push(renderBanner());
    output.push("");

    const configLines = [
      `${ANSI.cyan}transport${ANSI.reset}  ${ANSI.white}${info.transport}${ANSI.reset}`,
      `${ANSI.cyan}device${ANSI.reset}     ${ANSI.white}${info.selection}${ANSI.reset}`,
      `${ANSI.cyan}project${ANSI.reset}    ${ANSI.dim}${info.projectDir ?? "(none)"}${ANSI.reset}`,
      `${ANSI.cyan}backends${ANSI.reset}   ${ANSI.dim}${info.backends.join(", ") || "(none)"}${ANSI.reset}`,
    ];
    output.push(renderBox("CONFIGURATION", configLines, ANSI.magenta));
    output.push("");
    output.push(
      `  ${ANSI.green}${ANSI.bold}◆${ANSI.reset} ${ANSI.green}Server ready${ANSI.reset} ${ANSI.dim}(listening on stdio)${ANSI.reset}`
    );
    output.push("");

    this.sink(output.join("\n"));
  }

  /**
   * Log a message at the specified level.
   */
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const parts = [formatTimestamp(), getLevelIndicator(level), message];

    if (meta && Object.keys(meta).length > 0) {
      parts.push(`${ANSI.dim}${JSON.stringify(meta)}${ANSI.reset}`);
    }

    this.sink(parts.join(" ") + "\n");
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }
}
