import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { errorMessage, isRecord } from "../../utils.js";

const execFileAsync = promisify(execFile);

export type ToolErrorKind = "missing" | "failed" | "timeout";

/**
 * A structured error representing a failure to invoke a host tool
 * (`adb`, `xcrun`, ...).
 */
export class ToolError extends Error {
  public readonly tool: string;
  public readonly kind: ToolErrorKind;
  public readonly details: Record<string, unknown>;

  public constructor(tool: string, kind: ToolErrorKind, message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "ToolError";
    this.tool = tool;
    this.kind = kind;
    this.details = details;
  }
}

export interface RunToolOptions {
  /** Kill the process after this many milliseconds. */
  timeoutMs?: number;
}

/**
 * Run a host tool and return its trimmed stdout.
 *
 * @param tool - Short tool name used in messages (e.g. "adb")
 * @param executable - Resolved executable path
 * @throws ToolError with kind `missing`, `timeout` or `failed`
 */
export async function runTool(
  tool: string,
  executable: string,
  args: string[],
  options: RunToolOptions = {}
): Promise<string> {
  try {
    const { stdout } = await execFileAsync(executable, args, {
      encoding: "utf8",
      timeout: options.timeoutMs ?? 0,
      maxBuffer: 16 * 1024 * 1024,
      windowsHide: true,
    });
    return stdout.trim();
  } catch (err) {
    throw toToolError(tool, executable, args, options.timeoutMs, err);
  }
}

function toToolError(
  tool: string,
  executable: string,
  args: string[],
  timeoutMs: number | undefined,
  err: unknown
): ToolError {
  const fields = isRecord(err) ? err : {};
  const command = `${tool} ${args.join(" ")}`;

  if (fields.code === "ENOENT") {
    return new ToolError(tool, "missing", `${tool} executable not found: ${executable}`, { executable });
  }
  // execFile kills the child on timeout and reports `killed`.
  if (fields.killed === true && timeoutMs !== undefined && timeoutMs > 0) {
    return new ToolError(tool, "timeout", `${command} timed out after ${timeoutMs}ms`, {
      executable,
      args,
      timeoutMs,
    });
  }
  return new ToolError(tool, "failed", `${command} failed`, {
    executable,
    args,
    status: fields.code,
    stderr: typeof fields.stderr === "string" ? fields.stderr.trim() : undefined,
    error: errorMessage(err),
  });
}
