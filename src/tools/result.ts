import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/**
 * Machine-readable error codes for deckhand tool responses.
 *
 * Keep this list stable once clients depend on it.
 */
export type DeckhandToolErrorCode = "INVALID_ARGUMENT" | "NOT_FOUND" | "UNAVAILABLE" | "TIMEOUT" | "INTERNAL";

/**
 * Standard machine-readable error envelope for all deckhand tools.
 */
export interface DeckhandToolError {
  /** Stable error code for programmatic branching. */
  code: DeckhandToolErrorCode;
  /** Human-readable message (safe for operator display). */
  message: string;
  /** Tool name that produced the error (e.g., `deckhand_devices_get`). */
  tool: string;
  /** Whether retrying the exact same request may succeed. */
  retryable?: boolean;
  /** Optional structured details (do not put massive payloads here). */
  details?: Record<string, unknown>;
  /** Actionable suggestion for the AI/operator on how to resolve this error. */
  suggestion?: string;
}

/**
 * Standard success envelope for all deckhand tools.
 *
 * Tools return `structuredContent` matching this shape when they have an
 * `outputSchema` registered, so clients can avoid parsing `content[].text`.
 */
export interface DeckhandToolOk<T> extends Record<string, unknown> {
  ok: true;
  data: T;
}

/**
 * Standard error envelope for all deckhand tools.
 */
export interface DeckhandToolFail extends Record<string, unknown> {
  ok: false;
  error: DeckhandToolError;
}

/**
 * Build a successful MCP tool response with both:
 * - `structuredContent` (primary; validated when outputSchema is present)
 * - `content[].text` JSON (fallback for clients that only read text)
 *
 * @param data - Tool-specific success payload.
 */
export function toolOk<T extends Record<string, unknown>>(data: T): CallToolResult {
  const structuredContent: DeckhandToolOk<T> = { ok: true, data };
  return {
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Build an error MCP tool response.
 *
 * IMPORTANT: `isError=true` ensures MCP clients treat this as a tool failure.
 */
export function toolErr(error: DeckhandToolError): CallToolResult {
  const structuredContent: DeckhandToolFail = { ok: false, error };
  return {
    isError: true,
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}
