import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { BridgeErrorCode } from "../backend/bridge/bridgeClient.js";
import type { CoordinatorError } from "../backend/core/coreCoordinator.js";

/**
 * Machine-readable error codes for sideload tool responses.
 *
 * Keep this list stable once clients depend on it.
 */
export type SideloadToolErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "UNAVAILABLE"
  | "TIMEOUT"
  | "INTERNAL";

/**
 * Standard machine-readable error envelope for all sideload tools.
 */
export interface SideloadToolError {
  /** Stable error code for programmatic branching. */
  code: SideloadToolErrorCode;
  /** Human-readable message (safe for operator display). */
  message: string;
  /** Tool name that produced the error (e.g., `sideload_installs_enqueue`). */
  tool: string;
  /** Whether retrying the exact same request may succeed. */
  retryable?: boolean;
  /** Optional structured details (do not put massive payloads here). */
  details?: Record<string, unknown>;
  /** Actionable suggestion for the AI/operator on how to resolve this error. */
  suggestion?: string;
}

/**
 * Standard success envelope for all sideload tools.
 *
 * Tools should return `structuredContent` matching this shape when they have an
 * `outputSchema` registered, so clients can avoid parsing `content[].text`.
 */
export interface SideloadToolOk<T> extends Record<string, unknown> {
  ok: true;
  data: T;
}

/**
 * Standard error envelope for all sideload tools.
 */
export interface SideloadToolFail extends Record<string, unknown> {
  ok: false;
  error: SideloadToolError;
}

/**
 * Build a successful MCP tool response with both:
 * - `structuredContent` (primary; validated when outputSchema is present)
 * - `content[].text` JSON (fallback for clients that only read text)
 *
 * @param data - Tool-specific success payload.
 */
export function toolOk<T extends Record<string, unknown>>(data: T): CallToolResult {
  const structuredContent: SideloadToolOk<T> = { ok: true, data };
  return {
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Build an error MCP tool response with both:
 * - `structuredContent` (primary; validated when outputSchema is present)
 * - `content[].text` JSON (fallback for clients that only read text)
 *
 * IMPORTANT: `isError=true` ensures MCP clients treat this as a tool failure.
 */
export function toolErr(error: SideloadToolError): CallToolResult {
  const structuredContent: SideloadToolFail = { ok: false, error };
  return {
    isError: true,
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Map bridge and coordinator failure codes to the stable
 * {@link SideloadToolErrorCode} returned to MCP clients.
 */
export function mapCoreErrorCode(code: BridgeErrorCode | CoordinatorError["code"]): SideloadToolErrorCode {
  switch (code) {
    case "BRIDGE_UNAVAILABLE":
    case "DEVICE_UNAUTHORIZED":
    case "UNAVAILABLE":
      return "UNAVAILABLE";
    case "INVALID_PACKAGE":
    case "INVALID_ARGUMENT":
      return "INVALID_ARGUMENT";
    case "INSTALL_REJECTED":
    default:
      return "INTERNAL";
  }
}
