import { z } from "zod/v4";

/**
 * Shared Zod schemas for sideload MCP tool inputs and outputs.
 *
 * Note: These schemas are designed to be AI-friendly:
 * - explicit enums (no magic strings)
 * - descriptive field docs
 * - stable naming aligned with the core's event and request records
 */

// ---------------------------------------------------------------------------
// JSON String Fallback Utility
// ---------------------------------------------------------------------------
// Some MCP clients serialize array parameters as JSON strings instead of
// sending the parsed value.
// ---------------------------------------------------------------------------

/**
 * Wraps a Zod schema to accept either the expected type OR a JSON string
 * that parses to the expected type.
 *
 * @example
 * // Accepts both ["a.apk"] and "[\"a.apk\"]":
 * paths: withJsonStringFallback(z.array(zNonEmptyString), "paths")
 *
 * @param schema - The Zod schema to wrap
 * @param fieldName - Optional field name for debug logging
 * @returns A schema that preprocesses string inputs via JSON.parse
 */
export function withJsonStringFallback<T extends z.ZodTypeAny>(schema: T, fieldName?: string) {
  return z.preprocess((val) => {
    if (typeof val !== "string") return val;
    const trimmed = val.trim();
    if (!trimmed.startsWith("[") && !trimmed.startsWith("{")) return val;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (process.env.SIDELOAD_DEBUG_JSON_FALLBACK) {
        process.stderr.write(
          `[sideload] JSON string fallback triggered${fieldName ? ` for '${fieldName}'` : ""}: ` +
            `received string, parsed to ${typeof parsed}\n`
        );
      }
      return parsed;
    } catch {
      // Let Zod validation report the original value.
      return val;
    }
  }, schema);
}

export const zNonEmptyString = z
  .string()
  .min(1, "Must be a non-empty string")
  .describe("A non-empty string.");

export const zDeviceId = zNonEmptyString.describe(
  "adb serial of a device, as returned by `sideload_devices_list` (e.g., `emulator-5554`, `192.168.1.20:5555`)."
);

export const zPackagePath = zNonEmptyString.describe(
  "Absolute path to an `.apk` file on the machine running this server."
);

export const zToolCursor = zNonEmptyString.describe(
  "Opaque cursor returned by `sideload_events_fetch` as `next_cursor`."
);

export const zJsonObject = z.record(z.string(), z.unknown()).describe("Arbitrary JSON object.");

export const zDeviceStatus = z
  .enum(["absent", "connected", "unauthorized", "bridge_error"])
  .describe(
    "Device status: absent (no device), connected (a ready device is selected), unauthorized (device present but not ready), bridge_error (adb could not be queried)."
  );

export const zCoordinatorState = z
  .enum(["idle", "running", "installing", "shutting_down", "stopped"])
  .describe("Core lifecycle state.");

export const zEventKind = z
  .enum(["status.changed", "install.started", "install.outcome", "install.discarded", "coordinator.state_changed"])
  .describe("Event kind.");

export const zFailureCode = z
  .enum(["BRIDGE_UNAVAILABLE", "DEVICE_UNAUTHORIZED", "INSTALL_REJECTED", "INVALID_PACKAGE"])
  .describe("Install/bridge failure taxonomy code.");

export const zSideloadErrorCode = z
  .enum(["INVALID_ARGUMENT", "NOT_FOUND", "UNAVAILABLE", "TIMEOUT", "INTERNAL"])
  .describe("Stable machine-readable error code.");

export const zSideloadToolError = z
  .object({
    code: zSideloadErrorCode,
    message: zNonEmptyString.describe("Human-readable error message."),
    tool: zNonEmptyString.describe("Tool name that produced this error."),
    retryable: z.boolean().optional().describe("Whether a retry may succeed."),
    details: zJsonObject.optional().describe("Optional structured details for debugging/triage."),
    suggestion: zNonEmptyString.optional().describe("Actionable suggestion for the AI/operator on how to resolve."),
  })
  .describe("Standard sideload tool error envelope.");

/**
 * Create an object-shaped schema for sideload tool outputs.
 *
 * NOTE: The MCP SDK normalizes tool output schemas to an object schema for
 * validation, so the envelope stays a `z.object(...)` rather than a union.
 *
 * @param dataSchema - Schema for the tool-specific success payload.
 */
export function zSideloadToolResult<T extends z.ZodTypeAny>(dataSchema: T) {
  return z
    .object({
      ok: z.boolean().describe("True on success; false on failure."),
      data: dataSchema.optional().describe("Success payload when ok=true."),
      error: zSideloadToolError.optional().describe("Error payload when ok=false."),
    })
    .passthrough()
    .describe("Standard sideload tool result envelope.");
}

/**
 * Domain models (outputs).
 *
 * Slightly permissive (`passthrough`) so fields can be added without
 * breaking older clients.
 */
export const zDeviceSummary = z
  .object({
    device_id: zDeviceId,
    state: zNonEmptyString.describe("Raw adb state (`device`, `unauthorized`, `offline`, ...)."),
    ready: z.boolean().describe("True only when adb reports the device as `device`."),
    model: zNonEmptyString.describe("Device model name."),
    transport: z.enum(["USB", "TCP"]).describe("Device transport type."),
  })
  .passthrough()
  .describe("A device as reported by `adb devices -l`.");

export const zInstallRequest = z
  .object({
    request_id: zNonEmptyString,
    file_path: zNonEmptyString,
    target_id: zNonEmptyString.optional(),
    enqueued_at: zNonEmptyString.describe("ISO-8601 timestamp."),
  })
  .passthrough()
  .describe("An accepted install request.");

export const zPackageRejection = z
  .object({
    path: z.string(),
    code: z.literal("INVALID_PACKAGE"),
    reason: zNonEmptyString,
  })
  .describe("A dropped path that was not queued.");

export const zCoreEvent = z
  .object({
    seq: z.number().int().positive(),
    ts: zNonEmptyString,
    kind: zEventKind,
  })
  .passthrough()
  .describe(
    "Core event. Payload by kind: status.changed {status, previous, device_id?, device_count}; install.started {request}; install.outcome {outcome}; install.discarded {request}; coordinator.state_changed {state, previous}."
  );

/**
 * Tool output schemas (public contract).
 */
export const zOutMcpAbout = zSideloadToolResult(
  z
    .object({
      schema_version: z.number().int().positive(),
      toolkit: z
        .object({
          name: zNonEmptyString,
          version: zNonEmptyString,
          transport: zNonEmptyString,
          log_level: zNonEmptyString,
          data_dir: zNonEmptyString,
          operation_logs: zNonEmptyString,
        })
        .passthrough(),
    })
    .passthrough()
);

export const zOutDevicesStatus = zSideloadToolResult(
  z.object({
    status: z
      .object({
        state: zCoordinatorState,
        status: zDeviceStatus,
        device_id: zNonEmptyString.optional(),
        device_count: z.number().int().nonnegative(),
        queue_depth: z.number().int().nonnegative(),
        in_flight: zInstallRequest.optional(),
        skipped_polls: z.number().int().nonnegative(),
      })
      .passthrough(),
  })
);

export const zOutDevicesList = zSideloadToolResult(
  z.object({
    devices: z.array(zDeviceSummary),
  })
);

export const zOutDevicesGet = zSideloadToolResult(
  z.object({
    device: z
      .object({
        device_id: zDeviceId,
        name: zNonEmptyString.describe("Display name, typically `<brand> <model>`."),
        state: zNonEmptyString.optional(),
        ready: z.boolean().optional(),
        transport: z.enum(["USB", "TCP"]).optional(),
      })
      .passthrough(),
  })
);

export const zOutInstallsEnqueue = zSideloadToolResult(
  z.object({
    requests: z.array(zInstallRequest),
    rejected: z.array(zPackageRejection),
    queue_depth: z.number().int().nonnegative(),
  })
);

export const zOutEventsFetch = zSideloadToolResult(
  z.object({
    events: z.array(zCoreEvent),
    cursor: zToolCursor.optional(),
    next_cursor: zToolCursor,
    dropped: z.number().int().nonnegative(),
  })
);
