import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { BridgeError } from "../backend/bridge/bridgeClient.js";
import { errorMessage } from "../utils.js";
import type { SideloadToolContext } from "./context.js";
import { mapCoreErrorCode, toolErr, toolOk } from "./result.js";

function bridgeFailure(tool: string, err: unknown, what: string): CallToolResult {
  if (err instanceof BridgeError) {
    return toolErr({
      code: mapCoreErrorCode(err.code),
      tool,
      message: err.message,
      retryable: true,
      details: { bridge_code: err.code, ...err.details },
      suggestion: "Ensure adb is installed (or set adbPath in config.json) and the device is connected",
    });
  }
  return toolErr({
    code: "INTERNAL",
    tool,
    message: `Failed to ${what}: ${errorMessage(err)}`,
    retryable: false,
  });
}

/**
 * Current device status as last classified by the poller, plus queue state.
 *
 * Reads coordinator state only; never calls adb.
 */
export function sideloadDevicesStatus(ctx: SideloadToolContext): CallToolResult {
  return toolOk({ status: ctx.coordinator.snapshot() });
}

/**
 * List every device adb reports, ready or not.
 */
export async function sideloadDevicesList(ctx: SideloadToolContext): Promise<CallToolResult> {
  const tool = "sideload_devices_list";
  try {
    const devices = await ctx.bridge.listDevices();
    return toolOk({ devices });
  } catch (err) {
    return bridgeFailure(tool, err, "list devices");
  }
}

/**
 * Resolve a human-readable name for one device.
 */
export async function sideloadDevicesGet(
  ctx: SideloadToolContext,
  args: { device_id: string }
): Promise<CallToolResult> {
  const tool = "sideload_devices_get";
  try {
    const devices = await ctx.bridge.listDevices();
    const found = devices.find((d) => d.device_id === args.device_id);
    if (!found) {
      return toolErr({
        code: "NOT_FOUND",
        tool,
        message: `Device not found: ${args.device_id}`,
        retryable: false,
        details: { device_id: args.device_id, known: devices.map((d) => d.device_id) },
        suggestion: "Verify device_id using sideload_devices_list",
      });
    }

    // Unauthorized devices reject shell commands; their serial is the best name available.
    const name = found.ready ? await ctx.bridge.getDeviceName(found.device_id) : found.device_id;
    return toolOk({
      device: {
        device_id: found.device_id,
        name,
        state: found.state,
        ready: found.ready,
        transport: found.transport,
      },
    });
  } catch (err) {
    return bridgeFailure(tool, err, "get device");
  }
}
