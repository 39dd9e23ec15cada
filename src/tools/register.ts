import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod/v4";
import { sideloadAbout, type SideloadAboutContext } from "./about.js";
import type { SideloadToolContext } from "./context.js";
import { sideloadDevicesGet, sideloadDevicesList, sideloadDevicesStatus } from "./devices.js";
import { sideloadEventsFetch } from "./events.js";
import { sideloadInstallsEnqueue } from "./installs.js";
import {
  withJsonStringFallback,
  zDeviceId,
  zEventKind,
  zOutDevicesGet,
  zOutDevicesList,
  zOutDevicesStatus,
  zOutEventsFetch,
  zOutInstallsEnqueue,
  zOutMcpAbout,
  zPackagePath,
  zToolCursor,
} from "./schemas.js";

/**
 * Register the MCP tool surface for the sideload server.
 *
 * This is intentionally schema-first:
 * - stable tool names
 * - AI-friendly descriptions
 * - strict input/output schemas
 */
export function registerTools(server: McpServer, ctx: SideloadToolContext, about: SideloadAboutContext): void {
  registerAboutTool(server, about);
  registerDeviceTools(server, ctx);
  registerInstallTools(server, ctx);
  registerEventTools(server, ctx);
}

function registerAboutTool(server: McpServer, about: SideloadAboutContext): void {
  server.registerTool(
    "sideload_mcp_about",
    {
      title: "About sideload (operational contract)",
      description:
        "Returns a compact, machine-usable contract for the sideload server: the device status model, install queue guarantees, event kinds, typical workflows and failure codes. Use this to re-ground yourself after long sessions.",
      inputSchema: {},
      outputSchema: zOutMcpAbout,
    },
    async () => sideloadAbout(about)
  );
}

function registerDeviceTools(server: McpServer, ctx: SideloadToolContext): void {
  server.registerTool(
    "sideload_devices_status",
    {
      title: "Get device status",
      description:
        "Returns the current device status (absent/connected/unauthorized/bridge_error) as classified by the background poller, the selected device, the core lifecycle state, the request currently installing and the number of queued requests. Does not call adb; cheap to poll.",
      inputSchema: {},
      outputSchema: zOutDevicesStatus,
    },
    async () => sideloadDevicesStatus(ctx)
  );

  server.registerTool(
    "sideload_devices_list",
    {
      title: "List connected Android devices",
      description:
        "Runs `adb devices -l` and returns every device with its `device_id` (adb serial), raw state, readiness, model and transport (USB/TCP). Unauthorized and offline devices are included with ready=false.",
      inputSchema: {},
      outputSchema: zOutDevicesList,
    },
    async () => sideloadDevicesList(ctx)
  );

  server.registerTool(
    "sideload_devices_get",
    {
      title: "Get device name",
      description:
        "Retrieves a human-readable name (brand and model via getprop) for a device by its `device_id`. Unauthorized devices are reported by serial.",
      inputSchema: {
        device_id: zDeviceId,
      },
      outputSchema: zOutDevicesGet,
    },
    async (args) => sideloadDevicesGet(ctx, args)
  );
}

function registerInstallTools(server: McpServer, ctx: SideloadToolContext): void {
  server.registerTool(
    "sideload_installs_enqueue",
    {
      title: "Queue package installs",
      description:
        "Queues one install per `.apk` path, in the given order, and returns immediately with the created requests. Paths that are not existing .apk files are returned under `rejected` (INVALID_PACKAGE) and never queued. Installs run one at a time in the background; watch `install.outcome` events via sideload_events_fetch. Without device_id the device selected by the latest poll is used.",
      inputSchema: {
        paths: withJsonStringFallback(z.array(zPackagePath).min(1), "paths").describe(
          "Package paths as an array, e.g. ['/home/me/app-release.apk']."
        ),
        device_id: zDeviceId.optional().describe("Optional adb serial to install on."),
      },
      outputSchema: zOutInstallsEnqueue,
    },
    async (args) => sideloadInstallsEnqueue(ctx, args)
  );
}

function registerEventTools(server: McpServer, ctx: SideloadToolContext): void {
  server.registerTool(
    "sideload_events_fetch",
    {
      title: "Fetch core events",
      description:
        "Cursor-based drain of core events (status.changed, install.started, install.outcome, install.discarded, coordinator.state_changed) in publish order. Pass the returned `next_cursor` on the next call. Optionally filter by `kind`.",
      inputSchema: {
        cursor: zToolCursor.optional(),
        limit: z.number().int().positive().max(5000).optional().describe("Max events to return (default 200)."),
        kind: zEventKind.optional(),
      },
      outputSchema: zOutEventsFetch,
    },
    async (args) => sideloadEventsFetch(ctx, args)
  );
}
