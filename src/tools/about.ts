import path from "node:path";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { toolOk } from "./result.js";

export interface SideloadAboutContext {
  serverName: string;
  serverVersion: string;
  transport: string;
  dataDir: string;
  logLevel: string;
  pollIntervalMs: number;
  multiDevicePolicy: string;
}

/**
 * Return a compact, operational "contract" describing how the sideload server works:
 * the device status model, install queue semantics, event kinds and typical failures.
 *
 * Structured rather than prose so agents can re-ingest it after long sessions.
 */
export function sideloadAbout(ctx: SideloadAboutContext): CallToolResult {
  const toolNames = {
    about: "sideload_mcp_about",
    devices_status: "sideload_devices_status",
    devices_list: "sideload_devices_list",
    devices_get: "sideload_devices_get",
    installs_enqueue: "sideload_installs_enqueue",
    events_fetch: "sideload_events_fetch",
  } as const;

  const payload = {
    schema_version: 1,
    toolkit: {
      name: ctx.serverName,
      version: ctx.serverVersion,
      transport: ctx.transport,
      log_level: ctx.logLevel,
      data_dir: ctx.dataDir,
      operation_logs: path.join(ctx.dataDir, "logs"),
      poll_interval_ms: ctx.pollIntervalMs,
      multi_device_policy: ctx.multiDevicePolicy,
    },

    concepts: {
      device_status: {
        summary: "One current status, recomputed by a background poller from `adb devices -l` on every tick.",
        values: {
          absent: "adb answered and reported no device.",
          connected: "A ready device is selected; installs without device_id go there.",
          unauthorized: "A device is present but not ready (USB debugging not authorized, or offline).",
          bridge_error: "adb is missing, failed, or timed out. Retried on the next tick.",
        },
        multi_device_policy: {
          first_ready: "Connected when any device is ready; the first ready one is selected.",
          all_ready: "Connected only when every reported device is ready.",
        },
      },

      install_queue: {
        summary: "Every accepted package becomes one InstallRequest in a single FIFO queue.",
        invariants: [
          "Exactly one install runs at a time, in the order requests were enqueued.",
          "Each request produces exactly one install.outcome event.",
          "A failed install does not stop the queue; there are no automatic retries.",
          "Queued requests cannot be cancelled; shutdown discards them (install.discarded).",
          "Polling continues while an install runs.",
        ],
      },

      event: {
        summary: "Ordered, immutable core events retained in a bounded buffer and drained via cursor.",
        key_fields: ["seq (monotonic)", "ts", "kind"],
        kinds: {
          "status.changed": "{ status, previous, device_id?, device_count }; previous is null for the first poll.",
          "install.started": "{ request }",
          "install.outcome": "{ outcome: { request, succeeded, message, code?, finished_at } }",
          "install.discarded": "{ request }",
          "coordinator.state_changed": "{ state, previous }",
        },
      },
    },

    workflows: {
      install_packages: [
        `Call ${toolNames.devices_status} and check status='connected'.`,
        `Call ${toolNames.installs_enqueue} with absolute .apk paths (optionally device_id).`,
        `Poll ${toolNames.events_fetch} with kind='install.outcome', passing next_cursor each time, until one outcome per request_id has arrived.`,
      ],
      pick_device: [
        `Call ${toolNames.devices_list} to see every device and its raw state.`,
        `Call ${toolNames.devices_get} for a readable name before asking the operator to confirm.`,
      ],
    },

    failure_modes: {
      BRIDGE_UNAVAILABLE: "adb not found, failed to start, or timed out. Install platform-tools or set adbPath in config.json.",
      DEVICE_UNAUTHORIZED: "Accept the USB debugging prompt on the device, or reconnect it.",
      INSTALL_REJECTED: "adb ran but did not report Success; the outcome message carries adb's reason verbatim.",
      INVALID_PACKAGE: "Path is not an .apk or does not exist. Such paths are never queued.",
    },

    tools: toolNames,
  } as const;

  return toolOk(payload);
}
