import type { MultiDevicePolicy } from "../../config.js";
import type { DeviceSummary } from "../devices/types.js";

/**
 * Connectivity as seen by the latest poll.
 *
 * - `absent`: adb answered with an empty device list
 * - `connected`: a ready device is available for installs
 * - `unauthorized`: devices are present but none is usable (unauthorized/offline)
 * - `bridge_error`: adb could not be queried
 */
export type DeviceStatus = "absent" | "connected" | "unauthorized" | "bridge_error";

/** Classification of one poll cycle. */
export interface PollResult {
  status: DeviceStatus;
  /** The ready device installs default to, when there is one. */
  device_id?: string;
  /** Number of devices adb reported (ready or not). */
  device_count: number;
}

/**
 * Classify a successful `listDevices()` result.
 *
 * A single device is connected iff it is ready. Several devices are resolved by `policy`.
 */
export function classifyDevices(devices: readonly DeviceSummary[], policy: MultiDevicePolicy): PollResult {
  const device_count = devices.length;
  if (device_count === 0) {
    return { status: "absent", device_count };
  }

  const firstReady = devices.find((d) => d.ready);
  if (!firstReady) {
    return { status: "unauthorized", device_count };
  }

  if (device_count > 1 && policy === "all_ready" && devices.some((d) => !d.ready)) {
    return { status: "unauthorized", device_count };
  }

  return { status: "connected", device_id: firstReady.device_id, device_count };
}

/** Classification used when `listDevices()` fails. */
export function bridgeErrorResult(): PollResult {
  return { status: "bridge_error", device_count: 0 };
}
