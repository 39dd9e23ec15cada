import type { SideloadConfig } from "../../config.js";
import { adbExec } from "../adb/adb.js";
import type { DeviceSummary } from "./types.js";

/**
 * Parse a single `adb devices -l` line into a DeviceSummary, if applicable.
 *
 * Example lines:
 * - "emulator-5554          device product:sdk_gphone64_x86_64 model:sdk_gphone64_x86_64 device:emu64xa transport_id:1"
 * - "R58M123ABC            device usb:1-1 product:... model:SM_G991B device:o1s transport_id:2"
 * - "192.168.0.10:5555     device product:... model:Pixel_7 device:panther transport_id:3"
 * - "XYZ                   unauthorized usb:1-2 transport_id:4"
 *
 * Unlike a "usable devices" listing, unauthorized and offline devices are kept
 * with `ready: false` so status classification can tell them apart from an
 * empty bus.
 */
export function parseAdbDevicesLine(line: string): DeviceSummary | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("List of devices attached") || trimmed.startsWith("*")) {
    return null;
  }

  // First token is serial, second token is state (device/offline/unauthorized/etc.)
  const tokens = trimmed.split(/\s+/g);
  if (tokens.length < 2) return null;

  const serial = tokens[0];
  const state = tokens[1];

  const kv = new Map<string, string>();
  for (const t of tokens.slice(2)) {
    const idx = t.indexOf(":");
    if (idx <= 0) continue;
    const k = t.slice(0, idx);
    const v = t.slice(idx + 1);
    if (k && v) kv.set(k, v);
  }

  return {
    device_id: serial,
    state,
    ready: state === "device",
    model: kv.get("model") ?? "<unknown>",
    transport: serial.includes(":") ? "TCP" : "USB",
  };
}

/**
 * Parse the complete stdout of `adb devices -l`.
 */
export function parseAdbDevicesOutput(stdout: string): DeviceSummary[] {
  const devices: DeviceSummary[] = [];
  for (const line of stdout.split(/\r?\n/g)) {
    const d = parseAdbDevicesLine(line);
    if (d) devices.push(d);
  }
  return devices;
}

/**
 * Enumerate Android devices using ADB.
 *
 * @param config - Runtime configuration (adb location and list timeout).
 * @returns Every reported device, in adb's order.
 * @throws AdbError when adb is missing, times out or exits non-zero.
 */
export async function listDevicesViaAdb(config: SideloadConfig): Promise<DeviceSummary[]> {
  const { stdout } = await adbExec(config, ["devices", "-l"], { timeoutMs: config.listTimeoutMs });
  return parseAdbDevicesOutput(stdout);
}
