import type { SideloadConfig } from "../../config.js";
import { adbExec } from "../adb/adb.js";

const GETPROP_TIMEOUT_MS = 5_000;

/** Property values a device name is derived from. Missing values are "". */
export interface DeviceNameProps {
  brand: string;
  model: string;
  name: string;
  device: string;
}

/**
 * Derive a human-readable device name.
 *
 * Brand and model are combined unless the model already contains the brand
 * ("Redmi" + "Redmi Note 12" stays "Redmi Note 12"). Falls back to the product
 * name, then the device codename, then the serial.
 */
export function formatDeviceName(deviceId: string, props: DeviceNameProps): string {
  const brand = props.brand.trim();
  const model = props.model.trim();
  if (model) {
    if (brand && !model.toLowerCase().includes(brand.toLowerCase())) {
      return `${brand} ${model}`;
    }
    return model;
  }
  const name = props.name.trim();
  if (name) return name;
  const device = props.device.trim();
  if (device) return device;
  return deviceId;
}

async function getprop(config: SideloadConfig, deviceId: string, prop: string): Promise<string> {
  try {
    const { stdout } = await adbExec(config, ["shell", "getprop", prop], {
      serial: deviceId,
      timeoutMs: GETPROP_TIMEOUT_MS,
    });
    return stdout;
  } catch {
    // A single missing property should not fail the whole lookup.
    return "";
  }
}

/**
 * Fetch a display name for a device via `getprop`.
 *
 * Never throws for per-property failures; in the worst case the serial is returned.
 */
export async function getDeviceNameViaAdb(config: SideloadConfig, deviceId: string): Promise<string> {
  const [brand, model] = await Promise.all([
    getprop(config, deviceId, "ro.product.brand"),
    getprop(config, deviceId, "ro.product.model"),
  ]);
  if (model.trim()) {
    return formatDeviceName(deviceId, { brand, model, name: "", device: "" });
  }
  const name = await getprop(config, deviceId, "ro.product.name");
  const device = name.trim() ? "" : await getprop(config, deviceId, "ro.product.device");
  return formatDeviceName(deviceId, { brand, model, name, device });
}
