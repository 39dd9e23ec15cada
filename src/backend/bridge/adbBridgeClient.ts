import fs from "node:fs";
import type { SideloadConfig } from "../../config.js";
import { AdbError, adbExec } from "../adb/adb.js";
import { getDeviceNameViaAdb } from "../devices/adbDeviceDetails.js";
import { listDevicesViaAdb } from "../devices/adbDevices.js";
import type { DeviceSummary } from "../devices/types.js";
import { BridgeError, type BridgeClient, type BridgeErrorCode, type InstallResult } from "./bridgeClient.js";

const DEVICE_NOT_USABLE = /unauthorized|device offline|no devices\/emulators found|device '.*' not found/i;

/**
 * Pick the taxonomy code for a failed `adb install` from its diagnostic text.
 */
export function classifyInstallFailure(text: string): BridgeErrorCode {
  return DEVICE_NOT_USABLE.test(text) ? "DEVICE_UNAUTHORIZED" : "INSTALL_REJECTED";
}

function outputText(details: Record<string, unknown>): string {
  const stderr = typeof details.stderr === "string" ? details.stderr.trim() : "";
  const stdout = typeof details.stdout === "string" ? details.stdout.trim() : "";
  return stderr || stdout;
}

/**
 * {@link BridgeClient} backed by the `adb` executable.
 */
export class AdbBridgeClient implements BridgeClient {
  public constructor(private readonly config: SideloadConfig) {}

  public async listDevices(): Promise<DeviceSummary[]> {
    try {
      return await listDevicesViaAdb(this.config);
    } catch (err) {
      if (err instanceof AdbError) {
        throw new BridgeError("BRIDGE_UNAVAILABLE", err.message, { kind: err.kind, ...err.details });
      }
      throw err;
    }
  }

  public async install(filePath: string, targetId?: string): Promise<InstallResult> {
    if (!fs.existsSync(filePath)) {
      return { ok: false, code: "INVALID_PACKAGE", reason: `Package file does not exist: ${filePath}` };
    }

    const args = this.config.replaceExisting ? ["install", "-r", filePath] : ["install", filePath];
    try {
      const { stdout } = await adbExec(this.config, args, {
        serial: targetId,
        timeoutMs: this.config.installTimeoutMs,
      });
      // Older adb builds exit 0 even when the package manager refuses the APK.
      if (stdout.includes("Success")) {
        return { ok: true, message: "Package installed" };
      }
      const reason = stdout || "adb install did not report Success";
      return { ok: false, code: classifyInstallFailure(reason), reason };
    } catch (err) {
      if (!(err instanceof AdbError)) throw err;
      switch (err.kind) {
        case "timeout":
          return {
            ok: false,
            code: "BRIDGE_UNAVAILABLE",
            reason: `Install timed out after ${this.config.installTimeoutMs}ms; check the device connection`,
          };
        case "missing":
          return { ok: false, code: "BRIDGE_UNAVAILABLE", reason: err.message };
        case "failed": {
          const reason = outputText(err.details) || err.message;
          return { ok: false, code: classifyInstallFailure(reason), reason };
        }
      }
    }
  }

  public async getDeviceName(deviceId: string): Promise<string> {
    return getDeviceNameViaAdb(this.config, deviceId);
  }
}
