import type { DeviceSummary } from "../devices/types.js";

/**
 * Failure taxonomy shared by the bridge, the core and the tool layer.
 *
 * - `BRIDGE_UNAVAILABLE`: the bridge executable is missing, failed to start or timed out
 * - `DEVICE_UNAUTHORIZED`: a device is present but debugging is not authorized (or it is offline)
 * - `INSTALL_REJECTED`: the bridge ran but the install was not a success
 * - `INVALID_PACKAGE`: the package file is unusable (wrong type, missing)
 */
export type BridgeErrorCode =
  | "BRIDGE_UNAVAILABLE"
  | "DEVICE_UNAUTHORIZED"
  | "INSTALL_REJECTED"
  | "INVALID_PACKAGE";

export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly details?: Record<string, unknown>;

  public constructor(code: BridgeErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Result of one install call. `reason` is surfaced verbatim to the operator.
 */
export type InstallResult =
  | { ok: true; message: string }
  | { ok: false; code: BridgeErrorCode; reason: string };

/**
 * The two device operations the core depends on, plus a display-name lookup
 * for the tool layer.
 *
 * Implementations must bound every call with a timeout. `listDevices` rejects
 * (preferably with a {@link BridgeError}) when the bridge cannot be queried;
 * `install` may either resolve with `{ ok: false }` or reject.
 */
export interface BridgeClient {
  listDevices(): Promise<DeviceSummary[]>;
  install(filePath: string, targetId?: string): Promise<InstallResult>;
  getDeviceName(deviceId: string): Promise<string>;
}
