import type { CoordinatorState } from "../core/types.js";
import type { InstallOutcome, InstallRequest } from "../install/types.js";
import type { DeviceStatus } from "../status/deviceStatus.js";

/**
 * Event payloads published by the core, before the channel stamps them.
 */
export type CoreEventBody =
  | {
      readonly kind: "status.changed";
      readonly status: DeviceStatus;
      /** `null` for the first classification after start. */
      readonly previous: DeviceStatus | null;
      readonly device_id?: string;
      readonly device_count: number;
    }
  | { readonly kind: "install.started"; readonly request: InstallRequest }
  | { readonly kind: "install.outcome"; readonly outcome: InstallOutcome }
  | { readonly kind: "install.discarded"; readonly request: InstallRequest }
  | {
      readonly kind: "coordinator.state_changed";
      readonly state: CoordinatorState;
      readonly previous: CoordinatorState;
    };

export type CoreEventKind = CoreEventBody["kind"];

/**
 * A published event: the body plus its position in the channel.
 */
export type CoreEvent = CoreEventBody & {
  /** Monotonically increasing, starting at 1. */
  readonly seq: number;
  /** ISO-8601 publish time. */
  readonly ts: string;
};
