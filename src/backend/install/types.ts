import type { BridgeErrorCode } from "../bridge/bridgeClient.js";

/**
 * One package to push to a device. Immutable once created.
 */
export interface InstallRequest {
  readonly request_id: string;
  readonly file_path: string;
  /** adb serial; when absent adb picks its default device. */
  readonly target_id?: string;
  readonly enqueued_at: string;
}

/**
 * Terminal result of one request. Exactly one per request, in enqueue order.
 */
export interface InstallOutcome {
  readonly request: InstallRequest;
  readonly succeeded: boolean;
  /** Human-readable result; on failure the bridge's reason verbatim. */
  readonly message: string;
  /** Failure code; absent on success. */
  readonly code?: BridgeErrorCode;
  readonly finished_at: string;
}
