import type { MultiDevicePolicy } from "../../config.js";
import { BridgeError, type BridgeClient } from "../bridge/bridgeClient.js";
import type { OperationLog } from "../oplog/operationLog.js";
import { errorMessage } from "../../utils.js";
import { bridgeErrorResult, classifyDevices, type DeviceStatus, type PollResult } from "./deviceStatus.js";

export interface StatusPollerOptions {
  policy: MultiDevicePolicy;
  /** Every completed poll, changed or not. */
  onResult?: (result: PollResult) => void;
  /** Only polls whose status differs from the last emitted one. */
  onChange: (result: PollResult, previous: DeviceStatus | null) => void;
}

/**
 * Periodic device status poller.
 *
 * Ticks never overlap: a tick that comes due while the previous
 * `listDevices()` call is still pending is skipped, not queued.
 */
export class StatusPoller {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private active = false;
  private lastEmitted: DeviceStatus | null = null;
  private latest: PollResult | null = null;
  private skipped = 0;

  public constructor(
    private readonly bridge: BridgeClient,
    private readonly oplog: OperationLog,
    private readonly options: StatusPollerOptions
  ) {}

  public get isRunning(): boolean {
    return this.active;
  }

  /** Most recent classification, or null before the first poll completes. */
  public get latestResult(): PollResult | null {
    return this.latest;
  }

  /** Ticks dropped because the previous call had not returned. */
  public get skippedTicks(): number {
    return this.skipped;
  }

  /**
   * Poll now, then every `intervalMs`. No-op if already running.
   */
  public start(intervalMs: number): void {
    if (this.active) return;
    this.active = true;
    this.tick();
    this.timer = setInterval(() => this.tick(), intervalMs);
  }

  /**
   * Stop polling. Resolves once an in-flight call has settled; its result is discarded.
   */
  public async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private tick(): void {
    if (!this.active) return;
    if (this.inFlight) {
      this.skipped++;
      this.oplog.write("debug", "poll.skipped", "Previous device poll still running; tick skipped", {
        skipped: this.skipped,
      });
      return;
    }
    this.inFlight = this.poll()
      .catch((err: unknown) => {
        this.oplog.write("error", "poll.crashed", "Device status handler failed", { error: errorMessage(err) });
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  private async poll(): Promise<void> {
    let result: PollResult;
    try {
      const devices = await this.bridge.listDevices();
      result = classifyDevices(devices, this.options.policy);
    } catch (err) {
      result = bridgeErrorResult();
      this.oplog.write("warn", "poll.failed", `Device poll failed: ${errorMessage(err)}`, {
        code: err instanceof BridgeError ? err.code : "BRIDGE_UNAVAILABLE",
      });
    }

    if (!this.active) return;

    this.latest = result;
    this.options.onResult?.(result);

    if (result.status === this.lastEmitted) return;
    const previous = this.lastEmitted;
    this.lastEmitted = result.status;
    this.oplog.write("info", "status.changed", `Device status ${previous ?? "unknown"} -> ${result.status}`, {
      device_id: result.device_id,
      device_count: result.device_count,
    });
    this.options.onChange(result, previous);
  }
}
