import { BridgeError, type BridgeClient } from "../bridge/bridgeClient.js";
import type { OperationLog } from "../oplog/operationLog.js";
import { errorMessage, isoNow } from "../../utils.js";
import type { InstallQueue } from "./installQueue.js";
import type { InstallOutcome, InstallRequest } from "./types.js";

/**
 * Callbacks through which the worker reports progress. They run on the
 * worker's loop; the coordinator turns them into channel events.
 */
export interface InstallWorkerHooks {
  onStarted(request: InstallRequest): void;
  onOutcome(outcome: InstallOutcome): void;
  /** The queue was empty right after an outcome was reported. */
  onIdle(): void;
}

/**
 * The single consumer of the install queue.
 *
 * Exactly one `bridge.install` call is in flight at any time: the loop awaits
 * each install before dequeuing the next request. Failures of any kind become
 * a `succeeded: false` outcome and the loop moves on.
 */
export class InstallWorker {
  private loop: Promise<void> | null = null;
  private inFlight: InstallRequest | null = null;
  private processedCount = 0;

  public constructor(
    private readonly queue: InstallQueue<InstallRequest>,
    private readonly bridge: BridgeClient,
    private readonly hooks: InstallWorkerHooks,
    private readonly oplog: OperationLog
  ) {}

  /** Request currently handed to the bridge, if any. */
  public get current(): InstallRequest | null {
    return this.inFlight;
  }

  public get processed(): number {
    return this.processedCount;
  }

  public get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Start the loop. Calling it again returns the same completion promise.
   *
   * @returns Resolves once the queue is closed and drained
   */
  public start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.run().catch((err: unknown) => {
        this.oplog.write("error", "worker.crashed", "Install worker stopped unexpectedly", {
          error: errorMessage(err),
        });
      });
    }
    return this.loop;
  }

  /**
   * Resolves when the loop has exited. Resolves immediately if it never started.
   */
  public get done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    for (;;) {
      const next = await this.queue.dequeue();
      if (next.done) {
        this.oplog.write("debug", "worker.exited", "Install worker exited", { processed: this.processedCount });
        return;
      }

      const outcome = await this.process(next.value);
      this.processedCount++;
      this.hooks.onOutcome(outcome);
      if (this.queue.size === 0) {
        this.hooks.onIdle();
      }
    }
  }

  private async process(request: InstallRequest): Promise<InstallOutcome> {
    this.inFlight = request;
    this.hooks.onStarted(request);
    this.oplog.write("info", "install.started", `Installing ${request.file_path}`, {
      request_id: request.request_id,
      target_id: request.target_id,
    });

    let outcome: InstallOutcome;
    try {
      const res = await this.bridge.install(request.file_path, request.target_id);
      outcome = res.ok
        ? { request, succeeded: true, message: res.message, finished_at: isoNow() }
        : { request, succeeded: false, message: res.reason, code: res.code, finished_at: isoNow() };
    } catch (err) {
      outcome =
        err instanceof BridgeError
          ? { request, succeeded: false, message: err.message, code: err.code, finished_at: isoNow() }
          : {
              request,
              succeeded: false,
              message: `Install failed: ${errorMessage(err)}`,
              code: "BRIDGE_UNAVAILABLE",
              finished_at: isoNow(),
            };
    } finally {
      this.inFlight = null;
    }

    this.oplog.write(
      outcome.succeeded ? "info" : "warn",
      "install.finished",
      outcome.succeeded ? `Installed ${request.file_path}` : `Install failed for ${request.file_path}`,
      {
        request_id: request.request_id,
        succeeded: outcome.succeeded,
        code: outcome.code,
        message: outcome.message,
      }
    );
    return Object.freeze(outcome);
  }
}
