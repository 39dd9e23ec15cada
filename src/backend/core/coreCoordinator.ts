import crypto from "node:crypto";
import type { MultiDevicePolicy } from "../../config.js";
import { errorMessage, isoNow } from "../../utils.js";
import type { BridgeClient } from "../bridge/bridgeClient.js";
import { EventChannel, type CoreEventHandler, type EventsFetchResult } from "../events/eventChannel.js";
import type { CoreEventKind } from "../events/types.js";
import { InstallQueue } from "../install/installQueue.js";
import { InstallWorker } from "../install/installWorker.js";
import type { InstallRequest } from "../install/types.js";
import type { OperationLog } from "../oplog/operationLog.js";
import type { DeviceStatus, PollResult } from "../status/deviceStatus.js";
import { StatusPoller } from "../status/statusPoller.js";
import type { CoordinatorState } from "./types.js";

export class CoordinatorError extends Error {
  public readonly code: "INVALID_ARGUMENT" | "UNAVAILABLE";
  public readonly details?: Record<string, unknown>;

  public constructor(code: CoordinatorError["code"], message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "CoordinatorError";
    this.code = code;
    this.details = details;
  }
}

export interface CoreCoordinatorOptions {
  bridge: BridgeClient;
  oplog: OperationLog;
  pollIntervalMs: number;
  multiDevicePolicy: MultiDevicePolicy;
  /** Event ring buffer capacity (default 5000). */
  eventCapacity?: number;
}

/**
 * Snapshot of the coordinator for status displays.
 */
export interface CoordinatorSnapshot {
  state: CoordinatorState;
  status: DeviceStatus;
  device_id?: string;
  device_count: number;
  queue_depth: number;
  in_flight?: InstallRequest;
  skipped_polls: number;
}

function newRequestId(): string {
  return `req_${crypto.randomUUID()}`;
}

/**
 * Owns the status poller and the install worker and merges their output into
 * one ordered {@link EventChannel}.
 *
 * The current poll result is a value owned here and replaced on every poll.
 * The queue has one producer (`enqueueInstall`) and one consumer (the worker).
 */
export class CoreCoordinator {
  private state: CoordinatorState = "idle";
  private current: PollResult = { status: "absent", device_count: 0 };
  private readonly channel: EventChannel;
  private readonly queue = new InstallQueue<InstallRequest>();
  private readonly poller: StatusPoller;
  private readonly worker: InstallWorker;
  private shutdownPromise: Promise<void> | null = null;

  public constructor(private readonly options: CoreCoordinatorOptions) {
    const { oplog } = options;

    this.channel = new EventChannel({
      capacity: options.eventCapacity,
      onHandlerError: (err, event) => {
        oplog.write("error", "subscriber.failed", "Event subscriber threw", {
          seq: event.seq,
          kind: event.kind,
          error: errorMessage(err),
        });
      },
    });

    this.poller = new StatusPoller(options.bridge, oplog, {
      policy: options.multiDevicePolicy,
      onResult: (result) => {
        this.current = result;
      },
      onChange: (result, previous) => {
        this.channel.publish({
          kind: "status.changed",
          status: result.status,
          previous,
          device_id: result.device_id,
          device_count: result.device_count,
        });
      },
    });

    this.worker = new InstallWorker(
      this.queue,
      options.bridge,
      {
        onStarted: (request) => {
          if (this.state === "running") this.setState("installing");
          this.channel.publish({ kind: "install.started", request });
        },
        onOutcome: (outcome) => {
          this.channel.publish({ kind: "install.outcome", outcome });
        },
        onIdle: () => {
          if (this.state === "installing") this.setState("running");
        },
      },
      oplog
    );
  }

  public getState(): CoordinatorState {
    return this.state;
  }

  public getStatus(): DeviceStatus {
    return this.current.status;
  }

  /** Ready device that installs without an explicit target go to. */
  public getSelectedDevice(): string | undefined {
    return this.current.device_id;
  }

  public getQueueDepth(): number {
    return this.queue.size;
  }

  public snapshot(): CoordinatorSnapshot {
    return {
      state: this.state,
      status: this.current.status,
      device_id: this.current.device_id,
      device_count: this.current.device_count,
      queue_depth: this.queue.size,
      in_flight: this.worker.current ?? undefined,
      skipped_polls: this.poller.skippedTicks,
    };
  }

  /**
   * Start polling and the install worker: `idle` -> `running`.
   *
   * @throws CoordinatorError if the coordinator was shut down
   */
  public start(): void {
    if (this.state === "shutting_down" || this.state === "stopped") {
      throw new CoordinatorError("UNAVAILABLE", "Coordinator has been shut down");
    }
    if (this.state !== "idle") return;

    this.setState("running");
    this.poller.start(this.options.pollIntervalMs);
    void this.worker.start();
    this.options.oplog.write("info", "coordinator.started", "Coordinator started", {
      poll_interval_ms: this.options.pollIntervalMs,
      multi_device_policy: this.options.multiDevicePolicy,
    });
  }

  /**
   * Queue one install per path, in the given order. Returns immediately.
   *
   * @param targetId - adb serial; defaults to the device selected by the latest poll
   * @returns The created requests, in queue order
   * @throws CoordinatorError if a path is empty or shutdown has begun
   */
  public enqueueInstall(paths: readonly string[], targetId?: string): InstallRequest[] {
    if (this.state === "shutting_down" || this.state === "stopped") {
      throw new CoordinatorError("UNAVAILABLE", "Coordinator is shutting down; installs are no longer accepted", {
        state: this.state,
      });
    }
    const invalid = paths.filter((p) => p.trim().length === 0);
    if (invalid.length > 0) {
      throw new CoordinatorError("INVALID_ARGUMENT", "Install paths must be non-empty strings", {
        invalid_count: invalid.length,
      });
    }

    const target = targetId ?? this.current.device_id;
    const enqueued_at = isoNow();
    const requests = paths.map((file_path) =>
      Object.freeze({ request_id: newRequestId(), file_path, target_id: target, enqueued_at })
    );

    for (const request of requests) {
      this.queue.enqueue(request);
      this.options.oplog.write("info", "install.queued", `Queued ${request.file_path}`, {
        request_id: request.request_id,
        target_id: request.target_id,
        queue_depth: this.queue.size,
      });
    }
    return requests;
  }

  /**
   * Receive every event published from now on, in order.
   *
   * @returns A function that removes the handler
   */
  public subscribe(handler: CoreEventHandler): () => void {
    return this.channel.subscribe(handler);
  }

  /**
   * Cursor-based read of the retained events (for front ends that poll).
   */
  public fetchEvents(args: { cursor?: string; limit?: number; kind?: CoreEventKind } = {}): EventsFetchResult {
    return this.channel.fetch(args);
  }

  /**
   * Stop polling, discard queued requests, let the in-flight install finish,
   * then stop. Safe to call more than once.
   */
  public shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    this.setState("shutting_down");
    const pollerStopped = this.poller.stop();

    // Runs before the first await: no queued request can start once shutdown() was called.
    const discarded = this.queue.discardPending();
    this.queue.close();
    for (const request of discarded) {
      this.channel.publish({ kind: "install.discarded", request });
    }
    if (discarded.length > 0) {
      this.options.oplog.write("warn", "install.discarded", `Discarded ${discarded.length} queued install(s)`, {
        request_ids: discarded.map((r) => r.request_id),
      });
    }

    await pollerStopped;
    await this.worker.done;
    this.setState("stopped");
    this.options.oplog.write("info", "coordinator.stopped", "Coordinator stopped", {
      processed: this.worker.processed,
      discarded: discarded.length,
    });
  }

  private setState(next: CoordinatorState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.channel.publish({ kind: "coordinator.state_changed", state: next, previous });
  }
}
