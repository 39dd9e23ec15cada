import { afterEach, describe, expect, it, vi } from "vitest";
import type { InstallResult } from "../bridge/bridgeClient.js";
import type { CoreEvent } from "../events/types.js";
import { deferred, device, FakeBridge, MemoryOperationLog } from "../../testing/fakes.js";
import { CoordinatorError, CoreCoordinator } from "./coreCoordinator.js";

const OK: InstallResult = { ok: true, message: "Package installed" };

function setup(bridge = new FakeBridge()) {
  const oplog = new MemoryOperationLog();
  const coordinator = new CoreCoordinator({
    bridge,
    oplog,
    pollIntervalMs: 60_000,
    multiDevicePolicy: "first_ready",
  });
  const events: CoreEvent[] = [];
  coordinator.subscribe((e) => events.push(e));
  return { bridge, oplog, coordinator, events };
}

function kinds<K extends CoreEvent["kind"]>(events: CoreEvent[], kind: K): Array<Extract<CoreEvent, { kind: K }>> {
  return events.filter((e): e is Extract<CoreEvent, { kind: K }> => e.kind === kind);
}

describe("CoreCoordinator", () => {
  const running: CoreCoordinator[] = [];

  afterEach(async () => {
    await Promise.all(running.splice(0).map((c) => c.shutdown()));
  });

  it("installs a batch in order and reports each outcome", async () => {
    const bridge = new FakeBridge();
    bridge.listImpl = async () => [device("emulator-5554")];
    bridge.installImpl = async (filePath) =>
      filePath === "/pkgs/b.apk"
        ? { ok: false, code: "INSTALL_REJECTED", reason: "Failure [INSTALL_FAILED_OLDER_SDK]" }
        : OK;
    const { coordinator, events } = setup(bridge);
    running.push(coordinator);

    coordinator.start();
    await vi.waitFor(() => expect(coordinator.getStatus()).toBe("connected"));
    expect(coordinator.getSelectedDevice()).toBe("emulator-5554");

    const requests = coordinator.enqueueInstall(["/pkgs/a.apk", "/pkgs/b.apk", "/pkgs/c.apk"]);
    expect(requests.map((r) => r.file_path)).toEqual(["/pkgs/a.apk", "/pkgs/b.apk", "/pkgs/c.apk"]);
    expect(requests.every((r) => r.target_id === "emulator-5554")).toBe(true);
    expect(new Set(requests.map((r) => r.request_id)).size).toBe(3);

    await vi.waitFor(() => expect(kinds(events, "install.outcome")).toHaveLength(3));

    const outcomes = kinds(events, "install.outcome").map((e) => e.outcome);
    expect(outcomes.map((o) => [o.request.request_id, o.succeeded])).toEqual([
      [requests[0].request_id, true],
      [requests[1].request_id, false],
      [requests[2].request_id, true],
    ]);
    expect(outcomes[1].message).toBe("Failure [INSTALL_FAILED_OLDER_SDK]");
    expect(bridge.maxActiveInstalls).toBe(1);

    await vi.waitFor(() => expect(coordinator.getState()).toBe("running"));
    expect(kinds(events, "coordinator.state_changed").map((e) => e.state)).toEqual(["running", "installing", "running"]);
    expect(kinds(events, "status.changed").map((e) => [e.status, e.previous])).toEqual([["connected", null]]);
  });

  it("publishes events with increasing seq across poller and worker", async () => {
    const bridge = new FakeBridge();
    bridge.listImpl = async () => [device("emulator-5554")];
    const { coordinator, events } = setup(bridge);
    running.push(coordinator);

    coordinator.start();
    coordinator.enqueueInstall(["/pkgs/a.apk"]);
    await vi.waitFor(() => expect(kinds(events, "install.outcome")).toHaveLength(1));

    expect(events.map((e) => e.seq)).toEqual(events.map((_, i) => i + 1));
    expect(coordinator.fetchEvents().events).toEqual(events);
    expect(coordinator.fetchEvents({ kind: "install.started" }).events).toHaveLength(1);
  });

  it("uses an explicit target over the selected device", async () => {
    const bridge = new FakeBridge();
    bridge.listImpl = async () => [device("emulator-5554"), device("192.168.0.10:5555")];
    const { coordinator } = setup(bridge);
    running.push(coordinator);

    coordinator.start();
    await vi.waitFor(() => expect(coordinator.getStatus()).toBe("connected"));
    coordinator.enqueueInstall(["/pkgs/a.apk"], "192.168.0.10:5555");
    await vi.waitFor(() => expect(bridge.installCalls).toHaveLength(1));

    expect(bridge.installCalls[0]).toEqual({ filePath: "/pkgs/a.apk", targetId: "192.168.0.10:5555" });
  });

  it("leaves the target unset when no device is selected", () => {
    const { coordinator } = setup();
    running.push(coordinator);

    expect(coordinator.getStatus()).toBe("absent");
    const [req] = coordinator.enqueueInstall(["/pkgs/a.apk"]);
    expect(req.target_id).toBeUndefined();
    expect(coordinator.getQueueDepth()).toBe(1);
  });

  it("rejects empty paths", () => {
    const { coordinator } = setup();
    running.push(coordinator);

    expect(() => coordinator.enqueueInstall(["/pkgs/a.apk", " "])).toThrow(CoordinatorError);
    expect(coordinator.getQueueDepth()).toBe(0);
  });

  it("finishes the in-flight install and discards the queue on shutdown", async () => {
    const gate = deferred<InstallResult>();
    const bridge = new FakeBridge();
    bridge.listImpl = async () => [device("emulator-5554")];
    bridge.installImpl = (filePath) => (filePath === "/pkgs/a.apk" ? gate.promise : Promise.resolve(OK));
    const { coordinator, events, oplog } = setup(bridge);

    coordinator.start();
    coordinator.enqueueInstall(["/pkgs/a.apk", "/pkgs/b.apk", "/pkgs/c.apk"]);
    await vi.waitFor(() => expect(bridge.installCalls).toHaveLength(1));

    const done = coordinator.shutdown();
    expect(coordinator.shutdown()).toBe(done);
    expect(coordinator.getState()).toBe("shutting_down");
    expect(coordinator.getQueueDepth()).toBe(0);
    expect(kinds(events, "install.discarded").map((e) => e.request.file_path)).toEqual(["/pkgs/b.apk", "/pkgs/c.apk"]);

    gate.resolve(OK);
    await done;

    expect(coordinator.getState()).toBe("stopped");
    expect(bridge.installCalls.map((c) => c.filePath)).toEqual(["/pkgs/a.apk"]);
    const outcomes = kinds(events, "install.outcome");
    expect(outcomes.map((e) => [e.outcome.request.file_path, e.outcome.succeeded])).toEqual([["/pkgs/a.apk", true]]);
    expect(kinds(events, "coordinator.state_changed").map((e) => e.state).slice(-2)).toEqual([
      "shutting_down",
      "stopped",
    ]);
    expect(oplog.codes()).toContain("coordinator.stopped");
  });

  it("discards a request handed to the waiting worker when shutdown follows in the same tick", async () => {
    const bridge = new FakeBridge();
    bridge.listImpl = async () => [device("emulator-5554")];
    const { coordinator, events } = setup(bridge);

    coordinator.start();
    await vi.waitFor(() => expect(coordinator.getStatus()).toBe("connected"));

    coordinator.enqueueInstall(["/pkgs/a.apk", "/pkgs/b.apk"]);
    expect(coordinator.snapshot()).toMatchObject({ queue_depth: 2, in_flight: undefined });
    await coordinator.shutdown();

    expect(bridge.installCalls).toEqual([]);
    expect(kinds(events, "install.started")).toEqual([]);
    expect(kinds(events, "install.outcome")).toEqual([]);
    expect(kinds(events, "install.discarded").map((e) => e.request.file_path)).toEqual(["/pkgs/a.apk", "/pkgs/b.apk"]);
    expect(coordinator.getState()).toBe("stopped");
  });

  it("never overlaps installs across separate enqueue calls", async () => {
    const gate = deferred<InstallResult>();
    const bridge = new FakeBridge();
    bridge.listImpl = async () => [device("emulator-5554")];
    bridge.installImpl = async (filePath) => {
      if (filePath === "/pkgs/1.apk") return gate.promise;
      await new Promise((resolve) => setTimeout(resolve, 1));
      return OK;
    };
    const { coordinator, events } = setup(bridge);
    running.push(coordinator);

    coordinator.start();
    await vi.waitFor(() => expect(coordinator.getStatus()).toBe("connected"));

    // While an install is held open.
    const requests = [...coordinator.enqueueInstall(["/pkgs/1.apk"])];
    await vi.waitFor(() => expect(bridge.installCalls).toHaveLength(1));
    requests.push(...coordinator.enqueueInstall(["/pkgs/2.apk"]));
    requests.push(...coordinator.enqueueInstall(["/pkgs/3.apk", "/pkgs/4.apk"]));
    requests.push(...coordinator.enqueueInstall(["/pkgs/5.apk"]));
    gate.resolve(OK);
    await vi.waitFor(() => expect(kinds(events, "install.outcome")).toHaveLength(5));
    await vi.waitFor(() => expect(coordinator.getState()).toBe("running"));

    // While the worker is waiting, several calls in the same tick and across ticks.
    requests.push(...coordinator.enqueueInstall(["/pkgs/6.apk"]));
    requests.push(...coordinator.enqueueInstall(["/pkgs/7.apk"]));
    await Promise.resolve();
    requests.push(...coordinator.enqueueInstall(["/pkgs/8.apk"]));
    await vi.waitFor(() => expect(kinds(events, "install.outcome")).toHaveLength(8));

    expect(bridge.reentered).toBe(0);
    expect(bridge.maxActiveInstalls).toBe(1);
    const outcomes = kinds(events, "install.outcome").map((e) => e.outcome);
    expect(outcomes.every((o) => o.succeeded)).toBe(true);
    expect(outcomes.map((o) => o.request.request_id)).toEqual(requests.map((r) => r.request_id));
    expect(bridge.installCalls.map((c) => c.filePath)).toEqual([
      "/pkgs/1.apk",
      "/pkgs/2.apk",
      "/pkgs/3.apk",
      "/pkgs/4.apk",
      "/pkgs/5.apk",
      "/pkgs/6.apk",
      "/pkgs/7.apk",
      "/pkgs/8.apk",
    ]);
  });

  it("refuses work after shutdown", async () => {
    const { coordinator } = setup();
    await coordinator.shutdown();

    expect(coordinator.getState()).toBe("stopped");
    expect(() => coordinator.enqueueInstall(["/pkgs/a.apk"])).toThrow(
      new CoordinatorError("UNAVAILABLE", "Coordinator is shutting down; installs are no longer accepted")
    );
    expect(() => coordinator.start()).toThrow("Coordinator has been shut down");
  });

  it("logs a throwing subscriber without affecting other subscribers", async () => {
    const bridge = new FakeBridge();
    const { coordinator, events, oplog } = setup(bridge);
    running.push(coordinator);
    coordinator.subscribe(() => {
      throw new Error("front end crashed");
    });

    coordinator.start();
    await vi.waitFor(() => expect(kinds(events, "status.changed")).toHaveLength(1));

    expect(oplog.entries.filter((e) => e.code === "subscriber.failed").length).toBeGreaterThan(0);
    expect(events.map((e) => e.kind)).toEqual(["coordinator.state_changed", "status.changed"]);
  });
});
