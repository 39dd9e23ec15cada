import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../../logger.js";
import { JsonlOperationLog } from "./operationLog.js";

function readLines(file: string): unknown[] {
  return fs
    .readFileSync(file, "utf-8")
    .split("\n")
    .filter((l) => l.length > 0)
    .map((l): unknown => JSON.parse(l));
}

describe("JsonlOperationLog", () => {
  let dataDir = "";

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "sideload-oplog-"));
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("appends one JSON line per entry under logs/", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));

    const oplog = new JsonlOperationLog(dataDir);
    oplog.write("info", "install.started", "Installing /pkgs/a.apk", { request_id: "req_1" });
    oplog.write("warn", "poll.failed", "Device poll failed: ADB not found");
    const file = oplog.currentFile;
    await oplog.close();

    expect(file).toBe(path.join(dataDir, "logs", "operations-2026-03-01.jsonl"));
    expect(readLines(path.join(dataDir, "logs", "operations-2026-03-01.jsonl"))).toEqual([
      {
        ts: "2026-03-01T10:00:00.000Z",
        level: "info",
        code: "install.started",
        message: "Installing /pkgs/a.apk",
        payload: { request_id: "req_1" },
      },
      {
        ts: "2026-03-01T10:00:00.000Z",
        level: "warn",
        code: "poll.failed",
        message: "Device poll failed: ADB not found",
      },
    ]);
  });

  it("starts a new file when the UTC date changes", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const oplog = new JsonlOperationLog(dataDir);

    vi.setSystemTime(new Date("2026-03-01T23:59:59.000Z"));
    oplog.write("info", "coordinator.started", "Coordinator started");
    vi.setSystemTime(new Date("2026-03-02T00:00:01.000Z"));
    oplog.write("info", "coordinator.stopped", "Coordinator stopped");
    await oplog.close();

    const day1 = path.join(dataDir, "logs", "operations-2026-03-01.jsonl");
    const day2 = path.join(dataDir, "logs", "operations-2026-03-02.jsonl");
    await vi.waitFor(() => {
      expect(readLines(day1)).toHaveLength(1);
    });
    expect(readLines(day2)).toEqual([
      { ts: "2026-03-02T00:00:01.000Z", level: "info", code: "coordinator.stopped", message: "Coordinator stopped" },
    ]);
  });

  it("mirrors entries to the logger, also after close", async () => {
    const chunks: string[] = [];
    const oplog = new JsonlOperationLog(dataDir, new Logger("debug", (chunk) => chunks.push(chunk)));

    oplog.write("info", "install.queued", "Queued /pkgs/a.apk", { queue_depth: 1 });
    await oplog.close();
    oplog.write("info", "coordinator.stopped", "Coordinator stopped");

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toContain("Queued /pkgs/a.apk");
    expect(chunks[0]).toContain('{"code":"install.queued","queue_depth":1}');
    expect(chunks[1]).toContain("Coordinator stopped");

    const files = fs.readdirSync(path.join(dataDir, "logs"));
    expect(files).toHaveLength(1);
    const [file] = files;
    expect(readLines(path.join(dataDir, "logs", file))).toHaveLength(1);
  });

  it("reports an unusable log directory once and counts later entries as dropped", () => {
    const blocked = path.join(dataDir, "blocked");
    fs.writeFileSync(blocked, "");
    const chunks: string[] = [];
    const oplog = new JsonlOperationLog(blocked, new Logger("warn", (chunk) => chunks.push(chunk)));

    oplog.write("info", "install.queued", "Queued /pkgs/a.apk");
    oplog.write("info", "install.queued", "Queued /pkgs/b.apk");

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toContain("Operation log directory unavailable");
    expect(oplog.dropped).toBe(2);
    expect(oplog.currentFile).toBeUndefined();
  });
});
