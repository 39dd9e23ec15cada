import { describe, expect, it, vi } from "vitest";
import type { InstallRequest } from "../install/types.js";
import { EventChannel, makeCursor, parseCursor } from "./eventChannel.js";
import type { CoreEventBody } from "./types.js";

const request: InstallRequest = {
  request_id: "req_1",
  file_path: "/pkgs/a.apk",
  enqueued_at: "2026-01-01T00:00:00.000Z",
};

function statusBody(status: "absent" | "connected"): CoreEventBody {
  return { kind: "status.changed", status, previous: null, device_count: status === "absent" ? 0 : 1 };
}

describe("cursor helpers", () => {
  it("round-trips sequence numbers", () => {
    expect(makeCursor(42)).toBe("v1:42");
    expect(parseCursor("v1:42")).toBe(42);
  });

  it("rejects malformed cursors", () => {
    expect(parseCursor("v2:1")).toBeNull();
    expect(parseCursor("v1:-3")).toBeNull();
    expect(parseCursor("abc")).toBeNull();
  });
});

describe("EventChannel", () => {
  it("stamps events with increasing seq and freezes them", () => {
    const channel = new EventChannel();
    const first = channel.publish(statusBody("absent"));
    const second = channel.publish({ kind: "install.started", request });

    expect(first.seq).toBe(1);
    expect(second.seq).toBe(2);
    expect(channel.lastSeq).toBe(2);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("delivers nested publishes after the current event reaches every handler", () => {
    const channel = new EventChannel();
    const seen: string[] = [];
    channel.subscribe((e) => {
      seen.push(`A:${e.seq}`);
      if (e.seq === 1) channel.publish({ kind: "install.started", request });
    });
    channel.subscribe((e) => seen.push(`B:${e.seq}`));

    channel.publish(statusBody("connected"));

    expect(seen).toEqual(["A:1", "B:1", "A:2", "B:2"]);
  });

  it("isolates a throwing handler", () => {
    const onHandlerError = vi.fn();
    const channel = new EventChannel({ onHandlerError });
    const seen: number[] = [];
    channel.subscribe(() => {
      throw new Error("handler broke");
    });
    channel.subscribe((e) => seen.push(e.seq));

    const event = channel.publish(statusBody("absent"));

    expect(seen).toEqual([1]);
    expect(onHandlerError).toHaveBeenCalledWith(new Error("handler broke"), event);
  });

  it("stops delivering after unsubscribe", () => {
    const channel = new EventChannel();
    const seen: number[] = [];
    const off = channel.subscribe((e) => seen.push(e.seq));
    channel.publish(statusBody("absent"));
    off();
    channel.publish(statusBody("connected"));

    expect(seen).toEqual([1]);
    expect(channel.subscriberCount).toBe(0);
  });

  it("pages through retained events with a cursor", () => {
    const channel = new EventChannel();
    channel.publish(statusBody("absent"));
    channel.publish(statusBody("connected"));
    channel.publish({ kind: "install.started", request });

    const page1 = channel.fetch({ limit: 2 });
    expect(page1.events.map((e) => e.seq)).toEqual([1, 2]);
    expect(page1.next_cursor).toBe("v1:2");

    const page2 = channel.fetch({ cursor: page1.next_cursor });
    expect(page2.events.map((e) => e.seq)).toEqual([3]);
    expect(page2.cursor).toBe("v1:2");
    expect(page2.next_cursor).toBe("v1:3");

    const page3 = channel.fetch({ cursor: page2.next_cursor });
    expect(page3.events).toEqual([]);
    expect(page3.next_cursor).toBe("v1:3");
  });

  it("filters by kind and advances past skipped events", () => {
    const channel = new EventChannel();
    channel.publish(statusBody("absent"));
    channel.publish({ kind: "install.started", request });
    channel.publish(statusBody("connected"));
    channel.publish({ kind: "install.discarded", request });

    const res = channel.fetch({ kind: "status.changed" });
    expect(res.events.map((e) => e.seq)).toEqual([1, 3]);
    expect(res.next_cursor).toBe("v1:4");
  });

  it("reports events evicted before the cursor could see them", () => {
    const channel = new EventChannel({ capacity: 3 });
    for (let i = 0; i < 5; i++) channel.publish(statusBody(i % 2 === 0 ? "absent" : "connected"));

    const res = channel.fetch({ cursor: "v1:0" });
    expect(res.events.map((e) => e.seq)).toEqual([3, 4, 5]);
    expect(res.dropped).toBe(2);

    expect(channel.fetch({ cursor: "v1:3" }).dropped).toBe(0);
  });

  it("restarts from the beginning for unknown cursors", () => {
    const channel = new EventChannel();
    channel.publish(statusBody("absent"));
    channel.publish(statusBody("connected"));

    expect(channel.fetch({ cursor: "v1:99" }).events.map((e) => e.seq)).toEqual([1, 2]);
    expect(channel.fetch({ cursor: "garbage" }).events.map((e) => e.seq)).toEqual([1, 2]);
  });

  it("returns an empty page before anything is published", () => {
    expect(new EventChannel().fetch()).toEqual({ events: [], cursor: undefined, next_cursor: "v1:0", dropped: 0 });
  });
});
