import { describe, expect, it } from "vitest";
import { InstallQueue, InstallQueueError } from "./installQueue.js";

describe("InstallQueue", () => {
  it("hands items out in arrival order", async () => {
    const queue = new InstallQueue<string>();
    queue.enqueue("a");
    queue.enqueue("b");
    queue.enqueue("c");
    expect(queue.size).toBe(3);

    expect(await queue.dequeue()).toEqual({ done: false, value: "a" });
    expect(await queue.dequeue()).toEqual({ done: false, value: "b" });
    expect(await queue.dequeue()).toEqual({ done: false, value: "c" });
    expect(queue.size).toBe(0);
  });

  it("parks the consumer until an item arrives", async () => {
    const queue = new InstallQueue<string>();
    const pending = queue.dequeue();
    expect(queue.enqueue("a")).toBe(true);
    expect(await pending).toEqual({ done: false, value: "a" });
    expect(queue.size).toBe(0);
  });

  it("allows a single waiting consumer", async () => {
    const queue = new InstallQueue<string>();
    const first = queue.dequeue();
    await expect(queue.dequeue()).rejects.toBeInstanceOf(InstallQueueError);
    queue.close();
    expect(await first).toEqual({ done: true });
  });

  it("drains what it holds after close, then reports done", async () => {
    const queue = new InstallQueue<string>();
    queue.enqueue("a");
    queue.close();
    expect(queue.isClosed).toBe(true);
    expect(queue.enqueue("b")).toBe(false);
    expect(await queue.dequeue()).toEqual({ done: false, value: "a" });
    expect(await queue.dequeue()).toEqual({ done: true });
  });

  it("discards pending items in order", () => {
    const queue = new InstallQueue<string>();
    queue.enqueue("a");
    queue.enqueue("b");
    expect(queue.discardPending()).toEqual(["a", "b"]);
    expect(queue.size).toBe(0);
  });

  it("keeps an item handed to a parked consumer discardable until it resumes", async () => {
    const queue = new InstallQueue<string>();
    const pending = queue.dequeue();
    queue.enqueue("a");
    expect(queue.size).toBe(1);

    expect(queue.discardPending()).toEqual(["a"]);
    queue.close();
    expect(await pending).toEqual({ done: true });
  });
});
