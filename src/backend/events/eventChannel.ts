/**
 * Event Channel - the single ordered outbound stream of the core.
 *
 * Responsibilities:
 * - Stamp each published event with a sequence number and timestamp, and freeze it
 * - Deliver events to subscribers synchronously, in publish order
 * - Retain recent events in a ring buffer for cursor-based polling
 *
 * A handler that publishes while being notified does not jump the queue: the
 * nested event is delivered to every handler after the current one finishes.
 *
 * @module eventChannel
 */

import { isoNow } from "../../utils.js";
import type { CoreEvent, CoreEventBody, CoreEventKind } from "./types.js";

export type CoreEventHandler = (event: CoreEvent) => void;

export interface EventChannelOptions {
  /** Ring buffer capacity (default 5000). */
  capacity?: number;
  /** Called when a subscriber throws. The error never reaches the publisher. */
  onHandlerError?: (err: unknown, event: CoreEvent) => void;
}

/**
 * Result of fetching events via cursor-based pagination.
 */
export interface EventsFetchResult {
  events: CoreEvent[];
  /** The cursor that was provided in the request (echo). */
  cursor?: string;
  /** Cursor to use for the next fetch to get subsequent events. */
  next_cursor: string;
  /** Events evicted from the buffer before this caller saw them. */
  dropped: number;
}

export const DEFAULT_FETCH_LIMIT = 200;
export const MAX_FETCH_LIMIT = 5000;

// ============================================================================
// Cursor Management
// ============================================================================

/**
 * Cursor format (v1): `v1:<seq>`; events with a greater seq are returned next.
 */
export function makeCursor(seq: number): string {
  return `v1:${Math.max(0, Math.floor(seq))}`;
}

/**
 * Parse an opaque cursor string back into a sequence number.
 *
 * @returns The sequence number, or null if the cursor is malformed
 */
export function parseCursor(raw: string): number | null {
  const parts = raw.trim().split(":");
  if (parts.length !== 2 || parts[0] !== "v1") return null;
  if (!/^\d+$/.test(parts[1])) return null;
  return Number(parts[1]);
}

// ============================================================================
// Ring Buffer Implementation
// ============================================================================

/**
 * Fixed-capacity ring buffer.
 *
 * O(1) push; the oldest item is evicted when full.
 */
class RingBuffer<T> {
  private readonly capacity: number;
  private readonly buf: Array<T | undefined>;
  private start = 0;
  private len = 0;

  public constructor(capacity: number) {
    this.capacity = Math.max(1, capacity | 0);
    this.buf = new Array<T | undefined>(this.capacity);
  }

  public push(item: T): void {
    if (this.len < this.capacity) {
      this.buf[(this.start + this.len) % this.capacity] = item;
      this.len++;
      return;
    }

    // Overwrite oldest.
    this.buf[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
  }

  /**
   * All items, ordered oldest to newest.
   */
  public values(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.len; i++) {
      const v = this.buf[(this.start + i) % this.capacity];
      if (v !== undefined) out.push(v);
    }
    return out;
  }
}

// ============================================================================
// Channel
// ============================================================================

export class EventChannel {
  private seq = 0;
  private readonly ring: RingBuffer<CoreEvent>;
  private readonly handlers = new Set<CoreEventHandler>();
  private readonly onHandlerError?: (err: unknown, event: CoreEvent) => void;
  private readonly pending: CoreEvent[] = [];
  private dispatching = false;

  public constructor(options: EventChannelOptions = {}) {
    this.ring = new RingBuffer<CoreEvent>(options.capacity ?? 5000);
    this.onHandlerError = options.onHandlerError;
  }

  /** Sequence number of the most recently published event (0 if none). */
  public get lastSeq(): number {
    return this.seq;
  }

  /**
   * Publish an event to the buffer and every subscriber.
   *
   * @returns The stamped, frozen event
   */
  public publish(body: CoreEventBody): CoreEvent {
    this.seq++;
    const event: CoreEvent = Object.freeze({ ...body, seq: this.seq, ts: isoNow() });
    this.ring.push(event);
    this.pending.push(event);
    if (!this.dispatching) {
      this.drain();
    }
    return event;
  }

  /**
   * Register a handler for every event published from now on.
   *
   * @returns A function that removes the handler
   */
  public subscribe(handler: CoreEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  public get subscriberCount(): number {
    return this.handlers.size;
  }

  /**
   * Fetch buffered events newer than `cursor`.
   *
   * Without a cursor, fetching starts at the oldest retained event. A malformed
   * cursor is treated as "from the beginning". If the caller fell behind the
   * buffer, `dropped` reports how many events it missed.
   *
   * @param args.limit - Maximum events to return (default: 200, max: 5000)
   * @param args.kind - Only return events of this kind
   */
  public fetch(args: { cursor?: string; limit?: number; kind?: CoreEventKind } = {}): EventsFetchResult {
    const limit = Math.max(1, Math.min(MAX_FETCH_LIMIT, Math.floor(args.limit ?? DEFAULT_FETCH_LIMIT)));
    const parsed = args.cursor ? parseCursor(args.cursor) : null;
    // A cursor from the future (e.g. from a previous process) restarts at the beginning.
    const sinceSeq = parsed !== null && parsed <= this.seq ? parsed : 0;

    const items = this.ring.values();
    if (items.length === 0) {
      return { events: [], cursor: args.cursor, next_cursor: makeCursor(sinceSeq), dropped: 0 };
    }

    const minSeq = items[0].seq;
    const dropped = sinceSeq < minSeq - 1 ? minSeq - 1 - sinceSeq : 0;

    const out: CoreEvent[] = [];
    let lastSeqSeen = sinceSeq;
    for (const ev of items) {
      if (ev.seq <= sinceSeq) continue;
      if (out.length >= limit) break;
      lastSeqSeen = ev.seq;
      if (args.kind !== undefined && ev.kind !== args.kind) continue;
      out.push(ev);
    }

    return { events: out, cursor: args.cursor, next_cursor: makeCursor(lastSeqSeen), dropped };
  }

  private drain(): void {
    this.dispatching = true;
    try {
      let event = this.pending.shift();
      while (event !== undefined) {
        for (const handler of Array.from(this.handlers)) {
          try {
            handler(event);
          } catch (err) {
            this.onHandlerError?.(err, event);
          }
        }
        event = this.pending.shift();
      }
    } finally {
      this.dispatching = false;
    }
  }
}
