import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { CoreEventKind } from "../backend/events/types.js";
import type { SideloadToolContext } from "./context.js";
import { toolOk } from "./result.js";

/**
 * `sideload_events_fetch` - cursor-based retrieval of core events.
 *
 * Notes:
 * - `cursor` is an opaque, server-issued value. If omitted, fetching starts at the
 *   beginning of the currently retained in-memory window.
 * - `dropped` counts events evicted before this cursor could see them.
 */
export function sideloadEventsFetch(
  ctx: SideloadToolContext,
  args: { cursor?: string; limit?: number; kind?: CoreEventKind }
): CallToolResult {
  const res = ctx.coordinator.fetchEvents({
    cursor: args.cursor,
    limit: args.limit,
    kind: args.kind,
  });
  return toolOk({
    events: res.events,
    cursor: res.cursor,
    next_cursor: res.next_cursor,
    dropped: res.dropped,
  });
}
