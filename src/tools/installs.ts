import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { CoordinatorError } from "../backend/core/coreCoordinator.js";
import { partitionPackagePaths } from "../backend/install/packageFiles.js";
import { errorMessage } from "../utils.js";
import type { SideloadToolContext } from "./context.js";
import { mapCoreErrorCode, toolErr, toolOk } from "./result.js";

/**
 * `sideload_installs_enqueue` - accept dropped package paths.
 *
 * Paths that are not an existing `.apk` are reported under `rejected` and never
 * reach the queue; the rest are enqueued in the given order. Returns before any
 * install starts; outcomes arrive as `install.outcome` events.
 */
export function sideloadInstallsEnqueue(
  ctx: SideloadToolContext,
  args: { paths: string[]; device_id?: string }
): CallToolResult {
  const tool = "sideload_installs_enqueue";

  const { accepted, rejected } = partitionPackagePaths(args.paths, ctx.fileExists);
  if (accepted.length === 0) {
    return toolErr({
      code: "INVALID_ARGUMENT",
      tool,
      message: "No installable packages: every path was rejected",
      retryable: false,
      details: { rejected },
      suggestion: "Provide absolute paths to existing .apk files",
    });
  }

  try {
    const requests = ctx.coordinator.enqueueInstall(accepted, args.device_id);
    return toolOk({
      requests,
      rejected,
      queue_depth: ctx.coordinator.getQueueDepth(),
    });
  } catch (err) {
    if (err instanceof CoordinatorError) {
      return toolErr({
        code: mapCoreErrorCode(err.code),
        tool,
        message: err.message,
        retryable: false,
        details: err.details,
      });
    }
    return toolErr({
      code: "INTERNAL",
      tool,
      message: `Failed to enqueue installs: ${errorMessage(err)}`,
      retryable: false,
    });
  }
}
