import type { BridgeClient } from "../backend/bridge/bridgeClient.js";
import type { CoreCoordinator } from "../backend/core/coreCoordinator.js";
import type { FileCheck } from "../backend/install/packageFiles.js";

/**
 * What tool handlers operate on. Built once by the entrypoint.
 */
export interface SideloadToolContext {
  coordinator: CoreCoordinator;
  bridge: BridgeClient;
  /** Overrides the on-disk existence check for dropped packages. */
  fileExists?: FileCheck;
}
