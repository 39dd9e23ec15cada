#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { resolveAdbExecutable } from "./backend/adb/adb.js";
import { AdbBridgeClient } from "./backend/bridge/adbBridgeClient.js";
import { CoreCoordinator } from "./backend/core/coreCoordinator.js";
import { JsonlOperationLog } from "./backend/oplog/operationLog.js";
import { loadConfig, resolveDataDir } from "./config.js";
import { Logger } from "./logger.js";
import { loadPackageMeta } from "./meta.js";
import { registerTools } from "./tools/register.js";
import { errorMessage } from "./utils.js";

/**
 * MCP server entrypoint.
 *
 * Builds the core (adb bridge, poller, install worker), registers the tool
 * surface and serves it on stdio until SIGINT/SIGTERM.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const pkg = loadPackageMeta();
  const logger = new Logger(config.logLevel);

  const resolvedDataDir = resolveDataDir(config);
  const oplog = new JsonlOperationLog(resolvedDataDir, logger);
  const bridge = new AdbBridgeClient(config);
  const coordinator = new CoreCoordinator({
    bridge,
    oplog,
    pollIntervalMs: config.pollIntervalMs,
    multiDevicePolicy: config.multiDevicePolicy,
  });

  const server = new McpServer({ name: pkg.name, version: pkg.version });

  // IMPORTANT: tools must be registered before connecting to a transport, since
  // registration mutates server capabilities and request handlers.
  registerTools(
    server,
    { coordinator, bridge },
    {
      serverName: pkg.name,
      serverVersion: pkg.version,
      transport: config.transport,
      dataDir: resolvedDataDir,
      logLevel: config.logLevel,
      pollIntervalMs: config.pollIntervalMs,
      multiDevicePolicy: config.multiDevicePolicy,
    }
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const adb = await resolveAdbExecutable(config).catch((err: unknown) => {
    logger.warn("adb not found yet; device status will report bridge_error", { error: errorMessage(err) });
    return "<not found>";
  });

  logger.printBanner({
    transport: config.transport,
    dataDir: resolvedDataDir,
    adb,
    pollIntervalMs: config.pollIntervalMs,
  });

  coordinator.start();

  let stopping = false;
  const stop = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down", { signal, queued: coordinator.getQueueDepth() });
    coordinator
      .shutdown()
      .then(() => oplog.close())
      .then(() => server.close())
      .catch((err: unknown) => {
        logger.error("Shutdown failed", { error: errorMessage(err) });
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  process.stderr.write(`[sideload-mcp] fatal ${msg}\n`);
  process.exitCode = 1;
});
