import fs from "fs";
import path from "path";
import { getProjectRootDir } from "./config.js";
import { isRecord } from "./utils.js";

/**
 * Minimal subset of `package.json` metadata that we treat as authoritative at runtime.
 */
export interface SideloadPackageMeta {
  name: string;
  version: string;
}

/**
 * Load server metadata from `package.json`.
 *
 * The MCP server info and the about tool report this instead of a hard-coded version.
 *
 * @throws If `package.json` is missing or malformed.
 */
export function loadPackageMeta(): SideloadPackageMeta {
  const packageJsonPath = path.join(getProjectRootDir(), "package.json");

  const raw = fs.readFileSync(packageJsonPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Invalid package.json: expected JSON object at ${packageJsonPath}`);
  }

  const name = parsed.name;
  const version = parsed.version;

  if (typeof name !== "string" || name.trim().length === 0) {
    throw new Error(`Invalid package.json: expected non-empty string name at ${packageJsonPath}`);
  }
  if (typeof version !== "string" || version.trim().length === 0) {
    throw new Error(`Invalid package.json: expected non-empty string version at ${packageJsonPath}`);
  }

  return { name, version };
}
