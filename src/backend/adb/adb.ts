import { execFile } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { getProjectRootDir, type SideloadConfig } from "../../config.js";

/**
 * A structured error representing a failure to invoke `adb`.
 */
export class AdbError extends Error {
  public readonly kind: "missing" | "failed" | "timeout";
  public readonly details: Record<string, unknown>;

  public constructor(kind: "missing" | "failed" | "timeout", message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "AdbError";
    this.kind = kind;
    this.details = details;
  }
}

/** Raw result of one child process run. Never rejects. */
interface ProcessRun extends ProcessFailure {
  stdout: string;
  stderr: string;
}

/** How a child process run ended, derived from execFile's error. */
export interface ProcessFailure {
  exitCode: number | null;
  timedOut: boolean;
  /** Output exceeded the buffer limit and the child was killed. */
  outputOverflow: boolean;
  /** Spawn-level error (ENOENT, EACCES, ...), if any. */
  spawnError?: string;
}

const VERSION_CHECK_TIMEOUT_MS = 5_000;
const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;
const MAX_BUFFER_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

/**
 * Classify the error execFile reports.
 *
 * execFile sets `killed` both on timeout and when output exceeds `maxBuffer`;
 * the latter is told apart by its error code.
 */
export function classifyProcessError(
  error: { killed?: boolean; code?: string | number | null; message: string },
  timeoutMs?: number
): ProcessFailure {
  if (error.code === MAX_BUFFER_CODE) {
    return { exitCode: null, timedOut: false, outputOverflow: true };
  }
  return {
    exitCode: typeof error.code === "number" ? error.code : null,
    timedOut: error.killed === true && timeoutMs !== undefined && timeoutMs > 0,
    outputOverflow: false,
    spawnError: typeof error.code === "string" ? `${error.code}: ${error.message}` : undefined,
  };
}

function runProcess(file: string, args: string[], timeoutMs?: number): Promise<ProcessRun> {
  return new Promise((resolve) => {
    execFile(
      file,
      args,
      { encoding: "utf-8", timeout: timeoutMs ?? 0, maxBuffer: MAX_OUTPUT_BYTES, windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false, outputOverflow: false });
          return;
        }
        resolve({ ...classifyProcessError(error, timeoutMs), stdout, stderr });
      }
    );
  });
}

export interface AdbCandidateEnv {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  homeDir: string;
  projectRoot: string;
}

/**
 * List the `adb` executables to try, in order.
 *
 * - `adb` from PATH
 * - `config.adbPath`
 * - `$ANDROID_HOME/platform-tools`, `$ANDROID_SDK_ROOT/platform-tools`
 * - the per-user SDK location for the platform
 * - a portable `platform-tools/` directory in the project root
 */
export function listAdbCandidates(config: Pick<SideloadConfig, "adbPath">, where: AdbCandidateEnv): string[] {
  const exe = where.platform === "win32" ? "adb.exe" : "adb";
  const join = where.platform === "win32" ? path.win32.join : path.posix.join;
  const out: string[] = ["adb"];

  if (config.adbPath) out.push(config.adbPath);

  for (const sdkVar of ["ANDROID_HOME", "ANDROID_SDK_ROOT"]) {
    const sdk = where.env[sdkVar];
    if (sdk && sdk.trim().length > 0) out.push(join(sdk.trim(), "platform-tools", exe));
  }

  if (where.platform === "win32") {
    const localAppData = where.env.LOCALAPPDATA ?? join(where.homeDir, "AppData", "Local");
    out.push(join(localAppData, "Android", "Sdk", "platform-tools", exe));
    out.push(join("C:\\", "Android", "Sdk", "platform-tools", exe));
  } else if (where.platform === "darwin") {
    out.push(join(where.homeDir, "Library", "Android", "sdk", "platform-tools", exe));
  } else {
    out.push(join(where.homeDir, "Android", "Sdk", "platform-tools", exe));
  }

  out.push(join(where.projectRoot, "platform-tools", exe));

  return Array.from(new Set(out));
}

/** In-flight or settled resolution, shared by concurrent callers. */
let resolution: Promise<string> | null = null;

/**
 * Forget the cached `adb` location so the next call searches again.
 */
export function resetAdbResolution(): void {
  resolution = null;
}

async function findWorkingCandidate(config: SideloadConfig): Promise<string> {
  const candidates = listAdbCandidates(config, {
    env: process.env,
    platform: process.platform,
    homeDir: os.homedir(),
    projectRoot: getProjectRootDir(),
  });

  const attempts: Record<string, string> = {};
  for (const candidate of candidates) {
    if (candidate !== "adb" && !fs.existsSync(candidate)) {
      attempts[candidate] = "not found";
      continue;
    }
    const check = await runProcess(candidate, ["version"], VERSION_CHECK_TIMEOUT_MS);
    if (check.exitCode === 0) {
      return candidate;
    }
    attempts[candidate] = check.spawnError ?? (check.timedOut ? "timed out" : `exit ${String(check.exitCode)}`);
  }

  throw new AdbError("missing", "ADB not found on PATH, config.adbPath or the usual SDK locations.", {
    attempts,
  });
}

/**
 * Resolve an `adb` executable to use.
 *
 * The first working candidate is cached for the life of the process. A failed
 * resolution is not cached, so the next poll tries again.
 *
 * @throws AdbError if no working `adb` can be found.
 */
export async function resolveAdbExecutable(config: SideloadConfig): Promise<string> {
  if (!resolution) {
    const pending = findWorkingCandidate(config);
    resolution = pending;
    pending.catch(() => {
      if (resolution === pending) resolution = null;
    });
  }
  return resolution;
}

export interface AdbExecOptions {
  /** ADB device serial; if provided, `-s <serial>` is prepended to args. */
  serial?: string;
  /** Optional timeout in milliseconds for the adb process. */
  timeoutMs?: number;
}

export interface AdbExecResult {
  stdout: string;
  stderr: string;
}

/**
 * Run an `adb` command asynchronously.
 *
 * @param config - Runtime configuration (adb resolution).
 * @param args - Arguments passed to `adb`.
 * @returns stdout (trimmed) and stderr.
 * @throws AdbError if `adb` cannot be resolved, times out, or exits non-zero.
 */
export async function adbExec(
  config: SideloadConfig,
  args: string[],
  options?: AdbExecOptions
): Promise<AdbExecResult> {
  const adb = await resolveAdbExecutable(config);
  const fullArgs = options?.serial ? ["-s", options.serial, ...args] : args;
  const res = await runProcess(adb, fullArgs, options?.timeoutMs);

  if (res.timedOut) {
    throw new AdbError("timeout", `adb command timed out after ${options?.timeoutMs ?? "unknown"}ms`, {
      adb,
      args: fullArgs,
      timeoutMs: options?.timeoutMs,
    });
  }
  if (res.outputOverflow) {
    throw new AdbError("failed", `adb ${fullArgs.join(" ")} produced more than ${MAX_OUTPUT_BYTES} bytes of output`, {
      adb,
      args: fullArgs,
      maxBuffer: MAX_OUTPUT_BYTES,
    });
  }
  if (res.spawnError) {
    // The cached executable vanished or became unusable; search again next time.
    resetAdbResolution();
    throw new AdbError("missing", `Failed to start ${adb}`, { adb, args: fullArgs, error: res.spawnError });
  }
  if (res.exitCode !== 0) {
    throw new AdbError("failed", `adb ${fullArgs.join(" ")} failed`, {
      adb,
      args: fullArgs,
      timeoutMs: options?.timeoutMs,
      status: res.exitCode,
      stdout: res.stdout,
      stderr: res.stderr,
    });
  }
  return { stdout: res.stdout.trim(), stderr: res.stderr.trim() };
}
