import fs from "node:fs";
import path from "node:path";

export const PACKAGE_EXTENSION = ".apk";

/**
 * A dropped path that did not make it into the queue.
 */
export interface PackageRejection {
  path: string;
  code: "INVALID_PACKAGE";
  reason: string;
}

export interface PackagePartition {
  /** Paths to enqueue, in the order they were given. */
  accepted: string[];
  rejected: PackageRejection[];
}

export type FileCheck = (filePath: string) => boolean;

const isRegularFile: FileCheck = (filePath) => {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
};

/**
 * Check one dropped path. Extension matching is case-insensitive.
 *
 * @returns Rejection reason, or null when the path is installable
 */
export function checkPackagePath(filePath: string, exists: FileCheck = isRegularFile): string | null {
  if (filePath.trim().length === 0) {
    return "Path is empty";
  }
  if (path.extname(filePath).toLowerCase() !== PACKAGE_EXTENSION) {
    return `Not an ${PACKAGE_EXTENSION} file`;
  }
  if (!exists(filePath)) {
    return "File does not exist";
  }
  return null;
}

/**
 * Split dropped paths into installable ones and rejections.
 */
export function partitionPackagePaths(paths: readonly string[], exists: FileCheck = isRegularFile): PackagePartition {
  const accepted: string[] = [];
  const rejected: PackageRejection[] = [];
  for (const p of paths) {
    const reason = checkPackagePath(p, exists);
    if (reason === null) {
      accepted.push(p);
    } else {
      rejected.push({ path: p, code: "INVALID_PACKAGE", reason });
    }
  }
  return { accepted, rejected };
}
