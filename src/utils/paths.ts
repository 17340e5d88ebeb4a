import os from "os";
import path from "path";

/**
 * Lower-cased, posix-normalized remote path with a leading slash and no
 * trailing slash. The drive root is "/".
 */
export function normalizeRemotePath(remotePath: string): string {
  const posix = remotePath.trim().replace(/\\/g, "/");
  const normalized = path.posix.normalize(`/${posix}`).toLowerCase();
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

export function isInside(remotePath: string, folder: string): boolean {
  const target = normalizeRemotePath(remotePath);
  const parent = normalizeRemotePath(folder);
  if (parent === "/") return true;
  return target === parent || target.startsWith(`${parent}/`);
}

export function isExcluded(remotePath: string, excludedFolders: readonly string[]): boolean {
  return excludedFolders.some(folder => isInside(remotePath, folder));
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** Manifest paths have no leading slash; remote paths do. */
export function manifestToRemotePath(manifestPath: string): string {
  return `/${manifestPath.replace(/^\/+/, "")}`;
}
