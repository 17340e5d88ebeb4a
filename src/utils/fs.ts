import fg from "fast-glob";
import fs from "fs-extra";

import { REVISION_FILE } from "./constants";

export async function listFiles(dir: string): Promise<string[]> {
  return fg("**/*", { cwd: dir, onlyFiles: true, dot: true, ignore: [REVISION_FILE] });
}

export async function isDirectory(p: string): Promise<boolean> {
  if (!p) return false;
  try {
    const stat = await fs.stat(p);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/** Same device and inode; false when either path is missing. */
export async function isSameFile(a: string, b: string): Promise<boolean> {
  if (!(await fs.pathExists(a)) || !(await fs.pathExists(b))) {
    return false;
  }
  const [statA, statB] = await Promise.all([fs.stat(a), fs.stat(b)]);
  return statA.dev === statB.dev && statA.ino === statB.ino;
}
