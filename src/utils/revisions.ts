import fs from "fs-extra";

import { isInside, normalizeRemotePath } from "./paths";

/**
 * Per-file revision markers (the Swarm reference of the contents last
 * mirrored), persisted as JSON next to the synced files.
 */
export class RevisionStore {
  private revs: Map<string, string> | null = null;

  constructor(readonly file: string) {}

  async get(remotePath: string): Promise<string | undefined> {
    const revs = await this.load();
    return revs.get(normalizeRemotePath(remotePath));
  }

  async entries(): Promise<Array<[string, string]>> {
    const revs = await this.load();
    return [...revs.entries()];
  }

  /**
   * Stores `rev` for a path. `null` clears the path and everything below it.
   */
  async set(remotePath: string, rev: string | null): Promise<void> {
    const revs = await this.load();
    const key = normalizeRemotePath(remotePath);

    if (rev === null) {
      for (const existing of [...revs.keys()]) {
        if (isInside(existing, key)) {
          revs.delete(existing);
        }
      }
    } else {
      revs.set(key, rev);
    }

    await fs.outputJson(this.file, Object.fromEntries(revs), { spaces: 2 });
  }

  private async load(): Promise<Map<string, string>> {
    if (this.revs) return this.revs;

    const revs = new Map<string, string>();
    if (await fs.pathExists(this.file)) {
      const raw: Record<string, unknown> = await fs.readJson(this.file);
      for (const [key, value] of Object.entries(raw)) {
        if (typeof value === "string") {
          revs.set(normalizeRemotePath(key), value);
        }
      }
    }

    this.revs = revs;
    return revs;
  }
}
