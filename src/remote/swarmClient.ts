import { BatchId, Bee, MantarayNode } from "@ethersphere/bee-js";
import fs from "fs-extra";
import path from "path";

import { ConfigStore } from "../utils/config";
import { DRIVE_FEED_TOPIC, REVISION_FILE } from "../utils/constants";
import { ConnectionError, NotLinkedError } from "../utils/errors";
import { listFiles } from "../utils/fs";
import { isConnectionError } from "../utils/helpers";
import { isExcluded, isInside, manifestToRemotePath, normalizeRemotePath } from "../utils/paths";
import { RevisionStore } from "../utils/revisions";
import {
  downloadRemoteFile,
  getBatch,
  listRemoteFilesMap,
  loadOrCreateMantarayNode,
  readDriveFeed,
  saveMantarayNode,
  updateManifest,
  writeDriveFeed,
} from "../utils/swarm";
import { FolderEntry, LocalChange, RemoteClient, SyncEngine } from "../utils/types";

interface RemoteDrive {
  node: MantarayNode;
  /** manifest path -> data reference */
  files: Map<string, string>;
  reference: string;
  nextIndex: bigint;
}

/**
 * Mirrors a Swarm drive (a mantaray manifest published through the owner's
 * feed) into the local sync root.
 */
export class SwarmClient implements RemoteClient, SyncEngine {
  private root: string;
  private revisions: RevisionStore;
  // mtimes of files we wrote, so the watcher's echo is not pushed back
  private readonly pulled = new Map<string, number>();

  constructor(
    private readonly bee: Bee,
    private readonly store: ConfigStore,
  ) {
    this.root = store.get("main", "path");
    this.revisions = new RevisionStore(path.join(this.root, REVISION_FILE));
  }

  get localRoot(): string {
    return this.root;
  }

  set localRoot(dir: string) {
    this.root = dir;
    this.revisions = new RevisionStore(path.join(dir, REVISION_FILE));
    this.pulled.clear();
  }

  get revisionFile(): string {
    return this.revisions.file;
  }

  async isReachable(): Promise<boolean> {
    return this.bee.isConnected();
  }

  async listTopLevelFolders(): Promise<FolderEntry[]> {
    const drive = await this.request(() => this.loadDrive());

    const entries = new Map<string, FolderEntry>();
    for (const manifestPath of drive.files.keys()) {
      const [head, ...rest] = manifestPath.split("/");
      if (!head) continue;

      const pathDisplay = `/${head}`;
      const pathLower = pathDisplay.toLowerCase();
      if (entries.get(pathLower)?.isFolder) continue;

      entries.set(pathLower, { pathDisplay, pathLower, isFolder: rest.length > 0 });
    }

    return [...entries.values()].sort((a, b) => a.pathLower.localeCompare(b.pathLower));
  }

  async downloadTree(excluding: readonly string[]): Promise<void> {
    await this.request(async () => {
      const drive = await this.loadDrive();
      const count = await this.download(drive, remotePath => !isExcluded(remotePath, excluding));
      this.store.set("internal", "cursor", drive.reference);
      console.log(`[swarm] Downloaded ${count} file(s) from manifest ${drive.reference}`);
    });
  }

  async downloadFolder(remotePath: string): Promise<void> {
    const folder = normalizeRemotePath(remotePath);
    await this.request(async () => {
      const drive = await this.loadDrive();
      const count = await this.download(drive, p => isInside(p, folder));
      console.log(`[swarm] Downloaded ${count} file(s) under ${folder}`);
    });
  }

  async setLocalRevisionMarker(remotePath: string, rev: string | null): Promise<void> {
    await this.revisions.set(remotePath, rev);
  }

  /**
   * Local path for a remote path, matching existing directory entries without
   * regard to case.
   */
  async toLocalPath(remotePath: string): Promise<string> {
    let current = this.root;
    for (const segment of normalizeRemotePath(remotePath).split("/").filter(Boolean)) {
      const entries = (await fs.pathExists(current)) ? await fs.readdir(current) : [];
      const match = entries.find(e => e.toLowerCase() === segment);
      current = path.join(current, match ?? segment);
    }
    return current;
  }

  async unlink(): Promise<void> {
    this.store.set("account", "owner", "");
    this.store.set("account", "batchId", "");
    this.store.set("internal", "cursor", "");
    this.store.set("internal", "lastSync", null);
    console.log("[swarm] Drive unlinked; local files were left in place.");
  }

  async pullRemoteChanges(): Promise<void> {
    await this.request(async () => {
      const drive = await this.loadDrive();
      if (drive.reference === this.store.get("internal", "cursor")) {
        return;
      }

      const excluded = this.store.get("main", "excludedFolders");
      const included = (remotePath: string) => !isExcluded(remotePath, excluded);

      const changed = new Set<string>();
      for (const [manifestPath, ref] of drive.files) {
        const remotePath = manifestToRemotePath(manifestPath);
        if (included(remotePath) && (await this.revisions.get(remotePath)) !== ref) {
          changed.add(remotePath.toLowerCase());
        }
      }
      await this.download(drive, remotePath => changed.has(remotePath.toLowerCase()));

      const remaining = new Set([...drive.files.keys()].map(p => normalizeRemotePath(p)));
      for (const [remotePath] of await this.revisions.entries()) {
        if (remaining.has(remotePath) || !included(remotePath)) continue;

        const local = await this.toLocalPath(remotePath);
        console.log("🗑️  Remote deleted → removing local file", local);
        await fs.remove(local);
        await this.revisions.set(remotePath, null);
      }

      this.store.set("internal", "cursor", drive.reference);
    });
  }

  async scanLocalChanges(): Promise<LocalChange[]> {
    if (!(await fs.pathExists(this.root))) return [];

    const excluded = this.store.get("main", "excludedFolders");
    const localFiles = await listFiles(this.root);
    const local = new Set(localFiles.map(f => normalizeRemotePath(f)));
    const known = new Map(await this.revisions.entries());

    const changes: LocalChange[] = [];
    for (const relativePath of localFiles) {
      const remotePath = normalizeRemotePath(relativePath);
      if (!known.has(remotePath) && !isExcluded(remotePath, excluded)) {
        changes.push({ type: "add", relativePath });
      }
    }
    for (const remotePath of known.keys()) {
      if (!local.has(remotePath) && !isExcluded(remotePath, excluded)) {
        changes.push({ type: "unlink", relativePath: remotePath.slice(1) });
      }
    }
    return changes;
  }

  async pushLocalChanges(changes: LocalChange[]): Promise<void> {
    if (changes.length === 0) return;

    await this.request(async () => {
      const batchId = await this.usableBatch();
      const drive = await this.loadDrive();
      const excluded = this.store.get("main", "excludedFolders");
      const lowerToManifest = new Map([...drive.files.keys()].map(p => [normalizeRemotePath(p), p]));

      let changed = false;
      for (const { type, relativePath } of changes) {
        const remotePath = normalizeRemotePath(relativePath);
        if (isExcluded(remotePath, excluded)) continue;

        const existing = lowerToManifest.get(remotePath);
        const abs = path.join(this.root, relativePath);

        if (type === "unlink") {
          if (existing === undefined) continue;
          console.log("🗑️  Delete →", existing);
          await updateManifest(this.bee, batchId, drive.node, "", existing, true);
          await this.revisions.set(remotePath, null);
          changed = true;
          continue;
        }

        if (!(await fs.pathExists(abs))) continue;
        const { mtimeMs } = await fs.stat(abs);
        if (this.pulled.get(remotePath) === mtimeMs) {
          this.pulled.delete(remotePath);
          continue;
        }

        console.log(existing === undefined ? "➕ Add →" : "⬆️  Upload →", relativePath);
        if (existing !== undefined) {
          await updateManifest(this.bee, batchId, drive.node, "", existing, true);
        }
        const ref = await updateManifest(this.bee, batchId, drive.node, abs, relativePath, false);
        if (ref !== undefined) {
          await this.revisions.set(remotePath, ref);
        }
        changed = true;
      }

      if (!changed) return;

      const manifestRef = await saveMantarayNode(this.bee, drive.node, batchId);
      console.log(`[swarm] Writing feed@${drive.nextIndex} →`, manifestRef);
      await writeDriveFeed(this.bee, DRIVE_FEED_TOPIC, batchId, manifestRef, drive.nextIndex);
      this.store.set("internal", "cursor", manifestRef);
    });
  }

  private owner(): string {
    const owner = this.store.get("account", "owner");
    if (!owner) {
      throw new NotLinkedError();
    }
    return owner;
  }

  private async usableBatch(): Promise<BatchId> {
    const batchId = this.store.get("account", "batchId");
    if (!batchId) {
      throw new NotLinkedError();
    }
    const batch = await getBatch(this.bee, batchId);
    if (!batch) {
      throw new Error(`Postage batch ${batchId} is not usable; buy a new stamp with "swarm-dropbox link".`);
    }
    return batch.batchID;
  }

  private async loadDrive(): Promise<RemoteDrive> {
    const { reference, feedIndexNext } = await readDriveFeed(this.bee, DRIVE_FEED_TOPIC.toUint8Array(), this.owner());
    const node = await loadOrCreateMantarayNode(this.bee, reference);
    return {
      node,
      files: listRemoteFilesMap(node),
      reference: reference.toString(),
      nextIndex: feedIndexNext ? feedIndexNext.toBigInt() : 0n,
    };
  }

  private async download(drive: RemoteDrive, accept: (remotePath: string) => boolean): Promise<number> {
    let count = 0;
    for (const [manifestPath, ref] of drive.files) {
      const remotePath = manifestToRemotePath(manifestPath);
      if (!accept(remotePath)) continue;

      console.log("⤵️  Pull →", manifestPath);
      const data = await downloadRemoteFile(this.bee, drive.node, manifestPath);
      const dst = path.join(this.root, manifestPath);
      await fs.outputFile(dst, data);

      const { mtimeMs } = await fs.stat(dst);
      this.pulled.set(normalizeRemotePath(remotePath), mtimeMs);
      await this.revisions.set(remotePath, ref);
      count++;
    }
    return count;
  }

  private async request<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (isConnectionError(err) && !(err instanceof ConnectionError)) {
        throw new ConnectionError(err instanceof Error ? err.message : String(err), { cause: err });
      }
      throw err;
    }
  }
}
