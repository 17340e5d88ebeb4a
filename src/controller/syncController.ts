import fs from "fs-extra";
import path from "path";

import { ConfigStore } from "../utils/config";
import { DEFAULT_DROPBOX_PATH } from "../utils/constants";
import { isDirectory, isSameFile } from "../utils/fs";
import { expandHome, normalizeRemotePath } from "../utils/paths";
import { consolePrompter } from "../utils/prompt";
import { Prompter, RemoteClient, SyncMonitor } from "../utils/types";

import { ConnectionAware, ifConnected, Pausable, withSyncPaused } from "./guards";

export interface SyncControllerDeps {
  store: ConfigStore;
  client: RemoteClient;
  monitor: SyncMonitor;
  prompter?: Prompter;
}

export interface SyncControllerOptions {
  /** Resume background sync once created (and bootstrapped). Defaults to true. */
  run?: boolean;
}

/**
 * Mirrors a local folder against a Swarm drive. Owns the remote client and the
 * background monitor for the lifetime of the process.
 *
 * Operations that touch the exclusion list or the sync root run with the
 * monitor stopped; operations that need the network fail softly (returning
 * `false`) when offline.
 */
export class SyncController implements Pausable, ConnectionAware {
  pausedByUser = false;

  private readonly store: ConfigStore;
  private readonly client: RemoteClient;
  private readonly monitor: SyncMonitor;
  private readonly prompter: Prompter;
  private firstSync: boolean;

  private constructor(deps: SyncControllerDeps, firstSync: boolean) {
    this.store = deps.store;
    this.client = deps.client;
    this.monitor = deps.monitor;
    this.prompter = deps.prompter ?? consolePrompter;
    this.firstSync = firstSync;

    // hold off on syncing anything until set up
    this.monitor.stoppedByUser = true;
  }

  static async create(deps: SyncControllerDeps, options: SyncControllerOptions = {}): Promise<SyncController> {
    const controller = new SyncController(deps, await SyncController.needsFirstSync(deps.store));

    if (controller.firstSync) {
      await controller.bootstrap();
    }

    if (options.run ?? true) {
      await controller.resumeSync();
    }

    return controller;
  }

  static async needsFirstSync(store: ConfigStore): Promise<boolean> {
    return (
      store.get("internal", "lastSync") === null ||
      store.get("internal", "cursor") === "" ||
      !(await isDirectory(store.get("main", "path")))
    );
  }

  get syncing(): boolean {
    return this.monitor.running;
  }

  get connected(): boolean {
    return this.monitor.connected;
  }

  get isFirstSync(): boolean {
    return this.firstSync;
  }

  async pauseSync(): Promise<void> {
    this.pausedByUser = true;
    this.monitor.stoppedByUser = true;
    await this.monitor.stop();
  }

  async resumeSync(): Promise<void> {
    this.pausedByUser = false;
    this.monitor.stoppedByUser = false;
    await this.monitor.start();
  }

  holdSync(held: boolean): boolean {
    const previous = this.monitor.stoppedByUser;
    this.monitor.stoppedByUser = held;
    return previous;
  }

  /**
   * Unlinks the drive. Downloaded files stay where they are.
   */
  async unlink(): Promise<void> {
    await this.pauseSync();
    await this.client.unlink();
  }

  async close(): Promise<void> {
    await this.monitor.shutdown();
  }

  /**
   * Downloads the whole drive apart from excluded folders. Run on first sync.
   */
  async downloadRemoteDropbox(): Promise<boolean> {
    return ifConnected(this, async () => {
      await this.client.downloadTree(this.excludedFolders());
      return true;
    });
  }

  /**
   * Excludes a folder from sync and deletes its local copy. Safe to call for
   * folders which are already excluded.
   */
  async excludeFolder(remotePath: string): Promise<void> {
    await withSyncPaused(this, async () => {
      const folder = normalizeRemotePath(remotePath);

      const folders = this.excludedFolders();
      if (!folders.includes(folder)) {
        this.store.set("main", "excludedFolders", [...folders, folder]);
      }

      const local = await this.client.toLocalPath(folder);
      if (await isDirectory(local)) {
        console.log(`[controller] Removing local copy of ${folder}`);
        await fs.remove(local);
      }

      await this.client.setLocalRevisionMarker(folder, null);
    });
  }

  /**
   * Includes a folder in sync and downloads it. Folders which are already
   * included are not downloaded again.
   */
  async includeFolder(remotePath: string): Promise<boolean> {
    return withSyncPaused(this, () =>
      ifConnected(this, async () => {
        const folder = normalizeRemotePath(remotePath);

        const folders = this.excludedFolders();
        if (!folders.includes(folder)) {
          console.log(`[controller] ${folder} is already included, nothing to do.`);
          return true;
        }

        console.log(`[controller] Downloading ${folder}…`);
        await this.client.downloadFolder(folder);
        this.store.set(
          "main",
          "excludedFolders",
          folders.filter(f => f !== folder),
        );
        return true;
      }),
    );
  }

  /**
   * Asks, for every top-level folder of the drive, whether to exclude it and
   * applies the answers. Returns the excluded folders.
   *
   * Folders that could not be included again stay excluded, and the call then
   * returns `false`.
   */
  async selectExcludedFolders(): Promise<string[] | false> {
    return ifConnected(this, async (): Promise<string[] | false> => {
      const oldFolders = this.excludedFolders();
      const newFolders: string[] = [];

      for (const entry of await this.client.listTopLevelFolders()) {
        if (!entry.isFolder) continue;
        if (await this.prompter.yesno(`Exclude '${entry.pathDisplay}' from sync?`, false)) {
          const folder = normalizeRemotePath(entry.pathLower);
          if (!newFolders.includes(folder)) newFolders.push(folder);
        }
      }

      // nothing is downloaded yet on first sync, so there is nothing to apply
      const failed: string[] = [];
      if (!this.firstSync) {
        for (const folder of newFolders) {
          await this.excludeFolder(folder);
        }
        for (const folder of oldFolders.filter(f => !newFolders.includes(f))) {
          if (!(await this.includeFolder(folder))) {
            failed.push(folder);
          }
        }
      }

      const excluded = [...newFolders, ...failed];
      this.store.set("main", "excludedFolders", excluded);
      return failed.length > 0 ? false : excluded;
    });
  }

  /**
   * Changes the local Dropbox directory, moving all files to the new location.
   * Anything already at the new location is overwritten.
   *
   * @param newPath - prompted for when omitted
   */
  async setDropboxDirectory(newPath?: string): Promise<void> {
    await withSyncPaused(this, async () => {
      const oldPath = this.store.get("main", "path");
      const requested = newPath ?? (await this.prompter.askForPath(oldPath || DEFAULT_DROPBOX_PATH));
      const target = path.resolve(expandHome(requested));

      if (oldPath && (await isSameFile(oldPath, target))) {
        console.log(`[controller] Dropbox directory is already ${target}`);
        return;
      }

      if (await isDirectory(oldPath)) {
        console.log(`[controller] Moving ${oldPath} → ${target}`);
        await fs.move(oldPath, target, { overwrite: true });
      } else {
        // nothing to move; start from an empty folder
        await fs.emptyDir(target);
      }

      this.client.localRoot = target;
      this.store.set("main", "path", target);
    });
  }

  getDropboxDirectory(): string {
    return this.client.localRoot;
  }

  toString(): string {
    const inner = this.connected ? this.store.get("account", "owner") || "unlinked" : "Connecting...";
    return `SwarmDropbox(${inner})`;
  }

  private async bootstrap(): Promise<void> {
    console.log("[controller] No completed sync found, setting up…");

    await this.setDropboxDirectory();
    await this.selectExcludedFolders();

    // a failed first download must be retried from scratch on next launch
    this.store.set("internal", "cursor", "");
    this.store.set("internal", "lastSync", null);

    if (await this.downloadRemoteDropbox()) {
      this.store.set("internal", "lastSync", Date.now());
      this.firstSync = false;
      console.log("[controller] First sync complete");
    }
  }

  private excludedFolders(): string[] {
    return [...new Set(this.store.get("main", "excludedFolders").map(f => normalizeRemotePath(f)))];
  }
}
