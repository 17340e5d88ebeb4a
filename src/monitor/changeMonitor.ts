import chokidar, { FSWatcher } from "chokidar";
import debounce from "lodash.debounce";
import path from "path";

import { CONNECTION_CHECK_INTERVAL_MS, REVISION_FILE } from "../utils/constants";
import { isConnectionError } from "../utils/helpers";
import { LocalChange, LocalChangeType, SyncEngine, SyncMonitor } from "../utils/types";

export interface ChangeMonitorOptions {
  watchIntervalSeconds: number;
  pollIntervalSeconds: number;
  connectionCheckIntervalMs?: number;
}

/**
 * Background sync: pushes local edits after a debounce, pulls remote changes
 * on an interval and keeps track of whether the Bee node is reachable.
 *
 * All transfers run on a single promise chain, so cycles never overlap and
 * `stop()` resolves only after the current one has finished.
 */
export class ChangeMonitor implements SyncMonitor {
  /** Set while the user has paused sync; blocks restart on reconnect. */
  stoppedByUser = true;

  private _running = false;
  private _connected = false;
  private watcher: FSWatcher | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private connectionTimer: ReturnType<typeof setInterval> | null = null;
  private readonly pending = new Map<string, LocalChangeType>();
  private queue: Promise<void> = Promise.resolve();
  private readonly flush: ReturnType<typeof debounce<() => void>>;

  constructor(
    private readonly engine: SyncEngine,
    private readonly options: ChangeMonitorOptions,
  ) {
    this.flush = debounce(() => {
      this.enqueue("push", () => this.pushPending());
    }, options.watchIntervalSeconds * 1000);
  }

  get running(): boolean {
    return this._running;
  }

  get connected(): boolean {
    return this._connected;
  }

  async start(): Promise<void> {
    if (this._running) return;
    if (!this._connected) {
      console.log("[monitor] Waiting for a connection to Swarm before syncing");
      return;
    }

    const root = this.engine.localRoot;
    console.log(`[monitor] Watching ${root}…`);

    this.watcher = chokidar.watch(root, {
      ignoreInitial: true,
      depth: Infinity,
      ignored: (filePath: string) => path.basename(filePath) === REVISION_FILE,
    });
    this.watcher
      .on("add", filePath => this.record("add", filePath))
      .on("change", filePath => this.record("change", filePath))
      .on("unlink", filePath => this.record("unlink", filePath))
      .on("error", err => console.error("[monitor] Watcher error:", err));

    this.pollTimer = setInterval(() => {
      this.enqueue("pull", () => this.engine.pullRemoteChanges());
    }, this.options.pollIntervalSeconds * 1000);

    this._running = true;

    this.enqueue("startup", async () => {
      await this.engine.pullRemoteChanges();
      await this.engine.pushLocalChanges(await this.engine.scanLocalChanges());
    });
  }

  async stop(): Promise<void> {
    if (!this._running) return;
    this._running = false;

    this.flush.cancel();
    this.pending.clear();
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }

    await this.queue;
    console.log("[monitor] Sync stopped");
  }

  /**
   * Probes the Bee node once. An unreachable node stops sync; a reachable one
   * restarts it unless the user paused it.
   */
  async checkConnection(): Promise<boolean> {
    const reachable = await this.engine.isReachable();
    const changed = reachable !== this._connected;
    this._connected = reachable;

    if (!reachable) {
      if (changed) console.warn("[monitor] Connection to Swarm lost");
      await this.stop();
      return false;
    }

    if (changed) console.log("[monitor] Connected to Swarm");
    if (!this._running && !this.stoppedByUser) {
      await this.start();
    }
    return true;
  }

  startConnectionCheck(): void {
    if (this.connectionTimer) return;
    this.connectionTimer = setInterval(() => {
      this.checkConnection().catch((err: unknown) => {
        console.error("[monitor] Connection check failed:", err);
      });
    }, this.options.connectionCheckIntervalMs ?? CONNECTION_CHECK_INTERVAL_MS);
  }

  async shutdown(): Promise<void> {
    if (this.connectionTimer) {
      clearInterval(this.connectionTimer);
      this.connectionTimer = null;
    }
    this.stoppedByUser = true;
    await this.stop();
  }

  /** Resolves once every queued cycle has run. */
  async idle(): Promise<void> {
    await this.queue;
  }

  private record(type: LocalChangeType, filePath: string): void {
    const relativePath = path.relative(this.engine.localRoot, filePath).split(path.sep).join("/");
    if (!relativePath || relativePath.startsWith("..")) return;

    const previous = this.pending.get(relativePath);
    // a file created and changed within one window is still an add
    this.pending.set(relativePath, previous === "add" && type === "change" ? "add" : type);
    this.flush();
  }

  private async pushPending(): Promise<void> {
    const changes: LocalChange[] = [...this.pending].map(([relativePath, type]) => ({ type, relativePath }));
    this.pending.clear();
    await this.engine.pushLocalChanges(changes);
  }

  private enqueue(label: string, task: () => Promise<void>): void {
    this.queue = this.queue.then(async () => {
      if (!this._running) return;
      try {
        await task();
      } catch (err: unknown) {
        if (isConnectionError(err)) {
          this._connected = false;
          console.warn(`[monitor] ${label} sync interrupted: connection lost`);
          // stop() waits for this queue, so it must not be awaited here
          this.stop().catch((stopErr: unknown) => {
            console.error("[monitor] Error while stopping sync:", stopErr);
          });
          return;
        }
        console.error(`[monitor] Error during ${label} sync:`, err instanceof Error ? err.message : err);
      }
    });
  }
}
