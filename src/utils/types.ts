import { FeedIndex, Reference } from "@ethersphere/bee-js";

export interface ConfigSections {
  main: {
    path: string;
    excludedFolders: string[];
    watchIntervalSeconds: number;
    pollIntervalSeconds: number;
  };
  internal: {
    cursor: string;
    lastSync: number | null;
  };
  account: {
    owner: string;
    batchId: string;
  };
}

export type ConfigSection = keyof ConfigSections;

export interface FolderEntry {
  pathDisplay: string;
  pathLower: string;
  isFolder: boolean;
}

export type LocalChangeType = "add" | "change" | "unlink";

export interface LocalChange {
  type: LocalChangeType;
  /** Path relative to the sync root, always with forward slashes */
  relativePath: string;
}

/**
 * Remote operations the controller performs. Transport failures surface as
 * `ConnectionError`.
 */
export interface RemoteClient {
  localRoot: string;
  listTopLevelFolders(): Promise<FolderEntry[]>;
  downloadTree(excluding: readonly string[]): Promise<void>;
  downloadFolder(remotePath: string): Promise<void>;
  setLocalRevisionMarker(remotePath: string, rev: string | null): Promise<void>;
  toLocalPath(remotePath: string): Promise<string>;
  unlink(): Promise<void>;
}

/**
 * Work the background monitor drives on each cycle.
 */
export interface SyncEngine {
  readonly localRoot: string;
  isReachable(): Promise<boolean>;
  pullRemoteChanges(): Promise<void>;
  scanLocalChanges(): Promise<LocalChange[]>;
  pushLocalChanges(changes: LocalChange[]): Promise<void>;
}

export interface SyncMonitor {
  readonly running: boolean;
  readonly connected: boolean;
  stoppedByUser: boolean;
  start(): Promise<void>;
  stop(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface Prompter {
  yesno(message: string, defaultAnswer: boolean): Promise<boolean>;
  askForPath(defaultPath: string): Promise<string>;
}

interface FeedUpdateHeaders {
  feedIndex: FeedIndex;
  feedIndexNext?: FeedIndex;
}
export interface FeedReferenceResult extends FeedUpdateHeaders {
  reference: Reference;
}
