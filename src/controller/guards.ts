import { CONNECTION_ERROR_MSG } from "../utils/constants";
import { isConnectionError } from "../utils/helpers";

export interface Pausable {
  readonly syncing: boolean;
  pauseSync(): Promise<void>;
  resumeSync(): Promise<void>;
  /** Sets whether background sync may start on its own; returns the previous setting. */
  holdSync(held: boolean): boolean;
}

export interface ConnectionAware {
  readonly connected: boolean;
}

/**
 * Runs `fn` with background sync stopped. Sync is resumed afterwards, on every
 * exit path, only if it was running when the call started. Sync that was
 * stopped for another reason is held back for the duration, so a reconnect
 * cannot restart it mid-call.
 */
export async function withSyncPaused<T>(target: Pausable, fn: () => Promise<T>): Promise<T> {
  const resume = target.syncing;
  const wasHeld = target.holdSync(true);
  if (resume) {
    await target.pauseSync();
  }

  try {
    return await fn();
  } finally {
    if (resume) {
      await target.resumeSync();
    } else {
      target.holdSync(wasHeld);
    }
  }
}

/**
 * Runs `fn` only while connected. Being offline, or a transport failure while
 * running, is reported once and yields `false`; other errors propagate.
 */
export async function ifConnected<T>(target: ConnectionAware, fn: () => Promise<T>): Promise<T | false> {
  if (!target.connected) {
    console.error(CONNECTION_ERROR_MSG);
    return false;
  }

  try {
    return await fn();
  } catch (err: unknown) {
    if (isConnectionError(err)) {
      console.error(CONNECTION_ERROR_MSG);
      return false;
    }
    throw err;
  }
}
