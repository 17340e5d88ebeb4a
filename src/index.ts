export { SyncController, SyncControllerDeps, SyncControllerOptions } from "./controller/syncController";
export { ConnectionAware, ifConnected, Pausable, withSyncPaused } from "./controller/guards";
export { ChangeMonitor, ChangeMonitorOptions } from "./monitor/changeMonitor";
export { SwarmClient } from "./remote/swarmClient";
export { ConfigStore, defaultConfig, JsonConfigStore, MemoryConfigStore } from "./utils/config";
export { ConnectionError, NotLinkedError } from "./utils/errors";
export { askForPath, yesno } from "./utils/prompt";
export * from "./utils/types";
