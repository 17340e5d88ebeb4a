import fs from "fs";
import path from "path";

import { ConfigStore, JsonConfigStore } from "../utils/config";
import { CONFIG_FILE } from "../utils/constants";

function openStore(): ConfigStore {
  if (!fs.existsSync(path.resolve(CONFIG_FILE))) {
    console.error(`Error: config file "${CONFIG_FILE}" not found. Please run "swarm-dropbox start" first.`);
    process.exit(1);
  }
  return new JsonConfigStore();
}

export async function statusCmd(store: ConfigStore = openStore()): Promise<void> {
  const owner = store.get("account", "owner");
  const excluded = store.get("main", "excludedFolders");
  const lastSync = store.get("internal", "lastSync");
  const cursor = store.get("internal", "cursor");

  console.log("Swarm Dropbox Status");
  console.log("--------------------");
  console.log(`path: ${store.get("main", "path") || "<not set>"}`);
  console.log(`linked drive: ${owner || "<not linked>"}`);
  console.log(`excludedFolders: ${excluded.length > 0 ? excluded.join(", ") : "(none)"}`);
  console.log(`watchIntervalSeconds: ${store.get("main", "watchIntervalSeconds")}`);
  console.log(`pollIntervalSeconds: ${store.get("main", "pollIntervalSeconds")}`);

  if (lastSync !== null) {
    const minsAgo = Math.floor((Date.now() - lastSync) / 60000);
    console.log(
      `lastSync: ${new Date(lastSync).toISOString()} (${minsAgo} minute${minsAgo === 1 ? "" : "s"} ago)`,
    );
  } else {
    console.log("lastSync: <no sync yet> — run “swarm-dropbox start” to perform the first download");
  }

  if (cursor) {
    console.log(`cursor: ${cursor}`);
  }
}
