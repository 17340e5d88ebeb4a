import { ConfigStore, JsonConfigStore } from "../utils/config";

type IntervalKey = "watchIntervalSeconds" | "pollIntervalSeconds";

function setIntervalKey(store: ConfigStore, key: IntervalKey, value: string): void {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    console.error(`Error: "${value}" is not a valid positive integer for ${key}.`);
    process.exit(1);
  }
  store.set("main", key, n);
  console.log(`${key} = ${n}`);
}

export async function configSetCmd(key: string, value: string, store: ConfigStore = new JsonConfigStore()): Promise<void> {
  switch (key) {
    case "watchIntervalSeconds":
    case "pollIntervalSeconds":
      setIntervalKey(store, key, value);
      break;

    case "path":
      console.error('Error: "path" cannot be set directly. Use "swarm-dropbox move <path>" to relocate the folder.');
      process.exit(1);

    case "excludedFolders":
      console.error('Error: "excludedFolders" cannot be set directly. Use "swarm-dropbox exclude|include <folder>".');
      process.exit(1);

    default:
      console.error(`Error: "${key}" is not a valid configuration key.`);
      process.exit(1);
  }
}

export async function configGetCmd(key: string, store: ConfigStore = new JsonConfigStore()): Promise<void> {
  switch (key) {
    case "path":
      console.log(`path = ${store.get("main", "path")}`);
      break;

    case "excludedFolders":
      console.log(`excludedFolders = ${store.get("main", "excludedFolders").join(", ")}`);
      break;

    case "watchIntervalSeconds":
    case "pollIntervalSeconds":
      console.log(`${key} = ${store.get("main", key)}`);
      break;

    default:
      console.error(`Error: "${key}" is not a valid configuration key.`);
      process.exit(1);
  }
}
