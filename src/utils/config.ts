import fs from "fs";
import path from "path";

import { CONFIG_FILE, DEFAULT_POLL_INTERVAL_SECONDS, DEFAULT_WATCH_INTERVAL_SECONDS } from "./constants";
import { ConfigSection, ConfigSections } from "./types";

export function defaultConfig(): ConfigSections {
  return {
    main: {
      path: "",
      excludedFolders: [],
      watchIntervalSeconds: DEFAULT_WATCH_INTERVAL_SECONDS,
      pollIntervalSeconds: DEFAULT_POLL_INTERVAL_SECONDS,
    },
    internal: {
      cursor: "",
      lastSync: null,
    },
    account: {
      owner: "",
      batchId: "",
    },
  };
}

export interface ConfigStore {
  get<S extends ConfigSection, K extends keyof ConfigSections[S]>(section: S, key: K): ConfigSections[S][K];
  set<S extends ConfigSection, K extends keyof ConfigSections[S]>(
    section: S,
    key: K,
    value: ConfigSections[S][K],
  ): void;
}

export class MemoryConfigStore implements ConfigStore {
  protected data: ConfigSections;

  constructor(initial: Partial<{ [S in ConfigSection]: Partial<ConfigSections[S]> }> = {}) {
    const defaults = defaultConfig();
    this.data = {
      main: { ...defaults.main, ...initial.main },
      internal: { ...defaults.internal, ...initial.internal },
      account: { ...defaults.account, ...initial.account },
    };
  }

  get<S extends ConfigSection, K extends keyof ConfigSections[S]>(section: S, key: K): ConfigSections[S][K] {
    return structuredClone(this.data[section][key]);
  }

  set<S extends ConfigSection, K extends keyof ConfigSections[S]>(
    section: S,
    key: K,
    value: ConfigSections[S][K],
  ): void {
    this.data[section][key] = structuredClone(value);
  }

  snapshot(): ConfigSections {
    return structuredClone(this.data);
  }
}

/**
 * Config store backed by a JSON file. Every `set` is written through
 * synchronously, so a value is durable once the call returns.
 */
export class JsonConfigStore extends MemoryConfigStore {
  readonly file: string;

  constructor(file = path.resolve(CONFIG_FILE)) {
    super(loadConfigFile(file));
    this.file = file;
  }

  set<S extends ConfigSection, K extends keyof ConfigSections[S]>(
    section: S,
    key: K,
    value: ConfigSections[S][K],
  ): void {
    super.set(section, key, value);
    fs.writeFileSync(this.file, JSON.stringify(this.data, null, 2), "utf8");
  }
}

function loadConfigFile(file: string): Partial<{ [S in ConfigSection]: Partial<ConfigSections[S]> }> {
  try {
    const raw = fs.readFileSync(file, "utf8");
    return JSON.parse(raw);
  } catch {
    console.warn(`Failed to load config from "${file}", using defaults`);
    fs.writeFileSync(file, JSON.stringify(defaultConfig(), null, 2), "utf8");
    return {};
  }
}
