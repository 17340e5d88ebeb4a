import fs from "fs-extra";
import path from "path";
import os from "os";

import { configGetCmd, configSetCmd } from "../../src/commands/config";
import { defaultConfig, JsonConfigStore, MemoryConfigStore } from "../../src/utils/config";

function mockExit(): jest.SpyInstance {
  return jest.spyOn(process, "exit").mockImplementation(() => {
    throw new Error("exit");
  });
}

describe("config stores", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "swarm-dropbox-test-config-"));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.remove(tmp);
  });

  it("fills missing keys with defaults", () => {
    const store = new MemoryConfigStore({ main: { path: "/data" } });

    expect(store.snapshot()).toEqual({
      ...defaultConfig(),
      main: { ...defaultConfig().main, path: "/data" },
    });
  });

  it("hands out copies of list values", () => {
    const store = new MemoryConfigStore({ main: { excludedFolders: ["/photos"] } });

    store.get("main", "excludedFolders").push("/docs");

    expect(store.get("main", "excludedFolders")).toEqual(["/photos"]);
  });

  it("writes every change through to the file", async () => {
    const file = path.join(tmp, ".swarm-dropbox.json");
    await fs.writeJson(file, { main: { path: "/data" } });

    const store = new JsonConfigStore(file);
    store.set("main", "excludedFolders", ["/photos"]);
    store.set("internal", "lastSync", 1_700_000_000_000);

    const saved = await fs.readJson(file);
    expect(saved.main).toEqual({ ...defaultConfig().main, path: "/data", excludedFolders: ["/photos"] });
    expect(saved.internal.lastSync).toBe(1_700_000_000_000);

    const reopened = new JsonConfigStore(file);
    expect(reopened.get("main", "excludedFolders")).toEqual(["/photos"]);
  });

  it("starts from defaults when the file cannot be read", async () => {
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    const file = path.join(tmp, ".swarm-dropbox.json");
    await fs.writeFile(file, "{ not json");

    const store = new JsonConfigStore(file);

    expect(warnSpy).toHaveBeenCalledWith(`Failed to load config from "${file}", using defaults`);
    expect(store.snapshot()).toEqual(defaultConfig());
    expect(await fs.readJson(file)).toEqual(defaultConfig());
  });
});

describe("config command", () => {
  let store: MemoryConfigStore;
  let logSpy: jest.SpyInstance;
  let errSpy: jest.SpyInstance;

  beforeEach(() => {
    store = new MemoryConfigStore({
      main: { path: "/data", excludedFolders: ["/photos", "/music"], watchIntervalSeconds: 7, pollIntervalSeconds: 13 },
    });
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    errSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("configSetCmd", () => {
    it("sets watchIntervalSeconds to a positive integer", async () => {
      await configSetCmd("watchIntervalSeconds", "30", store);

      expect(store.get("main", "watchIntervalSeconds")).toBe(30);
      expect(logSpy).toHaveBeenCalledWith("watchIntervalSeconds = 30");
    });

    it("sets pollIntervalSeconds to a positive integer", async () => {
      await configSetCmd("pollIntervalSeconds", "120", store);

      expect(store.get("main", "pollIntervalSeconds")).toBe(120);
      expect(logSpy).toHaveBeenCalledWith("pollIntervalSeconds = 120");
    });

    it("rejects zero and non-numeric intervals", async () => {
      mockExit();

      await expect(configSetCmd("watchIntervalSeconds", "0", store)).rejects.toThrow("exit");
      expect(errSpy).toHaveBeenCalledWith(`Error: "0" is not a valid positive integer for watchIntervalSeconds.`);

      await expect(configSetCmd("pollIntervalSeconds", "abc", store)).rejects.toThrow("exit");
      expect(errSpy).toHaveBeenCalledWith(`Error: "abc" is not a valid positive integer for pollIntervalSeconds.`);

      expect(store.get("main", "watchIntervalSeconds")).toBe(7);
      expect(store.get("main", "pollIntervalSeconds")).toBe(13);
    });

    it("points path changes at the move command", async () => {
      mockExit();

      await expect(configSetCmd("path", "/elsewhere", store)).rejects.toThrow("exit");

      expect(errSpy).toHaveBeenCalledWith(
        'Error: "path" cannot be set directly. Use "swarm-dropbox move <path>" to relocate the folder.',
      );
      expect(store.get("main", "path")).toBe("/data");
    });

    it("points exclusions at the exclude and include commands", async () => {
      mockExit();

      await expect(configSetCmd("excludedFolders", "/docs", store)).rejects.toThrow("exit");

      expect(errSpy).toHaveBeenCalledWith(
        'Error: "excludedFolders" cannot be set directly. Use "swarm-dropbox exclude|include <folder>".',
      );
    });

    it("errors on unknown key", async () => {
      mockExit();

      await expect(configSetCmd("fooBar", "123", store)).rejects.toThrow("exit");

      expect(errSpy).toHaveBeenCalledWith(`Error: "fooBar" is not a valid configuration key.`);
    });
  });

  describe("configGetCmd", () => {
    it("gets path", async () => {
      await configGetCmd("path", store);
      expect(logSpy).toHaveBeenCalledWith("path = /data");
    });

    it("gets excludedFolders", async () => {
      await configGetCmd("excludedFolders", store);
      expect(logSpy).toHaveBeenCalledWith("excludedFolders = /photos, /music");
    });

    it("gets the intervals", async () => {
      await configGetCmd("watchIntervalSeconds", store);
      await configGetCmd("pollIntervalSeconds", store);

      expect(logSpy).toHaveBeenCalledWith("watchIntervalSeconds = 7");
      expect(logSpy).toHaveBeenCalledWith("pollIntervalSeconds = 13");
    });

    it("errors on unknown key", async () => {
      mockExit();

      await expect(configGetCmd("fooBar", store)).rejects.toThrow("exit");

      expect(errSpy).toHaveBeenCalledWith(`Error: "fooBar" is not a valid configuration key.`);
    });
  });
});
