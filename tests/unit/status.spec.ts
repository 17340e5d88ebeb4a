import fs from "fs-extra";
import path from "path";
import os from "os";

import { statusCmd } from "../../src/commands/status";
import { MemoryConfigStore } from "../../src/utils/config";

describe("status command", () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("errors when the config file is missing", async () => {
    const cwdBefore = process.cwd();
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "swarm-dropbox-test-status-"));
    process.chdir(tmp);
    const errSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    jest.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("exit");
    });

    try {
      await expect(statusCmd()).rejects.toThrow("exit");
      expect(errSpy).toHaveBeenCalledWith(
        'Error: config file ".swarm-dropbox.json" not found. Please run "swarm-dropbox start" first.',
      );
    } finally {
      process.chdir(cwdBefore);
      await fs.remove(tmp);
    }
  });

  it("prints placeholders before the first sync", async () => {
    await statusCmd(new MemoryConfigStore());

    expect(logSpy.mock.calls).toEqual([
      ["Swarm Dropbox Status"],
      ["--------------------"],
      ["path: <not set>"],
      ["linked drive: <not linked>"],
      ["excludedFolders: (none)"],
      ["watchIntervalSeconds: 5"],
      ["pollIntervalSeconds: 60"],
      ["lastSync: <no sync yet> — run “swarm-dropbox start” to perform the first download"],
    ]);
  });

  it("prints the linked drive, exclusions and last sync", async () => {
    const lastSync = new Date("2025-01-01T00:10:00Z").getTime();
    jest.spyOn(Date, "now").mockReturnValue(new Date("2025-01-01T00:12:30Z").getTime());

    await statusCmd(
      new MemoryConfigStore({
        main: { path: "/data", excludedFolders: ["/photos", "/music"], watchIntervalSeconds: 15 },
        internal: { cursor: "c".repeat(64), lastSync },
        account: { owner: "owner-address", batchId: "b".repeat(64) },
      }),
    );

    expect(logSpy).toHaveBeenCalledWith("path: /data");
    expect(logSpy).toHaveBeenCalledWith("linked drive: owner-address");
    expect(logSpy).toHaveBeenCalledWith("excludedFolders: /photos, /music");
    expect(logSpy).toHaveBeenCalledWith("watchIntervalSeconds: 15");
    expect(logSpy).toHaveBeenCalledWith("lastSync: 2025-01-01T00:10:00.000Z (2 minutes ago)");
    expect(logSpy).toHaveBeenCalledWith(`cursor: ${"c".repeat(64)}`);
  });

  it("uses the singular for one minute", async () => {
    const lastSync = new Date("2025-01-01T00:10:00Z").getTime();
    jest.spyOn(Date, "now").mockReturnValue(lastSync + 90_000);

    await statusCmd(new MemoryConfigStore({ internal: { lastSync } }));

    expect(logSpy).toHaveBeenCalledWith("lastSync: 2025-01-01T00:10:00.000Z (1 minute ago)");
  });
});
