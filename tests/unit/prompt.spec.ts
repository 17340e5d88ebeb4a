import fs from "fs-extra";
import os from "os";
import path from "path";

import { askForPath, parseYesNo, yesno } from "../../src/utils/prompt";

function scripted(...answers: string[]): jest.Mock<Promise<string>, [string]> {
  const ask = jest.fn<Promise<string>, [string]>();
  for (const answer of answers) {
    ask.mockResolvedValueOnce(answer);
  }
  return ask;
}

describe("prompts", () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("parseYesNo", () => {
    it("recognises yes, no and quit tokens", () => {
      expect(parseYesNo(" Yes ")).toBe(true);
      expect(parseYesNo("y")).toBe(true);
      expect(parseYesNo("NO")).toBe(false);
      expect(parseYesNo("n")).toBe(false);
      expect(parseYesNo("q")).toBe("quit");
      expect(parseYesNo("quit")).toBe("quit");
      expect(parseYesNo("maybe")).toBeUndefined();
    });
  });

  describe("yesno", () => {
    it("returns the default on a blank answer", async () => {
      const ask = scripted("   ");
      await expect(yesno("Exclude '/Photos' from sync?", false, ask)).resolves.toBe(false);
      expect(ask).toHaveBeenCalledWith("Exclude '/Photos' from sync? [N/y]");
    });

    it("shows the yes default in the question", async () => {
      const ask = scripted("");
      await expect(yesno("Overwrite?", true, ask)).resolves.toBe(true);
      expect(ask).toHaveBeenCalledWith("Overwrite? [Y/n]");
    });

    it("asks again until it understands the answer", async () => {
      const ask = scripted("maybe", "YES");

      await expect(yesno("Exclude?", false, ask)).resolves.toBe(true);

      expect(ask).toHaveBeenCalledTimes(2);
      expect(logSpy).toHaveBeenCalledWith("Please answer YES or NO.");
    });

    it("exits the process on quit", async () => {
      const exitSpy = jest.spyOn(process, "exit").mockImplementation((code?: string | number | null) => {
        throw new Error(`Process exit: ${code}`);
      });

      await expect(yesno("Exclude?", false, scripted("quit"))).rejects.toThrow("Process exit: 0");

      expect(logSpy).toHaveBeenCalledWith("Exit");
      expect(exitSpy).toHaveBeenCalledWith(0);
    });
  });

  describe("askForPath", () => {
    let tmp: string;

    beforeEach(async () => {
      tmp = await fs.mkdtemp(path.join(os.tmpdir(), "swarm-dropbox-prompt-"));
    });

    afterEach(async () => {
      await fs.remove(tmp);
    });

    it("returns the default on a blank answer", async () => {
      const fallback = path.join(tmp, "Default");
      const ask = scripted("");

      await expect(askForPath(fallback, ask)).resolves.toBe(fallback);
      expect(ask).toHaveBeenCalledWith(
        `Please give Dropbox folder location or press enter for default [${fallback}]:`,
      );
    });

    it("returns a new path with surrounding quotes stripped", async () => {
      const chosen = path.join(tmp, "Fresh");
      await expect(askForPath(path.join(tmp, "Default"), scripted(`'${chosen}'`))).resolves.toBe(chosen);
    });

    it("asks before reusing an existing directory", async () => {
      const existing = path.join(tmp, "Existing");
      await fs.ensureDir(existing);
      const ask = scripted(existing, "y");

      await expect(askForPath(path.join(tmp, "Default"), ask)).resolves.toBe(existing);
      expect(ask).toHaveBeenLastCalledWith(`Directory '${existing}' already exists. Should we overwrite? [Y/n]`);
    });

    it("asks for another path when overwriting is declined", async () => {
      const existing = path.join(tmp, "Existing");
      await fs.ensureDir(existing);
      const fallback = path.join(tmp, "Default");

      await expect(askForPath(fallback, scripted(existing, "n", ""))).resolves.toBe(fallback);
    });
  });
});
