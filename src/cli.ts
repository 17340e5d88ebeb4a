#!/usr/bin/env node
import dotenv from "dotenv";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
dotenv.config();

import { configGetCmd, configSetCmd } from "./commands/config";
import { excludeCmd, foldersCmd, includeCmd, moveCmd, unlinkCmd } from "./commands/folders";
import { linkCmd } from "./commands/link";
import { startCmd } from "./commands/start";
import { statusCmd } from "./commands/status";

yargs(hideBin(process.argv))
  .scriptName("swarm-dropbox")
  .command({
    command: "start",
    describe: "Set up on first run, then keep the Dropbox folder in sync",
    builder: y =>
      y.option("run", {
        type: "boolean",
        default: true,
        describe: "Start syncing right away (--no-run to stay paused)",
      }),
    handler: argv => startCmd(argv.run),
  })
  .command({
    command: "link",
    describe: "Link a Swarm drive and make sure a postage stamp exists",
    handler: () => linkCmd(),
  })
  .command({
    command: "unlink",
    describe: "Unlink the Swarm drive, keeping local files",
    handler: () => unlinkCmd(),
  })
  .command({
    command: "exclude <folder>",
    describe: "Exclude a top-level folder from sync and delete its local copy",
    builder: y =>
      y.positional("folder", {
        type: "string",
        demandOption: true,
        describe: "Drive folder, e.g. /Photos",
      }),
    handler: argv => excludeCmd(argv.folder),
  })
  .command({
    command: "include <folder>",
    describe: "Include an excluded folder in sync and download it",
    builder: y =>
      y.positional("folder", {
        type: "string",
        demandOption: true,
        describe: "Drive folder, e.g. /Photos",
      }),
    handler: argv => includeCmd(argv.folder),
  })
  .command({
    command: "folders",
    describe: "Choose which top-level folders to exclude from sync",
    handler: () => foldersCmd(),
  })
  .command({
    command: "move [path]",
    describe: "Move the local Dropbox folder (prompts when no path is given)",
    builder: y =>
      y.positional("path", {
        type: "string",
        describe: "New location of the Dropbox folder",
      }),
    handler: argv => moveCmd(argv.path),
  })
  .command({
    command: "status",
    describe: "Show current configuration and last sync status",
    handler: () => statusCmd(),
  })
  .command({
    command: "config <action> <key> [value]",
    describe: "Get or set configuration",
    builder: y =>
      y
        .positional("action", {
          choices: ["get", "set"] as const,
          demandOption: true,
          describe: "Whether to read or update a setting",
        })
        .positional("key", {
          type: "string",
          demandOption: true,
          describe: "Config key (e.g. path, watchIntervalSeconds)",
        })
        .positional("value", {
          type: "string",
          describe: "New value (only required for set)",
        }),
    handler: async argv => {
      if (argv.action === "get") {
        await configGetCmd(argv.key);
      } else {
        if (argv.value === undefined) {
          console.error("Error: missing value for config set");
          process.exit(1);
        }
        await configSetCmd(argv.key, argv.value);
      }
    },
  })
  .demandCommand(1, "You need to specify a command")
  .help()
  .parseAsync()
  .catch(err => {
    console.error(err);
    process.exit(1);
  });
