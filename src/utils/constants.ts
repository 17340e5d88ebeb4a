import { NULL_ADDRESS, NULL_TOPIC, Reference } from "@ethersphere/bee-js";
import os from "os";
import path from "path";

export const DRIVE_FEED_TOPIC = NULL_TOPIC;
export const SWARM_ZERO_ADDRESS = new Reference(NULL_ADDRESS);
export const SWARM_DROPBOX_STAMP_LABEL = "swarm-dropbox-stamp";
export const DEFAULT_BEE_URL = "http://127.0.0.1:1633";

export const CONFIG_FILE = ".swarm-dropbox.json";
export const REVISION_FILE = ".swarm-dropbox-revs.json";
export const DEFAULT_DROPBOX_PATH = path.join(os.homedir(), "Swarm Dropbox");

export const DEFAULT_WATCH_INTERVAL_SECONDS = 5;
export const DEFAULT_POLL_INTERVAL_SECONDS = 60;
export const CONNECTION_CHECK_INTERVAL_MS = 10_000;

export const CONNECTION_ERROR_MSG =
  "Cannot connect to Swarm. Please check your internet connection and Bee node, and try again later.";
