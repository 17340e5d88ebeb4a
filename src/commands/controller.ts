import { SyncController, SyncControllerOptions } from "../controller/syncController";
import { ChangeMonitor } from "../monitor/changeMonitor";
import { SwarmClient } from "../remote/swarmClient";
import { JsonConfigStore } from "../utils/config";
import { makeBeeWithSigner } from "../utils/swarm";

import { linkAccount } from "./link";

/**
 * Wires the config store, Swarm client and monitor into a controller. Links a
 * drive first when none is configured.
 */
export async function openController(options: SyncControllerOptions = {}): Promise<SyncController> {
  const store = new JsonConfigStore();
  if (!store.get("account", "owner")) {
    await linkAccount(store);
  }

  const client = new SwarmClient(makeBeeWithSigner(process.env.BEE_API), store);
  const monitor = new ChangeMonitor(client, {
    watchIntervalSeconds: store.get("main", "watchIntervalSeconds"),
    pollIntervalSeconds: store.get("main", "pollIntervalSeconds"),
  });

  await monitor.checkConnection();
  monitor.startConnectionCheck();

  return SyncController.create({ store, client, monitor }, options);
}

/** Runs a one-off operation on a paused controller and shuts it down afterwards. */
export async function withController<T>(fn: (controller: SyncController) => Promise<T>): Promise<T> {
  const controller = await openController({ run: false });
  try {
    return await fn(controller);
  } finally {
    await controller.close();
  }
}
