import { ConfigStore, JsonConfigStore } from "../utils/config";
import { createBeeWithBatch, ownerAddress } from "../utils/swarm";

export async function linkAccount(store: ConfigStore): Promise<void> {
  console.log("Initializing Bee client and ensuring postage stamp exists…");
  const { bee, batch } = await createBeeWithBatch(process.env.BEE_API, process.env.BEE_SIGNER_KEY);

  const owner = ownerAddress(bee);
  const batchId = batch.batchID.toString();
  store.set("account", "owner", owner);
  store.set("account", "batchId", batchId);

  console.log(`Linked drive of ${owner} → batchID: ${batchId}`);
}

export async function linkCmd(store: ConfigStore = new JsonConfigStore()): Promise<void> {
  await linkAccount(store);
}
