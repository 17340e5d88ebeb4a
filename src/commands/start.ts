import { openController } from "./controller";

export async function startCmd(run = true): Promise<void> {
  const controller = await openController({ run });
  console.log(`${controller.toString()} → ${controller.getDropboxDirectory()}`);
  console.log(controller.syncing ? "Syncing… press Ctrl+C to stop." : "Sync is paused.");

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, stopping sync…`);
    controller
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("Error while stopping sync:", err);
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}
