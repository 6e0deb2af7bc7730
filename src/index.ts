/**
 * Bot entrypoint: loads settings, starts the Seyfert client and uploads commands.
 * Commands and events are discovered by Seyfert from the locations in
 * seyfert.config.js.
 */
import "module-alias/register";
import "dotenv/config";

import type { ParseClient } from "seyfert";
import { Client } from "seyfert";
import { ConfigLoadError, configStore } from "@/configuration";
import { disconnectDb } from "@/db/mongo";

const client = new Client<true>();

async function bootstrap(): Promise<void> {
  console.log("[bootstrap] Starting bot...");
  await configStore.load();
  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

bootstrap().catch((error) => {
  if (error instanceof ConfigLoadError) {
    console.error(`[bootstrap] ${error.message}`);
  } else {
    console.error("[bootstrap] Failed to start bot:", error);
  }
  disconnectDb()
    .catch((closeError) => console.error("[bootstrap] Failed to close MongoDB:", closeError))
    .finally(() => process.exit(1));
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {}
}
