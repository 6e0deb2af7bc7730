/**
 * Ensures storage indexes once the gateway session is ready.
 */
import { createEvent } from "seyfert";
import { ensureBindingIndexes } from "@/modules/bindings";
import { ensureHeistLogIndexes } from "@/modules/heist";

export default createEvent({
  data: { name: "botReady", once: true },
  async run(user, client) {
    client.logger.info(`${user.username} is online`);
    await Promise.all([ensureBindingIndexes(), ensureHeistLogIndexes()]);
  },
});
