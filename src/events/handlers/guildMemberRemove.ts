/**
 * Unbinds members who leave a monitored guild and announces it in the guild's
 * system channel.
 */
import { createEvent, type UsingClient } from "seyfert";
import { configStore } from "@/configuration";
import { ConfigurableModule } from "@/configuration/constants";
import {
  bindingRepo,
  bindingService,
  purgeOnLeave,
  type LeaveAnnouncer,
  type MemberLeave,
} from "@/modules/bindings";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/** Reads guild and user ids from the payload, whichever shape the cache delivered. */
export function readMemberLeave(payload: unknown): MemberLeave | null {
  if (!isRecord(payload)) return null;
  const guildId = payload.guildId;
  const user = isRecord(payload.user) ? payload.user : payload;
  const chatId = user.id;
  if (typeof guildId !== "string" || typeof chatId !== "string") return null;
  const username = typeof user.username === "string" ? user.username : chatId;
  return { guildId, chatId, username };
}

const systemChannelAnnouncer = (client: UsingClient): LeaveAnnouncer => ({
  async announce(guildId, content) {
    const guild = await client.guilds.fetch(guildId);
    if (!guild.systemChannelId) return;
    await client.messages.write(guild.systemChannelId, { content });
  },
});

export default createEvent({
  data: { name: "guildMemberRemove" },
  async run(member, client) {
    const leave = readMemberLeave(member);
    if (!leave) return;

    const result = await purgeOnLeave(leave, {
      config: () => configStore.get(ConfigurableModule.GroupLeave),
      repo: bindingRepo,
      bindings: bindingService,
      announcer: systemChannelAnnouncer(client),
    });
    if (result?.outcome === "PURGED") {
      client.logger.info(`[Bindings] ${leave.chatId} left ${leave.guildId}; account ${result.binding.accountId} unbound`);
    }
  },
});
