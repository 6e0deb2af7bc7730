/**
 * Automatic unbind when a member leaves a monitored guild.
 */
import type { ChatId, GuildId } from "@/db/types";
import { renderTemplate } from "@/utils/template";
import type { GroupLeaveConfig } from "./config";
import type { BindingRepo } from "./repository";
import type { BindingService } from "./service";
import type { PurgeResult } from "./types";

export type MemberLeave = {
  guildId: GuildId;
  chatId: ChatId;
  username: string;
};

/** Posts the public notice; implemented over the Discord client at runtime. */
export interface LeaveAnnouncer {
  announce(guildId: GuildId, content: string): Promise<void>;
}

export type LeavePurgeDeps = {
  config: () => GroupLeaveConfig;
  repo: Pick<BindingRepo, "findByChatId">;
  bindings: Pick<BindingService, "purge">;
  announcer?: LeaveAnnouncer;
};

/**
 * Purges the leaver's binding when the guild is monitored. Resolves the purge
 * result, or null when nothing was attempted.
 */
export async function purgeOnLeave(
  leave: MemberLeave,
  deps: LeavePurgeDeps,
): Promise<PurgeResult | null> {
  const config = deps.config();
  if (!config.monitoredGuildIds.includes(leave.guildId)) return null;

  const found = await deps.repo.findByChatId(leave.chatId);
  if (found.isErr()) {
    console.error("[Bindings] leave purge lookup failed:", found.error);
    return null;
  }
  if (!found.value) {
    console.info(`[Bindings] ${leave.chatId} left ${leave.guildId} without a binding`);
    return null;
  }

  const result = await deps.bindings.purge(found.value.accountId);
  if (result.outcome !== "PURGED") return result;

  if (config.announce && deps.announcer) {
    const content = renderTemplate(config.announcementTemplate, {
      username: leave.username,
      chatId: leave.chatId,
      id: result.binding.accountId,
      group: config.revertGroup,
    });
    try {
      await deps.announcer.announce(leave.guildId, content);
    } catch (error) {
      console.error("[Bindings] leave announcement failed:", { guildId: leave.guildId, error });
    }
  }
  return result;
}
