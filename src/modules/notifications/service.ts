import type { AccountId, ChatId } from "@/db/types";
import { renderTemplate } from "@/utils/template";
import type { NotificationsConfig } from "./config";

export type BindSuccessDm = {
  accountId: AccountId;
  group: string;
  chatId: ChatId;
  username: string;
  siteUsername: string | null;
};

/** Direct message text for a fresh binding, or null when the DM is disabled. */
export function renderBindSuccessDm(config: NotificationsConfig, dm: BindSuccessDm): string | null {
  if (!config.bindSuccessDmEnabled) return null;
  return renderTemplate(config.bindSuccessDmTemplate, {
    id: dm.accountId,
    group: dm.group,
    chatId: dm.chatId,
    username: dm.username,
    siteUsername: dm.siteUsername ?? "unknown",
  });
}
