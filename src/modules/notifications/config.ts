/**
 * Direct-message notifications.
 *
 * Template placeholders: {id} {group} {chatId} {username} {siteUsername}.
 */
import { defineConfig, z } from "@/configuration/definitions";
import { ConfigurableModule } from "@/configuration/constants";

export const notificationsConfig = defineConfig(
  ConfigurableModule.Notifications,
  z.object({
    bindSuccessDmEnabled: z.boolean().default(false),
    bindSuccessDmTemplate: z
      .string()
      .default("Hi {username}! Your Discord account is now linked to {siteUsername} (ID {id}) in group {group}."),
  }),
);

export type NotificationsConfig = z.infer<typeof notificationsConfig>;

declare module "@/configuration/definitions" {
  export interface ConfigDefinitions {
    [ConfigurableModule.Notifications]: z.infer<typeof notificationsConfig>;
  }
}
