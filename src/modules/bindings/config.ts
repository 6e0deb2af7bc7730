/**
 * Binding and guild-leave settings.
 *
 * Invariants:
 * - `quotaDisplayRatio` is a positive integer shared by every quota conversion.
 * - `monitoredGuildIds` are snowflake strings; leaving any other guild is ignored.
 */
import { defineConfig, z } from "@/configuration/definitions";
import { ConfigurableModule } from "@/configuration/constants";

export const bindingConfig = defineConfig(
  ConfigurableModule.Binding,
  z.object({
    quotaDisplayRatio: z.number().int().positive().default(500_000),
    /** Remote group assigned on a successful bind. */
    bindingGroup: z.string().min(1).default("default"),
    /** Discord accounts younger than this cannot bind. 0 disables the check. */
    minAccountAgeDays: z.number().int().nonnegative().default(0),
  }),
);

export const groupLeaveConfig = defineConfig(
  ConfigurableModule.GroupLeave,
  z.object({
    monitoredGuildIds: z.array(z.string().regex(/^\d{17,20}$/)).default([]),
    revertGroup: z.string().min(1).default("default"),
    announce: z.boolean().default(true),
    announcementTemplate: z
      .string()
      .default(
        "{username} ({chatId}) left the server. Their linked account {id} was unbound and moved back to {group}.",
      ),
  }),
);

export type BindingConfig = z.infer<typeof bindingConfig>;
export type GroupLeaveConfig = z.infer<typeof groupLeaveConfig>;

declare module "@/configuration/definitions" {
  export interface ConfigDefinitions {
    [ConfigurableModule.Binding]: z.infer<typeof bindingConfig>;
    [ConfigurableModule.GroupLeave]: z.infer<typeof groupLeaveConfig>;
  }
}
