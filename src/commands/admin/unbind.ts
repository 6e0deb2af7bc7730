/**
 * Unbind Command (admin).
 *
 * Purpose: force-remove the binding of a remote account id and move the account
 * back to the leave group.
 */
import {
  Command,
  type CommandContext,
  Declare,
  Options,
  createIntegerOption,
} from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { bindingService } from "@/modules/bindings";
import { buildErrorEmbed, buildToneEmbed } from "@/modules/ui/embeds";
import { assertNever } from "@/utils/exhaustive";

const options = {
  "account-id": createIntegerOption({
    description: "Remote account id to unbind",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "unbind",
  description: "Remove the link of a site account",
  defaultMemberPermissions: ["ManageGuild"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class UnbindCommand extends Command {
  async run(ctx: CommandContext<typeof options>) {
    const accountId = ctx.options["account-id"];
    const result = await bindingService.purge(accountId);

    switch (result.outcome) {
      case "NOT_FOUND":
        await ctx.write({
          embeds: [buildErrorEmbed(`No binding found for account ${accountId}.`)],
          flags: MessageFlags.Ephemeral,
        });
        return;
      case "DELETE_FAILED":
        await ctx.write({
          embeds: [buildErrorEmbed(`Unbinding account ${accountId} failed. Check the logs.`)],
          flags: MessageFlags.Ephemeral,
        });
        return;
      case "PURGED":
        await ctx.write({
          embeds: [
            buildToneEmbed({
              tone: "success",
              emoji: "✅",
              title: "Unbound",
              description: `Account **${accountId}** is no longer linked to <@${result.binding.chatId}>.`,
              footerText: result.groupReverted ? undefined : "Group could not be reverted",
            }),
          ],
          flags: MessageFlags.Ephemeral,
        });
        return;
      default:
        assertNever(result);
    }
  }
}
