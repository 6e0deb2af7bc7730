/**
 * Bind Command.
 *
 * Purpose: link the caller's Discord account to a remote account id and, when
 * enabled, send a confirmation DM.
 */
import {
  Command,
  type CommandContext,
  Declare,
  Options,
  createIntegerOption,
} from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { configStore } from "@/configuration";
import { ConfigurableModule } from "@/configuration/constants";
import { bindingService, type BindResult } from "@/modules/bindings";
import { renderBindSuccessDm } from "@/modules/notifications";
import { buildErrorEmbed, buildToneEmbed } from "@/modules/ui/embeds";
import { assertNever } from "@/utils/exhaustive";
import { snowflakeCreatedAt } from "@/utils/snowflake";

const options = {
  "account-id": createIntegerOption({
    description: "Your user id on the quota site",
    required: true,
    min_value: 1,
  }),
};

function describeBindResult(result: BindResult): string {
  switch (result.outcome) {
    case "ALREADY_BOUND":
      return `You are already linked to account ${result.accountId}.`;
    case "ACCOUNT_TOO_NEW":
      return `Your Discord account is ${result.ageDays} days old; at least ${result.minAgeDays} days are required to link.`;
    case "REMOTE_ACCOUNT_NOT_FOUND":
      return `No account with id ${result.accountId} exists on the site. Check the id and try again.`;
    case "ACCOUNT_TAKEN":
      return `Account ${result.accountId} is already linked to someone else.`;
    case "BIND_FAILED":
      return "Linking failed and was rolled back. Please contact an admin.";
    case "BOUND":
      return `Linked to account ${result.binding.accountId} and moved to group **${result.group}**.`;
    default:
      return assertNever(result);
  }
}

@Declare({
  name: "bind",
  description: "Link your Discord account to your quota site account",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class BindCommand extends Command {
  async run(ctx: CommandContext<typeof options>) {
    const accountId = ctx.options["account-id"];
    const chatId = ctx.author.id;

    const result = await bindingService.bind(chatId, accountId, {
      accountCreatedAt: snowflakeCreatedAt(chatId),
    });
    const text = describeBindResult(result);

    if (result.outcome !== "BOUND") {
      await ctx.write({ embeds: [buildErrorEmbed(text)], flags: MessageFlags.Ephemeral });
      return;
    }

    await ctx.write({
      embeds: [buildToneEmbed({ tone: "success", emoji: "🔗", title: "Account linked", description: text })],
      flags: MessageFlags.Ephemeral,
    });

    const dm = renderBindSuccessDm(configStore.get(ConfigurableModule.Notifications), {
      accountId: result.binding.accountId,
      group: result.group,
      chatId,
      username: ctx.author.username,
      siteUsername: result.siteUsername,
    });
    if (!dm) return;

    try {
      await ctx.client.users.write(chatId, { content: dm });
    } catch (error) {
      ctx.client.logger.warn(`[Bindings] bind DM to ${chatId} failed: ${String(error)}`);
    }
  }
}
