/**
 * Balance Command.
 *
 * Purpose: show the display quota of the caller's linked account.
 */
import { Command, type CommandContext, Declare } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { quotaService } from "@/modules/quota";
import { buildErrorEmbed, buildToneEmbed } from "@/modules/ui/embeds";
import { assertNever } from "@/utils/exhaustive";
import { formatQuota } from "@/utils/template";

@Declare({
  name: "balance",
  description: "Show the quota of your linked account",
  contexts: ["Guild", "BotDM"],
  integrationTypes: ["GuildInstall"],
})
export default class BalanceCommand extends Command {
  async run(ctx: CommandContext) {
    const result = await quotaService.getBalance(ctx.author.id);

    switch (result.outcome) {
      case "NOT_BOUND":
        await ctx.write({
          embeds: [buildErrorEmbed("Your account is not linked yet. Use /bind first.")],
          flags: MessageFlags.Ephemeral,
        });
        return;
      case "API_ERROR":
        await ctx.write({
          embeds: [buildErrorEmbed("Could not fetch your balance. Try again later.")],
          flags: MessageFlags.Ephemeral,
        });
        return;
      case "SUCCESS":
        await ctx.write({
          embeds: [
            buildToneEmbed({
              tone: "info",
              emoji: "💳",
              title: "Balance",
              description: `Linked account: **${result.accountId}**\nRemaining quota: **${formatQuota(result.displayQuota)}**`,
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
