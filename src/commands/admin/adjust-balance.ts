/**
 * Adjust Balance Command (admin).
 *
 * Purpose: add or remove display quota on a linked account. The result never
 * goes below zero.
 */
import {
  Command,
  type CommandContext,
  Declare,
  Options,
  createNumberOption,
  createStringOption,
} from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { quotaService } from "@/modules/quota";
import { buildErrorEmbed, buildToneEmbed } from "@/modules/ui/embeds";
import { assertNever } from "@/utils/exhaustive";
import { formatQuota } from "@/utils/template";

const options = {
  identifier: createStringOption({
    description: "Site account id or Discord user id",
    required: true,
  }),
  amount: createNumberOption({
    description: "Display quota to add (negative to remove)",
    required: true,
  }),
};

@Declare({
  name: "adjust-balance",
  description: "Add or remove quota on a linked account",
  defaultMemberPermissions: ["ManageGuild"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class AdjustBalanceCommand extends Command {
  async run(ctx: CommandContext<typeof options>) {
    const { identifier, amount } = ctx.options;
    const result = await quotaService.adjustBalance(identifier, amount);

    switch (result.outcome) {
      case "USER_NOT_FOUND":
        await ctx.write({
          embeds: [buildErrorEmbed(`No linked user matches \`${identifier}\`.`)],
          flags: MessageFlags.Ephemeral,
        });
        return;
      case "LOOKUP_FAILED":
        await ctx.write({
          embeds: [buildErrorEmbed("Bindings are unavailable right now. Try again later.")],
          flags: MessageFlags.Ephemeral,
        });
        return;
      case "API_FETCH_FAILED":
        await ctx.write({
          embeds: [buildErrorEmbed(`Could not load account ${result.accountId} from the site.`)],
          flags: MessageFlags.Ephemeral,
        });
        return;
      case "API_UPDATE_FAILED":
        await ctx.write({
          embeds: [buildErrorEmbed(`Updating the balance of account ${result.accountId} failed.`)],
          flags: MessageFlags.Ephemeral,
        });
        return;
      case "SUCCESS": {
        const verb = amount >= 0 ? "Added" : "Removed";
        await ctx.write({
          embeds: [
            buildToneEmbed({
              tone: "success",
              emoji: "✅",
              title: "Balance adjusted",
              description: `${verb} **${formatQuota(Math.abs(amount))}** for account **${result.accountId}**.\nNew balance: **${formatQuota(result.newDisplayQuota)}**`,
              footerText: result.clamped ? "Clamped at 0" : undefined,
            }),
          ],
          flags: MessageFlags.Ephemeral,
        });
        return;
      }
      default:
        assertNever(result);
    }
  }
}
