/**
 * Lookup Command (admin).
 *
 * Purpose: find a binding by remote account id or Discord user id.
 */
import {
  Command,
  type CommandContext,
  Declare,
  Options,
  createStringOption,
} from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { bindingService } from "@/modules/bindings";
import { buildErrorEmbed, buildToneEmbed } from "@/modules/ui/embeds";

const options = {
  identifier: createStringOption({
    description: "Site account id or Discord user id",
    required: true,
  }),
};

@Declare({
  name: "lookup",
  description: "Find a binding by site account id or Discord user id",
  defaultMemberPermissions: ["ManageGuild"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class LookupCommand extends Command {
  async run(ctx: CommandContext<typeof options>) {
    const { identifier } = ctx.options;
    const result = await bindingService.lookup(identifier);

    if (result.kind === "ERROR") {
      await ctx.write({
        embeds: [buildErrorEmbed("Bindings are unavailable right now. Try again later.")],
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    if (result.kind === "NOT_FOUND") {
      await ctx.write({
        embeds: [buildErrorEmbed(`No binding matches \`${identifier}\`.`)],
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    const { binding } = result;
    const matched = result.kind === "ACCOUNT_ID" ? "site account id" : "Discord user id";
    const boundAt = Math.floor(binding.boundAt.getTime() / 1000);
    await ctx.write({
      embeds: [
        buildToneEmbed({
          tone: "info",
          emoji: "🔎",
          title: "Binding found",
          description: `Matched by **${matched}**.`,
          fields: [
            { name: "Site account", value: String(binding.accountId), inline: true },
            { name: "Discord user", value: `<@${binding.chatId}> (${binding.chatId})`, inline: true },
            { name: "Linked", value: `<t:${boundAt}:f>`, inline: false },
          ],
        }),
      ],
      flags: MessageFlags.Ephemeral,
    });
  }
}
