/**
 * Heist Command.
 *
 * Purpose: try to take quota from another linked member. Risky: a failed heist
 * pays the target a penalty.
 */
import {
  Command,
  type CommandContext,
  Declare,
  Options,
  createUserOption,
} from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { configStore } from "@/configuration";
import { ConfigurableModule } from "@/configuration/constants";
import { buildHeistEmbed, describeHeistResult, heistService } from "@/modules/heist";
import { buildErrorEmbed } from "@/modules/ui/embeds";

const options = {
  target: createUserOption({
    description: "Member to rob",
    required: true,
  }),
};

@Declare({
  name: "heist",
  description: "Attempt to steal quota from another member (risky!)",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@Options(options)
export default class HeistCommand extends Command {
  async run(ctx: CommandContext<typeof options>) {
    const target = ctx.options.target;

    if (target.bot) {
      await ctx.write({
        embeds: [buildErrorEmbed("Bots have nothing worth stealing.")],
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    const result = await heistService.executeHeist(ctx.author.id, target.id);
    const reply = describeHeistResult(
      result,
      configStore.get(ConfigurableModule.Heist).templates,
      `<@${target.id}>`,
    );

    const settled = result.outcome === "SUCCESS" || result.outcome === "CRITICAL" || result.outcome === "FAILURE";
    await ctx.write({
      embeds: [buildHeistEmbed(reply)],
      flags: settled ? undefined : MessageFlags.Ephemeral,
    });
  }
}
