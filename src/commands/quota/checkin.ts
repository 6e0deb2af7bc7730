/**
 * Check-in Command.
 *
 * Purpose: claim the daily quota grant.
 */
import { Command, type CommandContext, Declare } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { configStore } from "@/configuration";
import { ConfigurableModule } from "@/configuration/constants";
import {
  buildCheckInEmbed,
  checkInService,
  describeCheckInResult,
} from "@/modules/check-in";

@Declare({
  name: "checkin",
  description: "Claim your daily quota reward",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
export default class CheckInCommand extends Command {
  async run(ctx: CommandContext) {
    const result = await checkInService.performCheckIn(ctx.author.id);
    const reply = describeCheckInResult(result, configStore.get(ConfigurableModule.CheckIn));

    await ctx.write({
      embeds: [buildCheckInEmbed(reply)],
      flags: result.outcome === "SUCCESS" ? undefined : MessageFlags.Ephemeral,
    });
  }
}
