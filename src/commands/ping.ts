/**
 * Ping Command.
 *
 * Purpose: report gateway latency and whether the database answers.
 */
import { Command, type CommandContext, Declare } from "seyfert";
import { pingDb } from "@/db/mongo";

@Declare({
  name: "ping",
  description: "Show gateway latency and database status",
})
export default class PingCommand extends Command {
  async run(ctx: CommandContext) {
    const latency = ctx.client.gateway.latency;
    const dbUp = await pingDb();

    await ctx.write({
      content: `Latency is \`${latency}ms\` · database ${dbUp ? "reachable ✅" : "unreachable ❌"}`,
    });
  }
}
