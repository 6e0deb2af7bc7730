/**
 * Heist settings.
 *
 * Amounts are display quota. `minAmount > maxAmount` is accepted and normalized
 * when the outcome is resolved.
 */
import { defineConfig, z } from "@/configuration/definitions";
import { ConfigurableModule } from "@/configuration/constants";

const probability = z.number().min(0).max(1);
const displayAmount = z.number().nonnegative();

const heistTemplates = z
  .object({
    success: z.string().default("Heist succeeded: +{gain}"),
    critical: z.string().default("Critical heist! +{gain}"),
    failure: z.string().default("Heist failed, you paid a penalty of {penalty}"),
    disabled: z.string().default("Heists are not enabled."),
    robberNotBound: z.string().default("Link your account with /bind first."),
    victimNotFound: z.string().default("Could not find a linked account for {victim}."),
    cannotRobSelf: z.string().default("You cannot rob yourself."),
    attemptsExceeded: z.string().default("You are out of heist attempts for today."),
    defensesExceeded: z
      .string()
      .default("Account {victimId} is on alert and cannot be robbed again today."),
    apiError: z.string().default("Something went wrong while moving quota. Please contact an admin."),
  })
  .default({});

export const heistConfig = defineConfig(
  ConfigurableModule.Heist,
  z.object({
    enabled: z.boolean().default(false),
    failureChance: probability.default(0.5),
    failurePenalty: displayAmount.default(100),
    minAmount: displayAmount.default(5),
    maxAmount: displayAmount.default(40),
    criticalChance: probability.default(0.1),
    maxAttemptsPerDay: z.number().int().nonnegative().default(1),
    maxDefensesPerDay: z.number().int().nonnegative().default(3),
    templates: heistTemplates,
  }),
);

export type HeistConfig = z.infer<typeof heistConfig>;
export type HeistTemplates = HeistConfig["templates"];

declare module "@/configuration/definitions" {
  export interface ConfigDefinitions {
    [ConfigurableModule.Heist]: z.infer<typeof heistConfig>;
  }
}
