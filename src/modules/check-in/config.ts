/**
 * Daily check-in settings.
 *
 * `timezoneOffsetHours` only shifts the day boundary; stored timestamps stay UTC.
 */
import { defineConfig, z } from "@/configuration/definitions";
import { ConfigurableModule } from "@/configuration/constants";

export const checkInConfig = defineConfig(
  ConfigurableModule.CheckIn,
  z.object({
    enabled: z.boolean().default(false),
    timezoneOffsetHours: z.number().min(-12).max(14).default(0),
    firstCheckInBonusEnabled: z.boolean().default(false),
    firstCheckInBonusDisplayQuota: z.number().nonnegative().default(0),
    doubleChance: z.number().min(0).max(1).default(0),
    minDisplayQuota: z.number().nonnegative().default(0),
    maxDisplayQuota: z.number().nonnegative().default(0),
    templates: z
      .object({
        success: z
          .string()
          .default("Checked in! +{displayAdded}, balance is now {displayTotal}."),
        doubled: z
          .string()
          .default("Lucky day! Doubled check-in: +{displayAdded}, balance is now {displayTotal}."),
        firstCheckIn: z
          .string()
          .default("Welcome! First check-in bonus: +{displayAdded}, balance is now {displayTotal}."),
      })
      .default({}),
  }),
);

export type CheckInConfig = z.infer<typeof checkInConfig>;

declare module "@/configuration/definitions" {
  export interface ConfigDefinitions {
    [ConfigurableModule.CheckIn]: z.infer<typeof checkInConfig>;
  }
}
