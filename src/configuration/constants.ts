/**
 * Canonical keys for the bot's settings areas.
 *
 * Invariants:
 * - Keys double as the top-level property names in the settings file.
 * - Each key should be registered with defineConfig.
 */
export enum ConfigurableModule {
  Binding = "binding",
  CheckIn = "checkIn",
  Heist = "heist",
  GroupLeave = "groupLeave",
  Notifications = "notifications",
}
