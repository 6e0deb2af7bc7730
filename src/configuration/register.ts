/**
 * Explicit config schema loader.
 *
 * RISK: if a module's config file is not imported here, ConfigStore throws for
 * its key.
 */
import "@/modules/bindings/config";
import "@/modules/check-in/config";
import "@/modules/heist/config";
import "@/modules/notifications/config";
