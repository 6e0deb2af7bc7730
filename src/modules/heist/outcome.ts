import { type RandomSource, uniform } from "@/utils/rng";
import type { HeistConfig } from "./config";
import type { ResolvedOutcome } from "./types";

export type OutcomeConfig = Pick<
  HeistConfig,
  "failureChance" | "failurePenalty" | "minAmount" | "maxAmount" | "criticalChance"
>;

/**
 * Classifies one heist attempt. Draw order: failure roll, magnitude, critical roll.
 * A swapped range (`minAmount > maxAmount`) is normalized before drawing.
 */
export function resolveHeistOutcome(config: OutcomeConfig, rng: RandomSource): ResolvedOutcome {
  if (rng() < config.failureChance) {
    return {
      outcome: "FAILURE",
      displayAmount: config.failurePenalty,
      baseAmount: config.failurePenalty,
    };
  }

  const low = Math.min(config.minAmount, config.maxAmount);
  const high = Math.max(config.minAmount, config.maxAmount);
  const base = uniform(rng, low, high);

  if (rng() < config.criticalChance) {
    return { outcome: "CRITICAL", displayAmount: base * 2, baseAmount: base };
  }
  return { outcome: "SUCCESS", displayAmount: base, baseAmount: base };
}
