/**
 * Heist Orchestrator.
 *
 * Purpose: run one heist from guards to ledger entry.
 *
 * Invariants:
 * - Guards run in a fixed order and all of them precede any mutation.
 * - A ledger entry is appended if and only if the transfer succeeded.
 * - Nothing throws out of `executeHeist`; unexpected faults become API_ERROR.
 */
import { configStore } from "@/configuration";
import { ConfigurableModule } from "@/configuration/constants";
import type { ChatId } from "@/db/types";
import {
  bindingRepo,
  bindingService,
  type BindingRepo,
  type BindingService,
} from "@/modules/bindings";
import { quotaTransferEngine, type QuotaTransferEngine } from "@/modules/quota";
import { mathRandom, type RandomSource } from "@/utils/rng";
import type { HeistConfig } from "./config";
import { createDailyLimiter, type DailyLimiter } from "./limiter";
import { resolveHeistOutcome } from "./outcome";
import { heistLedgerRepo, type HeistLedgerRepo } from "./repository";
import type { HeistLedgerEntry, HeistResult } from "./types";

export interface HeistService {
  executeHeist(robberChatId: ChatId, victimIdentifier: string): Promise<HeistResult>;
}

export type HeistServiceDeps = {
  config: () => HeistConfig;
  bindings: Pick<BindingService, "lookup">;
  repo: Pick<BindingRepo, "findByChatId">;
  ledger: HeistLedgerRepo;
  limiter?: DailyLimiter;
  transfers: QuotaTransferEngine;
  rng?: RandomSource;
  now?: () => Date;
};

const API_ERROR: HeistResult = { outcome: "API_ERROR" };

class HeistServiceImpl implements HeistService {
  private readonly limiter: DailyLimiter;
  private readonly rng: RandomSource;
  private readonly now: () => Date;

  constructor(private readonly deps: HeistServiceDeps) {
    this.limiter = deps.limiter ?? createDailyLimiter(deps.ledger);
    this.rng = deps.rng ?? mathRandom;
    this.now = deps.now ?? (() => new Date());
  }

  async executeHeist(robberChatId: ChatId, victimIdentifier: string): Promise<HeistResult> {
    try {
      return await this.run(robberChatId, victimIdentifier);
    } catch (error) {
      console.error("[Heist] unexpected failure:", { robberChatId, victimIdentifier, error });
      return API_ERROR;
    }
  }

  private async run(robberChatId: ChatId, victimIdentifier: string): Promise<HeistResult> {
    const config = this.deps.config();
    if (!config.enabled) return { outcome: "DISABLED" };

    const robberLookup = await this.deps.repo.findByChatId(robberChatId);
    if (robberLookup.isErr()) {
      console.error("[Heist] robber lookup failed:", robberLookup.error);
      return API_ERROR;
    }
    const robber = robberLookup.value;
    if (!robber) return { outcome: "ROBBER_NOT_BOUND" };

    const victimLookup = await this.deps.bindings.lookup(victimIdentifier);
    if (victimLookup.kind === "ERROR") return API_ERROR;
    if (victimLookup.kind === "NOT_FOUND") {
      return { outcome: "VICTIM_NOT_FOUND", victimIdentifier };
    }
    const victim = victimLookup.binding;

    if (robber.accountId === victim.accountId) return { outcome: "CANNOT_ROB_SELF" };

    const attempts = await this.limiter.attemptsExceeded(robberChatId, config.maxAttemptsPerDay);
    if (attempts.isErr()) {
      console.error("[Heist] attempt count failed:", attempts.error);
      return API_ERROR;
    }
    if (attempts.value) return { outcome: "ATTEMPTS_EXCEEDED" };

    const defenses = await this.limiter.defensesExceeded(victim.accountId, config.maxDefensesPerDay);
    if (defenses.isErr()) {
      console.error("[Heist] defense count failed:", defenses.error);
      return API_ERROR;
    }
    if (defenses.value) {
      return { outcome: "DEFENSES_EXCEEDED", victimAccountId: victim.accountId };
    }

    const resolved = resolveHeistOutcome(config, this.rng);

    if (resolved.outcome === "FAILURE") {
      const moved = await this.deps.transfers.transfer({
        from: robber.accountId,
        to: victim.accountId,
        displayAmount: resolved.displayAmount,
        allowPartial: false,
      });
      if (!moved.success) {
        console.warn("[Heist] penalty transfer failed", {
          robberChatId,
          victimAccountId: victim.accountId,
          penalty: resolved.displayAmount,
        });
        return API_ERROR;
      }
      await this.record({
        robberChatId,
        victimAccountId: victim.accountId,
        outcome: "FAILURE",
        amount: moved.actualRawAmount === 0 ? 0 : -moved.actualRawAmount,
        heistAt: this.now(),
      });
      return {
        outcome: "FAILURE",
        penalty: moved.actualDisplayAmount,
        victimAccountId: victim.accountId,
      };
    }

    const moved = await this.deps.transfers.transfer({
      from: victim.accountId,
      to: robber.accountId,
      displayAmount: resolved.displayAmount,
      allowPartial: true,
    });
    if (!moved.success) {
      console.warn("[Heist] gain transfer failed", {
        robberChatId,
        victimAccountId: victim.accountId,
        amount: resolved.displayAmount,
      });
      return API_ERROR;
    }

    // A critical clamped down by the victim's balance is reported as a plain success.
    const outcome =
      resolved.outcome === "CRITICAL" && moved.actualDisplayAmount > resolved.baseAmount
        ? "CRITICAL"
        : "SUCCESS";

    await this.record({
      robberChatId,
      victimAccountId: victim.accountId,
      outcome,
      amount: moved.actualRawAmount,
      heistAt: this.now(),
    });
    return { outcome, gain: moved.actualDisplayAmount, victimAccountId: victim.accountId };
  }

  private async record(entry: HeistLedgerEntry): Promise<void> {
    const res = await this.deps.ledger.append(entry);
    if (res.isErr()) {
      console.error("[Heist] ledger append failed after a settled transfer", {
        ...entry,
        error: res.error,
      });
    }
  }
}

export function createHeistService(deps: HeistServiceDeps): HeistService {
  return new HeistServiceImpl(deps);
}

export const heistService: HeistService = createHeistService({
  config: () => configStore.get(ConfigurableModule.Heist),
  bindings: bindingService,
  repo: bindingRepo,
  ledger: heistLedgerRepo,
  transfers: quotaTransferEngine,
});
