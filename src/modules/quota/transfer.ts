/**
 * Quota Transfer Engine.
 *
 * Moves quota between two remote accounts through a non-transactional API:
 * debit the source, credit the destination, and on a failed credit write the
 * source back once. There is no retry loop.
 *
 * Invariants:
 * - Every write starts from a record fetched in this call; unknown fields round-trip.
 * - No write ever carries a negative quota.
 * - `success=false` always reports zero amounts.
 *
 * RISK: read-modify-write without a version check. Two concurrent transfers that
 * touch the same account can lose an update.
 */
import type { AccountId } from "@/db/types";
import type { RemoteAccountGateway } from "@/modules/remote-accounts";
import { toDisplay, toRaw } from "./units";

export type TransferRequest = {
  from: AccountId;
  to: AccountId;
  displayAmount: number;
  /** Clamp to the source balance instead of failing. */
  allowPartial: boolean;
};

export type TransferResult = {
  success: boolean;
  actualDisplayAmount: number;
  actualRawAmount: number;
};

export interface QuotaTransferEngine {
  transfer(request: TransferRequest): Promise<TransferResult>;
}

export type QuotaTransferDeps = {
  gateway: RemoteAccountGateway;
  ratio: () => number;
};

const FAILED: TransferResult = { success: false, actualDisplayAmount: 0, actualRawAmount: 0 };

class QuotaTransferEngineImpl implements QuotaTransferEngine {
  constructor(private readonly deps: QuotaTransferDeps) {}

  async transfer({ from, to, displayAmount, allowPartial }: TransferRequest): Promise<TransferResult> {
    const ratio = this.deps.ratio();
    const rawAmount = toRaw(displayAmount, ratio);
    const { gateway } = this.deps;

    const source = (await gateway.fetchAccount(from)).unwrapOr(null);
    const destination = (await gateway.fetchAccount(to)).unwrapOr(null);
    if (!source || !destination) return FAILED;

    const available = source.quota;
    let actual = rawAmount;
    if (available < rawAmount) {
      if (!allowPartial) return FAILED;
      actual = available;
    }

    if (actual <= 0) {
      return { success: true, actualDisplayAmount: 0, actualRawAmount: 0 };
    }

    const debited = { ...source, quota: source.quota - actual };
    const debitOk = (await gateway.replaceAccount(debited)).unwrapOr(false);
    if (!debitOk) return FAILED;

    const credited = { ...destination, quota: destination.quota + actual };
    const creditOk = (await gateway.replaceAccount(credited)).unwrapOr(false);
    if (!creditOk) {
      console.error("[QuotaTransfer] credit failed; restoring source balance", {
        from,
        to,
        amount: actual,
      });
      const restored = { ...debited, quota: debited.quota + actual };
      const restoreOk = (await gateway.replaceAccount(restored)).unwrapOr(false);
      if (!restoreOk) {
        console.error(
          `[QuotaTransfer] CRITICAL: rollback for account ${from} failed; ${actual} raw quota lost in transfer to ${to}. Manual reconciliation required.`,
          { from, to, amount: actual },
        );
      }
      return FAILED;
    }

    return {
      success: true,
      actualDisplayAmount: toDisplay(actual, ratio),
      actualRawAmount: actual,
    };
  }
}

export function createQuotaTransferEngine(deps: QuotaTransferDeps): QuotaTransferEngine {
  return new QuotaTransferEngineImpl(deps);
}
