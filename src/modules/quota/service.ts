/**
 * Balance queries and admin adjustments, in display quota.
 */
import type { AccountId, ChatId } from "@/db/types";
import type { BindingRepo, BindingService } from "@/modules/bindings";
import type { RemoteAccountGateway } from "@/modules/remote-accounts";
import { toDisplay, toRaw } from "./units";

export type AdjustBalanceResult =
  | { outcome: "USER_NOT_FOUND"; identifier: string }
  | { outcome: "LOOKUP_FAILED"; identifier: string }
  | { outcome: "API_FETCH_FAILED"; accountId: AccountId }
  | { outcome: "API_UPDATE_FAILED"; accountId: AccountId }
  | {
      outcome: "SUCCESS";
      accountId: AccountId;
      chatId: ChatId;
      /** True when the delta would have gone below zero. */
      clamped: boolean;
      newDisplayQuota: number;
    };

export type BalanceResult =
  | { outcome: "NOT_BOUND" }
  | { outcome: "API_ERROR"; accountId: AccountId }
  | { outcome: "SUCCESS"; accountId: AccountId; displayQuota: number };

export interface QuotaService {
  adjustBalance(identifier: string, displayDelta: number): Promise<AdjustBalanceResult>;
  getBalance(chatId: ChatId): Promise<BalanceResult>;
}

export type QuotaServiceDeps = {
  bindings: Pick<BindingService, "lookup">;
  repo: Pick<BindingRepo, "findByChatId">;
  gateway: RemoteAccountGateway;
  ratio: () => number;
};

class QuotaServiceImpl implements QuotaService {
  constructor(private readonly deps: QuotaServiceDeps) {}

  async adjustBalance(identifier: string, displayDelta: number): Promise<AdjustBalanceResult> {
    const { bindings, gateway } = this.deps;
    const ratio = this.deps.ratio();

    const found = await bindings.lookup(identifier);
    if (found.kind === "NOT_FOUND") return { outcome: "USER_NOT_FOUND", identifier };
    if (found.kind === "ERROR") return { outcome: "LOOKUP_FAILED", identifier };
    const { accountId, chatId } = found.binding;

    const account = (await gateway.fetchAccount(accountId)).unwrapOr(null);
    if (!account) return { outcome: "API_FETCH_FAILED", accountId };

    let next = account.quota + toRaw(displayDelta, ratio);
    const clamped = next < 0;
    if (clamped) {
      console.warn(`[QuotaTransfer] adjustment for account ${accountId} would go negative; clamping to 0`);
      next = 0;
    }

    const written = (await gateway.replaceAccount({ ...account, quota: next })).unwrapOr(false);
    if (!written) return { outcome: "API_UPDATE_FAILED", accountId };

    console.info("[QuotaTransfer] balance adjusted", { accountId, displayDelta, newRaw: next });
    return {
      outcome: "SUCCESS",
      accountId,
      chatId,
      clamped,
      newDisplayQuota: toDisplay(next, ratio),
    };
  }

  async getBalance(chatId: ChatId): Promise<BalanceResult> {
    const binding = (await this.deps.repo.findByChatId(chatId)).unwrapOr(null);
    if (!binding) return { outcome: "NOT_BOUND" };

    const account = (await this.deps.gateway.fetchAccount(binding.accountId)).unwrapOr(null);
    if (!account) return { outcome: "API_ERROR", accountId: binding.accountId };

    return {
      outcome: "SUCCESS",
      accountId: binding.accountId,
      displayQuota: toDisplay(account.quota, this.deps.ratio()),
    };
  }
}

export function createQuotaService(deps: QuotaServiceDeps): QuotaService {
  return new QuotaServiceImpl(deps);
}
