/**
 * Binding Service.
 *
 * Purpose: link, look up and unlink Discord users and remote accounts, keeping the
 * remote `group` in step with the link.
 *
 * Invariants:
 * - A failed bind leaves no binding row behind.
 * - Purge reverts the remote group best-effort; the row is deleted either way.
 */
import { configStore } from "@/configuration";
import { ConfigurableModule } from "@/configuration/constants";
import type { AccountId, ChatId } from "@/db/types";
import {
  remoteAccountGateway,
  type RemoteAccountGateway,
} from "@/modules/remote-accounts";
import type { BindingConfig, GroupLeaveConfig } from "./config";
import { bindingRepo, type BindingRepo } from "./repository";
import type {
  BindContext,
  BindResult,
  Binding,
  LookupResult,
  PurgeResult,
} from "./types";

const MS_PER_DAY = 1000 * 60 * 60 * 24;

export interface BindingService {
  /** Account id first (when the identifier is one), then chat id. */
  lookup(identifier: string): Promise<LookupResult>;
  bind(chatId: ChatId, accountId: AccountId, context: BindContext): Promise<BindResult>;
  purge(accountId: AccountId): Promise<PurgeResult>;
  /** Moves the remote account back to the configured leave group. */
  revertGroup(accountId: AccountId): Promise<boolean>;
}

export type BindingServiceDeps = {
  repo: BindingRepo;
  gateway: RemoteAccountGateway;
  bindingConfig: () => BindingConfig;
  groupLeaveConfig: () => GroupLeaveConfig;
};

/** Parses identifiers that can only be an account id: a safe positive integer. */
export function parseAccountId(identifier: string): AccountId | null {
  const trimmed = identifier.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

class BindingServiceImpl implements BindingService {
  constructor(private readonly deps: BindingServiceDeps) {}

  async lookup(identifier: string): Promise<LookupResult> {
    const { repo } = this.deps;
    const trimmed = identifier.trim();

    const accountId = parseAccountId(trimmed);
    if (accountId !== null) {
      const byAccount = await repo.findByAccountId(accountId);
      if (byAccount.isErr()) {
        console.error("[Bindings] lookup by account id failed:", byAccount.error);
        return { kind: "ERROR", error: byAccount.error };
      }
      if (byAccount.value) return { kind: "ACCOUNT_ID", binding: byAccount.value };
    }

    const byChat = await repo.findByChatId(trimmed);
    if (byChat.isErr()) {
      console.error("[Bindings] lookup by chat id failed:", byChat.error);
      return { kind: "ERROR", error: byChat.error };
    }
    if (byChat.value) return { kind: "CHAT_ID", binding: byChat.value };

    return { kind: "NOT_FOUND" };
  }

  async bind(chatId: ChatId, accountId: AccountId, context: BindContext): Promise<BindResult> {
    const { repo, gateway } = this.deps;
    const config = this.deps.bindingConfig();
    const now = context.now ?? new Date();

    const existing = await repo.findByChatId(chatId);
    if (existing.isErr()) {
      console.error("[Bindings] bind: existing binding check failed", { chatId, error: existing.error });
      return { outcome: "BIND_FAILED", accountId };
    }
    if (existing.value) {
      return { outcome: "ALREADY_BOUND", accountId: existing.value.accountId };
    }

    if (config.minAccountAgeDays > 0 && context.accountCreatedAt) {
      const ageDays = Math.floor((now.getTime() - context.accountCreatedAt.getTime()) / MS_PER_DAY);
      if (ageDays < config.minAccountAgeDays) {
        return { outcome: "ACCOUNT_TOO_NEW", ageDays, minAgeDays: config.minAccountAgeDays };
      }
    }

    const remote = await gateway.fetchAccount(accountId);
    if (remote.isErr()) return { outcome: "BIND_FAILED", accountId };
    if (!remote.value) return { outcome: "REMOTE_ACCOUNT_NOT_FOUND", accountId };

    const taken = await repo.findByAccountId(accountId);
    if (taken.isErr()) return { outcome: "BIND_FAILED", accountId };
    if (taken.value) return { outcome: "ACCOUNT_TAKEN", accountId };

    const binding: Binding = { chatId, accountId, boundAt: now, lastCheckInAt: null };
    const inserted = await repo.insert(binding);
    if (inserted.isErr()) {
      console.error("[Bindings] bind: insert failed", { chatId, accountId, error: inserted.error });
      return { outcome: "BIND_FAILED", accountId };
    }
    if (!inserted.value) return { outcome: "ACCOUNT_TAKEN", accountId };

    const fresh = (await gateway.fetchAccount(accountId)).unwrapOr(null);
    const promoted =
      fresh !== null &&
      (await gateway.replaceAccount({ ...fresh, group: config.bindingGroup })).unwrapOr(false);

    if (!fresh || !promoted) {
      console.error("[Bindings] bind: group update failed; rolling back", { chatId, accountId });
      const rollback = await repo.deleteByChatId(chatId);
      if (rollback.isErr()) {
        console.error("[Bindings] bind: rollback failed", { chatId, accountId, error: rollback.error });
      }
      return { outcome: "BIND_FAILED", accountId };
    }

    console.info(`[Bindings] ${chatId} bound to account ${accountId} (group ${config.bindingGroup})`);
    return {
      outcome: "BOUND",
      binding,
      group: config.bindingGroup,
      siteUsername: fresh.username ?? null,
    };
  }

  async revertGroup(accountId: AccountId): Promise<boolean> {
    const { gateway } = this.deps;
    const target = this.deps.groupLeaveConfig().revertGroup;

    const account = (await gateway.fetchAccount(accountId)).unwrapOr(null);
    if (!account) {
      console.warn(`[Bindings] account ${accountId} unavailable; skipping group revert`);
      return false;
    }
    if (account.group === target) return true;

    const ok = (await gateway.replaceAccount({ ...account, group: target })).unwrapOr(false);
    if (ok) {
      console.info(`[Bindings] account ${accountId} moved back to group ${target}`);
    } else {
      console.error(`[Bindings] failed to move account ${accountId} back to group ${target}`);
    }
    return ok;
  }

  async purge(accountId: AccountId): Promise<PurgeResult> {
    const { repo } = this.deps;

    const found = await repo.findByAccountId(accountId);
    if (found.isErr() || !found.value) {
      if (found.isErr()) console.error("[Bindings] purge lookup failed:", found.error);
      return { outcome: "NOT_FOUND", accountId };
    }
    const binding = found.value;

    const groupReverted = await this.revertGroup(accountId);
    const deleted = await repo.deleteByAccountId(accountId);
    if (deleted.isErr() || deleted.value === 0) {
      console.error("[Bindings] purge: binding row not deleted", {
        accountId,
        chatId: binding.chatId,
        error: deleted.isErr() ? deleted.error : undefined,
      });
      return { outcome: "DELETE_FAILED", binding };
    }

    console.info(`[Bindings] purged account ${accountId} (chat ${binding.chatId})`);
    return { outcome: "PURGED", binding, groupReverted };
  }
}

export function createBindingService(deps: BindingServiceDeps): BindingService {
  return new BindingServiceImpl(deps);
}

export const bindingService: BindingService = createBindingService({
  repo: bindingRepo,
  gateway: remoteAccountGateway,
  bindingConfig: () => configStore.get(ConfigurableModule.Binding),
  groupLeaveConfig: () => configStore.get(ConfigurableModule.GroupLeave),
});
