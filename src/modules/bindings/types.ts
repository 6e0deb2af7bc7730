import type { AccountId, ChatId } from "@/db/types";

/** One-to-one link between a Discord user and a remote account. */
export interface Binding {
  readonly chatId: ChatId;
  readonly accountId: AccountId;
  readonly boundAt: Date;
  /** UTC instant of the last check-in; null before the first one. */
  readonly lastCheckInAt: Date | null;
}

export type LookupResult =
  | { kind: "ACCOUNT_ID"; binding: Binding }
  | { kind: "CHAT_ID"; binding: Binding }
  | { kind: "NOT_FOUND" }
  /** The store could not be read; nothing is known about the identifier. */
  | { kind: "ERROR"; error: Error };

export type BindContext = {
  /** When the Discord account was created; null skips the age check. */
  accountCreatedAt: Date | null;
  now?: Date;
};

export type BindResult =
  | { outcome: "ALREADY_BOUND"; accountId: AccountId }
  | { outcome: "ACCOUNT_TOO_NEW"; ageDays: number; minAgeDays: number }
  | { outcome: "REMOTE_ACCOUNT_NOT_FOUND"; accountId: AccountId }
  | { outcome: "ACCOUNT_TAKEN"; accountId: AccountId }
  | { outcome: "BIND_FAILED"; accountId: AccountId }
  | { outcome: "BOUND"; binding: Binding; group: string; siteUsername: string | null };

export type PurgeResult =
  | { outcome: "NOT_FOUND"; accountId: AccountId }
  | { outcome: "PURGED"; binding: Binding; groupReverted: boolean }
  | { outcome: "DELETE_FAILED"; binding: Binding };
