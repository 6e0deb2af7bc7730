/**
 * Binding Repository.
 *
 * Purpose: persist chat-identity to remote-account links.
 * Role: MongoDB collection `account_bindings`, `_id` is the chat id and
 * `accountId` carries a unique index, so both directions are 1:1.
 */
import { z } from "zod";
import { MongoStore, isDuplicateKeyError } from "@/db/mongo-store";
import type { AccountId, ChatId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { Binding } from "./types";

const BindingRecordSchema = z.object({
  _id: z.string(),
  accountId: z.number().int().positive(),
  boundAt: z.coerce.date(),
  lastCheckInAt: z.coerce.date().nullable().default(null),
});

type BindingRecord = z.infer<typeof BindingRecordSchema>;

const BindingStore = new MongoStore<BindingRecord>("account_bindings", BindingRecordSchema);

const toBinding = (record: BindingRecord): Binding => ({
  chatId: record._id,
  accountId: record.accountId,
  boundAt: record.boundAt,
  lastCheckInAt: record.lastCheckInAt,
});

function toBindingResult(res: Result<BindingRecord | null>): Result<Binding | null> {
  if (res.isErr()) return ErrResult(res.error);
  return OkResult(res.value ? toBinding(res.value) : null);
}

/**
 * Ensure the unique account index exists.
 * Should be called once at application startup.
 */
export async function ensureBindingIndexes(): Promise<void> {
  try {
    const col = await BindingStore.collection();
    await col.createIndex({ accountId: 1 }, { name: "account_id_unique_idx", unique: true });
    console.log("[Bindings] Indexes ensured");
  } catch (error) {
    console.error("[Bindings] Failed to ensure indexes:", error);
  }
}

export interface BindingRepo {
  findByChatId(chatId: ChatId): Promise<Result<Binding | null>>;
  findByAccountId(accountId: AccountId): Promise<Result<Binding | null>>;
  /** Resolves `Ok(false)` when either key is already taken. */
  insert(binding: Binding): Promise<Result<boolean>>;
  /** Resolves the number of rows removed. */
  deleteByChatId(chatId: ChatId): Promise<Result<number>>;
  deleteByAccountId(accountId: AccountId): Promise<Result<number>>;
  setLastCheckIn(chatId: ChatId, at: Date): Promise<Result<boolean>>;
}

class MongoBindingRepo implements BindingRepo {
  async findByChatId(chatId: ChatId): Promise<Result<Binding | null>> {
    return toBindingResult(await BindingStore.findOne({ _id: chatId }));
  }

  async findByAccountId(accountId: AccountId): Promise<Result<Binding | null>> {
    return toBindingResult(await BindingStore.findOne({ accountId }));
  }

  async insert(binding: Binding): Promise<Result<boolean>> {
    const res = await BindingStore.insert({
      _id: binding.chatId,
      accountId: binding.accountId,
      boundAt: binding.boundAt,
      lastCheckInAt: binding.lastCheckInAt,
    });
    if (res.isOk()) return OkResult(true);
    if (isDuplicateKeyError(res.error)) return OkResult(false);
    return ErrResult(res.error);
  }

  async deleteByChatId(chatId: ChatId): Promise<Result<number>> {
    return BindingStore.deleteWhere({ _id: chatId });
  }

  async deleteByAccountId(accountId: AccountId): Promise<Result<number>> {
    return BindingStore.deleteWhere({ accountId });
  }

  async setLastCheckIn(chatId: ChatId, at: Date): Promise<Result<boolean>> {
    return BindingStore.updatePaths(chatId, { lastCheckInAt: at });
  }
}

export const bindingRepo: BindingRepo = new MongoBindingRepo();
