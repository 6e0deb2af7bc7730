/**
 * Heist Ledger Repository.
 *
 * Purpose: append-only log of settled heists, read only through daily counts.
 * Role: MongoDB collection `heist_log`. "Today" is the UTC day of the server's
 * `$$NOW`, never the application clock.
 */
import { z } from "zod";
import { MongoStore } from "@/db/mongo-store";
import type { AccountId, ChatId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { DEFENSE_BREACH_OUTCOMES, HEIST_OUTCOMES, type HeistLedgerEntry } from "./types";

const HeistLogRecordSchema = z.object({
  _id: z.string(),
  robberChatId: z.string(),
  victimAccountId: z.number().int(),
  outcome: z.enum(HEIST_OUTCOMES),
  amount: z.number().int(),
  heistAt: z.coerce.date(),
});

type HeistLogRecord = z.infer<typeof HeistLogRecordSchema>;

const HeistLogStore = new MongoStore<HeistLogRecord>("heist_log", HeistLogRecordSchema);

/** Server-side "since the start of today" predicate. */
const heistedToday = {
  $gte: ["$heistAt", { $dateTrunc: { date: "$$NOW", unit: "day" } }],
};

export async function ensureHeistLogIndexes(): Promise<void> {
  try {
    const col = await HeistLogStore.collection();
    await col.createIndex({ robberChatId: 1, heistAt: -1 }, { name: "robber_time_idx" });
    await col.createIndex(
      { victimAccountId: 1, outcome: 1, heistAt: -1 },
      { name: "victim_outcome_time_idx" },
    );
    console.log("[Heist] Indexes ensured");
  } catch (error) {
    console.error("[Heist] Failed to ensure indexes:", error);
  }
}

function generateHeistId(): string {
  return `heist_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

export interface HeistLedgerRepo {
  countAttemptsToday(robberChatId: ChatId): Promise<Result<number>>;
  /** Counts today's SUCCESS and CRITICAL entries against the victim. */
  countSuccessfulDefensesToday(victimAccountId: AccountId): Promise<Result<number>>;
  append(entry: HeistLedgerEntry): Promise<Result<void>>;
}

class MongoHeistLedgerRepo implements HeistLedgerRepo {
  async countAttemptsToday(robberChatId: ChatId): Promise<Result<number>> {
    return HeistLogStore.count({ robberChatId, $expr: heistedToday });
  }

  async countSuccessfulDefensesToday(victimAccountId: AccountId): Promise<Result<number>> {
    return HeistLogStore.count({
      victimAccountId,
      outcome: { $in: [...DEFENSE_BREACH_OUTCOMES] },
      $expr: heistedToday,
    });
  }

  async append(entry: HeistLedgerEntry): Promise<Result<void>> {
    const res = await HeistLogStore.insert({ _id: generateHeistId(), ...entry });
    if (res.isErr()) return ErrResult(res.error);
    return OkResult(undefined);
  }
}

export const heistLedgerRepo: HeistLedgerRepo = new MongoHeistLedgerRepo();
