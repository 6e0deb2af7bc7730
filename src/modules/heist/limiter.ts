/**
 * Daily Rate Limiter.
 *
 * Read-only checks over the heist ledger. The counts come from the storage
 * engine, so the day boundary follows the storage clock.
 */
import type { AccountId, ChatId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { HeistLedgerRepo } from "./repository";

export interface DailyLimiter {
  attemptsExceeded(robberChatId: ChatId, maxAttemptsPerDay: number): Promise<Result<boolean>>;
  defensesExceeded(victimAccountId: AccountId, maxDefensesPerDay: number): Promise<Result<boolean>>;
}

class LedgerDailyLimiter implements DailyLimiter {
  constructor(private readonly ledger: HeistLedgerRepo) {}

  async attemptsExceeded(robberChatId: ChatId, maxAttemptsPerDay: number): Promise<Result<boolean>> {
    const count = await this.ledger.countAttemptsToday(robberChatId);
    if (count.isErr()) return ErrResult(count.error);
    return OkResult(count.value >= maxAttemptsPerDay);
  }

  async defensesExceeded(
    victimAccountId: AccountId,
    maxDefensesPerDay: number,
  ): Promise<Result<boolean>> {
    const count = await this.ledger.countSuccessfulDefensesToday(victimAccountId);
    if (count.isErr()) return ErrResult(count.error);
    return OkResult(count.value >= maxDefensesPerDay);
  }
}

export function createDailyLimiter(ledger: HeistLedgerRepo): DailyLimiter {
  return new LedgerDailyLimiter(ledger);
}
