import type { AccountId, ChatId } from "@/db/types";

export type HeistOutcome = "SUCCESS" | "CRITICAL" | "FAILURE";

export const HEIST_OUTCOMES = ["SUCCESS", "CRITICAL", "FAILURE"] as const satisfies readonly HeistOutcome[];

/** Outcomes that count as a successful defense breach against the victim. */
export const DEFENSE_BREACH_OUTCOMES = ["SUCCESS", "CRITICAL"] as const satisfies readonly HeistOutcome[];

export interface HeistLedgerEntry {
  readonly robberChatId: ChatId;
  readonly victimAccountId: AccountId;
  readonly outcome: HeistOutcome;
  /** Raw quota actually moved; negative when the robber paid a penalty. */
  readonly amount: number;
  readonly heistAt: Date;
}

export type ResolvedOutcome = {
  outcome: HeistOutcome;
  /** Display quota to move. Doubled already when CRITICAL. */
  displayAmount: number;
  /** Pre-doubling magnitude; equals `displayAmount` unless CRITICAL. */
  baseAmount: number;
};

export type HeistResult =
  | { outcome: "DISABLED" }
  | { outcome: "ROBBER_NOT_BOUND" }
  | { outcome: "VICTIM_NOT_FOUND"; victimIdentifier: string }
  | { outcome: "CANNOT_ROB_SELF" }
  | { outcome: "ATTEMPTS_EXCEEDED" }
  | { outcome: "DEFENSES_EXCEEDED"; victimAccountId: AccountId }
  | { outcome: "FAILURE"; penalty: number; victimAccountId: AccountId }
  | { outcome: "SUCCESS" | "CRITICAL"; gain: number; victimAccountId: AccountId }
  | { outcome: "API_ERROR" };
