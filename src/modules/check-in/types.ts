import type { AccountId, ChatId } from "@/db/types";

export type CheckInResult =
  | { outcome: "DISABLED" }
  | { outcome: "NOT_BOUND" }
  | { outcome: "ALREADY_CHECKED_IN" }
  | { outcome: "API_USER_NOT_FOUND" }
  | { outcome: "API_UPDATE_FAILED" }
  | {
      outcome: "SUCCESS";
      isFirst: boolean;
      isDoubled: boolean;
      displayAdded: number;
      displayTotal: number;
      chatId: ChatId;
      accountId: AccountId;
    };
