import { buildToneEmbed, type Tone } from "@/modules/ui/embeds";
import { assertNever } from "@/utils/exhaustive";
import { formatQuota, renderTemplate } from "@/utils/template";
import type { CheckInConfig } from "./config";
import type { CheckInResult } from "./types";

export type CheckInReply = { tone: Tone; emoji: string; title: string; text: string };

export function describeCheckInResult(result: CheckInResult, config: CheckInConfig): CheckInReply {
  switch (result.outcome) {
    case "SUCCESS": {
      const { templates } = config;
      const template =
        result.isFirst && config.firstCheckInBonusEnabled
          ? templates.firstCheckIn
          : result.isDoubled
            ? templates.doubled
            : templates.success;
      return {
        tone: "success",
        emoji: result.isDoubled ? "🍀" : "📅",
        title: "Checked in",
        text: renderTemplate(template, {
          displayAdded: formatQuota(result.displayAdded),
          displayTotal: formatQuota(result.displayTotal),
          chatId: result.chatId,
          accountId: result.accountId,
        }),
      };
    }
    case "DISABLED":
      return { tone: "neutral", emoji: "📅", title: "Check-in", text: "Daily check-in is not enabled." };
    case "NOT_BOUND":
      return { tone: "warning", emoji: "🔗", title: "Not linked", text: "Link your account with /bind first." };
    case "ALREADY_CHECKED_IN":
      return {
        tone: "info",
        emoji: "⏳",
        title: "Already checked in",
        text: "You already checked in today. Come back tomorrow!",
      };
    case "API_USER_NOT_FOUND":
      return {
        tone: "error",
        emoji: "❌",
        title: "Check-in failed",
        text: "Could not load your linked account. Please contact an admin.",
      };
    case "API_UPDATE_FAILED":
      return {
        tone: "error",
        emoji: "❌",
        title: "Check-in failed",
        text: "Could not update your balance. Please try again later.",
      };
    default:
      return assertNever(result);
  }
}

export function buildCheckInEmbed(reply: CheckInReply) {
  return buildToneEmbed({
    tone: reply.tone,
    emoji: reply.emoji,
    title: reply.title,
    description: reply.text,
  });
}
