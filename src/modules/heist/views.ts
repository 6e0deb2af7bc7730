import { buildToneEmbed, type Tone } from "@/modules/ui/embeds";
import { assertNever } from "@/utils/exhaustive";
import { formatQuota, renderTemplate } from "@/utils/template";
import type { HeistTemplates } from "./config";
import type { HeistResult } from "./types";

export type HeistReply = { tone: Tone; emoji: string; title: string; text: string };

/**
 * Maps a heist result onto its configured reply. `victimLabel` fills `{victim}`
 * and defaults to the identifier that was looked up.
 */
export function describeHeistResult(
  result: HeistResult,
  templates: HeistTemplates,
  victimLabel?: string,
): HeistReply {
  switch (result.outcome) {
    case "SUCCESS":
      return {
        tone: "success",
        emoji: "💰",
        title: "Heist succeeded",
        text: renderTemplate(templates.success, { gain: formatQuota(result.gain) }),
      };
    case "CRITICAL":
      return {
        tone: "success",
        emoji: "💥",
        title: "Critical heist",
        text: renderTemplate(templates.critical, { gain: formatQuota(result.gain) }),
      };
    case "FAILURE":
      return {
        tone: "error",
        emoji: "🚨",
        title: "Heist failed",
        text: renderTemplate(templates.failure, { penalty: formatQuota(result.penalty) }),
      };
    case "DISABLED":
      return { tone: "neutral", emoji: "⚔️", title: "Heist", text: templates.disabled };
    case "ROBBER_NOT_BOUND":
      return { tone: "warning", emoji: "🤔", title: "Not linked", text: templates.robberNotBound };
    case "VICTIM_NOT_FOUND":
      return {
        tone: "warning",
        emoji: "💨",
        title: "Target not found",
        text: renderTemplate(templates.victimNotFound, {
          victim: victimLabel ?? result.victimIdentifier,
        }),
      };
    case "CANNOT_ROB_SELF":
      return { tone: "warning", emoji: "🤦", title: "Nice try", text: templates.cannotRobSelf };
    case "ATTEMPTS_EXCEEDED":
      return { tone: "warning", emoji: "🥵", title: "Out of attempts", text: templates.attemptsExceeded };
    case "DEFENSES_EXCEEDED":
      return {
        tone: "warning",
        emoji: "🛡️",
        title: "Target on alert",
        text: renderTemplate(templates.defensesExceeded, { victimId: result.victimAccountId }),
      };
    case "API_ERROR":
      return { tone: "error", emoji: "❌", title: "Error", text: templates.apiError };
    default:
      return assertNever(result);
  }
}

export function buildHeistEmbed(reply: HeistReply) {
  return buildToneEmbed({
    tone: reply.tone,
    emoji: reply.emoji,
    title: reply.title,
    description: reply.text,
  });
}
