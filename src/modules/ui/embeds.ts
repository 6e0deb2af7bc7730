/**
 * Shared embed builders.
 *
 * Success = green, error = red, info = indigo, warning = amber.
 */
import { Embed } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import type { APIEmbedField } from "seyfert/lib/types";

export const UIColors = {
  success: 0x10b981,
  warning: 0xf59e0b,
  error: 0xef4444,
  info: 0x6366f1,
  neutral: 0x6b7280,
} as const;

export type Tone = "success" | "warning" | "error" | "info" | "neutral";

export function buildErrorEmbed(publicMessage: string): Embed {
  return new Embed()
    .setColor(EmbedColors.Red)
    .setTitle("❌ Error")
    .setDescription(publicMessage);
}

export function buildToneEmbed(params: {
  tone: Tone;
  title: string;
  description: string;
  emoji?: string;
  fields?: APIEmbedField[];
  footerText?: string;
}): Embed {
  const { tone, title, description, emoji, fields = [], footerText } = params;

  const embed = new Embed()
    .setColor(UIColors[tone])
    .setTitle(emoji ? `${emoji} ${title}` : title)
    .setDescription(description);

  if (fields.length) embed.setFields(fields);
  if (footerText) embed.setFooter({ text: footerText });

  return embed;
}
