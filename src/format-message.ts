import { TELEGRAM_MAX_MESSAGE_LENGTH } from "@/lib/constants";
import { DigestError } from "@/lib/errors";
import type { Digest, DigestStory } from "@/lib/types";

export interface FormatOptions {
  maxLength?: number;
}

/**
 * Renders a digest as Telegram HTML (`parse_mode: "HTML"`). Pure: the same
 * digest always yields the same string. Trailing stories are dropped until the
 * message fits in `maxLength`.
 */
export function formatDigestMessage(digest: Digest, options: FormatOptions = {}): string {
  const maxLength = options.maxLength ?? TELEGRAM_MAX_MESSAGE_LENGTH;
  if (digest.stories.length === 0) {
    throw new DigestError("format", "Digest has no stories to format");
  }

  const header = renderHeader(digest.title, digest.dateLabel);
  const footer = renderFooter(digest.sources);
  for (let count = digest.stories.length; count > 0; count--) {
    const blocks = digest.stories.slice(0, count).map(renderStory);
    const message = [header, ...blocks, footer].join("\n\n");
    if (message.length <= maxLength) {
      return message;
    }
  }
  throw new DigestError("format", `Digest does not fit in one Telegram message (${maxLength} characters)`);
}

export function formatEmptyDigestMessage(title: string, dateLabel: string, windowHours: number): string {
  return `${renderHeader(title, dateLabel)}\n\nNo notable items found in the last ${windowHours} hours.`;
}

export function renderStory(story: DigestStory, index: number): string {
  const lines = [
    `<b>${index + 1}. ${escapeHtml(story.headline)}</b>`,
    ...story.bullets.map((bullet) => `• ${escapeHtml(bullet)}`)
  ];
  if (story.link) {
    lines.push(`<a href="${escapeAttribute(story.link)}">Read more</a>`);
  }
  return lines.join("\n");
}

export function formatDateLabel(date: Date, timezone: string, locale: string): string {
  try {
    return new Intl.DateTimeFormat(locale, {
      timeZone: timezone,
      year: "numeric",
      month: "short",
      day: "2-digit"
    }).format(date);
  } catch {
    return date.toISOString().slice(0, 10);
  }
}

/** Telegram's HTML mode only needs these three entities escaped in text. */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeAttribute(text: string): string {
  return escapeHtml(text).replace(/"/g, "&quot;");
}

function renderHeader(title: string, dateLabel: string): string {
  return `<b>${escapeHtml(title)} — ${escapeHtml(dateLabel)}</b>`;
}

function renderFooter(sources: string[]): string {
  const lines = ["—", "🤖 Auto-generated AI summary"];
  if (sources.length > 0) {
    lines.push(`📡 Sources: ${sources.map(escapeHtml).join(", ")}`);
  }
  return lines.join("\n");
}
