import type { FeedItem } from "@/lib/types";

export const DIGEST_SYSTEM_PROMPT = "You write crisp tech news digests for busy readers.";

export interface StoryTarget {
  min: number;
  max: number;
}

/** Never ask for more stories than there are articles to base them on. */
export function resolveStoryTarget(itemCount: number, minStories: number, maxStories: number): StoryTarget {
  const max = Math.max(1, Math.min(maxStories, itemCount));
  const min = Math.max(1, Math.min(minStories, max));
  return { min, max };
}

export function buildDigestPrompt(items: FeedItem[], target: StoryTarget, maxBullets: number): string {
  const count = target.min === target.max ? `exactly ${target.min}` : `between ${target.min} and ${target.max}`;
  const noun = target.max === 1 ? "story" : "stories";
  const articles = items.map((item, index) =>
    [
      `[${index}] ${item.source} | ${item.title} (${formatUtc(item.publishedAt)})`,
      `    ${item.link}`,
      item.snippet ? `    ${item.snippet}` : ""
    ]
      .filter(Boolean)
      .join("\n")
  );

  return [
    "You are a professional tech news editor preparing the daily digest of a Telegram channel.",
    `Read the ${items.length} articles below and write ${count} ${noun} covering the most important news.`,
    "",
    "Rules:",
    "- Merge articles that cover the same event into a single story.",
    "- headline: one plain-text line, at most 100 characters, leading with the event.",
    `- bullets: 1 to ${maxBullets} entries, each 1–3 sentences of plain text.`,
    "- itemIndex: the [index] of the article the story is mainly based on.",
    "- Use only facts present in the articles. Do NOT invent URLs, names or figures.",
    "- No Markdown, no HTML, no emoji inside headlines or bullets.",
    "- Tone: professional, informative, neutral.",
    "",
    "Articles:",
    articles.join("\n")
  ].join("\n");
}

function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}
