import type { Ora } from "ora";
import type { LanguageModel } from "ai";
import { collectFeedItems, type FeedReader } from "./collect-feeds";
import { composeDigest } from "./compose-digest";
import { formatDateLabel, formatDigestMessage, formatEmptyDigestMessage } from "./format-message";
import { sendTelegramMessage } from "./telegram-client";
import type { FetchLike } from "./llm-client";
import { GLYPHS, logDetail } from "@/lib/log";
import type { DigestConfig, DigestRunResult, FeedItem } from "@/lib/types";

export interface DigestDeps {
  reader?: FeedReader;
  model?: LanguageModel;
  /** Used for the Telegram request only; the model carries its own fetch. */
  fetch?: FetchLike;
  now?: Date;
  spinner?: Ora;
}

/**
 * Collect → compose → format → publish, once. With no qualifying items the
 * model is skipped and a short "no news" message is posted instead.
 */
export async function runDigest(config: DigestConfig, deps: DigestDeps = {}): Promise<DigestRunResult> {
  const now = deps.now ?? new Date();
  const { spinner } = deps;
  const dateLabel = formatDateLabel(now, config.timezone, config.locale);

  spinner?.start(`Fetching RSS feeds (0/${config.feeds.length})`);
  const collection = await collectFeedItems(config, { reader: deps.reader, now, spinner });
  const { items } = collection;
  spinner?.succeed(
    `Fetched ${config.feeds.length - collection.failedFeeds.length}/${config.feeds.length} feeds - ${items.length} items in the last ${config.digest.windowHours}h`
  );
  if (spinner) {
    logDetail(
      GLYPHS.window,
      `Collection window: ${collection.window.start.toISOString()} → ${collection.window.end.toISOString()}`
    );
  }

  let message: string;
  let storyCount = 0;
  if (items.length === 0) {
    message = formatEmptyDigestMessage(config.digest.title, dateLabel, config.digest.windowHours);
  } else {
    spinner?.start(`Summarising ${items.length} items (model: ${config.llm.model})`);
    const stories = await composeDigest(items, config, { model: deps.model });
    storyCount = stories.length;
    spinner?.succeed(`Composed ${stories.length} stories`);
    message = formatDigestMessage({
      title: config.digest.title,
      dateLabel,
      stories,
      sources: listSources(items)
    });
  }

  if (config.dryRun) {
    return { itemCount: items.length, storyCount, message, published: false };
  }

  spinner?.start(`Posting digest to Telegram channel ${config.telegram.channelId}`);
  await sendTelegramMessage(message, config.telegram, { fetch: deps.fetch });
  spinner?.succeed("Digest posted");

  return { itemCount: items.length, storyCount, message, published: true };
}

/** Distinct feed names in order of first appearance. */
export function listSources(items: FeedItem[]): string[] {
  return [...new Set(items.map((item) => item.source))];
}
