import crypto from "node:crypto";
import Parser from "rss-parser";
import { htmlToText } from "html-to-text";
import type { Ora } from "ora";
import { FEED_CLOCK_SKEW_MS, FEED_TIMEOUT_MS, USER_AGENT } from "@/lib/constants";
import { errorMessage, logWarn } from "@/lib/log";
import type { CollectionWindow, DigestConfig, FeedItem, FeedSource } from "@/lib/types";

export interface FeedEntry {
  title?: string;
  link?: string;
  isoDate?: string;
  pubDate?: string;
  contentSnippet?: string;
  content?: string;
  summary?: string;
}

export interface ParsedFeed {
  title?: string;
  items: FeedEntry[];
}

/** Anything that turns a feed URL into parsed entries; `rss-parser` in production. */
export interface FeedReader {
  parseURL(url: string): Promise<ParsedFeed>;
}

export interface CollectOptions {
  reader?: FeedReader;
  now?: Date;
  spinner?: Ora;
}

export interface CollectionResult {
  items: FeedItem[];
  window: CollectionWindow;
  failedFeeds: string[];
  rawCount: number;
}

export function createFeedReader(): FeedReader {
  return new Parser({
    timeout: FEED_TIMEOUT_MS,
    headers: {
      "User-Agent": USER_AGENT
    }
  });
}

export async function collectFeedItems(
  config: DigestConfig,
  options: CollectOptions = {}
): Promise<CollectionResult> {
  const reader = options.reader ?? createFeedReader();
  const window = resolveCollectionWindow(options.now ?? new Date(), config.digest.windowHours);
  const { spinner } = options;

  const collected: FeedItem[] = [];
  const failedFeeds: string[] = [];
  let rawCount = 0;

  // One request in flight at a time.
  for (const [index, feed] of config.feeds.entries()) {
    if (spinner) spinner.text = `Fetching "${feed.title ?? feed.url}" (${index + 1}/${config.feeds.length})`;
    try {
      const parsed = await reader.parseURL(feed.url);
      const source = resolveSourceName(parsed, feed);
      const entries = parsed.items;
      rawCount += entries.length;
      collected.push(...pickFreshItems(entries, source, window, config.digest.snippetChars));
    } catch (error) {
      failedFeeds.push(feed.url);
      logWarn(`Skipping feed "${feed.title ?? feed.url}": ${errorMessage(error)}`);
    }
  }

  const items = dedupeItems(collected)
    .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime())
    .slice(0, config.digest.maxArticles);

  return { items, window, failedFeeds, rawCount };
}

export function resolveCollectionWindow(now: Date, windowHours: number): CollectionWindow {
  const end = new Date(now.getTime());
  const start = new Date(end.getTime() - windowHours * 60 * 60 * 1000);
  return { start, end };
}

export function pickFreshItems(
  entries: FeedEntry[],
  source: string,
  window: CollectionWindow,
  snippetChars: number
): FeedItem[] {
  const fresh: FeedItem[] = [];
  for (const entry of entries) {
    const title = (entry.title ?? "").trim();
    const link = (entry.link ?? "").trim();
    if (!title || !link) {
      continue;
    }
    const publishedAt = parsePublishedAt(entry.isoDate) ?? parsePublishedAt(entry.pubDate);
    if (
      !publishedAt ||
      publishedAt < window.start ||
      publishedAt.getTime() > window.end.getTime() + FEED_CLOCK_SKEW_MS
    ) {
      continue;
    }
    fresh.push({
      title,
      link: normalizeUrl(link),
      publishedAt,
      snippet: truncate(normaliseContent(entry.contentSnippet ?? entry.content ?? entry.summary ?? ""), snippetChars),
      source
    });
  }
  return fresh;
}

export function parsePublishedAt(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date;
}

export function normalizeUrl(url: string): string {
  return url.split(/[?#]/)[0].trim();
}

export function stableId(title: string, url: string): string {
  return crypto
    .createHash("sha256")
    .update(`${title.trim().toLowerCase()}|${normalizeUrl(url)}`)
    .digest("hex")
    .slice(0, 16);
}

/** Same story syndicated by several feeds collapses to its newest copy. */
export function dedupeItems(items: FeedItem[]): FeedItem[] {
  const byId = new Map<string, FeedItem>();
  for (const item of items) {
    const id = stableId(item.title, item.link);
    const existing = byId.get(id);
    if (!existing || item.publishedAt > existing.publishedAt) {
      byId.set(id, item);
    }
  }
  return [...byId.values()];
}

function resolveSourceName(parsed: ParsedFeed, feed: FeedSource): string {
  const fromFeed = parsed.title?.trim();
  if (fromFeed) return fromFeed;
  if (feed.title) return feed.title;
  try {
    return new URL(feed.url).hostname;
  } catch {
    return "Unknown";
  }
}

function normaliseContent(html: string): string {
  if (!html) {
    return "";
  }
  return htmlToText(html, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" }
    ]
  })
    .replace(/\s+/g, " ")
    .trim();
}

/** Counts code points so an emoji is never split into a lone surrogate. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) {
    return text;
  }
  return `${chars.slice(0, max - 1).join("").trimEnd()}…`;
}
