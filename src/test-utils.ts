import Parser from "rss-parser";
import type { FeedReader } from "./collect-feeds";
import type { DigestConfig, FeedItem } from "@/lib/types";

export const NOW = new Date("2026-10-18T08:00:00.000Z");

export function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * 60 * 60 * 1000);
}

export interface FixtureEntry {
  title: string;
  link?: string;
  publishedAt?: Date;
  description?: string;
}

/** Minimal RSS 2.0 document; titles and links must be XML-safe. */
export function rssXml(title: string, entries: FixtureEntry[]): string {
  const items = entries.map((entry) =>
    [
      "<item>",
      `<title>${entry.title}</title>`,
      entry.link ? `<link>${entry.link}</link>` : "",
      entry.publishedAt ? `<pubDate>${entry.publishedAt.toUTCString()}</pubDate>` : "",
      entry.description ? `<description><![CDATA[${entry.description}]]></description>` : "",
      "</item>"
    ].join("")
  );
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0"><channel>',
    `<title>${title}</title>`,
    "<link>https://example.com/</link>",
    "<description>fixture feed</description>",
    ...items,
    "</channel></rss>"
  ].join("");
}

/** Minimal Atom document whose entries carry only `<updated>`. */
export function atomXml(title: string, entries: FixtureEntry[]): string {
  const items = entries.map((entry) =>
    [
      "<entry>",
      `<title>${entry.title}</title>`,
      entry.link ? `<link href="${entry.link}"/>` : "",
      entry.publishedAt ? `<updated>${entry.publishedAt.toISOString()}</updated>` : "",
      entry.description ? `<summary>${entry.description}</summary>` : "",
      "</entry>"
    ].join("")
  );
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom">',
    `<title>${title}</title>`,
    '<link href="https://example.com/"/>',
    "<updated>2026-10-18T08:00:00Z</updated>",
    ...items,
    "</feed>"
  ].join("");
}

/**
 * In-process stand-in for the network: serves fixture XML per URL through the
 * real rss-parser. An Error value makes that feed fail.
 */
export function createStubReader(feeds: Record<string, string | Error>): FeedReader & { calls: string[] } {
  const parser = new Parser();
  const calls: string[] = [];
  return {
    calls,
    async parseURL(url: string) {
      calls.push(url);
      const feed = feeds[url];
      if (feed === undefined) {
        throw new Error("Status code 404");
      }
      if (feed instanceof Error) {
        throw feed;
      }
      return parser.parseString(feed);
    }
  };
}

export function createTestConfig(overrides: Partial<DigestConfig> = {}): DigestConfig {
  return {
    timezone: "UTC",
    locale: "en-US",
    dryRun: false,
    digest: {
      title: "📰 Tech News Digest (Last 24h)",
      windowHours: 24,
      maxArticles: 25,
      minStories: 3,
      maxStories: 5,
      maxBullets: 3,
      snippetChars: 400
    },
    llm: {
      apiKey: "test-key",
      model: "openai/gpt-4o-mini",
      baseUrl: "https://openrouter.ai/api/v1",
      temperature: 0.3,
      maxTokens: 900,
      timeoutMs: 60_000
    },
    telegram: {
      botToken: "test-token",
      channelId: "@test_channel",
      disableNotification: false
    },
    feeds: [
      { title: "Alpha News", url: "https://alpha.example/rss" },
      { title: "Beta Wire", url: "https://beta.example/rss" },
      { title: "Gamma Daily", url: "https://gamma.example/rss" }
    ],
    ...overrides
  };
}

export function feedItem(index: number, overrides: Partial<FeedItem> = {}): FeedItem {
  return {
    title: `Story ${index}`,
    link: `https://alpha.example/story-${index}`,
    publishedAt: hoursAgo(index + 1),
    snippet: `Snippet for story ${index}.`,
    source: "Alpha News",
    ...overrides
  };
}

export interface ModelStory {
  headline: string;
  bullets: string[];
  itemIndex: number;
}

/** OpenAI-style chat completion whose message content is the model's JSON answer. */
export function chatCompletion(stories: ModelStory[]): Response {
  return jsonResponse(200, {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1792310400,
    model: "openai/gpt-4o-mini",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content: JSON.stringify({ stories }) },
        finish_reason: "stop"
      }
    ],
    usage: { prompt_tokens: 120, completion_tokens: 80, total_tokens: 200 }
  });
}

export function telegramOk(messageId = 42): Response {
  return jsonResponse(200, { ok: true, result: { message_id: messageId, chat: { id: -100123 } } });
}

export function telegramForbidden(): Response {
  return jsonResponse(403, {
    ok: false,
    error_code: 403,
    description: "Forbidden: bot is not a member of the channel chat"
  });
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

export interface ChatRequest {
  model: string;
  temperature?: number;
  max_tokens?: number;
  messages: Array<{ role: string; content: unknown }>;
}

export function readChatRequest(init: RequestInit | undefined): ChatRequest {
  return JSON.parse(String(init?.body));
}

export function userPrompt(request: ChatRequest): string {
  const message = request.messages.find((entry) => entry.role === "user");
  return typeof message?.content === "string" ? message.content : JSON.stringify(message?.content);
}
