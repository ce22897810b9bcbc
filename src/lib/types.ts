export interface FeedSource {
  title?: string;
  url: string;
}

export interface FeedItem {
  title: string;
  link: string;
  publishedAt: Date;
  snippet: string;
  source: string;
}

export interface DigestStory {
  headline: string;
  bullets: string[];
  link?: string;
}

export interface Digest {
  title: string;
  dateLabel: string;
  stories: DigestStory[];
  sources: string[];
}

export interface DigestConfig {
  timezone: string;
  locale: string;
  dryRun: boolean;
  digest: {
    title: string;
    windowHours: number;
    maxArticles: number;
    minStories: number;
    maxStories: number;
    maxBullets: number;
    snippetChars: number;
  };
  llm: {
    apiKey: string;
    model: string;
    baseUrl: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  telegram: {
    botToken: string;
    channelId: string;
    disableNotification: boolean;
  };
  feeds: FeedSource[];
}

export interface CollectionWindow {
  start: Date;
  end: Date;
}

export interface DigestRunResult {
  itemCount: number;
  storyCount: number;
  message: string;
  published: boolean;
}
