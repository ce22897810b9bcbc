import fs from "node:fs/promises";
import path from "node:path";
import dotenv from "dotenv";
import YAML from "yaml";
import { z } from "zod";
import {
  CONFIG_PATH,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  defaultDigestTitle,
  ENV_PATH,
  FEEDS_CONFIG_PATH
} from "./constants";
import { ConfigError } from "./errors";
import { errorMessage } from "./log";
import type { DigestConfig, FeedSource } from "./types";

const fileConfigSchema = z
  .object({
    timezone: z
      .string()
      .default("UTC")
      .refine(isValidTimezone, { message: "must be an IANA time zone" }),
    locale: z.string().default("en-US"),
    digest: z
      .object({
        title: z.string().min(1).optional(),
        window_hours: z.number().int().min(1).max(168).default(24),
        max_articles: z.number().int().min(1).max(100).default(25),
        min_stories: z.number().int().min(1).max(10).default(3),
        max_stories: z.number().int().min(1).max(10).default(5),
        max_bullets: z.number().int().min(1).max(5).default(3),
        snippet_chars: z.number().int().min(80).max(2000).default(400)
      })
      .default({}),
    llm: z
      .object({
        model: z.string().min(1).optional(),
        base_url: z.string().url().optional(),
        temperature: z.number().min(0).max(2).default(0.3),
        max_tokens: z.number().int().min(100).max(16_000).default(900),
        timeout_ms: z.number().int().min(1000).max(300_000).default(60_000)
      })
      .default({}),
    telegram: z
      .object({
        disable_notification: z.boolean().default(false)
      })
      .default({})
  })
  .refine((config) => config.digest.min_stories <= config.digest.max_stories, {
    message: "must not exceed digest.max_stories",
    path: ["digest", "min_stories"]
  });

const feedsSchema = z.object({
  feeds: z
    .array(
      z.object({
        title: z.string().min(1).optional(),
        url: z.string().url()
      })
    )
    .min(1)
});

function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const requiredEnv = z.preprocess(blankToUndefined, z.string().trim());
const optionalEnv = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  OPENAI_API_KEY: requiredEnv,
  OPENAI_MODEL: optionalEnv,
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  TELEGRAM_BOT_TOKEN: requiredEnv,
  TELEGRAM_CHANNEL_ID: requiredEnv,
  DIGEST_TITLE: optionalEnv,
  MAX_ARTICLES: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(100).optional()),
  DIGEST_DRY_RUN: z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((value) => value !== undefined && /^(1|true|yes)$/i.test(value.trim()))
  ),
  FEED_URLS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform((value) =>
        value
          .split(/[\n,]/)
          .map((url) => url.trim())
          .filter((url) => url.length > 0)
      )
      .pipe(z.array(z.string().url()).min(1))
      .optional()
  )
});

export interface ConfigSources {
  env: Record<string, string | undefined>;
  /** Parsed config.yml, or undefined when the file is absent. */
  fileConfig?: unknown;
  /** Parsed feeds.yml, or undefined when the file is absent. */
  feedsFile?: unknown;
}

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  envPath?: string;
  configPath?: string;
  feedsPath?: string;
}

/**
 * Reads `.env`, `config.yml` and `feeds.yml` and merges them into one
 * {@link DigestConfig}. When `env` is passed, `.env` is not read and
 * `process.env` is left alone.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DigestConfig> {
  let env = options.env;
  if (!env) {
    dotenv.config({ path: options.envPath ?? ENV_PATH });
    env = process.env;
  }
  const fileConfig = await readYamlFile(options.configPath ?? CONFIG_PATH);
  const feedsFile = await readYamlFile(options.feedsPath ?? FEEDS_CONFIG_PATH);
  return resolveConfig({ env, fileConfig, feedsFile });
}

export function resolveConfig(sources: ConfigSources): DigestConfig {
  const issues: string[] = [];

  const envResult = envSchema.safeParse(sources.env);
  if (!envResult.success) {
    issues.push(...formatIssues(envResult.error));
  }

  const fileResult = fileConfigSchema.safeParse(sources.fileConfig ?? {});
  if (!fileResult.success) {
    issues.push(...formatIssues(fileResult.error, "config.yml"));
  }

  let feeds: FeedSource[] = [];
  const feedUrls = envResult.success ? envResult.data.FEED_URLS : undefined;
  if (feedUrls) {
    feeds = feedUrls.map((url) => ({ url }));
  } else if (sources.feedsFile === undefined) {
    if (envResult.success) {
      issues.push("- feeds.yml: missing; set FEED_URLS or create feeds.yml");
    }
  } else {
    const feedsResult = feedsSchema.safeParse(sources.feedsFile);
    if (feedsResult.success) {
      feeds = feedsResult.data.feeds;
    } else {
      issues.push(...formatIssues(feedsResult.error, "feeds.yml"));
    }
  }

  if (!envResult.success || !fileResult.success || issues.length > 0) {
    throw new ConfigError(issues);
  }

  const env = envResult.data;
  const file = fileResult.data;

  return {
    timezone: file.timezone,
    locale: file.locale,
    dryRun: env.DIGEST_DRY_RUN,
    digest: {
      title: env.DIGEST_TITLE ?? file.digest.title ?? defaultDigestTitle(file.digest.window_hours),
      windowHours: file.digest.window_hours,
      maxArticles: env.MAX_ARTICLES ?? file.digest.max_articles,
      minStories: file.digest.min_stories,
      maxStories: file.digest.max_stories,
      maxBullets: file.digest.max_bullets,
      snippetChars: file.digest.snippet_chars
    },
    llm: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL ?? file.llm.model ?? DEFAULT_MODEL,
      baseUrl: env.OPENAI_BASE_URL ?? file.llm.base_url ?? DEFAULT_BASE_URL,
      temperature: file.llm.temperature,
      maxTokens: file.llm.max_tokens,
      timeoutMs: file.llm.timeout_ms
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      channelId: env.TELEGRAM_CHANNEL_ID,
      disableNotification: file.telegram.disable_notification
    },
    feeds
  };
}

async function readYamlFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
  try {
    return YAML.parse(raw) ?? {};
  } catch (error) {
    throw new ConfigError([`- ${path.basename(filePath)}: ${errorMessage(error)}`]);
  }
}

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const issuePath = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `- ${prefix ? `${prefix} ` : ""}${issuePath}: ${issue.message}`;
  });
}

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
