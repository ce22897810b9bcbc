import path from "node:path";

export const ROOT_DIR = process.cwd();
export const CONFIG_PATH = path.resolve(ROOT_DIR, "config.yml");
export const FEEDS_CONFIG_PATH = path.resolve(ROOT_DIR, "feeds.yml");
export const ENV_PATH = path.resolve(ROOT_DIR, ".env");

export const USER_AGENT = "feed-brief/0.1 (+https://github.com/)";
export const FEED_TIMEOUT_MS = 10_000;
/** Entries stamped slightly ahead of now still count as fresh. */
export const FEED_CLOCK_SKEW_MS = 15 * 60 * 1000;

export const TELEGRAM_API_BASE = "https://api.telegram.org";
export const TELEGRAM_TIMEOUT_MS = 30_000;
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

export function defaultDigestTitle(windowHours: number): string {
  return `📰 Tech News Digest (Last ${windowHours}h)`;
}
export const DEFAULT_MODEL = "openai/gpt-4o-mini";
export const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";
