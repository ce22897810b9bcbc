import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import type { DigestConfig } from "@/lib/types";

export type FetchLike = typeof fetch;

export interface ModelOptions {
  /** Replaces the global fetch for every request the provider makes. */
  fetch?: FetchLike;
}

/**
 * Chat model behind an OpenAI-compatible endpoint. OpenRouter is the default,
 * so the model id usually carries a provider prefix ("openai/gpt-4o-mini").
 */
export function createDigestModel(config: DigestConfig, options: ModelOptions = {}): LanguageModel {
  const provider = createOpenAI({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseUrl,
    compatibility: "compatible",
    headers: {
      "HTTP-Referer": "https://github.com/",
      "X-Title": "feed-brief"
    },
    fetch: options.fetch
  });
  return provider(config.llm.model);
}
