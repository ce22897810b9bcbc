import { generateObject, type LanguageModel } from "ai";
import { z } from "zod";
import { createDigestModel } from "./llm-client";
import {
  buildDigestPrompt,
  DIGEST_SYSTEM_PROMPT,
  resolveStoryTarget,
  type StoryTarget
} from "./digest-prompt";
import { DigestError } from "@/lib/errors";
import { errorMessage } from "@/lib/log";
import type { DigestConfig, DigestStory, FeedItem } from "@/lib/types";

/** Story and bullet counts are bounded by the schema itself. */
export function buildDigestSchema(target: StoryTarget, maxBullets: number) {
  const storySchema = z.object({
    headline: z.string().describe("One crisp line. Lead with the event, not the company."),
    bullets: z
      .array(z.string())
      .min(1)
      .max(maxBullets)
      .describe(`1–${maxBullets} bullet points, each 1–3 sentences.`),
    itemIndex: z.number().describe("Index of the article this story is mainly based on.")
  });
  return z.object({
    stories: z.array(storySchema).min(target.min).max(target.max)
  });
}

type RawStory = z.infer<ReturnType<typeof buildDigestSchema>>["stories"][number];

export interface ComposeOptions {
  model?: LanguageModel;
}

export async function composeDigest(
  items: FeedItem[],
  config: DigestConfig,
  options: ComposeOptions = {}
): Promise<DigestStory[]> {
  if (items.length === 0) {
    throw new DigestError("compose", "No feed items to summarise");
  }

  const target = resolveStoryTarget(items.length, config.digest.minStories, config.digest.maxStories);
  const model = options.model ?? createDigestModel(config);

  let stories: RawStory[];
  try {
    const { object } = await generateObject({
      model,
      mode: "json",
      schema: buildDigestSchema(target, config.digest.maxBullets),
      system: DIGEST_SYSTEM_PROMPT,
      prompt: buildDigestPrompt(items, target, config.digest.maxBullets),
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      abortSignal: AbortSignal.timeout(config.llm.timeoutMs)
    });
    stories = object.stories;
  } catch (error) {
    throw new DigestError("compose", `Summarisation request failed: ${errorMessage(error)}`, { cause: error });
  }

  const normalised = normaliseStories(stories, items, config.digest.maxStories, config.digest.maxBullets);
  if (normalised.length < target.min) {
    throw new DigestError(
      "compose",
      `Model returned ${normalised.length} usable ${normalised.length === 1 ? "story" : "stories"}, expected at least ${target.min}`
    );
  }
  return normalised;
}

export function normaliseStories(
  stories: RawStory[],
  items: FeedItem[],
  maxStories: number,
  maxBullets: number
): DigestStory[] {
  const result: DigestStory[] = [];
  for (const story of stories) {
    const headline = cleanLine(story.headline);
    const bullets = story.bullets
      .map(cleanLine)
      .filter((bullet) => bullet.length > 0)
      .slice(0, maxBullets);
    if (!headline || bullets.length === 0) {
      continue;
    }
    const link = Number.isInteger(story.itemIndex) ? items[story.itemIndex]?.link : undefined;
    result.push(link ? { headline, bullets, link } : { headline, bullets });
    if (result.length >= maxStories) {
      break;
    }
  }
  return result;
}

/** Strips list markers and Markdown emphasis the model sometimes adds despite the prompt. */
function cleanLine(text: string): string {
  return text
    .replace(/^\s*(?:[-*•]|\d+[.)])\s+/, "")
    .replace(/\*\*|__/g, "")
    .replace(/\s+/g, " ")
    .trim();
}
