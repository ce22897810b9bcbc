import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { runCli } from "./cli";
import { createDigestModel } from "./llm-client";
import { ConfigError } from "@/lib/errors";
import { COLORS } from "@/lib/log";
import {
  chatCompletion,
  createStubReader,
  createTestConfig,
  hoursAgo,
  NOW,
  rssXml,
  telegramForbidden,
  telegramOk
} from "./test-utils";

function fetchStub(respond: () => Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
}

function pipelineDeps(telegramResponse: () => Response) {
  const config = createTestConfig();
  const reader = createStubReader({
    "https://alpha.example/rss": rssXml("Alpha News", [
      { title: "Chip maker unveils new GPU", link: "https://alpha.example/gpu", publishedAt: hoursAgo(2) }
    ])
  });
  const model = createDigestModel(config, {
    fetch: fetchStub(() => chatCompletion([{ headline: "New GPU", bullets: ["Faster training."], itemIndex: 0 }]))
  });
  const telegramFetch = fetchStub(telegramResponse);
  return {
    telegramFetch,
    deps: { loadConfig: async () => config, reader, model, fetch: telegramFetch, now: NOW }
  };
}

describe("runCli", () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("exits with 0 after posting the digest", async () => {
    const { deps, telegramFetch } = pipelineDeps(() => telegramOk());

    await expect(runCli(deps)).resolves.toBe(0);
    expect(telegramFetch).toHaveBeenCalledTimes(1);
  });

  it("exits non-zero on a 403 from Telegram without retrying", async () => {
    const { deps, telegramFetch } = pipelineDeps(() => telegramForbidden());

    await expect(runCli(deps)).resolves.toBe(1);
    expect(telegramFetch).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      `\n${COLORS.error}Error:${COLORS.reset} [publish] Telegram send failed: 403 Forbidden: bot is not a member of the channel chat`
    );
  });

  it("exits non-zero before any request when the configuration is invalid", async () => {
    const { deps, telegramFetch } = pipelineDeps(() => telegramOk());
    const loadConfig = async () => {
      throw new ConfigError(["- OPENAI_API_KEY: Required"]);
    };

    await expect(runCli({ ...deps, loadConfig })).resolves.toBe(1);
    expect(telegramFetch).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(
      `\n${COLORS.error}Error:${COLORS.reset} [config] Configuration is invalid:\n- OPENAI_API_KEY: Required`
    );
  });

  it("restores console.warn once the run is over", async () => {
    const before = console.warn;
    const { deps } = pipelineDeps(() => telegramOk());

    await runCli(deps);

    expect(console.warn).toBe(before);
  });
});
