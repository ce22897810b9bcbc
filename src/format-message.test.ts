import { describe, expect, it } from "vitest";
import {
  escapeHtml,
  formatDateLabel,
  formatDigestMessage,
  formatEmptyDigestMessage,
  renderStory
} from "./format-message";
import { DigestError } from "@/lib/errors";
import type { Digest } from "@/lib/types";

const digest: Digest = {
  title: "📰 Tech News Digest (Last 24h)",
  dateLabel: "Oct 18, 2026",
  stories: [
    {
      headline: "Chip maker unveils new GPU",
      bullets: ["Faster training.", "Ships next month."],
      link: "https://chips.example/gpu"
    },
    {
      headline: "Q&A: <AI> safety",
      bullets: ["Rules & limits."]
    }
  ],
  sources: ["Alpha News", "Gamma & Co"]
};

const expectedMessage = [
  "<b>📰 Tech News Digest (Last 24h) — Oct 18, 2026</b>",
  "",
  "<b>1. Chip maker unveils new GPU</b>",
  "• Faster training.",
  "• Ships next month.",
  '<a href="https://chips.example/gpu">Read more</a>',
  "",
  "<b>2. Q&amp;A: &lt;AI&gt; safety</b>",
  "• Rules &amp; limits.",
  "",
  "—",
  "🤖 Auto-generated AI summary",
  "📡 Sources: Alpha News, Gamma &amp; Co"
].join("\n");

describe("formatDigestMessage", () => {
  it("renders headlines, bullets, links and the footer as Telegram HTML", () => {
    expect(formatDigestMessage(digest)).toBe(expectedMessage);
  });

  it("is deterministic for equal input", () => {
    const copy = structuredClone(digest);
    expect(formatDigestMessage(copy)).toBe(formatDigestMessage(digest));
    expect(formatDigestMessage(digest)).toBe(formatDigestMessage(digest));
  });

  it("omits the sources line when there are no sources", () => {
    const message = formatDigestMessage({ ...digest, sources: [] });
    expect(message.endsWith("—\n🤖 Auto-generated AI summary")).toBe(true);
  });

  it("drops trailing stories until the message fits", () => {
    const firstOnly = formatDigestMessage({ ...digest, stories: digest.stories.slice(0, 1) });

    expect(formatDigestMessage(digest, { maxLength: firstOnly.length })).toBe(firstOnly);
  });

  it("fails when not even one story fits", () => {
    expect(() => formatDigestMessage(digest, { maxLength: 40 })).toThrow(DigestError);
  });

  it("refuses a digest without stories", () => {
    expect(() => formatDigestMessage({ ...digest, stories: [] })).toThrow("Digest has no stories to format");
  });
});

describe("formatEmptyDigestMessage", () => {
  it("announces that nothing was found", () => {
    expect(formatEmptyDigestMessage("Daily <Tech>", "Oct 18, 2026", 24)).toBe(
      "<b>Daily &lt;Tech&gt; — Oct 18, 2026</b>\n\nNo notable items found in the last 24 hours."
    );
  });
});

describe("renderStory", () => {
  it("escapes quotes and ampersands inside the link attribute", () => {
    expect(renderStory({ headline: "H", bullets: ["b"], link: 'https://x.example/?q="a"&b=1' }, 0)).toBe(
      '<b>1. H</b>\n• b\n<a href="https://x.example/?q=&quot;a&quot;&amp;b=1">Read more</a>'
    );
  });
});

describe("escapeHtml", () => {
  it("escapes the characters Telegram's HTML mode reserves", () => {
    expect(escapeHtml("a < b && c > d")).toBe("a &lt; b &amp;&amp; c &gt; d");
  });
});

describe("formatDateLabel", () => {
  const evening = new Date("2026-10-18T20:00:00.000Z");

  it("formats the date in the configured time zone", () => {
    expect(formatDateLabel(evening, "UTC", "en-US")).toBe("Oct 18, 2026");
    expect(formatDateLabel(evening, "Asia/Jakarta", "en-US")).toBe("Oct 19, 2026");
  });

  it("falls back to the ISO date for an unknown time zone", () => {
    expect(formatDateLabel(evening, "Mars/Olympus_Mons", "en-US")).toBe("2026-10-18");
  });
});
