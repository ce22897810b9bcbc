import { z } from "zod";
import { TELEGRAM_API_BASE, TELEGRAM_TIMEOUT_MS } from "@/lib/constants";
import { DigestError } from "@/lib/errors";
import { errorMessage } from "@/lib/log";
import type { FetchLike } from "./llm-client";
import type { DigestConfig } from "@/lib/types";

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  result: z
    .object({
      message_id: z.number()
    })
    .passthrough()
    .optional()
});

type TelegramResponse = z.infer<typeof telegramResponseSchema>;

export interface TelegramSendOptions {
  fetch?: FetchLike;
}

export interface TelegramSendResult {
  messageId?: number;
}

/**
 * Posts one HTML message to the configured channel. Any failure is fatal:
 * there is no retry, and the bot token is scrubbed from error messages.
 */
export async function sendTelegramMessage(
  text: string,
  config: DigestConfig["telegram"],
  options: TelegramSendOptions = {}
): Promise<TelegramSendResult> {
  const fetchImpl = options.fetch ?? fetch;
  const url = `${TELEGRAM_API_BASE}/bot${config.botToken}/sendMessage`;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        chat_id: config.channelId,
        text,
        parse_mode: "HTML",
        disable_web_page_preview: true,
        disable_notification: config.disableNotification
      }),
      signal: AbortSignal.timeout(TELEGRAM_TIMEOUT_MS)
    });
  } catch (error) {
    throw new DigestError("publish", redactToken(`Telegram request failed: ${errorMessage(error)}`, config.botToken), {
      cause: error
    });
  }

  const body = await readTelegramResponse(response);
  if (!response.ok || !body?.ok) {
    const description = body?.description ?? (response.statusText || "unexpected response");
    throw new DigestError(
      "publish",
      redactToken(`Telegram send failed: ${response.status} ${description}`, config.botToken),
      { status: response.status }
    );
  }
  return { messageId: body.result?.message_id };
}

async function readTelegramResponse(response: Response): Promise<TelegramResponse | null> {
  let json: unknown;
  try {
    json = await response.json();
  } catch {
    return null;
  }
  const parsed = telegramResponseSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function redactToken(message: string, token: string): string {
  return token ? message.split(token).join("<redacted>") : message;
}
