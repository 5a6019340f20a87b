import type { TelegramClient } from "telegram";
import { z } from "zod";
import type { AlertPayload, AlertSink } from "../tasks/alerts.js";
import { HttpStatusError, withRetry } from "../utils/retry.js";

export type TelegramMode = "bot" | "user";

export interface TelegramOptions {
  enabled: boolean;
  mode?: TelegramMode;
  botToken?: string;
  chatId?: string;
  apiId?: number;
  apiHash?: string;
  session?: string;
  target?: string;
  timeoutMs?: number;
  attempts?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_ATTEMPTS = 4;
const MAX_RATE_LIMIT_WAIT_MS = 30_000;

const rateLimitBody = z.object({
  parameters: z.object({ retry_after: z.number().nonnegative() }).partial().optional()
});

export function pickMode(options: TelegramOptions): TelegramMode | null {
  if (options.mode) return options.mode;
  if (options.botToken && options.chatId) return "bot";
  if (options.apiId && options.apiHash && options.session) return "user";
  return null;
}

export class TelegramAlertSink implements AlertSink {
  readonly name = "telegram";
  private userClient: Promise<TelegramClient> | null = null;

  constructor(private readonly options: TelegramOptions) {}

  get configured(): boolean {
    return this.options.enabled && pickMode(this.options) !== null;
  }

  async deliver(payloads: readonly AlertPayload[]): Promise<AlertPayload[]> {
    const delivered: AlertPayload[] = [];
    for (const payload of payloads) {
      try {
        await this.send(payload.text);
        delivered.push(payload);
      } catch (error) {
        console.error(`[telegram] send failed for ${payload.signal.marketId}`, error);
      }
    }
    return delivered;
  }

  async send(text: string): Promise<void> {
    if (!this.options.enabled) return;

    const mode = pickMode(this.options);
    if (mode === "bot") {
      await this.sendBot(text);
    } else if (mode === "user") {
      await this.sendUser(text);
    } else {
      throw new Error("telegram is enabled but neither bot nor user credentials are set");
    }
  }

  private retryOptions(attempts: number) {
    return {
      attempts,
      timeoutMs: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxDelayMs: MAX_RATE_LIMIT_WAIT_MS,
      sleep: this.options.sleep
    };
  }

  private async sendBot(text: string): Promise<void> {
    const { botToken, chatId } = this.options;
    if (!botToken || !chatId) throw new Error("TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required in bot mode");

    const doFetch = this.options.fetch ?? fetch;
    await withRetry(async (signal) => {
      const response = await doFetch(`https://api.telegram.org/bot${botToken}/sendMessage`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: chatId,
          text,
          disable_web_page_preview: true
        }),
        signal
      });

      if (response.status === 429) {
        const body = rateLimitBody.safeParse(await response.json().catch(() => null));
        const retrySeconds = (body.success ? body.data.parameters?.retry_after : undefined) ?? 1;
        throw new HttpStatusError(429, "Telegram bot send rate limited", retrySeconds * 1000);
      }

      if (!response.ok) {
        const payload = await response.text();
        throw new HttpStatusError(response.status, `Telegram bot send failed ${response.status}: ${payload}`);
      }
    }, this.retryOptions(this.options.attempts ?? DEFAULT_ATTEMPTS));
  }

  private getUserClient(): Promise<TelegramClient> {
    const { apiId, apiHash, session } = this.options;
    if (!apiId || !apiHash || !session) {
      return Promise.reject(new Error("TELEGRAM_API_ID, TELEGRAM_API_HASH and TELEGRAM_SESSION are required in user mode"));
    }
    if (this.userClient) return this.userClient;

    this.userClient = (async () => {
      const { TelegramClient } = await import("telegram");
      const { StringSession } = await import("telegram/sessions/index.js");

      const client = new TelegramClient(new StringSession(session), apiId, apiHash, {
        connectionRetries: 1
      });
      await withRetry(() => client.connect(), this.retryOptions(1));
      return client;
    })();

    // A failed connect is retried on the next send.
    this.userClient.catch(() => {
      this.userClient = null;
    });
    return this.userClient;
  }

  private async sendUser(text: string): Promise<void> {
    const client = await this.getUserClient();
    const target = (this.options.target ?? "me").trim() || "me";
    await withRetry(
      () => client.sendMessage(target, { message: text, linkPreview: false }),
      this.retryOptions(1)
    );
  }

  async close(): Promise<void> {
    if (!this.userClient) return;
    const client = await this.userClient;
    await client.disconnect();
    this.userClient = null;
  }
}
