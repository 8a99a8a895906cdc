/**
 * Notification fan-out: ntfy, Discord, Telegram, Pushover, PushBullet, generic webhook.
 *
 * Every configured channel gets the message concurrently, each bounded by the
 * configured timeout. Delivery failures are logged, never thrown.
 */

import type { NotificationConfig } from "./config.ts";
import type { SharedState } from "./state.ts";
import type { Logger } from "./log.ts";
import { redactSecrets, registerSecret } from "../../server/secrets.ts";

export interface Notifier {
  /** Resolves once every channel has delivered, failed or timed out. Never rejects. */
  notify(message: string, snapshot: Readonly<SharedState>): Promise<void>;
  readonly channels: readonly string[];
}

type FetchFn = typeof fetch;

interface Channel {
  name: string;
  request(message: string, snapshot: Readonly<SharedState>): { url: string; init: RequestInit };
}

const TITLE = "stake-warden";

function buildChannels(cfg: NotificationConfig): Channel[] {
  const channels: Channel[] = [];
  const ntfyToken = cfg.ntfyToken ?? process.env.NTFY_TOKEN;
  const ntfyChannel = cfg.ntfyChannel ?? process.env.NTFY_CHANNEL;

  if (ntfyChannel) {
    channels.push({
      name: "ntfy",
      request: (message) => {
        const headers: Record<string, string> = { Title: TITLE, Markdown: "yes" };
        if (ntfyToken) headers["Authorization"] = `Bearer ${ntfyToken}`;
        if (message.startsWith("WARNING!")) headers["Priority"] = "high";
        return {
          url: `https://ntfy.sh/${encodeURIComponent(ntfyChannel)}`,
          init: { method: "POST", headers, body: message },
        };
      },
    });
  }

  const discord = cfg.discordWebhook;
  if (discord) {
    channels.push({
      name: "Discord",
      request: (message) => ({
        url: discord,
        init: {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ content: message.slice(0, 2000) }),
        },
      }),
    });
  }

  const botToken = cfg.telegramBotToken ?? process.env.TELEGRAM_BOT_TOKEN;
  const chatId = cfg.telegramChatId;
  if (botToken && chatId) {
    channels.push({
      name: "Telegram",
      request: (message) => ({
        url: `https://api.telegram.org/bot${botToken}/sendMessage`,
        init: {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ chat_id: chatId, text: message }),
        },
      }),
    });
  }

  const appToken = cfg.pushoverAppToken ?? process.env.PUSHOVER_APP_TOKEN;
  const userKey = cfg.pushoverUserKey;
  if (appToken && userKey) {
    channels.push({
      name: "Pushover",
      request: (message) => ({
        url: "https://api.pushover.net/1/messages.json",
        init: {
          method: "POST",
          body: new URLSearchParams({ token: appToken, user: userKey, title: TITLE, message }),
        },
      }),
    });
  }

  const pushbullet = cfg.pushbulletToken ?? process.env.PUSHBULLET_TOKEN;
  if (pushbullet) {
    channels.push({
      name: "PushBullet",
      request: (message) => ({
        url: "https://api.pushbullet.com/v2/pushes",
        init: {
          method: "POST",
          headers: { "Access-Token": pushbullet, "Content-Type": "application/json" },
          body: JSON.stringify({ type: "note", title: TITLE, body: message }),
        },
      }),
    });
  }

  const webhook = cfg.webhookUrl;
  if (webhook) {
    channels.push({
      name: "Webhook",
      request: (message, snapshot) => ({
        url: webhook,
        init: {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ message, state: snapshot, sentAt: new Date().toISOString() }),
        },
      }),
    });
  }

  return channels;
}

export class NotificationService implements Notifier {
  private readonly list: Channel[];
  private readonly timeoutMs: number;

  constructor(
    cfg: NotificationConfig,
    private readonly log: Logger,
    private readonly fetchImpl: FetchFn = fetch,
  ) {
    for (const [label, value] of [
      ["NTFY_TOKEN", cfg.ntfyToken],
      ["TELEGRAM_BOT_TOKEN", cfg.telegramBotToken],
      ["PUSHOVER_APP_TOKEN", cfg.pushoverAppToken],
      ["PUSHBULLET_TOKEN", cfg.pushbulletToken],
    ] as const) {
      if (value) registerSecret(label, value);
    }
    this.list = buildChannels(cfg);
    this.timeoutMs = cfg.timeoutSeconds * 1000;
  }

  get channels(): readonly string[] {
    return this.list.map((c) => c.name);
  }

  async notify(message: string, snapshot: Readonly<SharedState>): Promise<void> {
    const body = redactSecrets(message);
    this.log.debug(`[notify] ${body.replace(/\n/g, " | ")}`);
    if (this.list.length === 0) return;

    const results = await Promise.allSettled(this.list.map((ch) => this.deliver(ch, body, snapshot)));
    results.forEach((r, i) => {
      if (r.status === "rejected") {
        const reason = r.reason instanceof Error ? r.reason.message : String(r.reason);
        this.log.warn(`[notify] ${this.list[i].name} delivery failed: ${redactSecrets(reason)}`);
      }
    });
  }

  private async deliver(channel: Channel, message: string, snapshot: Readonly<SharedState>): Promise<void> {
    const { url, init } = channel.request(message, snapshot);
    const ctrl = new AbortController();
    const timeout = setTimeout(() => ctrl.abort(), this.timeoutMs);
    try {
      const resp = await this.fetchImpl(url, { ...init, signal: ctrl.signal });
      if (!resp.ok) throw new Error(`HTTP ${resp.status}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}
