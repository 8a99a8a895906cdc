import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { NotificationService } from "../stake-manager/src/notify.ts";
import { initialState } from "../stake-manager/src/state.ts";
import type { Logger } from "../stake-manager/src/log.ts";
import type { NotificationConfig } from "../stake-manager/src/config.ts";
import { _clearSecrets, registerSecret } from "../server/secrets.ts";

interface SentRequest {
  url: string;
  init: RequestInit | undefined;
}

function fakeFetch(status = 200): { fetch: typeof fetch; sent: SentRequest[] } {
  const sent: SentRequest[] = [];
  const impl: typeof fetch = async (input, init) => {
    sent.push({ url: String(input), init });
    return new Response("", { status });
  };
  return { fetch: impl, sent };
}

function warnings(): Logger & { warned: string[] } {
  const warned: string[] = [];
  return { warned, debug() {}, info() {}, warn: (m) => warned.push(m), error() {} };
}

const base: NotificationConfig = { timeoutSeconds: 10 };
const state = initialState();

describe("NotificationService", () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.NTFY_CHANNEL;
    delete process.env.NTFY_TOKEN;
    delete process.env.TELEGRAM_BOT_TOKEN;
    delete process.env.PUSHOVER_APP_TOKEN;
    delete process.env.PUSHBULLET_TOKEN;
  });

  afterEach(() => {
    process.env = { ...origEnv };
    _clearSecrets();
  });

  it("has no channels when nothing is configured", async () => {
    const f = fakeFetch();
    const svc = new NotificationService(base, warnings(), f.fetch);
    expect(svc.channels).toEqual([]);
    await svc.notify("hello", state);
    expect(f.sent).toHaveLength(0);
  });

  it("posts to ntfy with bearer auth and high priority for warnings", async () => {
    const f = fakeFetch();
    const svc = new NotificationService({ ...base, ntfyChannel: "my-node", ntfyToken: "test-token" }, warnings(), f.fetch);
    await svc.notify("WARNING! Low peer count", state);
    expect(f.sent[0]?.url).toBe("https://ntfy.sh/my-node");
    expect(f.sent[0]?.init?.body).toBe("WARNING! Low peer count");
    expect(f.sent[0]?.init?.headers).toEqual({
      Title: "stake-warden",
      Markdown: "yes",
      Authorization: "Bearer test-token",
      Priority: "high",
    });
  });

  it("picks up the ntfy channel from the environment", () => {
    process.env.NTFY_CHANNEL = "env-channel";
    const svc = new NotificationService(base, warnings(), fakeFetch().fetch);
    expect(svc.channels).toEqual(["ntfy"]);
  });

  it("fans out to every configured channel", async () => {
    const f = fakeFetch();
    const svc = new NotificationService(
      {
        ...base,
        discordWebhook: "https://discord.example.test/hook",
        telegramBotToken: "test-bot",
        telegramChatId: "42",
        webhookUrl: "https://hooks.example.test/warden",
      },
      warnings(),
      f.fetch,
    );
    expect(svc.channels).toEqual(["Discord", "Telegram", "Webhook"]);
    await svc.notify("Stake Completed: New Stake: 2005 DUSK", state);
    expect(f.sent.map((r) => r.url)).toEqual([
      "https://discord.example.test/hook",
      "https://api.telegram.org/bottest-bot/sendMessage",
      "https://hooks.example.test/warden",
    ]);
    expect(f.sent[1]?.init?.body).toBe(JSON.stringify({ chat_id: "42", text: "Stake Completed: New Stake: 2005 DUSK" }));
  });

  it("pushes a note to PushBullet with the access token header", async () => {
    const f = fakeFetch();
    const svc = new NotificationService({ ...base, pushbulletToken: "test-token" }, warnings(), f.fetch);
    expect(svc.channels).toEqual(["PushBullet"]);
    await svc.notify("Claim and Stake: Rewards: 5", state);
    expect(f.sent[0]?.url).toBe("https://api.pushbullet.com/v2/pushes");
    expect(f.sent[0]?.init?.headers).toEqual({ "Access-Token": "test-token", "Content-Type": "application/json" });
    expect(f.sent[0]?.init?.body).toBe(
      JSON.stringify({ type: "note", title: "stake-warden", body: "Claim and Stake: Rewards: 5" }),
    );
  });

  it("picks up the PushBullet token from the environment", () => {
    process.env.PUSHBULLET_TOKEN = "test-token";
    const svc = new NotificationService(base, warnings(), fakeFetch().fetch);
    expect(svc.channels).toEqual(["PushBullet"]);
  });

  it("redacts a configured PushBullet token echoed in a message", async () => {
    const f = fakeFetch();
    const svc = new NotificationService({ ...base, pushbulletToken: "test-token" }, warnings(), f.fetch);
    await svc.notify("token test-token rejected", state);
    expect(f.sent[0]?.init?.body).toBe(
      JSON.stringify({ type: "note", title: "stake-warden", body: "token [PUSHBULLET_TOKEN] rejected" }),
    );
  });

  it("truncates Discord content to 2000 characters", async () => {
    const f = fakeFetch();
    const svc = new NotificationService({ ...base, discordWebhook: "https://discord.example.test/hook" }, warnings(), f.fetch);
    await svc.notify("x".repeat(2500), state);
    expect(f.sent[0]?.init?.body).toBe(JSON.stringify({ content: "x".repeat(2000) }));
  });

  it("redacts secrets from the message body", async () => {
    registerSecret("WALLET_PASSWORD", "test-secret");
    const f = fakeFetch();
    const svc = new NotificationService({ ...base, ntfyChannel: "n" }, warnings(), f.fetch);
    await svc.notify("failed: --password test-secret", state);
    expect(f.sent[0]?.init?.body).toBe("failed: --password [WALLET_PASSWORD]");
  });

  it("logs delivery failures instead of throwing", async () => {
    const f = fakeFetch(500);
    const log = warnings();
    const svc = new NotificationService({ ...base, ntfyChannel: "n" }, log, f.fetch);
    await expect(svc.notify("hello", state)).resolves.toBeUndefined();
    expect(log.warned).toEqual(["[notify] ntfy delivery failed: HTTP 500"]);
  });
});
