/**
 * Controller configuration: JSON file with five sections, every key optional.
 *
 * Default location: stake-manager/warden.config.json (gitignored).
 * A missing file means "all defaults"; a malformed one is a startup error.
 * Each section is a zod schema carrying its own defaults.
 */

import { existsSync, readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CONFIG_PATH = resolve(__dirname, "..", "warden.config.json");

const finite = z.number().finite();
const flag = z.boolean().default(true);
/** Unset, null and "" all leave the channel off. */
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v || undefined);

const generalSchema = z.object({
  minRewards: finite.default(1),
  minSlashed: finite.default(1),
  bufferBlocks: finite.min(0).default(60),
  minStakeAmount: finite.default(1000),
  minPeers: finite.default(10),
  autoStakeRewards: z.boolean().default(false),
  autoReclaimFullRestakes: z.boolean().default(false),
  passwordEnv: z.string().min(1).default("WALLET_PASSWORD"),
  useSudo: z.boolean().default(false),
  enableTmux: z.boolean().default(false),
  walletBin: z.string().min(1).default("rusk-wallet"),
  queryBin: z.string().min(1).default("ruskquery"),
  symbol: z.string().default("DUSK"),
  commandTimeoutSeconds: finite.positive().default(120),
});

const notificationSchema = z.object({
  ntfyChannel: optionalText,
  ntfyToken: optionalText,
  discordWebhook: optionalText,
  telegramBotToken: optionalText,
  telegramChatId: optionalText,
  pushoverUserKey: optionalText,
  pushoverAppToken: optionalText,
  pushbulletToken: optionalText,
  webhookUrl: optionalText,
  timeoutSeconds: finite.positive().default(10),
});

const statusBarSchema = z.object({
  showCurrentBlock: flag,
  showStaked: flag,
  showPublic: flag,
  showShielded: flag,
  showTotal: flag,
  showRewards: flag,
  showReclaimable: flag,
  showPrice: flag,
  showTimer: flag,
  showTriggerTime: flag,
  showPeerCount: flag,
});

const dashboardSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().min(1).default("0.0.0.0"),
  // no port, no dashboard
  port: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .nullish()
    .transform((v) => v ?? undefined),
});

const marketSchema = z.object({
  baseUrl: z.string().url().default("https://api.coingecko.com/api/v3"),
  coingeckoId: z.string().min(1).default("dusk-network"),
  vsCurrency: z.string().min(1).default("usd"),
});

export type GeneralConfig = z.infer<typeof generalSchema>;
export type NotificationConfig = z.infer<typeof notificationSchema>;
export type StatusBarConfig = z.infer<typeof statusBarSchema>;
export type DashboardConfig = z.infer<typeof dashboardSchema>;
export type MarketConfig = z.infer<typeof marketSchema>;

export interface WardenConfig {
  general: GeneralConfig;
  notifications: NotificationConfig;
  statusBar: StatusBarConfig;
  dashboard: DashboardConfig;
  market: MarketConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_GENERAL: GeneralConfig = generalSchema.parse({});

const rawSection = z.record(z.string(), z.unknown());

/**
 * Parse one section. A key that fails validation is dropped with a warning so
 * its default applies; a section that is not an object falls back entirely.
 */
function parseSection<T extends z.ZodTypeAny>(name: string, schema: T, raw: unknown, warnings: string[]): z.output<T> {
  const parsed = schema.safeParse(raw ?? {});
  if (parsed.success) return parsed.data;

  const section = rawSection.safeParse(raw);
  if (!section.success) {
    warnings.push(`${name}: expected an object, using defaults`);
    return schema.parse({});
  }
  const kept = { ...section.data };
  for (const issue of parsed.error.issues) {
    const [key] = issue.path;
    if (typeof key === "string" && key in kept) {
      warnings.push(`${name}.${key}: ${issue.message}, using default`);
      delete kept[key];
    }
  }
  return schema.parse(kept);
}

/** Build a config from already-parsed JSON. Exported for tests. */
export function parseConfig(raw: unknown): { config: WardenConfig; warnings: string[] } {
  const root = rawSection.safeParse(raw ?? {});
  if (!root.success) throw new ConfigError("Config root must be a JSON object");
  const sections = root.data;
  const warnings: string[] = [];
  return {
    config: {
      general: parseSection("general", generalSchema, sections.general, warnings),
      notifications: parseSection("notifications", notificationSchema, sections.notifications, warnings),
      statusBar: parseSection("statusBar", statusBarSchema, sections.statusBar, warnings),
      dashboard: parseSection("dashboard", dashboardSchema, sections.dashboard, warnings),
      market: parseSection("market", marketSchema, sections.market, warnings),
    },
    warnings,
  };
}

export function loadConfig(path: string = DEFAULT_CONFIG_PATH): { config: WardenConfig; warnings: string[] } {
  if (!existsSync(path)) return parseConfig(undefined);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read config ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(parsed);
}
