/**
 * Spot price + 24h stats from the CoinGecko simple-price endpoint.
 * Display only: a failed fetch returns null and the last snapshot stays up.
 */

import { z } from "zod";
import type { MarketConfig } from "./config.ts";
import type { MarketSnapshot } from "./state.ts";
import type { Logger } from "./log.ts";

const FETCH_TIMEOUT_MS = 10_000;

const payloadSchema = z.record(z.string(), z.record(z.string(), z.unknown()));
const figure = z.number().finite();

function figureOrNull(v: unknown): number | null {
  const parsed = figure.safeParse(v);
  return parsed.success ? parsed.data : null;
}

export function marketUrl(cfg: MarketConfig): string {
  const params = new URLSearchParams({
    ids: cfg.coingeckoId,
    vs_currencies: cfg.vsCurrency,
    include_market_cap: "true",
    include_24hr_vol: "true",
    include_24hr_change: "true",
  });
  return `${cfg.baseUrl.replace(/\/+$/, "")}/simple/price?${params.toString()}`;
}

/** Map the `{ "<id>": { usd, usd_market_cap, ... } }` payload. Exported for tests. */
export function parseMarketPayload(json: unknown, cfg: MarketConfig): MarketSnapshot | null {
  const payload = payloadSchema.safeParse(json);
  if (!payload.success) return null;
  const entry = payload.data[cfg.coingeckoId];
  if (!entry) return null;

  const cur = cfg.vsCurrency;
  const price = figureOrNull(entry[cur]);
  if (price === null) return null;
  return {
    price,
    marketCap: figureOrNull(entry[`${cur}_market_cap`]),
    volume24h: figureOrNull(entry[`${cur}_24h_vol`]),
    change24hPct: figureOrNull(entry[`${cur}_24h_change`]),
  };
}

export async function fetchMarketSnapshot(cfg: MarketConfig, log: Logger): Promise<MarketSnapshot | null> {
  const ctrl = new AbortController();
  const timeout = setTimeout(() => ctrl.abort(), FETCH_TIMEOUT_MS);
  try {
    const resp = await fetch(marketUrl(cfg), { signal: ctrl.signal });
    if (resp.status !== 200) {
      log.debug(`[market] price feed HTTP ${resp.status}`);
      return null;
    }
    const snapshot = parseMarketPayload(await resp.json(), cfg);
    if (!snapshot) log.debug(`[market] no ${cfg.coingeckoId} entry in price feed response`);
    return snapshot;
  } catch (err) {
    log.debug(`[market] price feed error: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  } finally {
    clearTimeout(timeout);
  }
}
