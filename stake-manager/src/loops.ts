/**
 * Loop coordinator: polling (10s), decision (epoch-aligned), presentation (1s).
 * The loops share nothing but the state store and the shutdown signal.
 * Once the signal aborts, no further command is issued after the one in flight.
 */

import type { Logger } from "./log.ts";
import type { Notifier } from "./notify.ts";
import type { MarketSnapshot, PresentationSnapshot, StateStore } from "./state.ts";
import type { ChainWallet } from "./wallet.ts";
import type { StakeEngine } from "./engine.ts";
import { POLL_INTERVAL_SECONDS, type AnomalyAlert, type AnomalyDetector } from "./anomaly.ts";
import { sleep } from "./epoch.ts";

export const SLOW_REFRESH_EVERY = 33; // polls (~5.5 min)
export const PRESENTATION_INTERVAL_MS = 1000;
export const PRESENTATION_ERROR_BACKOFF_MS = 5000;

export interface Presenter {
  readonly name: string;
  render(snapshot: PresentationSnapshot): void | Promise<void>;
}

export interface PollingDeps {
  wallet: ChainWallet;
  store: StateStore;
  notifier: Notifier;
  log: Logger;
  detector: AnomalyDetector;
  fetchMarket: () => Promise<MarketSnapshot | null>;
}

function applyMarket(store: StateStore, snap: MarketSnapshot): void {
  store.update((s) => {
    s.price = snap.price;
    s.marketCap = snap.marketCap;
    s.volume24h = snap.volume24h;
    s.change24hPct = snap.change24hPct;
  });
}

/**
 * Slow-moving data: balances, stake info (all three figures or nothing), market.
 * Used once at startup and every SLOW_REFRESH_EVERY polls.
 */
export async function refreshSlowData(
  deps: Pick<PollingDeps, "wallet" | "store" | "fetchMarket">,
  signal?: AbortSignal,
): Promise<void> {
  const { wallet, store } = deps;
  const [balances, info, market] = await Promise.all([
    wallet.fetchBalances(),
    wallet.fetchStakeInfo(),
    deps.fetchMarket(),
  ]);
  if (signal?.aborted) return;
  store.update((s) => {
    s.balances = { ...balances };
  });
  if (info) store.setStakeInfo(info);
  if (market) applyMarket(store, market);
}

/** Startup refresh so the first frames show real numbers. Seeds the stall detector. */
export async function initialRefresh(deps: PollingDeps, signal?: AbortSignal): Promise<void> {
  const height = await deps.wallet.fetchBlockHeight();
  if (signal?.aborted) return;
  if (height !== null) {
    deps.store.update((s) => {
      s.blockHeight = height;
    });
    deps.detector.seedHeight(height);
  } else {
    deps.log.warn("Initial block height unavailable");
  }
  await refreshSlowData(deps, signal);
}

async function raise(deps: PollingDeps, alert: AnomalyAlert): Promise<void> {
  deps.log.error(alert.message.replace(/\n/g, " "));
  await deps.notifier.notify(alert.message, deps.store.get());
}

/** One poll. Returns false when the block height could not be fetched or shutdown cut it short. */
export async function pollOnce(deps: PollingDeps, cycle: number, signal?: AbortSignal): Promise<boolean> {
  const { wallet, store, log, detector } = deps;

  const height = await wallet.fetchBlockHeight();
  if (signal?.aborted) return false;
  if (height === null) {
    log.error(`Failed to fetch block height. Retrying in ${POLL_INTERVAL_SECONDS}s...`);
    return false;
  }
  const stall = detector.observeHeight(height);
  store.update((s) => {
    s.blockHeight = height;
  });
  if (stall) await raise(deps, stall);

  if (cycle > 0 && cycle % SLOW_REFRESH_EVERY === 0) {
    await refreshSlowData(deps, signal);
  }
  if (signal?.aborted) return false;

  const peers = await wallet.fetchPeerCount();
  if (signal?.aborted) return false;
  if (peers === null) {
    log.error("Failed to fetch peers.");
    return true;
  }
  store.update((s) => {
    s.peerCount = peers;
  });
  const lowPeers = detector.observePeers(peers);
  if (lowPeers) await raise(deps, lowPeers);
  return true;
}

export async function runPollingLoop(deps: PollingDeps, signal: AbortSignal): Promise<void> {
  let cycle = 0;
  while (!signal.aborted) {
    try {
      if (await pollOnce(deps, cycle, signal)) cycle++;
    } catch (err) {
      deps.log.error("[poll] unexpected error", err);
    }
    await sleep(POLL_INTERVAL_SECONDS * 1000, signal);
  }
  deps.log.info("[poll] polling loop stopped");
}

/** Render every presenter once. A failing presenter doesn't stop the others. */
export async function renderOnce(
  store: StateStore,
  presenters: readonly Presenter[],
  log: Logger,
): Promise<boolean> {
  const snapshot = store.snapshot();
  let allOk = true;
  for (const p of presenters) {
    try {
      await p.render(snapshot);
    } catch (err) {
      allOk = false;
      log.error(`[display] ${p.name} failed`, err);
    }
  }
  return allOk;
}

export async function runPresentationLoop(
  store: StateStore,
  presenters: readonly Presenter[],
  log: Logger,
  signal: AbortSignal,
): Promise<void> {
  while (!signal.aborted) {
    const ok = await renderOnce(store, presenters, log);
    await sleep(ok ? PRESENTATION_INTERVAL_MS : PRESENTATION_ERROR_BACKOFF_MS, signal);
  }
}

export interface CoordinatorDeps extends PollingDeps {
  engine: StakeEngine;
  presenters: readonly Presenter[];
}

/** Run all three loops until the signal aborts; resolves when every loop has wound down. */
export async function runLoops(deps: CoordinatorDeps, signal: AbortSignal): Promise<void> {
  await Promise.all([
    deps.engine.run(signal),
    runPollingLoop(deps, signal),
    runPresentationLoop(deps.store, deps.presenters, deps.log, signal),
  ]);
}
