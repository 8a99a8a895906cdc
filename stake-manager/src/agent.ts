#!/usr/bin/env node
/**
 * Validator stake controller.
 * Polls the node, claims/restakes rewards at epoch boundaries, raises alerts.
 *
 * Usage:
 *   npx tsx stake-manager/src/agent.ts --verbose
 *   npx tsx stake-manager/src/agent.ts tmux --password-file ~/.wallet-pw
 */

import dotenv from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { Command } from "commander";

// Load .env from the stake-manager directory regardless of CWD
const __dirname = dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: resolve(__dirname, "..", ".env") });

import { loadConfig } from "./config.ts";
import { loadWalletPassword } from "./keyloader.ts";
import { ActionLogger } from "./log.ts";
import { ProcessExecutor } from "./executor.ts";
import { WalletCli } from "./wallet.ts";
import { NotificationService, type Notifier } from "./notify.ts";
import { ActionJournal } from "./journal.ts";
import { StateStore } from "./state.ts";
import { AnomalyDetector } from "./anomaly.ts";
import { StakeEngine } from "./engine.ts";
import { fetchMarketSnapshot } from "./market.ts";
import { initialRefresh, runLoops, type Presenter } from "./loops.ts";
import { TerminalDisplay } from "./display.ts";
import { TmuxStatusBar } from "./statusbar.ts";
import { startDashboard, type DashboardHandle } from "../../server/index.ts";

// ── CLI ──────────────────────────────────────────────────────────────────────

type CliOptions = {
  config?: string;
  passwordEnv?: string;
  passwordFile?: string;
  tmux: boolean;
  display: boolean;
  dashboard: boolean;
  verbose: boolean;
};

const program = new Command();

program
  .name("stake-warden")
  .description("Validator stake controller: auto-claim, auto-restake, node health alerts")
  .argument("[mode]", "Pass 'tmux' to drive the tmux status bar")
  .option("--config <path>", "Config file (JSON)")
  .option("--password-env <name>", "Env var holding the wallet password")
  .option("--password-file <path>", "File holding the wallet password")
  .option("--tmux", "Drive the tmux status bar", false)
  .option("--no-display", "Disable the live terminal panel")
  .option("--no-dashboard", "Do not start the HTTP dashboard")
  .option("--verbose", "Extra logging", false);

program.parse();
const opts = program.opts<CliOptions>();
const tmuxRequested = opts.tmux || program.args.includes("tmux");

const log = new ActionLogger({
  file: resolve(__dirname, "..", "..", "logs", "actions.log"),
  verbose: opts.verbose,
});

let runtime: { notifier: Notifier; store: StateStore } | null = null;

// ── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const { config, warnings } = loadConfig(opts.config);
  for (const w of warnings) log.warn(`[config] ${w}`);
  const general = config.general;

  const password = loadWalletPassword({
    passwordFile: opts.passwordFile,
    passwordEnv: opts.passwordEnv ?? general.passwordEnv,
  });

  const timeoutMs = general.commandTimeoutSeconds * 1000;
  const executor = new ProcessExecutor({ useSudo: general.useSudo, timeoutMs, log });
  const wallet = new WalletCli({
    executor,
    password,
    walletBin: general.walletBin,
    queryBin: general.queryBin,
    symbol: general.symbol,
  });
  const notify = new NotificationService(config.notifications, log);
  const journal = new ActionJournal();
  const store = new StateStore();
  runtime = { notifier: notify, store };
  const lastClaim = journal.getLastClaimBlock();
  if (lastClaim !== null) {
    store.update((s) => {
      s.lastClaimBlock = lastClaim;
    });
  }

  const detector = new AnomalyDetector({ minPeers: general.minPeers });
  const engine = new StakeEngine({ wallet, store, notifier: notify, log, policy: general, journal });

  const presenters: Presenter[] = [];
  if (opts.display) {
    presenters.push(new TerminalDisplay(general.symbol));
  }
  if (tmuxRequested || general.enableTmux) {
    // tmux runs as the invoking user, never under sudo
    presenters.push(new TmuxStatusBar(config.statusBar, new ProcessExecutor({ timeoutMs: 10_000, log }), log));
  }

  log.info("=== stake-warden starting ===");
  log.info(
    `Auto-stake rewards: ${general.autoStakeRewards ? "on" : "off"} | ` +
      `Auto-reclaim restakes: ${general.autoReclaimFullRestakes ? "on" : "off"} | ` +
      `Buffer: ${general.bufferBlocks} blocks | Min peers: ${general.minPeers}`,
  );
  log.info(`Notifications: ${notify.channels.length > 0 ? notify.channels.join(", ") : "none"}`);
  if (lastClaim !== null) log.info(`Last claim block restored: #${lastClaim}`);

  let dashboard: DashboardHandle | null = null;
  if (opts.dashboard && config.dashboard.enabled && config.dashboard.port !== undefined) {
    dashboard = await startDashboard(
      { store, journal, bufferBlocks: general.bufferBlocks, symbol: general.symbol },
      config.dashboard.host,
      config.dashboard.port,
      log,
    );
  }

  const deps = {
    wallet,
    store,
    notifier: notify,
    log,
    detector,
    fetchMarket: () => fetchMarketSnapshot(config.market, log),
  };

  // ── Graceful Shutdown ──────────────────────────────────────────────────────
  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      log.warn(`[${sig}] second signal, forcing exit`);
      process.exit(1);
    }
    log.info(`[${sig}] shutting down gracefully...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  await initialRefresh(deps, controller.signal);

  if (opts.display) log.muteConsole(true);
  try {
    await runLoops({ ...deps, engine, presenters }, controller.signal);
  } finally {
    log.muteConsole(false);
  }

  if (dashboard) await dashboard.close();
  journal.close();
  log.info("=== stake-warden stopped ===");
}

main()
  .then(() => process.exit(0))
  .catch(async (err: unknown) => {
    log.muteConsole(false);
    log.error("[FATAL]", err);
    if (runtime) {
      const msg = err instanceof Error ? err.message : String(err);
      await runtime.notifier.notify(`stake-warden stopped on an unhandled error: ${msg}`, runtime.store.get());
    }
    process.exit(1);
  });
