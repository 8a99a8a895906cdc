/**
 * Dashboard express app, exported for testing.
 * Read-only: every route works from a store snapshot or the journal.
 */

import express from "express";
import cors from "cors";
import type { StateStore } from "../stake-manager/src/state.ts";
import type { ActionJournal } from "../stake-manager/src/journal.ts";
import { formatHms, truncateDecimals } from "../stake-manager/src/format.ts";
import { minutesUntilNextEpoch } from "../stake-manager/src/epoch.ts";
import { stateRouter } from "./routes/state.ts";
import { actionsRouter } from "./routes/actions.ts";

export interface DashboardDeps {
  store: StateStore;
  journal?: ActionJournal;
  bufferBlocks: number;
  symbol: string;
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function renderDashboardPage(deps: DashboardDeps): string {
  const { state, logEntries } = deps.store.snapshot();
  const sym = deps.symbol;
  const price = state.price === null ? "?" : `$${truncateDecimals(state.price, 3)}`;
  const rows: Array<[string, string]> = [
    ["Block", `#${state.blockHeight}`],
    ["Peers", String(state.peerCount)],
    ["Last action", state.lastActionTaken],
    ["Next check", `${formatHms(state.remainingSeconds)} (${state.completionTimeLabel})`],
    ["Epoch boundary in", `${minutesUntilNextEpoch(state.blockHeight, deps.bufferBlocks)} min`],
    ["Price", price],
    ["Public", `${truncateDecimals(state.balances.public)} ${sym}`],
    ["Shielded", `${truncateDecimals(state.balances.shielded)} ${sym}`],
    ["Staked", `${truncateDecimals(state.stakeInfo.stakeAmount)} ${sym}`],
    ["Rewards", `${truncateDecimals(state.stakeInfo.rewardsAmount)} ${sym}`],
    ["Reclaimable", `${truncateDecimals(state.stakeInfo.reclaimableSlashedStake)} ${sym}`],
  ];
  if (state.lastFailure) rows.push(["Error", state.lastFailure]);

  const table = rows
    .map(([k, v]) => `<tr><th>${escapeHtml(k)}</th><td>${escapeHtml(v)}</td></tr>`)
    .join("");
  const logs = [...logEntries]
    .reverse()
    .map((e) => `<pre>${escapeHtml(e.text)}</pre>`)
    .join("");

  return (
    "<!doctype html><html><head><meta charset='utf-8'><meta http-equiv='refresh' content='10'>" +
    "<title>stake-warden</title></head>" +
    "<body style='font:14px monospace;background:#020817;color:#e2e8f0;padding:2rem'>" +
    `<h2>stake-warden</h2><table>${table}</table><h3>Status log</h3>${logs || "<p>No entries yet.</p>"}` +
    "</body></html>"
  );
}

export function createApp(deps: DashboardDeps): express.Express {
  const app = express();
  app.use(cors());

  app.use("/api", stateRouter(deps.store, deps.bufferBlocks));
  if (deps.journal) app.use("/api/actions", actionsRouter(deps.journal));

  app.get("/", (_req, res) => {
    res.type("html").send(renderDashboardPage(deps));
  });

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}
