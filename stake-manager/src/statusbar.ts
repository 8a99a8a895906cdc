/**
 * tmux status-left integration. Segments are toggled by the statusBar config.
 * The first failed tmux call (not inside tmux, tmux missing) turns it off for good.
 */

import type { StatusBarConfig } from "./config.ts";
import type { Executor } from "./executor.ts";
import type { Logger } from "./log.ts";
import type { Presenter } from "./loops.ts";
import type { PresentationSnapshot, SharedState } from "./state.ts";
import { formatHms, truncateDecimals } from "./format.ts";

export function statusLine(state: Readonly<SharedState>, cfg: StatusBarConfig): string {
  const st = state.stakeInfo;
  const b = state.balances;
  const segments: string[] = [];

  if (cfg.showCurrentBlock) segments.push(`Blk: #${state.blockHeight}`);
  if (cfg.showStaked) segments.push(`Stk: ${truncateDecimals(st.stakeAmount)}`);
  if (cfg.showReclaimable) segments.push(`Rcl: ${truncateDecimals(st.reclaimableSlashedStake)}`);
  if (cfg.showRewards) segments.push(`Rwd: ${truncateDecimals(st.rewardsAmount)}`);

  const bal: string[] = [];
  if (cfg.showPublic) bal.push(`P:${truncateDecimals(b.public)}`);
  if (cfg.showShielded) bal.push(`S:${truncateDecimals(b.shielded)}`);
  if (bal.length > 0) segments.push(`${cfg.showTotal ? "Bal: " : ""}${bal.join("  ")}`);

  if (cfg.showPrice) {
    const price = state.price === null ? "?" : truncateDecimals(state.price, 3);
    const chg = state.change24hPct === null ? "?" : `${state.change24hPct > 0 ? "+" : ""}${state.change24hPct.toFixed(2)}%`;
    segments.push(`$USD: ${price} (${chg} 24h)`);
  }

  const timing: string[] = [];
  if (cfg.showTimer) timing.push(`Next: ${state.remainingSeconds > 0 ? formatHms(state.remainingSeconds) : "0s"}`);
  if (cfg.showTriggerTime) timing.push(`(${state.completionTimeLabel})`);
  if (cfg.showPeerCount) timing.push(`Peers: ${state.peerCount}`);
  if (timing.length > 0) segments.push(timing.join(" "));

  const error = state.lastFailure ? " - !ERROR DETECTED!" : "";
  return `> ${segments.join(" | ")}${error}`;
}

export class TmuxStatusBar implements Presenter {
  readonly name = "tmux";
  private enabled = true;
  private lastLine = "";

  constructor(
    private readonly cfg: StatusBarConfig,
    private readonly executor: Executor,
    private readonly log: Logger,
  ) {}

  get active(): boolean {
    return this.enabled;
  }

  async render(snapshot: PresentationSnapshot): Promise<void> {
    if (!this.enabled) return;
    const line = statusLine(snapshot.state, this.cfg);
    if (line === this.lastLine) return;
    const res = await this.executor.run("tmux", ["set-option", "-g", "status-left", line]);
    if (!res.ok) {
      this.enabled = false;
      this.log.error("Failed to update tmux status bar. Is tmux running? Status bar disabled.");
      return;
    }
    this.lastLine = line;
  }
}
