/**
 * Live terminal view. Redraws the whole frame once a second:
 * status log entries on top, the real-time panel below.
 */

import chalk from "chalk";
import { clearScreenDown, cursorTo } from "readline";
import type { Presenter } from "./loops.ts";
import type { PresentationSnapshot, SharedState } from "./state.ts";
import { fiat, formatHms, truncateDecimals } from "./format.ts";

type Paint = (text: string) => string;

/** Countdown colour: red under 1h, yellow under 2h, green under 3h. */
export function timerColor(remainingSeconds: number): Paint {
  if (remainingSeconds <= 3600) return chalk.red;
  if (remainingSeconds <= 7200) return chalk.yellowBright;
  if (remainingSeconds <= 10800) return chalk.green;
  return chalk.whiteBright;
}

export function peerColor(peers: number): Paint {
  if (peers > 40) return chalk.greenBright;
  if (peers > 16) return chalk.yellowBright;
  return chalk.red;
}

export function formatChange(pct: number | null): string {
  if (pct === null) return "(? 24h)";
  const text = `${pct > 0 ? "+" : ""}${pct.toFixed(2)}%`;
  if (pct > 0) return `(${chalk.green(text)} 24h)`;
  if (pct < 0) return `(${chalk.red(text)} 24h)`;
  return `(${text} 24h)`;
}

export function renderPanel(state: Readonly<SharedState>, symbol: string, now: Date = new Date()): string {
  const st = state.stakeInfo;
  const b = state.balances;
  const p = state.price;
  const total = b.public + b.shielded;
  const remaining = state.remainingSeconds;
  const timer = timerColor(remaining)(remaining > 0 ? formatHms(remaining) : "0s");
  const clock = now.toTimeString().slice(0, 8);
  const priceText = p === null ? "?" : truncateDecimals(p, 3);
  const failure = state.lastFailure ? `\n    ${chalk.bgRed.white(" ERROR ")} ${chalk.red(state.lastFailure)}` : "";

  return [
    ` ${chalk.whiteBright("=======")} ${clock} Block: ${chalk.blueBright(`#${state.blockHeight}`)} Peers: ${peerColor(state.peerCount)(String(state.peerCount))} ${chalk.whiteBright("=======")}`,
    `    ${chalk.cyan("Last Action")}   | ${chalk.cyan(state.lastActionTaken)}${failure}`,
    `    ${chalk.greenBright("Next Check")}    | ${timer} (${state.completionTimeLabel})`,
    `                  |`,
    `    ${chalk.whiteBright("Balance")}       |   @ $${priceText} USD ${formatChange(state.change24hPct)}`,
    `      ├─ ${chalk.yellowBright("Public")}   | ${chalk.yellowBright(`${truncateDecimals(b.public)} ($${fiat(b.public, p)})`)}`,
    `      └─ ${chalk.blue("Shielded")} | ${chalk.blue(`${truncateDecimals(b.shielded)} ($${fiat(b.shielded, p)})`)}`,
    `            Total | ${chalk.whiteBright(`${truncateDecimals(total)} ${symbol} ($${fiat(total, p)})`)}`,
    `                  |`,
    `    ${chalk.whiteBright("Staked")}        | ${truncateDecimals(st.stakeAmount)} ($${fiat(st.stakeAmount, p)})`,
    `    ${chalk.yellowBright("Rewards")}       | ${chalk.yellowBright(`${truncateDecimals(st.rewardsAmount)} ($${fiat(st.rewardsAmount, p)})`)}`,
    `    ${chalk.redBright("Reclaimable")}   | ${chalk.redBright(`${truncateDecimals(st.reclaimableSlashedStake)} ($${fiat(st.reclaimableSlashedStake, p)})`)}`,
    ` ${"=".repeat(47)}`,
  ].join("\n");
}

export class TerminalDisplay implements Presenter {
  readonly name = "terminal";

  constructor(
    private readonly symbol: string,
    private readonly out: NodeJS.WriteStream = process.stdout,
  ) {}

  render(snapshot: PresentationSnapshot): void {
    const logs = snapshot.logEntries
      .map((e) => e.text.split("\n").map((l) => `\t${l}`).join("\n"))
      .join("\n\n");
    cursorTo(this.out, 0, 0);
    clearScreenDown(this.out);
    this.out.write(`${logs ? `${logs}\n\n` : ""}${renderPanel(snapshot.state, this.symbol)}\n`);
  }
}
