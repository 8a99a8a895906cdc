/**
 * Chain + wallet adapter over the two CLIs.
 *
 *   <queryBin> block-height | peers
 *   <walletBin> --password <pw> profiles | stake-info | withdraw | unstake
 *   <walletBin> --password <pw> balance --spendable --address <addr>
 *   <walletBin> --password <pw> stake --amt <amount>
 *
 * Queries return null when the command fails or its output can't be parsed.
 * Transactions (withdraw, unstake, stake) run without a kill deadline.
 */

import type { CommandResult, Executor } from "./executor.ts";
import type { Balances, StakeInfo } from "./state.ts";
import { formatAmount } from "./format.ts";

export interface WalletAddresses {
  public: string[];
  shielded: string[];
}

export interface ChainWallet {
  fetchBlockHeight(): Promise<number | null>;
  fetchPeerCount(): Promise<number | null>;
  fetchStakeInfo(): Promise<StakeInfo | null>;
  fetchAddresses(): Promise<WalletAddresses | null>;
  fetchSpendableBalance(address: string): Promise<number>;
  fetchBalances(): Promise<Balances>;
  withdraw(): Promise<CommandResult>;
  unstake(): Promise<CommandResult>;
  stake(amount: number): Promise<CommandResult>;
}

export interface WalletCliOptions {
  executor: Executor;
  password: string;
  walletBin?: string;
  queryBin?: string;
  symbol?: string;
}

// ── Parsers ──────────────────────────────────────────────────────────────────

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** A bare non-negative integer, e.g. `block-height` / `peers` output. */
export function parseCount(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Pull the three stake figures out of `stake-info` output.
 * All-or-nothing: if any figure is missing the whole result is null.
 */
export function parseStakeInfo(text: string, symbol = "DUSK"): StakeInfo | null {
  const unit = escapeRegExp(symbol);
  const field = (label: string): number | null => {
    const m = text.match(new RegExp(`${escapeRegExp(label)}\\s*(\\d+(?:\\.\\d+)?)\\s*${unit}`));
    return m ? Number(m[1]) : null;
  };

  const stakeAmount = field("Eligible stake:");
  const reclaimableSlashedStake = field("Reclaimable slashed stake:");
  const rewardsAmount = field("Accumulated rewards is:");
  if (stakeAmount === null || reclaimableSlashedStake === null || rewardsAmount === null) {
    return null;
  }
  return { stakeAmount, reclaimableSlashedStake, rewardsAmount };
}

/** `profiles` output: "Public account - <addr>" / "Shielded account - <addr>" lines. */
export function parseProfiles(text: string): WalletAddresses {
  const out: WalletAddresses = { public: [], shielded: [] };
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    const shielded = line.match(/Shielded account\s*-\s*(\S+)/);
    if (shielded) {
      out.shielded.push(shielded[1]);
      continue;
    }
    const pub = line.match(/Public account\s*-\s*(\S+)/);
    if (pub) out.public.push(pub[1]);
  }
  return out;
}

/** `balance --spendable` output: "Total: <n>". Anything else counts as 0. */
export function parseSpendable(text: string): number {
  const m = text.trim().match(/^(?:Total:\s*)?(\d+(?:\.\d+)?)$/);
  return m ? Number(m[1]) : 0;
}

// ── Adapter ──────────────────────────────────────────────────────────────────

export class WalletCli implements ChainWallet {
  private readonly executor: Executor;
  private readonly password: string;
  private readonly walletBin: string;
  private readonly queryBin: string;
  private readonly symbol: string;

  constructor(opts: WalletCliOptions) {
    this.executor = opts.executor;
    this.password = opts.password;
    this.walletBin = opts.walletBin ?? "rusk-wallet";
    this.queryBin = opts.queryBin ?? "ruskquery";
    this.symbol = opts.symbol ?? "DUSK";
  }

  private wallet(...args: string[]): Promise<CommandResult> {
    return this.executor.run(this.walletBin, ["--password", this.password, ...args]);
  }

  // a killed transaction may still land on chain
  private transact(...args: string[]): Promise<CommandResult> {
    return this.executor.run(this.walletBin, ["--password", this.password, ...args], { timeoutMs: 0 });
  }

  private query(...args: string[]): Promise<CommandResult> {
    return this.executor.run(this.queryBin, args);
  }

  async fetchBlockHeight(): Promise<number | null> {
    const res = await this.query("block-height");
    return res.ok ? parseCount(res.stdout) : null;
  }

  async fetchPeerCount(): Promise<number | null> {
    const res = await this.query("peers");
    return res.ok ? parseCount(res.stdout) : null;
  }

  async fetchStakeInfo(): Promise<StakeInfo | null> {
    const res = await this.wallet("stake-info");
    return res.ok ? parseStakeInfo(res.stdout, this.symbol) : null;
  }

  async fetchAddresses(): Promise<WalletAddresses | null> {
    const res = await this.wallet("profiles");
    return res.ok && res.stdout ? parseProfiles(res.stdout) : null;
  }

  async fetchSpendableBalance(address: string): Promise<number> {
    const res = await this.wallet("balance", "--spendable", "--address", address);
    return res.ok ? parseSpendable(res.stdout) : 0;
  }

  /** One concurrent query per address; a failed address contributes 0. */
  async fetchBalances(): Promise<Balances> {
    const addresses = await this.fetchAddresses();
    if (!addresses) return { public: 0, shielded: 0 };

    const sum = (values: number[]) => values.reduce((a, b) => a + b, 0);
    const [pub, shielded] = await Promise.all([
      Promise.all(addresses.public.map((a) => this.fetchSpendableBalance(a))),
      Promise.all(addresses.shielded.map((a) => this.fetchSpendableBalance(a))),
    ]);
    return { public: sum(pub), shielded: sum(shielded) };
  }

  withdraw(): Promise<CommandResult> {
    return this.transact("withdraw");
  }

  unstake(): Promise<CommandResult> {
    return this.transact("unstake");
  }

  stake(amount: number): Promise<CommandResult> {
    return this.transact("stake", "--amt", formatAmount(amount));
  }
}
