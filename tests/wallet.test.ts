import { describe, it, expect } from "vitest";
import {
  WalletCli,
  parseCount,
  parseProfiles,
  parseSpendable,
  parseStakeInfo,
} from "../stake-manager/src/wallet.ts";
import { FakeExecutor, fail, ok } from "./fakes.ts";

const STAKE_INFO = [
  "Eligible stake: 2000.5 DUSK",
  "Reclaimable slashed stake: 5 DUSK",
  "Accumulated rewards is: 3.25 DUSK",
].join("\n");

describe("parseStakeInfo", () => {
  it("extracts all three figures", () => {
    expect(parseStakeInfo(STAKE_INFO)).toEqual({
      stakeAmount: 2000.5,
      reclaimableSlashedStake: 5,
      rewardsAmount: 3.25,
    });
  });

  it("is all-or-nothing when a figure is missing", () => {
    const partial = STAKE_INFO.split("\n").slice(0, 2).join("\n");
    expect(parseStakeInfo(partial)).toBeNull();
  });

  it("requires the configured symbol", () => {
    expect(parseStakeInfo(STAKE_INFO, "LUX")).toBeNull();
  });
});

describe("parseCount", () => {
  it("accepts a bare integer with surrounding whitespace", () => {
    expect(parseCount(" 123456\n")).toBe(123456);
  });

  it("rejects anything else", () => {
    expect(parseCount("")).toBeNull();
    expect(parseCount("12.5")).toBeNull();
    expect(parseCount("height: 12")).toBeNull();
  });
});

describe("parseProfiles", () => {
  it("splits public and shielded addresses", () => {
    const text = "Profile 1\n  Shielded account - sh1\n  Public account - pub1\nProfile 2\n  Public account - pub2";
    expect(parseProfiles(text)).toEqual({ public: ["pub1", "pub2"], shielded: ["sh1"] });
  });
});

describe("parseSpendable", () => {
  it("reads 'Total: n' or a bare number", () => {
    expect(parseSpendable("Total: 12.75")).toBe(12.75);
    expect(parseSpendable("8")).toBe(8);
  });

  it("treats unparseable output as 0", () => {
    expect(parseSpendable("error: address not found")).toBe(0);
  });
});

describe("WalletCli", () => {
  const pw = "test-secret";

  it("passes the password to wallet commands only", async () => {
    const exec = new FakeExecutor({ "block-height": ok("4321"), [`--password ${pw} stake-info`]: ok(STAKE_INFO) });
    const wallet = new WalletCli({ executor: exec, password: pw });
    expect(await wallet.fetchBlockHeight()).toBe(4321);
    expect((await wallet.fetchStakeInfo())?.rewardsAmount).toBe(3.25);
    expect(exec.calls).toEqual([
      { command: "ruskquery", args: ["block-height"] },
      { command: "rusk-wallet", args: ["--password", pw, "stake-info"] },
    ]);
  });

  it("returns null when a query fails", async () => {
    const wallet = new WalletCli({ executor: new FakeExecutor(), password: pw });
    expect(await wallet.fetchBlockHeight()).toBeNull();
    expect(await wallet.fetchPeerCount()).toBeNull();
    expect(await wallet.fetchStakeInfo()).toBeNull();
  });

  it("sums spendable balances, counting a failed address as 0", async () => {
    const exec = new FakeExecutor({
      [`--password ${pw} profiles`]: ok("Public account - pubA\nPublic account - pubB\nShielded account - shA"),
      [`--password ${pw} balance --spendable --address pubA`]: ok("Total: 10.5"),
      [`--password ${pw} balance --spendable --address pubB`]: fail("timeout"),
      [`--password ${pw} balance --spendable --address shA`]: ok("3"),
    });
    const wallet = new WalletCli({ executor: exec, password: pw });
    expect(await wallet.fetchBalances()).toEqual({ public: 10.5, shielded: 3 });
  });

  it("reports zero balances when profiles are unavailable", async () => {
    const wallet = new WalletCli({ executor: new FakeExecutor(), password: pw });
    expect(await wallet.fetchBalances()).toEqual({ public: 0, shielded: 0 });
  });

  it("stakes with a 9-decimal truncated amount", async () => {
    const exec = new FakeExecutor();
    const wallet = new WalletCli({ executor: exec, password: pw });
    await wallet.stake(1.123456789123);
    expect(exec.calls[0]?.args).toEqual(["--password", pw, "stake", "--amt", "1.123456789"]);
  });

  it("runs transactions without a kill deadline and queries with the default one", async () => {
    const exec = new FakeExecutor();
    const wallet = new WalletCli({ executor: exec, password: pw });
    await wallet.withdraw();
    await wallet.unstake();
    await wallet.stake(5);
    await wallet.fetchStakeInfo();
    await wallet.fetchBlockHeight();
    expect(exec.calls.map((c) => c.opts)).toEqual([
      { timeoutMs: 0 },
      { timeoutMs: 0 },
      { timeoutMs: 0 },
      undefined,
      undefined,
    ]);
  });

  it("uses the configured binaries", async () => {
    const exec = new FakeExecutor();
    const wallet = new WalletCli({ executor: exec, password: pw, walletBin: "/opt/bin/wallet", queryBin: "/opt/bin/query" });
    await wallet.withdraw();
    await wallet.fetchPeerCount();
    expect(exec.calls.map((c) => c.command)).toEqual(["/opt/bin/wallet", "/opt/bin/query"]);
  });
});
