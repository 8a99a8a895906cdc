/**
 * Password redaction on the failure path, with a real process that exits non-zero.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import request from "supertest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ProcessExecutor, type Executor } from "../stake-manager/src/executor.ts";
import { WalletCli } from "../stake-manager/src/wallet.ts";
import { StakeEngine } from "../stake-manager/src/engine.ts";
import { ActionJournal } from "../stake-manager/src/journal.ts";
import { StateStore } from "../stake-manager/src/state.ts";
import { ActionLogger, type Logger } from "../stake-manager/src/log.ts";
import { createApp } from "../server/app.ts";
import { registerSecret, _clearSecrets } from "../server/secrets.ts";
import { FakeExecutor, RecordingNotifier, ok } from "./fakes.ts";

const PASSWORD = "test-secret";

const STAKE_INFO = [
  "Eligible stake: 2000 DUSK",
  "Reclaimable slashed stake: 0 DUSK",
  "Accumulated rewards is: 5 DUSK",
].join("\n");

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (m) => lines.push(m),
    info: (m) => lines.push(m),
    warn: (m) => lines.push(m),
    error: (m) => lines.push(m),
  };
}

describe("failed wallet transaction", () => {
  let journal: ActionJournal;
  let store: StateStore;
  let notifier: RecordingNotifier;
  let execLog: ReturnType<typeof recordingLogger>;

  beforeEach(() => {
    registerSecret("WALLET_PASSWORD", PASSWORD);
    journal = new ActionJournal();
    store = new StateStore();
    notifier = new RecordingNotifier();
    execLog = recordingLogger();
  });

  afterEach(() => {
    journal.close();
    _clearSecrets();
  });

  async function claimWithFailingWithdraw(): Promise<void> {
    // `false` exits 1 and Node echoes the full command line in the error message
    const real = new ProcessExecutor({ log: execLog });
    const canned = new FakeExecutor({
      "block-height": ok("4320"),
      [`--password ${PASSWORD} stake-info`]: ok(STAKE_INFO),
    });
    const executor: Executor = {
      run: (command, args, opts) => (args.includes("withdraw") ? real : canned).run(command, args, opts),
    };
    const wallet = new WalletCli({ executor, password: PASSWORD, walletBin: "false" });
    const engine = new StakeEngine({
      wallet,
      store,
      notifier,
      log: execLog,
      journal,
      policy: {
        minRewards: 1,
        minSlashed: 1,
        minStakeAmount: 1000,
        bufferBlocks: 60,
        autoStakeRewards: true,
        autoReclaimFullRestakes: true,
        symbol: "DUSK",
      },
    });
    const res = await engine.runCycle();
    expect(res.outcome).toEqual({ kind: "failed", height: 4320, action: "claim", step: "withdraw" });
  }

  it("journals the failure with the password masked", async () => {
    await claimWithFailingWithdraw();
    const [rec] = journal.recent(1);
    expect(rec?.detail).toContain("--password [WALLET_PASSWORD] withdraw");
    expect(rec?.detail).not.toContain(PASSWORD);
  });

  it("keeps the password out of notifications and log lines", async () => {
    await claimWithFailingWithdraw();
    expect(notifier.messages.at(-1)).toContain("--password [WALLET_PASSWORD] withdraw");
    expect(notifier.messages.filter((m) => m.includes(PASSWORD))).toEqual([]);
    expect(execLog.lines.filter((l) => l.includes(PASSWORD))).toEqual([]);
  });

  it("serves the journaled failure without the password", async () => {
    await claimWithFailingWithdraw();
    const res = await request(createApp({ store, journal, bufferBlocks: 60, symbol: "DUSK" })).get("/api/actions");
    expect(res.status).toBe(200);
    expect(res.body[0].kind).toBe("failed");
    expect(res.body[0].detail).toContain("[WALLET_PASSWORD]");
    expect(res.text).not.toContain(PASSWORD);
  });
});

describe("ActionJournal", () => {
  afterEach(() => {
    _clearSecrets();
  });

  it("masks registered secrets in action details", () => {
    registerSecret("WALLET_PASSWORD", PASSWORD);
    const journal = new ActionJournal();
    const rec = journal.record({ kind: "failed", blockHeight: 1, failedStep: "stake", detail: `bad ${PASSWORD}` });
    expect(rec.detail).toBe("bad [WALLET_PASSWORD]");
    expect(journal.recent(1)[0]?.detail).toBe("bad [WALLET_PASSWORD]");
    journal.close();
  });
});

describe("ActionLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "warden-log-"));
    registerSecret("WALLET_PASSWORD", PASSWORD);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    _clearSecrets();
  });

  it("masks secrets in the stack it writes to the file", () => {
    const file = path.join(dir, "actions.log");
    const log = new ActionLogger({ file });
    log.muteConsole(true);
    const err = new Error(`spawn failed for --password ${PASSWORD}`);
    log.error("[FATAL]", err);
    const text = fs.readFileSync(file, "utf8");
    expect(text).toContain("[STACK] Error: spawn failed for --password [WALLET_PASSWORD]");
    expect(text).not.toContain(PASSWORD);
  });
});
