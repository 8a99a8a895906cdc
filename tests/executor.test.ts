import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

type ExecCallback = (err: (Error & { code?: number | string }) | null, stdout: string, stderr: string) => void;

const { execFileMock } = vi.hoisted(() => ({ execFileMock: vi.fn() }));

vi.mock("child_process", () => ({ execFile: execFileMock }));

import { ProcessExecutor, describeCommand } from "../stake-manager/src/executor.ts";
import type { Logger } from "../stake-manager/src/log.ts";
import { registerSecret, _clearSecrets } from "../server/secrets.ts";

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (m) => lines.push(`debug ${m}`),
    info: (m) => lines.push(`info ${m}`),
    warn: (m) => lines.push(`warn ${m}`),
    error: (m) => lines.push(`error ${m}`),
  };
}

function respond(err: (Error & { code?: number | string }) | null, stdout: string, stderr: string): void {
  execFileMock.mockImplementation((_file: string, _args: string[], _opts: object, cb: ExecCallback) => {
    cb(err, stdout, stderr);
  });
}

describe("ProcessExecutor", () => {
  beforeEach(() => {
    execFileMock.mockReset();
    registerSecret("WALLET_PASSWORD", "test-secret");
  });

  afterEach(() => {
    _clearSecrets();
  });

  it("returns trimmed stdout on success", async () => {
    respond(null, "  1234\n", "");
    const exec = new ProcessExecutor({ log: recordingLogger() });
    await expect(exec.run("ruskquery", ["block-height"])).resolves.toEqual({ ok: true, stdout: "1234" });
    expect(execFileMock.mock.calls[0]?.[0]).toBe("ruskquery");
    expect(execFileMock.mock.calls[0]?.[1]).toEqual(["block-height"]);
  });

  it("prefixes sudo when configured", async () => {
    respond(null, "", "");
    const exec = new ProcessExecutor({ useSudo: true, log: recordingLogger() });
    await exec.run("rusk-wallet", ["--password", "test-secret", "withdraw"]);
    expect(execFileMock.mock.calls[0]?.[0]).toBe("sudo");
    expect(execFileMock.mock.calls[0]?.[1]).toEqual(["rusk-wallet", "--password", "test-secret", "withdraw"]);
  });

  it("passes the timeout to the child process", async () => {
    respond(null, "", "");
    const exec = new ProcessExecutor({ timeoutMs: 5000, log: recordingLogger() });
    await exec.run("ruskquery", ["peers"]);
    expect(execFileMock.mock.calls[0]?.[2]).toMatchObject({ timeout: 5000 });
  });

  it("lets a single call override the timeout", async () => {
    respond(null, "", "");
    const exec = new ProcessExecutor({ timeoutMs: 5000, log: recordingLogger() });
    await exec.run("rusk-wallet", ["--password", "test-secret", "withdraw"], { timeoutMs: 0 });
    expect(execFileMock.mock.calls[0]?.[2]).toMatchObject({ timeout: 0 });
  });

  it("redacts the command line echoed in the error message", async () => {
    const err = Object.assign(new Error("Command failed: rusk-wallet --password test-secret withdraw\n"), { code: 1 });
    respond(err, "", "");
    const exec = new ProcessExecutor({ log: recordingLogger() });
    await expect(exec.run("rusk-wallet", ["--password", "test-secret", "withdraw"])).resolves.toEqual({
      ok: false,
      exitCode: 1,
      stderr: "Command failed: rusk-wallet --password [WALLET_PASSWORD] withdraw\n",
    });
  });

  it("turns a non-zero exit into a failure value", async () => {
    const err = Object.assign(new Error("Command failed"), { code: 2 });
    respond(err, "", "insufficient funds\n");
    const log = recordingLogger();
    const exec = new ProcessExecutor({ log });
    await expect(exec.run("rusk-wallet", ["--password", "test-secret", "stake"])).resolves.toEqual({
      ok: false,
      exitCode: 2,
      stderr: "insufficient funds",
    });
    expect(log.lines).toContain(
      "error Command failed (exit 2): rusk-wallet --password [WALLET_PASSWORD] stake | insufficient funds",
    );
  });

  it("reports a launch error without an exit code", async () => {
    const err = Object.assign(new Error("spawn ruskquery ENOENT"), { code: "ENOENT" });
    respond(err, "", "");
    const exec = new ProcessExecutor({ log: recordingLogger() });
    await expect(exec.run("ruskquery", ["peers"])).resolves.toEqual({
      ok: false,
      exitCode: null,
      stderr: "spawn ruskquery ENOENT",
    });
  });

  it("never logs the password", async () => {
    respond(null, "ok", "");
    const log = recordingLogger();
    await new ProcessExecutor({ log }).run("rusk-wallet", ["--password", "test-secret", "profiles"]);
    expect(log.lines.some((l) => l.includes("test-secret"))).toBe(false);
    expect(log.lines[0]).toBe("debug [exec] rusk-wallet --password [WALLET_PASSWORD] profiles");
  });
});

describe("describeCommand", () => {
  it("redacts registered secrets", () => {
    registerSecret("WALLET_PASSWORD", "test-secret");
    expect(describeCommand("rusk-wallet", ["--password", "test-secret"])).toBe("rusk-wallet --password [WALLET_PASSWORD]");
    _clearSecrets();
  });
});
