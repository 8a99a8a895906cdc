/**
 * Runs the wallet / chain-query CLIs.
 * Failure is a value: callers get a CommandResult, never an exception.
 */

import { execFile } from "child_process";
import { redactSecrets } from "../../server/secrets.ts";
import type { Logger } from "./log.ts";

export type CommandResult =
  | { ok: true; stdout: string }
  | { ok: false; exitCode: number | null; stderr: string };

export interface RunOptions {
  /** Kill deadline for this call; 0 lets the command run to completion. */
  timeoutMs?: number;
}

export interface Executor {
  run(command: string, args: string[], opts?: RunOptions): Promise<CommandResult>;
}

export interface ProcessExecutorOptions {
  useSudo?: boolean;
  timeoutMs?: number;
  log: Logger;
}

export function describeCommand(command: string, args: string[]): string {
  return redactSecrets([command, ...args].join(" "));
}

export class ProcessExecutor implements Executor {
  private readonly useSudo: boolean;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts: ProcessExecutorOptions) {
    this.useSudo = opts.useSudo ?? false;
    this.timeoutMs = opts.timeoutMs ?? 120_000;
    this.log = opts.log;
  }

  run(command: string, args: string[], opts: RunOptions = {}): Promise<CommandResult> {
    const [file, argv] = this.useSudo ? ["sudo", [command, ...args]] : [command, args];
    const shown = describeCommand(file, argv);
    const timeout = opts.timeoutMs ?? this.timeoutMs;
    this.log.debug(`[exec] ${shown}`);

    return new Promise((resolve) => {
      execFile(file, argv, { timeout, maxBuffer: 4 * 1024 * 1024 }, (err, stdout, stderr) => {
        const errText = String(stderr).trim();
        if (err) {
          const exitCode = typeof err.code === "number" ? err.code : null;
          // err.message echoes the full argv, password included
          const reason = redactSecrets(errText || err.message);
          this.log.error(`Command failed (exit ${exitCode ?? "n/a"}): ${shown} | ${reason}`);
          resolve({ ok: false, exitCode, stderr: reason });
          return;
        }
        const out = String(stdout).trim();
        if (out) this.log.debug(`[exec] output: ${redactSecrets(out)}`);
        resolve({ ok: true, stdout: out });
      });
    });
  }
}
