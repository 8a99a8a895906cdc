/**
 * Timestamped action log: console plus an append-only file.
 * Every line is redacted before it leaves the process.
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { redactSecrets } from "../../server/secrets.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

export interface LoggerOptions {
  /** Append target; omit to log to console only */
  file?: string;
  verbose?: boolean;
}

export class ActionLogger implements Logger {
  private consoleMuted = false;
  private readonly file?: string;
  private readonly verbose: boolean;

  constructor(opts: LoggerOptions = {}) {
    this.file = opts.file;
    this.verbose = opts.verbose ?? false;
    if (this.file) mkdirSync(dirname(this.file), { recursive: true });
  }

  /** The live terminal display owns stdout while it runs. */
  muteConsole(muted: boolean): void {
    this.consoleMuted = muted;
  }

  debug(msg: string): void {
    this.write("debug", msg);
  }

  info(msg: string): void {
    this.write("info", msg);
  }

  warn(msg: string): void {
    this.write("warn", msg);
  }

  error(msg: string, err?: unknown): void {
    this.write("error", err === undefined ? msg : `${msg}: ${errorText(err)}`);
    if (err instanceof Error && err.stack) {
      this.writeFile("error", `[STACK] ${redactSecrets(err.stack)}`);
    }
  }

  private write(level: LogLevel, msg: string): void {
    const line = redactSecrets(msg);
    this.writeFile(level, line);
    if (this.consoleMuted) return;
    if (level === "debug" && !this.verbose) return;
    const ts = new Date().toISOString().slice(11, 19);
    const out = `[${ts}] ${level === "info" ? "" : `[${level.toUpperCase()}] `}${line}`;
    if (level === "error") console.error(out);
    else console.log(out);
  }

  private writeFile(level: LogLevel, line: string): void {
    if (!this.file) return;
    appendFileSync(this.file, `${new Date().toISOString()} [${level.toUpperCase()}] ${line}\n`);
  }
}

export function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
