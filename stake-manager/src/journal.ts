/**
 * SQLite action journal.
 *
 * Environment switching via WARDEN_ENV:
 *   testing    → :memory:             (in-process tests, no side effects)
 *   production → .warden/warden.db    (default)
 *
 * Data dir can be overridden with WARDEN_DATA_DIR.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { redactSecrets } from "../../server/secrets.ts";

export type ActionKind =
  | "claim"
  | "restake"
  | "restake-skipped"
  | "no-action"
  | "failed"
  | "interrupted";

export interface ActionRecord {
  id: number;
  kind: ActionKind;
  blockHeight: number;
  amount: number | null;
  failedStep: string | null;
  detail: string | null;
  createdAt: number;
}

export interface NewAction {
  kind: ActionKind;
  blockHeight: number;
  amount?: number;
  failedStep?: string;
  detail?: string;
}

interface ActionRow {
  id: number;
  kind: ActionKind;
  block_height: number;
  amount: number | null;
  failed_step: string | null;
  detail: string | null;
  created_at: number;
}

function resolveDbPath(): string {
  if (process.env.WARDEN_ENV === "testing") return ":memory:";
  const dataDir = process.env.WARDEN_DATA_DIR || path.join(process.cwd(), ".warden");
  if (!fs.existsSync(dataDir)) fs.mkdirSync(dataDir, { recursive: true });
  return path.join(dataDir, "warden.db");
}

export class ActionJournal {
  private readonly db: Database.Database;

  constructor(dbPath: string = resolveDbPath()) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS actions (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        kind         TEXT NOT NULL,
        block_height INTEGER NOT NULL,
        amount       REAL,
        failed_step  TEXT,
        detail       TEXT,
        created_at   INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_actions_created ON actions(created_at DESC);

      CREATE TABLE IF NOT EXISTS kv (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  record(action: NewAction, at: number = Date.now()): ActionRecord {
    const detail = action.detail === undefined ? null : redactSecrets(action.detail);
    const info = this.db
      .prepare(
        `INSERT INTO actions (kind, block_height, amount, failed_step, detail, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        action.kind,
        action.blockHeight,
        action.amount ?? null,
        action.failedStep ?? null,
        detail,
        at,
      );
    return {
      id: Number(info.lastInsertRowid),
      kind: action.kind,
      blockHeight: action.blockHeight,
      amount: action.amount ?? null,
      failedStep: action.failedStep ?? null,
      detail,
      createdAt: at,
    };
  }

  /** Most recent first. */
  recent(limit = 50): ActionRecord[] {
    const rows = this.db
      .prepare<[number], ActionRow>("SELECT * FROM actions ORDER BY created_at DESC, id DESC LIMIT ?")
      .all(limit);
    return rows.map((r) => ({
      id: r.id,
      kind: r.kind,
      blockHeight: r.block_height,
      amount: r.amount,
      failedStep: r.failed_step,
      detail: r.detail,
      createdAt: r.created_at,
    }));
  }

  getLastClaimBlock(): number | null {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM kv WHERE key = ?")
      .get("last_claim_block");
    if (!row) return null;
    const n = Number(row.value);
    return Number.isInteger(n) && n >= 0 ? n : null;
  }

  setLastClaimBlock(height: number): void {
    this.db
      .prepare("INSERT INTO kv (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value")
      .run("last_claim_block", String(height));
  }

  close(): void {
    this.db.close();
  }
}
