// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * SqliteAccountingSink — durable accounting log for the dashboard and CLI.
 *
 * PRIVACY: Only metadata. Request content is NEVER stored.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";

import type { PersistenceSink } from "../router/accounting.js";
import type { AccountingEntry } from "../types.js";

export interface DailySummary {
  date: string;
  requests: number;
  costUsd: number;
  savedUsd: number;
  localRequests: number;
}

export const DEFAULT_DB_PATH = join(homedir(), ".tollgate", "accounting.db");

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS accounting_log (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    ts               TEXT    NOT NULL,
    request_id       TEXT    NOT NULL,
    task_type        TEXT    NOT NULL,
    sensitivity      TEXT    NOT NULL,
    strategy         TEXT    NOT NULL,
    venue_used       TEXT,
    input_tokens     INTEGER NOT NULL DEFAULT 0,
    actual_cost      REAL    NOT NULL DEFAULT 0.0,
    baseline_cost    REAL    NOT NULL DEFAULT 0.0,
    cost_saved       REAL    NOT NULL DEFAULT 0.0,
    quality_score    REAL    NOT NULL DEFAULT 0.0,
    latency_ms       INTEGER NOT NULL DEFAULT 0,
    failed_attempts  INTEGER NOT NULL DEFAULT 0,
    error            TEXT
  )
`;

interface DailyRow {
  date: string;
  requests: number;
  cost_usd: number;
  saved_usd: number;
  local_requests: number;
}

export class SqliteAccountingSink implements PersistenceSink {
  private readonly db: Database.Database;
  private readonly insert: Database.Statement;

  constructor(dbPath: string = DEFAULT_DB_PATH) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(dbPath);
    this.db.exec(CREATE_TABLE);
    this.insert = this.db.prepare(
      `INSERT INTO accounting_log
         (ts, request_id, task_type, sensitivity, strategy, venue_used, input_tokens,
          actual_cost, baseline_cost, cost_saved, quality_score, latency_ms, failed_attempts, error)
       VALUES
         (@timestamp, @requestId, @taskType, @sensitivity, @strategy, @venueUsed, @inputTokens,
          @actualCost, @baselineCost, @costSaved, @qualityScore, @latencyMs, @failedAttempts, @error)`,
    );
  }

  write(entry: AccountingEntry): void {
    this.insert.run({
      ...entry,
      latencyMs: Math.round(entry.latencyMs),
      error: entry.error ?? null,
    });
  }

  /** Per-day totals for the last N days, newest first. */
  getDailySummary(days: number = 7): DailySummary[] {
    const rows: DailyRow[] = this.db
      .prepare<[number], DailyRow>(
        `SELECT
           date(ts)                                                AS date,
           COUNT(*)                                                AS requests,
           COALESCE(SUM(actual_cost), 0.0)                         AS cost_usd,
           COALESCE(SUM(cost_saved), 0.0)                          AS saved_usd,
           SUM(CASE WHEN venue_used = 'local' THEN 1 ELSE 0 END)   AS local_requests
         FROM accounting_log
         WHERE ts >= datetime('now', '-' || ? || ' days')
         GROUP BY date(ts)
         ORDER BY date(ts) DESC`,
      )
      .all(days);

    return rows.map((r) => ({
      date: r.date,
      requests: r.requests,
      costUsd: r.cost_usd,
      savedUsd: r.saved_usd,
      localRequests: r.local_requests,
    }));
  }

  /** Number of stored entries. */
  count(): number {
    const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM accounting_log`).get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
