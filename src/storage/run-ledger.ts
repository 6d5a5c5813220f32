import Database from 'better-sqlite3';
import type { RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per finished import run
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  tool_version TEXT NOT NULL,
  status TEXT NOT NULL,
  requested INTEGER NOT NULL DEFAULT 0,
  processed INTEGER NOT NULL DEFAULT 0,
  skipped INTEGER NOT NULL DEFAULT 0,
  triple_count INTEGER NOT NULL DEFAULT 0,
  output_path TEXT,
  report_json TEXT NOT NULL DEFAULT '{}'
);

CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status);
`;

/**
 * Import history kept in SQLite via better-sqlite3.
 */
export class RunLedger {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.migrate();
        getLogger().debug({ dbPath }, 'Run ledger opened');
    }

    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Run ledger migrated to v1');
        }
    }

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, tool_version, status, requested, processed, skipped, triple_count, output_path, report_json)
      VALUES (@created_at, @tool_version, @status, @requested, @processed, @skipped, @triple_count, @output_path, @report_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    /**
     * Most recent runs first.
     */
    getRecentRuns(limit = 20): RunRecord[] {
        return this.db
            .prepare<[number], RunRecord>('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?')
            .all(limit);
    }

    getRunCount(): number {
        const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM runs').get();
        return row?.count ?? 0;
    }

    close(): void {
        this.db.close();
    }
}

/**
 * Open the ledger at `dbPath`, or return undefined (with a warning) when it
 * cannot be opened. A run goes ahead without a ledger rather than failing.
 */
export function openRunLedger(dbPath: string | null): RunLedger | undefined {
    if (!dbPath) return undefined;
    try {
        return new RunLedger(dbPath);
    } catch (error) {
        getLogger().warn({ error, dbPath }, 'Could not open run ledger; continuing without it');
        return undefined;
    }
}
