import Database from 'better-sqlite3';
import type { ArchivedRecord, RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per digest run
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  litalert_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Records reported in a run's digest, in rank order per query
CREATE TABLE IF NOT EXISTS digest_records (
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  query TEXT NOT NULL,
  rank INTEGER NOT NULL,
  dedup_key TEXT NOT NULL,
  title TEXT NOT NULL,
  doi TEXT NOT NULL,
  year TEXT NOT NULL,
  source TEXT NOT NULL,
  article_type TEXT NOT NULL,
  PRIMARY KEY (run_id, query, rank)
);

CREATE INDEX IF NOT EXISTS idx_digest_records_key ON digest_records(dedup_key);
`;

export interface RunSummary extends RunRecord {
    run_id: number;
    record_count: number;
}

/**
 * Digest archive: remembers what each run reported.
 */
export class DigestArchive {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Archive initialized');
    }

    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Archive migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    /**
     * Store a run together with the records its digest reported.
     * @returns The new run_id
     */
    recordRun(run: Omit<RunRecord, 'run_id'>, records: Omit<ArchivedRecord, 'run_id'>[]): number {
        const insertRun = this.db.prepare<Omit<RunRecord, 'run_id'>>(`
      INSERT INTO runs (created_at, litalert_version, config_json, stats_json)
      VALUES (@created_at, @litalert_version, @config_json, @stats_json)
    `);
        const insertRecord = this.db.prepare<ArchivedRecord>(`
      INSERT INTO digest_records (run_id, query, rank, dedup_key, title, doi, year, source, article_type)
      VALUES (@run_id, @query, @rank, @dedup_key, @title, @doi, @year, @source, @article_type)
    `);

        const store = this.db.transaction((): number => {
            const runId = Number(insertRun.run(run).lastInsertRowid);
            for (const record of records) {
                insertRecord.run({ ...record, run_id: runId });
            }
            return runId;
        });

        const runId = store();
        getLogger().debug({ runId, records: records.length }, 'Run archived');
        return runId;
    }

    /**
     * Most recent runs first, with how many records each reported.
     */
    getRecentRuns(limit = 10): RunSummary[] {
        return this.db.prepare<[number], RunSummary>(`
      SELECT r.run_id, r.created_at, r.litalert_version, r.config_json, r.stats_json,
             COUNT(d.rank) AS record_count
      FROM runs r
      LEFT JOIN digest_records d ON d.run_id = r.run_id
      GROUP BY r.run_id
      ORDER BY r.run_id DESC
      LIMIT ?
    `).all(limit);
    }

    getRunRecords(runId: number): ArchivedRecord[] {
        return this.db.prepare<[number], ArchivedRecord>(
            'SELECT * FROM digest_records WHERE run_id = ? ORDER BY query, rank'
        ).all(runId);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): { runs: number; records: number; uniqueWorks: number } {
        const row = this.db.prepare<[], { runs: number; records: number; uniqueWorks: number }>(`
      SELECT
        (SELECT COUNT(*) FROM runs) AS runs,
        (SELECT COUNT(*) FROM digest_records) AS records,
        (SELECT COUNT(DISTINCT dedup_key) FROM digest_records) AS uniqueWorks
    `).get();
        return row ?? { runs: 0, records: 0, uniqueWorks: 0 };
    }

    close(): void {
        this.db.close();
    }
}
