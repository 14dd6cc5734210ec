import type Database from 'better-sqlite3';

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      run_id TEXT PRIMARY KEY,
      started_at TEXT NOT NULL,
      list_only INTEGER NOT NULL,
      user_id TEXT,
      completed_at TEXT,
      activated INTEGER,
      skipped INTEGER,
      failed INTEGER,
      planned INTEGER,
      elapsed_ms INTEGER
    );

    CREATE TABLE IF NOT EXISTS activation_log (
      id TEXT PRIMARY KEY,
      run_id TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      event TEXT NOT NULL,
      kind TEXT,
      role_id TEXT,
      status TEXT,
      duration_hours INTEGER,
      attempts INTEGER DEFAULT 0,
      detail TEXT,
      FOREIGN KEY (run_id) REFERENCES runs(run_id)
    );

    CREATE INDEX IF NOT EXISTS idx_activation_run ON activation_log(run_id);
    CREATE INDEX IF NOT EXISTS idx_activation_timestamp ON activation_log(timestamp);
    CREATE INDEX IF NOT EXISTS idx_activation_role ON activation_log(kind, role_id);
    CREATE INDEX IF NOT EXISTS idx_activation_status ON activation_log(status);

    CREATE VIEW IF NOT EXISTS daily_outcomes AS
    SELECT
      date(timestamp) as day,
      kind,
      status,
      COUNT(*) as roles
    FROM activation_log
    WHERE event = 'role-outcome'
    GROUP BY date(timestamp), kind, status;
  `);
}

export interface ActivationLogRow {
  id: string;
  run_id: string;
  timestamp: string;
  event: string;
  kind: string | null;
  role_id: string | null;
  status: string | null;
  duration_hours: number | null;
  attempts: number;
  detail: string | null;
}

export interface RunRow {
  run_id: string;
  started_at: string;
  list_only: number;
  user_id: string | null;
  completed_at: string | null;
  activated: number | null;
  skipped: number | null;
  failed: number | null;
  planned: number | null;
  elapsed_ms: number | null;
}

export function insertRun(
  db: Database.Database,
  row: Pick<RunRow, 'run_id' | 'started_at' | 'list_only' | 'user_id'>,
): void {
  db.prepare(`
    INSERT OR IGNORE INTO runs (run_id, started_at, list_only, user_id) VALUES (?, ?, ?, ?)
  `).run(row.run_id, row.started_at, row.list_only, row.user_id);
}

export function completeRun(
  db: Database.Database,
  row: Pick<RunRow, 'run_id' | 'completed_at' | 'activated' | 'skipped' | 'failed' | 'planned' | 'elapsed_ms'>,
): void {
  db.prepare(`
    UPDATE runs SET completed_at = ?, activated = ?, skipped = ?, failed = ?, planned = ?, elapsed_ms = ?
    WHERE run_id = ?
  `).run(row.completed_at, row.activated, row.skipped, row.failed, row.planned, row.elapsed_ms, row.run_id);
}

export function insertActivationLog(db: Database.Database, row: ActivationLogRow): void {
  db.prepare(`
    INSERT INTO activation_log (id, run_id, timestamp, event, kind, role_id, status,
      duration_hours, attempts, detail)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    row.id, row.run_id, row.timestamp, row.event, row.kind, row.role_id,
    row.status, row.duration_hours, row.attempts, row.detail,
  );
}

export function queryActivationLogs(
  db: Database.Database,
  opts: { limit?: number; kind?: string; status?: string; runId?: string },
): ActivationLogRow[] {
  let query = 'SELECT * FROM activation_log WHERE 1=1';
  const params: unknown[] = [];

  if (opts.kind) {
    query += ' AND kind = ?';
    params.push(opts.kind);
  }
  if (opts.status) {
    query += ' AND status = ?';
    params.push(opts.status);
  }
  if (opts.runId) {
    query += ' AND run_id = ?';
    params.push(opts.runId);
  }

  query += ' ORDER BY timestamp DESC, rowid DESC LIMIT ?';
  params.push(opts.limit ?? 100);

  return db.prepare(query).all(...params) as ActivationLogRow[];
}

export function getRun(db: Database.Database, runId: string): RunRow | null {
  return (db.prepare('SELECT * FROM runs WHERE run_id = ?').get(runId) as RunRow | undefined) ?? null;
}

export interface DailyOutcomeRow {
  day: string;
  kind: string;
  status: string;
  roles: number;
}

export function getDailyOutcomes(db: Database.Database, day: string): DailyOutcomeRow[] {
  return db.prepare('SELECT * FROM daily_outcomes WHERE day = ? ORDER BY kind, status').all(day) as DailyOutcomeRow[];
}
