import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { RunEvent, RunReporter } from '../shared/types.js';
import { completeRun, insertActivationLog, insertRun, type ActivationLogRow } from './schema.js';
import { sanitize } from './sanitize.js';

function detail(value: Record<string, unknown>): string {
  return JSON.stringify(sanitize(value));
}

export function toLogRow(event: RunEvent, id: string, timestamp: string): ActivationLogRow | null {
  const base = {
    id,
    run_id: event.runId,
    timestamp,
    event: event.type,
    kind: null,
    role_id: null,
    status: null,
    duration_hours: null,
    attempts: 0,
    detail: null,
  };

  switch (event.type) {
    case 'role-skipped':
      return { ...base, kind: event.kind, role_id: event.roleId, status: 'skipped', detail: detail({ reason: event.reason }) };
    case 'role-planned':
      return { ...base, kind: event.kind, role_id: event.roleId, status: 'planned', detail: detail({ durations: event.durations }) };
    case 'attempt-rejected':
      return {
        ...base,
        kind: event.kind,
        role_id: event.roleId,
        status: 'duration-rejected',
        duration_hours: event.durationHours,
        detail: detail({ message: event.message }),
      };
    case 'role-outcome':
      return {
        ...base,
        kind: event.kind,
        role_id: event.roleId,
        status: event.outcome.status,
        duration_hours: event.outcome.grantedDurationHours,
        attempts: event.outcome.attempts.length,
        detail: detail({ error: event.outcome.error, attempts: event.outcome.attempts }),
      };
    case 'scope-failed':
      return { ...base, kind: 'resource', status: 'failed', detail: detail({ scope: event.scope, message: event.message }) };
    case 'state-load-failed':
    case 'state-save-failed':
      return { ...base, detail: detail({ message: event.message }) };
    case 'run-started':
    case 'run-completed':
      return null;
  }
}

/** Writes run events to SQLite. Audit failures are logged, never raised into the run. */
export class AuditReporter implements RunReporter {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  report(event: RunEvent): void {
    try {
      this.write(event);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Audit log failed:', (err as Error).message);
    }
  }

  private write(event: RunEvent): void {
    if (event.type === 'run-started') {
      insertRun(this.db, {
        run_id: event.runId,
        started_at: event.at.toISOString(),
        list_only: event.listOnly ? 1 : 0,
        user_id: event.userId,
      });
      return;
    }

    if (event.type === 'run-completed') {
      const { summary } = event;
      completeRun(this.db, {
        run_id: event.runId,
        completed_at: this.clock().toISOString(),
        activated: summary.activated,
        skipped: summary.skipped,
        failed: summary.failed,
        planned: summary.planned,
        elapsed_ms: summary.elapsedMs,
      });
      return;
    }

    const row = toLogRow(event, uuidv4(), this.clock().toISOString());
    if (row) insertActivationLog(this.db, row);
  }
}
