import express from 'express';
import { z } from 'zod';
import type Database from 'better-sqlite3';
import { getDailyOutcomes, getRun, queryActivationLogs } from '../audit/schema.js';
import type { RunStatePersistence } from '../history/persistence.js';
import { serializeRunState } from '../history/state-file.js';
import { errorMessage } from '../shared/errors.js';
import type { HealthResponse, RunSummary } from '../shared/types.js';
import { requireToken } from './auth.js';

export type RunTrigger = (listOnly: boolean) => Promise<RunSummary>;

/** Serializes scheduled and on-demand runs: at most one is in flight. */
export class RunCoordinator {
  private current: Promise<RunSummary> | null = null;
  private last: RunSummary | null = null;

  constructor(private readonly trigger: RunTrigger) {}

  get busy(): boolean {
    return this.current !== null;
  }

  get lastSummary(): RunSummary | null {
    return this.last;
  }

  /** Returns null when a run is already in progress. */
  start(listOnly = false): Promise<RunSummary> | null {
    if (this.current) return null;
    const run = this.trigger(listOnly)
      .then((summary) => {
        if (!listOnly) this.last = summary;
        return summary;
      })
      .finally(() => {
        this.current = null;
      });
    this.current = run;
    return run;
  }
}

export interface StatusAppOptions {
  db: Database.Database;
  persistence: RunStatePersistence;
  coordinator: RunCoordinator;
  secret: string;
  startTime?: number;
}

const DEFAULT_AUDIT_LIMIT = 100;
const MAX_AUDIT_LIMIT = 1000;

const auditLimit = z.coerce.number().int().min(1).max(MAX_AUDIT_LIMIT).default(DEFAULT_AUDIT_LIMIT);

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function createStatusApp(opts: StatusAppOptions): express.Express {
  const { db, persistence, coordinator, secret } = opts;
  const startTime = opts.startTime ?? Date.now();

  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    const body: HealthResponse = { status: 'ok', uptime_s: Math.floor((Date.now() - startTime) / 1000) };
    res.json(body);
  });

  app.use(requireToken(secret, 'read'));

  app.get('/state', async (_req, res) => {
    try {
      const { state, warning } = await persistence.load();
      res.json({ ...serializeRunState(state), warning, running: coordinator.busy, lastSummary: coordinator.lastSummary });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.get('/audit', (req, res) => {
    const limit = auditLimit.safeParse(queryString(req.query.limit));
    if (!limit.success) {
      res.status(400).json({ error: `limit must be a whole number between 1 and ${MAX_AUDIT_LIMIT}` });
      return;
    }
    const logs = queryActivationLogs(db, {
      limit: limit.data,
      kind: queryString(req.query.kind),
      status: queryString(req.query.status),
      runId: queryString(req.query.run_id),
    });
    res.json(logs);
  });

  app.get('/runs/:runId', (req, res) => {
    const run = getRun(db, req.params.runId);
    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    res.json(run);
  });

  app.get('/outcomes/:day', (req, res) => {
    res.json(getDailyOutcomes(db, req.params.day));
  });

  app.post('/run', requireToken(secret, 'run'), async (req, res) => {
    const body: unknown = req.body;
    const listOnly = typeof body === 'object' && body !== null && 'list_only' in body && body.list_only === true;
    const run = coordinator.start(listOnly);
    if (!run) {
      res.status(409).json({ error: 'A run is already in progress' });
      return;
    }
    try {
      res.json(await run);
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return app;
}
