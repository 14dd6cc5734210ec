import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Preferences, RoleHistoryRecord, RunState } from '../shared/types.js';

const timestamp = z
  .string()
  .datetime({ offset: true })
  .nullable()
  .transform((value) => (value === null ? null : new Date(value)));

const counter = z.number().int().nonnegative();

const recordSchema = z.object({
  lastActivatedAt: timestamp.default(null),
  expiresAt: timestamp.default(null),
  optimalDurationHours: counter.default(0),
  consecutiveFailures: counter.default(0),
  totalActivations: counter.default(0),
  totalFailures: counter.default(0),
});

const stateSchema = z.object({
  lastRun: timestamp.default(null),
  userId: z.string().nullable().default(null),
  activationHistory: z
    .object({
      directory: z.record(recordSchema).default({}),
      resource: z.record(recordSchema).default({}),
    })
    .default({}),
  preferences: z
    .object({
      defaultJustification: z.string().optional(),
      directoryDurationHours: z.number().int().positive().optional(),
      resourceDurationHours: z.number().int().positive().optional(),
    })
    .default({}),
});

interface PersistedRecord {
  lastActivatedAt: string | null;
  expiresAt: string | null;
  optimalDurationHours: number;
  consecutiveFailures: number;
  totalActivations: number;
  totalFailures: number;
}

export interface PersistedRunState {
  lastRun: string | null;
  userId: string | null;
  activationHistory: {
    directory: Record<string, PersistedRecord>;
    resource: Record<string, PersistedRecord>;
  };
  preferences: Preferences;
}

export function emptyRunState(preferences: Preferences): RunState {
  return {
    lastRunAt: null,
    userId: null,
    activationHistory: { directory: {}, resource: {} },
    preferences: { ...preferences },
  };
}

export function parseRunState(raw: unknown, defaults: Preferences): RunState {
  const parsed = stateSchema.parse(raw);
  return {
    lastRunAt: parsed.lastRun,
    userId: parsed.userId,
    activationHistory: {
      directory: parsed.activationHistory.directory,
      resource: parsed.activationHistory.resource,
    },
    preferences: { ...defaults, ...parsed.preferences },
  };
}

function toPersistedRecord(record: RoleHistoryRecord): PersistedRecord {
  return {
    lastActivatedAt: record.lastActivatedAt?.toISOString() ?? null,
    expiresAt: record.expiresAt?.toISOString() ?? null,
    optimalDurationHours: record.optimalDurationHours,
    consecutiveFailures: record.consecutiveFailures,
    totalActivations: record.totalActivations,
    totalFailures: record.totalFailures,
  };
}

function mapRecords(records: Record<string, RoleHistoryRecord>): Record<string, PersistedRecord> {
  const result: Record<string, PersistedRecord> = {};
  for (const [id, record] of Object.entries(records)) {
    result[id] = toPersistedRecord(record);
  }
  return result;
}

export function serializeRunState(state: RunState): PersistedRunState {
  return {
    lastRun: state.lastRunAt?.toISOString() ?? null,
    userId: state.userId,
    activationHistory: {
      directory: mapRecords(state.activationHistory.directory),
      resource: mapRecords(state.activationHistory.resource),
    },
    preferences: { ...state.preferences },
  };
}

export interface LoadedRunState {
  state: RunState;
  /** Set when the file existed but could not be used; the state is then fresh. */
  warning: string | null;
}

export async function loadRunState(filePath: string, defaults: Preferences): Promise<LoadedRunState> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') return { state: emptyRunState(defaults), warning: null };
    return { state: emptyRunState(defaults), warning: `cannot read ${filePath}: ${(err as Error).message}` };
  }

  try {
    return { state: parseRunState(JSON.parse(text), defaults), warning: null };
  } catch (err) {
    return { state: emptyRunState(defaults), warning: `ignoring invalid state file ${filePath}: ${(err as Error).message}` };
  }
}

/** Temp file + rename, so a crash mid-write leaves the previous file intact. */
export async function saveRunState(filePath: string, state: RunState): Promise<void> {
  const dir = path.dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${uuidv4()}.tmp`);
  try {
    await writeFile(tmpPath, JSON.stringify(serializeRunState(state), null, 2) + '\n', 'utf8');
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}
