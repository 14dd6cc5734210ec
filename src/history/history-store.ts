import type { RoleHistoryMap, RoleHistoryRecord, RoleIdentity, RoleKind } from '../shared/types.js';

const HOUR_MS = 60 * 60 * 1000;

export interface RoleHistoryStore {
  get(kind: RoleKind, id: RoleIdentity): RoleHistoryRecord | null;
  recordSuccess(kind: RoleKind, id: RoleIdentity, durationHours: number, now: Date): RoleHistoryRecord;
  recordFailure(kind: RoleKind, id: RoleIdentity): RoleHistoryRecord;
  entries(kind: RoleKind): [RoleIdentity, RoleHistoryRecord][];
}

export function emptyRecord(): RoleHistoryRecord {
  return {
    lastActivatedAt: null,
    expiresAt: null,
    optimalDurationHours: 0,
    consecutiveFailures: 0,
    totalActivations: 0,
    totalFailures: 0,
  };
}

/**
 * Mutates the history maps it is handed, so the owning RunState sees every
 * change without a copy-back step. Persistence is the caller's job.
 */
export class InMemoryRoleHistoryStore implements RoleHistoryStore {
  constructor(private readonly history: Record<RoleKind, RoleHistoryMap>) {}

  get(kind: RoleKind, id: RoleIdentity): RoleHistoryRecord | null {
    return Object.hasOwn(this.history[kind], id) ? this.history[kind][id] : null;
  }

  recordSuccess(
    kind: RoleKind,
    id: RoleIdentity,
    durationHours: number,
    now: Date,
  ): RoleHistoryRecord {
    const record = this.touch(kind, id);
    record.lastActivatedAt = new Date(now.getTime());
    record.expiresAt = new Date(now.getTime() + durationHours * HOUR_MS);
    record.consecutiveFailures = 0;
    record.totalActivations += 1;
    if (durationHours > record.optimalDurationHours) {
      record.optimalDurationHours = durationHours;
    }
    return record;
  }

  recordFailure(kind: RoleKind, id: RoleIdentity): RoleHistoryRecord {
    const record = this.touch(kind, id);
    record.consecutiveFailures += 1;
    record.totalFailures += 1;
    return record;
  }

  entries(kind: RoleKind): [RoleIdentity, RoleHistoryRecord][] {
    return Object.entries(this.history[kind]);
  }

  private touch(kind: RoleKind, id: RoleIdentity): RoleHistoryRecord {
    const existing = this.get(kind, id);
    if (existing) return existing;
    const record = emptyRecord();
    this.history[kind][id] = record;
    return record;
  }
}
