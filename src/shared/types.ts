export type RoleKind = 'directory' | 'resource';

export const ROLE_KINDS: readonly RoleKind[] = ['directory', 'resource'];

export type ScopeType = 'subscription' | 'resourceGroup' | 'resource' | 'managementGroup';

/** Stable history key: role display name, or `scope|scopeType|roleName` for resource roles. */
export type RoleIdentity = string;

export interface RoleHistoryRecord {
  lastActivatedAt: Date | null;
  expiresAt: Date | null;
  optimalDurationHours: number;
  consecutiveFailures: number;
  totalActivations: number;
  totalFailures: number;
}

export type RoleHistoryMap = Record<RoleIdentity, RoleHistoryRecord>;

export interface Preferences {
  defaultJustification: string;
  directoryDurationHours: number;
  resourceDurationHours: number;
}

export interface RunState {
  lastRunAt: Date | null;
  userId: string | null;
  activationHistory: Record<RoleKind, RoleHistoryMap>;
  preferences: Preferences;
}

export type ActivationMode = 'all' | 'named';

export interface ResourceScopeConfig {
  scope: string;
  roles?: readonly string[];
  maxDurationHours?: number;
}

export interface RoleConfig {
  mode: ActivationMode;
  directoryRoles: readonly string[];
  resourceScopes: readonly ResourceScopeConfig[];
  justification: string;
  directoryDurationHours: number;
  resourceDurationHours: number;
}

export interface DirectoryEligibleRole {
  kind: 'directory';
  roleName: string;
  roleDefinitionId: string;
  directoryScopeId: string;
}

export interface ResourceEligibleRole {
  kind: 'resource';
  roleName: string;
  scope: string;
  scopeType: ScopeType;
  /** Full ARM id when the eligibility record carried one, otherwise null. */
  roleDefinitionId: string | null;
}

export type EligibleRole = DirectoryEligibleRole | ResourceEligibleRole;

export type ActivationStatus = 'activated' | 'already-active' | 'pending' | 'failed';

export interface AttemptRecord {
  durationHours: number;
  signal: AttemptSignal;
  message: string | null;
}

export interface ActivationOutcome {
  status: ActivationStatus;
  grantedDurationHours: number;
  attempts: AttemptRecord[];
  error: string | null;
}

/** Closed vocabulary an activator adapter translates provider responses into. */
export type AttemptSignal =
  | 'activated'
  | 'already-active'
  | 'pending'
  | 'duration-rejected'
  | 'failed';

export interface AttemptResult {
  signal: AttemptSignal;
  message: string | null;
}

export type SkipReason = 'not-configured' | 'still-active' | 'too-many-failures';

export type Decision =
  | { action: 'skip'; reason: SkipReason }
  | { action: 'attempt' };

export interface RunSummary {
  runId: string;
  listOnly: boolean;
  activated: number;
  skipped: number;
  failed: number;
  planned: number;
  byStatus: Record<ActivationStatus, number>;
  startedAt: Date;
  elapsedMs: number;
}

export type RunEvent =
  | { type: 'run-started'; runId: string; listOnly: boolean; userId: string; at: Date }
  | { type: 'scope-failed'; runId: string; scope: string; message: string }
  | { type: 'role-skipped'; runId: string; kind: RoleKind; roleId: RoleIdentity; reason: SkipReason }
  | { type: 'role-planned'; runId: string; kind: RoleKind; roleId: RoleIdentity; durations: number[] }
  | { type: 'attempt-rejected'; runId: string; kind: RoleKind; roleId: RoleIdentity; durationHours: number; message: string | null }
  | { type: 'role-outcome'; runId: string; kind: RoleKind; roleId: RoleIdentity; outcome: ActivationOutcome }
  | { type: 'state-load-failed'; runId: string; message: string }
  | { type: 'state-save-failed'; runId: string; message: string }
  | { type: 'run-completed'; runId: string; summary: RunSummary };

export interface RunReporter {
  report(event: RunEvent): void;
}

export interface HealthResponse {
  status: 'ok';
  uptime_s: number;
}
