import { v4 as uuidv4 } from 'uuid';
import { driveActivation } from '../activator/drive.js';
import type { RoleActivator } from '../activator/types.js';
import type { EligibleRoleLister } from '../azure/eligibility.js';
import { directoryRoleIdentity, normalizeScope, resourceRoleIdentity } from '../azure/scope.js';
import { decide, type RoleFilter } from '../decision/decision-engine.js';
import { InMemoryRoleHistoryStore, type RoleHistoryStore } from '../history/history-store.js';
import type { RunStatePersistence } from '../history/persistence.js';
import { planDurations, resolveBaseDuration } from '../negotiation/duration-negotiator.js';
import { FatalRunError, errorMessage } from '../shared/errors.js';
import type {
  ActivationOutcome,
  ActivationStatus,
  DirectoryEligibleRole,
  EligibleRole,
  ResourceEligibleRole,
  RoleConfig,
  RoleIdentity,
  RunReporter,
  RunSummary,
} from '../shared/types.js';

export interface RunOrchestratorDeps {
  config: RoleConfig;
  principalId: string;
  lister: EligibleRoleLister;
  activators: {
    directory: RoleActivator<DirectoryEligibleRole>;
    resource: RoleActivator<ResourceEligibleRole>;
  };
  persistence: RunStatePersistence;
  reporter: RunReporter;
  now?: () => Date;
  newRunId?: () => string;
}

export interface RunOptions {
  listOnly?: boolean;
}

interface Candidate<R extends EligibleRole> {
  role: R;
  roleId: RoleIdentity;
  filter: RoleFilter;
  defaultHours: number;
  maxHours?: number;
}

function emptyByStatus(): Record<ActivationStatus, number> {
  return { activated: 0, 'already-active': 0, pending: 0, failed: 0 };
}

export class RunOrchestrator {
  private readonly now: () => Date;
  private readonly newRunId: () => string;

  constructor(private readonly deps: RunOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newRunId = deps.newRunId ?? uuidv4;
  }

  async run(opts: RunOptions = {}): Promise<RunSummary> {
    const listOnly = opts.listOnly ?? false;
    const { config, reporter } = this.deps;
    const runId = this.newRunId();
    const startedAt = this.now();

    const summary: RunSummary = {
      runId,
      listOnly,
      activated: 0,
      skipped: 0,
      failed: 0,
      planned: 0,
      byStatus: emptyByStatus(),
      startedAt,
      elapsedMs: 0,
    };

    reporter.report({ type: 'run-started', runId, listOnly, userId: this.deps.principalId, at: startedAt });

    const loaded = await this.deps.persistence.load();
    if (loaded.warning) {
      reporter.report({ type: 'state-load-failed', runId, message: loaded.warning });
    }
    const state = loaded.state;
    const store = new InMemoryRoleHistoryStore(state.activationHistory);

    const directory = await this.directoryCandidates();
    const resource = await this.resourceCandidates(runId, summary);

    const ctx = { runId, listOnly, store, summary, justification: config.justification };
    for (const candidate of directory) {
      await this.process('directory', this.deps.activators.directory, candidate, ctx);
    }
    for (const candidate of resource) {
      await this.process('resource', this.deps.activators.resource, candidate, ctx);
    }

    summary.elapsedMs = this.now().getTime() - startedAt.getTime();

    // A dry run leaves the persisted history untouched.
    if (!listOnly) {
      state.lastRunAt = startedAt;
      state.userId = this.deps.principalId;
      try {
        await this.deps.persistence.save(state);
      } catch (err) {
        reporter.report({ type: 'state-save-failed', runId, message: errorMessage(err) });
      }
    }

    reporter.report({ type: 'run-completed', runId, summary });
    return summary;
  }

  private async directoryCandidates(): Promise<Candidate<DirectoryEligibleRole>[]> {
    const { config } = this.deps;
    if (config.mode === 'named' && config.directoryRoles.length === 0) return [];

    let roles: DirectoryEligibleRole[];
    try {
      roles = await this.deps.lister.listDirectoryRoles();
    } catch (err) {
      throw new FatalRunError(`Cannot list eligible directory roles: ${errorMessage(err)}`);
    }

    const filter: RoleFilter = config.mode === 'named'
      ? new Set(config.directoryRoles.map(directoryRoleIdentity))
      : null;

    return roles.map((role) => ({
      role,
      roleId: directoryRoleIdentity(role.roleName),
      filter,
      defaultHours: config.directoryDurationHours,
    }));
  }

  private async resourceCandidates(
    runId: string,
    summary: RunSummary,
  ): Promise<Candidate<ResourceEligibleRole>[]> {
    const { config, reporter } = this.deps;
    const wantedIds = new Set<RoleIdentity>();
    const candidates = new Map<RoleIdentity, Candidate<ResourceEligibleRole>>();

    for (const entry of config.resourceScopes) {
      let roles: ResourceEligibleRole[];
      try {
        roles = await this.deps.lister.listResourceRoles(entry.scope);
      } catch (err) {
        summary.failed++;
        reporter.report({ type: 'scope-failed', runId, scope: entry.scope, message: errorMessage(err) });
        continue;
      }

      // Listing a scope also returns grants inherited from above it and
      // grants on resources below it. Named mode only wants the exact scope.
      const entryScope = normalizeScope(entry.scope);
      for (const role of roles) {
        const roleId = resourceRoleIdentity(role.scope, role.scopeType, role.roleName);
        const wanted = config.mode === 'all' || (
          normalizeScope(role.scope) === entryScope
          && (!entry.roles || entry.roles.includes(role.roleName))
        );
        const candidate = {
          role,
          roleId,
          filter: null,
          defaultHours: config.resourceDurationHours,
          maxHours: entry.maxDurationHours,
        };

        if (wanted && !wantedIds.has(roleId)) {
          wantedIds.add(roleId);
          candidates.set(roleId, candidate);
        } else if (!candidates.has(roleId)) {
          candidates.set(roleId, candidate);
        }
      }
    }

    const filter: RoleFilter = config.mode === 'named' ? wantedIds : null;
    return [...candidates.values()].map((candidate) => ({ ...candidate, filter }));
  }

  private async process<R extends EligibleRole>(
    kind: R['kind'],
    activator: RoleActivator<R>,
    candidate: Candidate<R>,
    ctx: { runId: string; listOnly: boolean; store: RoleHistoryStore; summary: RunSummary; justification: string },
  ): Promise<void> {
    const { reporter } = this.deps;
    const { runId, store, summary } = ctx;
    const { roleId } = candidate;

    const history = store.get(kind, roleId);
    const decision = decide(roleId, history, candidate.filter, this.now());
    if (decision.action === 'skip') {
      summary.skipped++;
      reporter.report({ type: 'role-skipped', runId, kind, roleId, reason: decision.reason });
      return;
    }

    const plan = planDurations(resolveBaseDuration(history, candidate.defaultHours, candidate.maxHours));

    if (ctx.listOnly) {
      summary.planned++;
      reporter.report({ type: 'role-planned', runId, kind, roleId, durations: plan });
      return;
    }

    let outcome: ActivationOutcome;
    try {
      outcome = await driveActivation({
        activator,
        role: candidate.role,
        plan,
        justification: ctx.justification,
        now: this.now,
        onRejected: (attempt) => reporter.report({
          type: 'attempt-rejected',
          runId,
          kind,
          roleId,
          durationHours: attempt.durationHours,
          message: attempt.message,
        }),
      });
    } catch (err) {
      outcome = { status: 'failed', grantedDurationHours: 0, attempts: [], error: errorMessage(err) };
    }

    summary.byStatus[outcome.status]++;
    if (outcome.status === 'failed') {
      summary.failed++;
      store.recordFailure(kind, roleId);
    } else {
      summary.activated++;
      store.recordSuccess(kind, roleId, outcome.grantedDurationHours, this.now());
    }

    reporter.report({ type: 'role-outcome', runId, kind, roleId, outcome });
  }
}
