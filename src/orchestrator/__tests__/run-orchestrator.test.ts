import { describe, it, expect, beforeEach } from 'vitest';
import { RunOrchestrator } from '../run-orchestrator.js';
import type { ActivationRequest, RoleActivator } from '../../activator/types.js';
import type { EligibleRoleLister } from '../../azure/eligibility.js';
import type { RunStatePersistence } from '../../history/persistence.js';
import { emptyRecord } from '../../history/history-store.js';
import { emptyRunState } from '../../history/state-file.js';
import { FatalRunError } from '../../shared/errors.js';
import type {
  AttemptResult,
  DirectoryEligibleRole,
  EligibleRole,
  ResourceEligibleRole,
  RoleConfig,
  RunEvent,
  RunState,
} from '../../shared/types.js';

const NOW = new Date('2026-03-02T08:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;
const PREFERENCES = { defaultJustification: 'daily', directoryDurationHours: 8, resourceDurationHours: 8 };
const OWNER_ID = '/subscriptions/sub-1|subscription|Owner';

function directoryRole(roleName: string): DirectoryEligibleRole {
  return { kind: 'directory', roleName, roleDefinitionId: `def-${roleName}`, directoryScopeId: '/' };
}

function resourceRole(roleName: string, scope = '/subscriptions/sub-1'): ResourceEligibleRole {
  return { kind: 'resource', roleName, scope, scopeType: 'subscription', roleDefinitionId: null };
}

type Responder<R extends EligibleRole> = (request: ActivationRequest<R>) => AttemptResult;

class FakeActivator<R extends EligibleRole> implements RoleActivator<R> {
  readonly calls: { roleName: string; durationHours: number; justification: string }[] = [];

  constructor(private readonly respond: Responder<R> = () => ({ signal: 'activated', message: null })) {}

  async attempt(request: ActivationRequest<R>): Promise<AttemptResult> {
    this.calls.push({
      roleName: request.role.roleName,
      durationHours: request.durationHours,
      justification: request.justification,
    });
    return this.respond(request);
  }
}

class MemoryPersistence implements RunStatePersistence {
  saved: RunState | null = null;
  saves = 0;
  warning: string | null = null;
  failSave = false;

  constructor(public state: RunState = emptyRunState(PREFERENCES)) {}

  async load() {
    return { state: this.state, warning: this.warning };
  }

  async save(state: RunState) {
    if (this.failSave) throw new Error('EACCES: permission denied');
    this.saves++;
    this.saved = state;
  }
}

interface Fixture {
  config: RoleConfig;
  directoryRoles: DirectoryEligibleRole[];
  resourceRoles: Record<string, ResourceEligibleRole[] | Error>;
  directoryError?: Error;
}

describe('RunOrchestrator', () => {
  let events: RunEvent[];
  let persistence: MemoryPersistence;
  let directory: FakeActivator<DirectoryEligibleRole>;
  let resource: FakeActivator<ResourceEligibleRole>;
  let listedDirectory: number;
  let fixture: Fixture;

  function build() {
    const lister: EligibleRoleLister = {
      listDirectoryRoles: async () => {
        listedDirectory++;
        if (fixture.directoryError) throw fixture.directoryError;
        return fixture.directoryRoles;
      },
      listResourceRoles: async (scope) => {
        const roles = fixture.resourceRoles[scope] ?? [];
        if (roles instanceof Error) throw roles;
        return roles;
      },
    };
    return new RunOrchestrator({
      config: fixture.config,
      principalId: 'principal-1',
      lister,
      activators: { directory, resource },
      persistence,
      reporter: { report: (event) => events.push(event) },
      now: () => NOW,
      newRunId: () => 'run-1',
    });
  }

  function eventsOf<T extends RunEvent['type']>(type: T): Extract<RunEvent, { type: T }>[] {
    return events.filter((e): e is Extract<RunEvent, { type: T }> => e.type === type);
  }

  beforeEach(() => {
    events = [];
    listedDirectory = 0;
    persistence = new MemoryPersistence();
    directory = new FakeActivator();
    resource = new FakeActivator();
    fixture = {
      config: {
        mode: 'named',
        directoryRoles: ['Reader', 'Global Administrator'],
        resourceScopes: [{ scope: '/subscriptions/sub-1', roles: ['Owner'] }],
        justification: 'daily',
        directoryDurationHours: 8,
        resourceDurationHours: 8,
      },
      directoryRoles: [],
      resourceRoles: {},
    };
  });

  it('should fall back to a shorter duration and learn it', async () => {
    fixture.resourceRoles['/subscriptions/sub-1'] = [resourceRole('Owner')];
    resource = new FakeActivator((req) => req.durationHours > 4
      ? { signal: 'duration-rejected', message: 'ExpirationRule' }
      : { signal: 'activated', message: 'Provisioned' });

    const summary = await build().run();

    expect(resource.calls.map((c) => c.durationHours)).toEqual([8, 4]);
    expect(summary).toMatchObject({ activated: 1, skipped: 0, failed: 0 });
    expect(eventsOf('attempt-rejected')).toEqual([
      { type: 'attempt-rejected', runId: 'run-1', kind: 'resource', roleId: OWNER_ID, durationHours: 8, message: 'ExpirationRule' },
    ]);
    expect(persistence.saved?.activationHistory.resource[OWNER_ID]).toEqual({
      lastActivatedAt: NOW,
      expiresAt: new Date(NOW.getTime() + 4 * HOUR_MS),
      optimalDurationHours: 4,
      consecutiveFailures: 0,
      totalActivations: 1,
      totalFailures: 0,
    });
  });

  it('should start from the learned duration on the next run', async () => {
    persistence.state.activationHistory.resource[OWNER_ID] = {
      ...emptyRecord(),
      optimalDurationHours: 4,
      expiresAt: new Date(NOW.getTime() - HOUR_MS),
    };
    fixture.resourceRoles['/subscriptions/sub-1'] = [resourceRole('Owner')];

    await build().run();

    expect(resource.calls.map((c) => c.durationHours)).toEqual([4]);
  });

  it('should skip a role that is still active beyond the buffer', async () => {
    persistence.state.activationHistory.directory.Reader = {
      ...emptyRecord(),
      expiresAt: new Date(NOW.getTime() + 45 * 60 * 1000),
    };
    fixture.directoryRoles = [directoryRole('Reader')];

    const summary = await build().run();

    expect(directory.calls).toEqual([]);
    expect(summary.skipped).toBe(1);
    expect(eventsOf('role-skipped')).toEqual([
      { type: 'role-skipped', runId: 'run-1', kind: 'directory', roleId: 'Reader', reason: 'still-active' },
    ]);
  });

  it('should re-activate a role expiring within the buffer', async () => {
    persistence.state.activationHistory.directory.Reader = {
      ...emptyRecord(),
      expiresAt: new Date(NOW.getTime() + 20 * 60 * 1000),
    };
    fixture.directoryRoles = [directoryRole('Reader')];

    await build().run();

    expect(directory.calls).toEqual([{ roleName: 'Reader', durationHours: 8, justification: 'daily' }]);
  });

  it('should stop trying a role after repeated failures', async () => {
    persistence.state.activationHistory.directory['Global Administrator'] = {
      ...emptyRecord(),
      consecutiveFailures: 3,
      totalFailures: 3,
    };
    fixture.directoryRoles = [directoryRole('Global Administrator')];

    const summary = await build().run();

    expect(directory.calls).toEqual([]);
    expect(eventsOf('role-skipped')[0].reason).toBe('too-many-failures');
    expect(summary.skipped).toBe(1);
  });

  it('should skip eligible roles that are not configured in named mode', async () => {
    fixture.directoryRoles = [directoryRole('Reader'), directoryRole('Exchange Administrator')];
    fixture.resourceRoles['/subscriptions/sub-1'] = [resourceRole('Owner'), resourceRole('Contributor')];

    const summary = await build().run();

    expect(directory.calls.map((c) => c.roleName)).toEqual(['Reader']);
    expect(resource.calls.map((c) => c.roleName)).toEqual(['Owner']);
    expect(summary).toMatchObject({ activated: 2, skipped: 2 });
    expect(eventsOf('role-skipped').map((e) => e.reason)).toEqual(['not-configured', 'not-configured']);
  });

  it('should activate every eligible role in all mode', async () => {
    fixture.config = { ...fixture.config, mode: 'all', directoryRoles: [], resourceScopes: [{ scope: '/subscriptions/sub-1' }] };
    fixture.directoryRoles = [directoryRole('Exchange Administrator')];
    fixture.resourceRoles['/subscriptions/sub-1'] = [resourceRole('Contributor')];

    const summary = await build().run();

    expect(directory.calls.map((c) => c.roleName)).toEqual(['Exchange Administrator']);
    expect(resource.calls.map((c) => c.roleName)).toEqual(['Contributor']);
    expect(summary.activated).toBe(2);
  });

  it('should not list directory roles when none are named', async () => {
    fixture.config = { ...fixture.config, directoryRoles: [] };

    await build().run();

    expect(listedDirectory).toBe(0);
  });

  it('should cap the duration at the scope maximum', async () => {
    fixture.config = {
      ...fixture.config,
      resourceScopes: [{ scope: '/subscriptions/sub-1', roles: ['Owner'], maxDurationHours: 2 }],
    };
    fixture.resourceRoles['/subscriptions/sub-1'] = [resourceRole('Owner')];

    await build().run();

    expect(resource.calls.map((c) => c.durationHours)).toEqual([2]);
  });

  it('should process a role listed under two scopes once', async () => {
    fixture.config = {
      ...fixture.config,
      resourceScopes: [
        { scope: '/subscriptions/sub-1', roles: ['Owner'] },
        { scope: '/subscriptions/sub-1/resourceGroups/rg-app', roles: ['Owner'] },
      ],
    };
    // Inherited eligibility shows up at the child scope with the parent scope.
    fixture.resourceRoles['/subscriptions/sub-1'] = [resourceRole('Owner')];
    fixture.resourceRoles['/subscriptions/sub-1/resourceGroups/rg-app'] = [resourceRole('Owner')];

    const summary = await build().run();

    expect(resource.calls).toHaveLength(1);
    expect(summary.activated).toBe(1);
  });

  it('should not activate an inherited grant above the configured scope', async () => {
    const rgApp = '/subscriptions/sub-1/resourceGroups/rg-app';
    fixture.config = { ...fixture.config, directoryRoles: [], resourceScopes: [{ scope: rgApp, roles: ['Reader'] }] };
    fixture.resourceRoles[rgApp] = [
      resourceRole('Reader'),
      { kind: 'resource', roleName: 'Reader', scope: '/subscriptions/sub-1/resourcegroups/rg-app', scopeType: 'resourceGroup', roleDefinitionId: null },
    ];

    const summary = await build().run();

    expect(resource.calls).toHaveLength(1);
    expect(eventsOf('role-skipped')).toEqual([
      { type: 'role-skipped', runId: 'run-1', kind: 'resource', roleId: '/subscriptions/sub-1|subscription|Reader', reason: 'not-configured' },
    ]);
    expect(summary).toMatchObject({ activated: 1, skipped: 1 });
  });

  it('should not activate grants on child scopes of the configured scope', async () => {
    fixture.resourceRoles['/subscriptions/sub-1'] = [
      { kind: 'resource', roleName: 'Owner', scope: '/subscriptions/sub-1/resourcegroups/rg-app', scopeType: 'resourceGroup', roleDefinitionId: null },
    ];

    const summary = await build().run();

    expect(resource.calls).toEqual([]);
    expect(eventsOf('role-skipped').map((e) => e.reason)).toEqual(['not-configured']);
    expect(summary.skipped).toBe(1);
  });

  it('should activate a parent grant named after a child scope listed it first', async () => {
    const rgApp = '/subscriptions/sub-1/resourceGroups/rg-app';
    fixture.config = {
      ...fixture.config,
      directoryRoles: [],
      resourceScopes: [
        { scope: rgApp, roles: ['Reader'] },
        { scope: '/subscriptions/sub-1', roles: ['Owner'], maxDurationHours: 4 },
      ],
    };
    fixture.resourceRoles[rgApp] = [resourceRole('Owner')];
    fixture.resourceRoles['/subscriptions/sub-1'] = [resourceRole('Owner')];

    const summary = await build().run();

    expect(resource.calls).toEqual([{ roleName: 'Owner', durationHours: 4, justification: 'daily' }]);
    expect(summary).toMatchObject({ activated: 1, skipped: 0 });
  });

  it('should match only roles at the exact scope for a named entry without roles', async () => {
    fixture.config = { ...fixture.config, directoryRoles: [], resourceScopes: [{ scope: '/subscriptions/sub-1' }] };
    fixture.resourceRoles['/subscriptions/sub-1'] = [
      resourceRole('Contributor'),
      { kind: 'resource', roleName: 'Reader', scope: '/providers/microsoft.management/managementgroups/platform', scopeType: 'managementGroup', roleDefinitionId: null },
    ];

    const summary = await build().run();

    expect(resource.calls.map((c) => c.roleName)).toEqual(['Contributor']);
    expect(summary).toMatchObject({ activated: 1, skipped: 1 });
  });

  it('should treat already-active and pending as success', async () => {
    fixture.directoryRoles = [directoryRole('Reader'), directoryRole('Global Administrator')];
    directory = new FakeActivator((req) => req.role.roleName === 'Reader'
      ? { signal: 'already-active', message: 'The Role assignment already exists.' }
      : { signal: 'pending', message: 'PendingApproval' });

    const summary = await build().run();

    expect(summary.activated).toBe(2);
    expect(summary.byStatus).toEqual({ activated: 0, 'already-active': 1, pending: 1, failed: 0 });
    expect(persistence.saved?.activationHistory.directory.Reader.optimalDurationHours).toBe(8);
  });

  it('should record a failure without retrying shorter durations', async () => {
    persistence.state.activationHistory.directory.Reader = { ...emptyRecord(), consecutiveFailures: 1, totalFailures: 1 };
    fixture.directoryRoles = [directoryRole('Reader')];
    directory = new FakeActivator(() => ({ signal: 'failed', message: 'Forbidden' }));

    const summary = await build().run();

    expect(directory.calls).toHaveLength(1);
    expect(summary).toMatchObject({ activated: 0, failed: 1 });
    expect(persistence.saved?.activationHistory.directory.Reader).toMatchObject({
      consecutiveFailures: 2,
      totalFailures: 2,
      totalActivations: 0,
    });
    expect(eventsOf('role-outcome')[0].outcome).toEqual({
      status: 'failed',
      grantedDurationHours: 0,
      attempts: [{ durationHours: 8, signal: 'failed', message: 'Forbidden' }],
      error: 'Forbidden',
    });
  });

  it('should turn a throwing activator into a failed outcome', async () => {
    fixture.directoryRoles = [directoryRole('Reader')];
    directory = new FakeActivator(() => {
      throw new Error('socket hang up');
    });

    const summary = await build().run();

    expect(summary.failed).toBe(1);
    expect(eventsOf('role-outcome')[0].outcome.error).toBe('socket hang up');
  });

  it('should plan without activating or saving in list-only mode', async () => {
    fixture.directoryRoles = [directoryRole('Reader')];
    fixture.resourceRoles['/subscriptions/sub-1'] = [resourceRole('Owner')];

    const summary = await build().run({ listOnly: true });

    expect(directory.calls).toEqual([]);
    expect(resource.calls).toEqual([]);
    expect(persistence.saves).toBe(0);
    expect(summary).toMatchObject({ listOnly: true, planned: 2, activated: 0 });
    expect(eventsOf('role-planned').map((e) => e.durations)).toEqual([[8, 4, 2], [8, 4, 2]]);
  });

  it('should count a failing scope and continue with the others', async () => {
    fixture.config = {
      ...fixture.config,
      resourceScopes: [
        { scope: '/subscriptions/sub-1', roles: ['Owner'] },
        { scope: '/subscriptions/sub-2', roles: ['Reader'] },
      ],
    };
    fixture.resourceRoles['/subscriptions/sub-1'] = new Error('AuthorizationFailed');
    fixture.resourceRoles['/subscriptions/sub-2'] = [resourceRole('Reader', '/subscriptions/sub-2')];

    const summary = await build().run();

    expect(summary).toMatchObject({ activated: 1, failed: 1 });
    expect(eventsOf('scope-failed')).toEqual([
      { type: 'scope-failed', runId: 'run-1', scope: '/subscriptions/sub-1', message: 'AuthorizationFailed' },
    ]);
  });

  it('should abort when directory roles cannot be listed', async () => {
    fixture.directoryError = new Error('403 Forbidden');

    await expect(build().run()).rejects.toThrow(FatalRunError);
    await expect(build().run()).rejects.toThrow('Cannot list eligible directory roles: 403 Forbidden');
    expect(persistence.saves).toBe(0);
  });

  it('should report a failed save and still return the summary', async () => {
    fixture.directoryRoles = [directoryRole('Reader')];
    persistence.failSave = true;

    const summary = await build().run();

    expect(summary.activated).toBe(1);
    expect(eventsOf('state-save-failed')).toEqual([
      { type: 'state-save-failed', runId: 'run-1', message: 'EACCES: permission denied' },
    ]);
    expect(events[events.length - 1].type).toBe('run-completed');
  });

  it('should report an unusable state file and carry on', async () => {
    persistence.warning = 'ignoring invalid state file ./pim-state.json: Unexpected token';

    await build().run();

    expect(events.map((e) => e.type).slice(0, 2)).toEqual(['run-started', 'state-load-failed']);
  });

  it('should stamp the run on the saved state', async () => {
    await build().run();

    expect(persistence.saved).toMatchObject({ lastRunAt: NOW, userId: 'principal-1' });
  });
});
