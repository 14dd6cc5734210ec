import { errorMessage } from '../shared/errors.js';
import type { DirectoryEligibleRole, ResourceEligibleRole } from '../shared/types.js';
import type { EligibleRoleLister } from './eligibility.js';
import { ARM_BASE, requestAllPages } from './http.js';
import { resourceRoleIdentity } from './scope.js';
import type { AuthenticatedSession } from './session.js';

const SUBSCRIPTIONS_API_VERSION = '2022-12-01';

interface SubscriptionItem {
  subscriptionId?: string;
  state?: string;
}

export interface ScopeFailure {
  scope: string;
  message: string;
}

export interface EnvironmentScan {
  directory: DirectoryEligibleRole[];
  resource: ResourceEligibleRole[];
  failedScopes: ScopeFailure[];
}

/** Subscriptions the signed-in principal can see, disabled ones excluded. */
export async function listSubscriptionScopes(session: AuthenticatedSession): Promise<string[]> {
  const url = `${ARM_BASE}/subscriptions?api-version=${SUBSCRIPTIONS_API_VERSION}`;
  const items = await requestAllPages<SubscriptionItem>(url, session.armToken);
  return items
    .filter((item) => item.subscriptionId && (item.state === undefined || item.state === 'Enabled'))
    .map((item) => `/subscriptions/${item.subscriptionId?.toLowerCase()}`);
}

/**
 * Eligibility across the whole tenant: directory roles plus every role
 * reachable from a visible subscription. Management group eligibilities show
 * up through inheritance and are kept once.
 */
export async function scanEnvironment(
  lister: EligibleRoleLister,
  subscriptionScopes: string[],
): Promise<EnvironmentScan> {
  const directory = await lister.listDirectoryRoles();
  const resource: ResourceEligibleRole[] = [];
  const failedScopes: ScopeFailure[] = [];
  const seen = new Set<string>();

  for (const scope of subscriptionScopes) {
    let roles: ResourceEligibleRole[];
    try {
      roles = await lister.listResourceRoles(scope);
    } catch (err) {
      failedScopes.push({ scope, message: errorMessage(err) });
      continue;
    }
    for (const role of roles) {
      const id = resourceRoleIdentity(role.scope, role.scopeType, role.roleName);
      if (seen.has(id)) continue;
      seen.add(id);
      resource.push(role);
    }
  }

  return { directory, resource, failedScopes };
}
