import type { DirectoryEligibleRole, ResourceEligibleRole } from '../shared/types.js';
import { ARM_API_VERSION, ARM_BASE, GRAPH_BASE, requestAllPages } from './http.js';
import { parseScope, resourceRoleIdentity, type ParsedScope } from './scope.js';
import type { AuthenticatedSession } from './session.js';

export interface EligibleRoleLister {
  listDirectoryRoles(): Promise<DirectoryEligibleRole[]>;
  listResourceRoles(scope: string): Promise<ResourceEligibleRole[]>;
}

interface DirectoryEligibilityInstance {
  roleDefinitionId?: string;
  directoryScopeId?: string;
  roleDefinition?: { displayName?: string };
}

interface ResourceEligibilityInstance {
  properties?: {
    scope?: string;
    roleDefinitionId?: string;
    expandedProperties?: {
      roleDefinition?: { displayName?: string };
    };
  };
}

export function toDirectoryRoles(items: DirectoryEligibilityInstance[]): DirectoryEligibleRole[] {
  const byName = new Map<string, DirectoryEligibleRole>();
  for (const item of items) {
    const roleName = item.roleDefinition?.displayName;
    if (!roleName || !item.roleDefinitionId || byName.has(roleName)) continue;
    byName.set(roleName, {
      kind: 'directory',
      roleName,
      roleDefinitionId: item.roleDefinitionId,
      directoryScopeId: item.directoryScopeId ?? '/',
    });
  }
  return [...byName.values()];
}

/** Eligibilities inherited from scopes this tool cannot address (tenant root) are dropped. */
export function toResourceRoles(items: ResourceEligibilityInstance[]): ResourceEligibleRole[] {
  const byIdentity = new Map<string, ResourceEligibleRole>();
  for (const item of items) {
    const props = item.properties;
    const roleName = props?.expandedProperties?.roleDefinition?.displayName;
    if (!props?.scope || !roleName) continue;

    let parsed: ParsedScope;
    try {
      parsed = parseScope(props.scope);
    } catch {
      continue;
    }

    const identity = resourceRoleIdentity(parsed.scope, parsed.scopeType, roleName);
    if (byIdentity.has(identity)) continue;
    byIdentity.set(identity, {
      kind: 'resource',
      roleName,
      scope: parsed.scope,
      scopeType: parsed.scopeType,
      roleDefinitionId: props.roleDefinitionId ?? null,
    });
  }
  return [...byIdentity.values()];
}

export function createEligibleRoleLister(session: AuthenticatedSession): EligibleRoleLister {
  return {
    async listDirectoryRoles() {
      const filter = encodeURIComponent(`principalId eq '${session.principalId}'`);
      const url = `${GRAPH_BASE}/roleManagement/directory/roleEligibilityScheduleInstances?$filter=${filter}&$expand=roleDefinition`;
      return toDirectoryRoles(await requestAllPages<DirectoryEligibilityInstance>(url, session.graphToken));
    },

    async listResourceRoles(scope: string) {
      const { scope: normalized } = parseScope(scope);
      const url = `${ARM_BASE}${normalized}/providers/Microsoft.Authorization/roleEligibilityScheduleInstances?api-version=${ARM_API_VERSION}&$filter=asTarget()`;
      return toResourceRoles(await requestAllPages<ResourceEligibilityInstance>(url, session.armToken));
    },
  };
}
