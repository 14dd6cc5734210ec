import { ARM_BASE, requestAllPages } from '../azure/http.js';
import { parseScope } from '../azure/scope.js';
import type { AuthenticatedSession } from '../azure/session.js';
import type { ResourceEligibleRole } from '../shared/types.js';

const ROLE_DEFINITIONS_API_VERSION = '2022-04-01';
const GUID_AT_END = /\/roleDefinitions\/([0-9a-f-]{36})$/i;

interface RoleDefinitionItem {
  name?: string;
  properties?: { roleName?: string };
}

export function roleDefinitionGuid(roleDefinitionId: string): string | null {
  return GUID_AT_END.exec(roleDefinitionId)?.[1]?.toLowerCase() ?? null;
}

/**
 * Subscription, resource group and resource scopes share the subscription
 * namespace; management groups have their own.
 */
export function scopedRoleDefinitionId(scope: string, guid: string): string {
  const parsed = parseScope(scope);
  if (parsed.scopeType === 'managementGroup') {
    return `/providers/Microsoft.Management/managementGroups/${parsed.managementGroupId}/providers/Microsoft.Authorization/roleDefinitions/${guid}`;
  }
  return `/subscriptions/${parsed.subscriptionId}/providers/Microsoft.Authorization/roleDefinitions/${guid}`;
}

export interface RoleDefinitionResolver {
  resolve(role: ResourceEligibleRole): Promise<string>;
}

export class ArmRoleDefinitionResolver implements RoleDefinitionResolver {
  private readonly guidsByName = new Map<string, string>();

  constructor(private readonly session: AuthenticatedSession) {}

  async resolve(role: ResourceEligibleRole): Promise<string> {
    const known = role.roleDefinitionId ? roleDefinitionGuid(role.roleDefinitionId) : null;
    const guid = known ?? await this.lookupGuid(role);
    return scopedRoleDefinitionId(role.scope, guid);
  }

  private async lookupGuid(role: ResourceEligibleRole): Promise<string> {
    const cached = this.guidsByName.get(role.roleName);
    if (cached) return cached;

    const filter = encodeURIComponent(`roleName eq '${role.roleName.replace(/'/g, "''")}'`);
    const url = `${ARM_BASE}${parseScope(role.scope).scope}/providers/Microsoft.Authorization/roleDefinitions?api-version=${ROLE_DEFINITIONS_API_VERSION}&$filter=${filter}`;
    const items = await requestAllPages<RoleDefinitionItem>(url, this.session.armToken);
    const match = items.find((item) => item.properties?.roleName === role.roleName && item.name);
    if (!match?.name) {
      throw new Error(`Role definition "${role.roleName}" not found at ${role.scope}`);
    }

    this.guidsByName.set(role.roleName, match.name);
    return match.name;
  }
}
