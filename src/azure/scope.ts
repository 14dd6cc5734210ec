import type { RoleIdentity, ScopeType } from '../shared/types.js';

const MANAGEMENT_GROUP_PREFIX = '/providers/microsoft.management/managementgroups/';

export interface ParsedScope {
  scope: string;
  scopeType: ScopeType;
  subscriptionId: string | null;
  managementGroupId: string | null;
}

/** Lower-cases and trims trailing slashes so equal scopes compare equal. */
export function normalizeScope(scope: string): string {
  const trimmed = scope.trim().replace(/\/+$/, '');
  const withSlash = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  return withSlash.toLowerCase();
}

export function parseScope(scope: string): ParsedScope {
  const normalized = normalizeScope(scope);

  if (normalized.startsWith(MANAGEMENT_GROUP_PREFIX)) {
    const managementGroupId = normalized.slice(MANAGEMENT_GROUP_PREFIX.length);
    if (!managementGroupId || managementGroupId.includes('/')) {
      throw new Error(`Unsupported management group scope: ${scope}`);
    }
    return { scope: normalized, scopeType: 'managementGroup', subscriptionId: null, managementGroupId };
  }

  const segments = normalized.split('/').filter(Boolean);
  if (segments[0] !== 'subscriptions' || !segments[1]) {
    throw new Error(`Unsupported scope: ${scope}`);
  }

  const subscriptionId = segments[1];
  let scopeType: ScopeType;
  if (segments.length === 2) {
    scopeType = 'subscription';
  } else if (segments[2] === 'resourcegroups' && segments.length === 4) {
    scopeType = 'resourceGroup';
  } else if (segments[2] === 'resourcegroups' && segments[4] === 'providers' && segments.length >= 8) {
    scopeType = 'resource';
  } else {
    throw new Error(`Unsupported scope: ${scope}`);
  }

  return { scope: normalized, scopeType, subscriptionId, managementGroupId: null };
}

export function directoryRoleIdentity(roleName: string): RoleIdentity {
  return roleName;
}

export function resourceRoleIdentity(scope: string, scopeType: ScopeType, roleName: string): RoleIdentity {
  return `${normalizeScope(scope)}|${scopeType}|${roleName}`;
}
