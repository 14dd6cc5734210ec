import type { Decision, RoleHistoryRecord, RoleIdentity } from '../shared/types.js';

export const STILL_ACTIVE_BUFFER_MS = 30 * 60 * 1000;
export const MAX_CONSECUTIVE_FAILURES = 3;

/** `null` means every eligible role is wanted. */
export type RoleFilter = ReadonlySet<RoleIdentity> | null;

export function decide(
  roleId: RoleIdentity,
  history: RoleHistoryRecord | null,
  filter: RoleFilter,
  now: Date,
): Decision {
  if (filter && !filter.has(roleId)) {
    return { action: 'skip', reason: 'not-configured' };
  }

  if (history?.expiresAt && history.expiresAt.getTime() > now.getTime() + STILL_ACTIVE_BUFFER_MS) {
    return { action: 'skip', reason: 'still-active' };
  }

  // Circuit breaker for roles whose policy never allows self-activation.
  if (history && history.consecutiveFailures >= MAX_CONSECUTIVE_FAILURES) {
    return { action: 'skip', reason: 'too-many-failures' };
  }

  return { action: 'attempt' };
}
