import type { RoleHistoryRecord } from '../shared/types.js';

/** Standard shorter windows tried after a policy rejects the requested duration. */
const FALLBACK_HOURS = [4, 2];

export function planDurations(baseDuration: number): number[] {
  const plan = [baseDuration];
  for (const hours of FALLBACK_HOURS) {
    if (baseDuration > hours && !plan.includes(hours)) plan.push(hours);
  }
  return plan;
}

/**
 * A learned duration is known to pass the policy, so it wins over the
 * configured default. A per-scope maximum caps either.
 */
export function resolveBaseDuration(
  history: RoleHistoryRecord | null,
  defaultHours: number,
  maxHours?: number,
): number {
  const learned = history?.optimalDurationHours ?? 0;
  const base = learned > 0 ? learned : defaultHours;
  const capped = maxHours !== undefined ? Math.min(base, maxHours) : base;
  return Math.max(1, Math.floor(capped));
}
