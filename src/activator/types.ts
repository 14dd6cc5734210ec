import type { AttemptResult, EligibleRole } from '../shared/types.js';

export interface ActivationRequest<R extends EligibleRole = EligibleRole> {
  role: R;
  durationHours: number;
  justification: string;
  now: Date;
}

/**
 * One activation attempt against the provider. Implementations never throw
 * for provider errors: they translate them into an AttemptResult signal.
 */
export interface RoleActivator<R extends EligibleRole = EligibleRole> {
  attempt(request: ActivationRequest<R>): Promise<AttemptResult>;
}

export function isoDuration(hours: number): string {
  return `PT${hours}H`;
}
