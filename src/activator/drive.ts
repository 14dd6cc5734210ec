import type { ActivationOutcome, AttemptRecord, EligibleRole } from '../shared/types.js';
import type { RoleActivator } from './types.js';

export interface DriveOptions<R extends EligibleRole> {
  activator: RoleActivator<R>;
  role: R;
  plan: readonly number[];
  justification: string;
  now: () => Date;
  onRejected?: (attempt: AttemptRecord) => void;
}

/**
 * Walks the duration plan left to right. Only a duration rejection moves on
 * to the next entry; every other signal ends the walk.
 */
export async function driveActivation<R extends EligibleRole>(
  opts: DriveOptions<R>,
): Promise<ActivationOutcome> {
  const attempts: AttemptRecord[] = [];

  for (let i = 0; i < opts.plan.length; i++) {
    const durationHours = opts.plan[i];
    const result = await opts.activator.attempt({
      role: opts.role,
      durationHours,
      justification: opts.justification,
      now: opts.now(),
    });
    const attempt: AttemptRecord = { durationHours, signal: result.signal, message: result.message };
    attempts.push(attempt);

    switch (result.signal) {
      case 'activated':
      case 'already-active':
      case 'pending':
        return { status: result.signal, grantedDurationHours: durationHours, attempts, error: null };
      case 'duration-rejected':
        if (i < opts.plan.length - 1) {
          opts.onRejected?.(attempt);
          continue;
        }
        return { status: 'failed', grantedDurationHours: 0, attempts, error: result.message };
      case 'failed':
        return { status: 'failed', grantedDurationHours: 0, attempts, error: result.message };
    }
  }

  return { status: 'failed', grantedDurationHours: 0, attempts, error: 'empty duration plan' };
}
