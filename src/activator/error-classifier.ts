import type { AttemptResult, AttemptSignal } from '../shared/types.js';
import { ApiError, errorMessage } from '../shared/errors.js';

interface SignalRule {
  signal: Exclude<AttemptSignal, 'activated' | 'failed'>;
  codes: string[];
  patterns: RegExp[];
}

// Order matters: a duplicate request is reported before any policy check runs.
const RULES: SignalRule[] = [
  {
    signal: 'already-active',
    codes: ['RoleAssignmentExists'],
    patterns: [/already exists/i, /assignment exists/i],
  },
  {
    signal: 'pending',
    codes: ['RoleAssignmentRequestPendingApproval', 'PendingRoleAssignmentRequest'],
    patterns: [/pending approval/i, /pendingapproval/i, /pending request/i],
  },
  {
    signal: 'duration-rejected',
    // RoleAssignmentRequestPolicyValidationFailed also covers MFA and ticket
    // rules, so only the message identifies a duration violation.
    codes: ['ExpirationRule'],
    patterns: [/expiration ?rule/i, /maximum (allowed )?duration/i, /duration .*exceed/i],
  },
];

function matchesRule(rule: SignalRule, code: string | null, message: string): boolean {
  if (code !== null && rule.codes.includes(code)) return true;
  return rule.patterns.some((p) => p.test(message));
}

export function classifyActivationError(err: unknown): AttemptResult {
  const message = errorMessage(err);
  const code = err instanceof ApiError ? err.code : null;

  for (const rule of RULES) {
    if (matchesRule(rule, code, message)) {
      return { signal: rule.signal, message };
    }
  }
  return { signal: 'failed', message };
}

/** Request status values the providers return on an accepted request. */
export function classifyRequestStatus(status: string | undefined): AttemptResult {
  if (status && /^pending/i.test(status) && /approval/i.test(status)) {
    return { signal: 'pending', message: status };
  }
  if (status && /^(denied|failed|canceled|revoked)/i.test(status)) {
    return { signal: 'failed', message: `request ended in status ${status}` };
  }
  return { signal: 'activated', message: status ?? null };
}
