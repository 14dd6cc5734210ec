/* eslint-disable no-console */
import type { ActivationStatus, RunEvent, RunReporter, SkipReason } from '../shared/types.js';

const STATUS_ICON: Record<ActivationStatus, string> = {
  activated: '\u2705',             // ✅
  'already-active': '\u{1F7E2}',   // 🟢
  pending: '\u23F3',               // ⏳
  failed: '\u274C',                // ❌
};

const SKIP_TEXT: Record<SkipReason, string> = {
  'not-configured': 'not configured',
  'still-active': 'still active',
  'too-many-failures': 'too many consecutive failures',
};

export function formatEvent(event: RunEvent): string | null {
  switch (event.type) {
    case 'run-started':
      return `${event.listOnly ? 'Listing' : 'Activating'} roles for ${event.userId} (run ${event.runId})`;
    case 'scope-failed':
      return `❌ scope ${event.scope}: ${event.message}`;
    case 'role-skipped':
      return `⏭  [${event.kind}] ${event.roleId}: skipped, ${SKIP_TEXT[event.reason]}`;
    case 'role-planned':
      return `\u{1F4CB} [${event.kind}] ${event.roleId}: would activate, trying ${event.durations.map((h) => `${h}h`).join(' → ')}`;
    case 'attempt-rejected':
      return `↪  [${event.kind}] ${event.roleId}: ${event.durationHours}h rejected by policy, retrying shorter`;
    case 'role-outcome': {
      const { outcome } = event;
      const icon = STATUS_ICON[outcome.status];
      if (outcome.status === 'failed') {
        return `${icon} [${event.kind}] ${event.roleId}: failed${outcome.error ? ` (${outcome.error})` : ''}`;
      }
      return `${icon} [${event.kind}] ${event.roleId}: ${outcome.status} for ${outcome.grantedDurationHours}h`;
    }
    case 'state-load-failed':
      return `⚠  state: ${event.message}, starting fresh`;
    case 'state-save-failed':
      return `⚠  state not saved: ${event.message}`;
    case 'run-completed': {
      const s = event.summary;
      const seconds = (s.elapsedMs / 1000).toFixed(1);
      const counts = s.listOnly
        ? `${s.planned} to activate, ${s.skipped} skipped, ${s.failed} failed`
        : `${s.activated} activated, ${s.skipped} skipped, ${s.failed} failed`;
      return `Done in ${seconds}s: ${counts}`;
    }
  }
}

export class ConsoleReporter implements RunReporter {
  report(event: RunEvent): void {
    const line = formatEvent(event);
    if (line === null) return;
    if (event.type === 'scope-failed' || event.type === 'state-save-failed' || event.type === 'state-load-failed'
      || (event.type === 'role-outcome' && event.outcome.status === 'failed')) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export class CompositeReporter implements RunReporter {
  constructor(private readonly reporters: RunReporter[]) {}

  report(event: RunEvent): void {
    for (const reporter of this.reporters) reporter.report(event);
  }
}
