import Database from 'better-sqlite3';
import { DirectoryRoleActivator } from './activator/directory-activator.js';
import { ResourceRoleActivator } from './activator/resource-activator.js';
import { ArmRoleDefinitionResolver } from './activator/role-definitions.js';
import { AuditReporter } from './audit/audit-reporter.js';
import { initSchema } from './audit/schema.js';
import { createEligibleRoleLister } from './azure/eligibility.js';
import type { AuthenticatedSession } from './azure/session.js';
import { preferencesOf, type AppConfig } from './config/config.js';
import { createFileStatePersistence, type RunStatePersistence } from './history/persistence.js';
import { RunOrchestrator } from './orchestrator/run-orchestrator.js';
import { CompositeReporter, ConsoleReporter } from './reporter/console-reporter.js';

export function openAuditDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  initSchema(db);
  return db;
}

export interface Runtime {
  orchestrator: RunOrchestrator;
  persistence: RunStatePersistence;
}

export function createRuntime(config: AppConfig, session: AuthenticatedSession, db: Database.Database): Runtime {
  const persistence = createFileStatePersistence(config.statePath, preferencesOf(config.roles));
  const orchestrator = new RunOrchestrator({
    config: config.roles,
    principalId: session.principalId,
    lister: createEligibleRoleLister(session),
    activators: {
      directory: new DirectoryRoleActivator(session),
      resource: new ResourceRoleActivator(session, new ArmRoleDefinitionResolver(session)),
    },
    persistence,
    reporter: new CompositeReporter([new ConsoleReporter(), new AuditReporter(db)]),
  });
  return { orchestrator, persistence };
}
