export * from './shared/types.js';
export * from './shared/errors.js';
export { InMemoryRoleHistoryStore, emptyRecord, type RoleHistoryStore } from './history/history-store.js';
export { loadRunState, saveRunState, serializeRunState, parseRunState, emptyRunState } from './history/state-file.js';
export { createFileStatePersistence, type RunStatePersistence } from './history/persistence.js';
export { planDurations, resolveBaseDuration } from './negotiation/duration-negotiator.js';
export { decide, STILL_ACTIVE_BUFFER_MS, MAX_CONSECUTIVE_FAILURES, type RoleFilter } from './decision/decision-engine.js';
export type { RoleActivator, ActivationRequest } from './activator/types.js';
export { DirectoryRoleActivator } from './activator/directory-activator.js';
export { ResourceRoleActivator } from './activator/resource-activator.js';
export { ArmRoleDefinitionResolver, scopedRoleDefinitionId } from './activator/role-definitions.js';
export { driveActivation } from './activator/drive.js';
export { classifyActivationError } from './activator/error-classifier.js';
export { createEligibleRoleLister, type EligibleRoleLister } from './azure/eligibility.js';
export { createSessionFromEnv, type AuthenticatedSession } from './azure/session.js';
export { listSubscriptionScopes, scanEnvironment, type EnvironmentScan } from './azure/environment.js';
export { parseScope, normalizeScope, directoryRoleIdentity, resourceRoleIdentity } from './azure/scope.js';
export { loadConfig, resolveConfig, parseConfigFile, buildSetupConfig, type AppConfig } from './config/config.js';
export { RunOrchestrator, type RunOrchestratorDeps, type RunOptions } from './orchestrator/run-orchestrator.js';
export { ConsoleReporter, CompositeReporter } from './reporter/console-reporter.js';
export { AuditReporter } from './audit/audit-reporter.js';
export { createRuntime, openAuditDb } from './runtime.js';
export { createStatusApp, RunCoordinator } from './server/status-server.js';
