#!/usr/bin/env node
/* eslint-disable no-console */
import { parseArgs } from 'node:util';
import { createEligibleRoleLister } from './azure/eligibility.js';
import { listSubscriptionScopes, scanEnvironment } from './azure/environment.js';
import { createSessionFromEnv } from './azure/session.js';
import {
  buildSetupConfig,
  configPathFrom,
  loadConfig,
  writeNewConfigFile,
  type ConfigOverrides,
} from './config/config.js';
import { createRuntime, openAuditDb } from './runtime.js';
import { generateInternalToken, isTokenScope } from './server/auth.js';
import { RunCoordinator, createStatusApp } from './server/status-server.js';
import { ConfigError, errorMessage } from './shared/errors.js';

const USAGE = `Usage: pim-activate [run|list|scan|scan-scope <scope>|setup|serve|token [read|run]] [options]

Options:
  --config <path>           configuration file (default ./pim-config.json)
  --directory-hours <n>     default directory role duration
  --resource-hours <n>      default resource role duration
  --justification <text>    justification sent with each request
  -h, --help                show this help`;

const HOUR_MS = 60 * 60 * 1000;

function hoursOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 24) {
    throw new ConfigError(`--${name} must be a whole number of hours between 1 and 24`);
  }
  return parsed;
}

/** Resolves to the exit code, or null when a long-running server took over. */
async function main(argv: string[]): Promise<number | null> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      'directory-hours': { type: 'string' },
      'resource-hours': { type: 'string' },
      justification: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const [mode = 'run', arg] = positionals;
  const overrides: ConfigOverrides = {
    configPath: values.config,
    directoryDurationHours: hoursOption('directory-hours', values['directory-hours']),
    resourceDurationHours: hoursOption('resource-hours', values['resource-hours']),
    justification: values.justification,
  };

  if (mode === 'scan' || mode === 'scan-scope' || mode === 'setup') {
    const session = await createSessionFromEnv(process.env);
    const lister = createEligibleRoleLister(session);

    if (mode === 'scan-scope') {
      if (!arg) throw new ConfigError('scan-scope needs a scope argument');
      const roles = await lister.listResourceRoles(arg);
      for (const role of roles) {
        console.log(`${role.roleName}\t${role.scopeType}\t${role.scope}`);
      }
      console.log(`${roles.length} eligible role(s)`);
      return 0;
    }

    const scan = await scanEnvironment(lister, await listSubscriptionScopes(session));
    for (const failure of scan.failedScopes) {
      console.error(`\u274C scope ${failure.scope}: ${failure.message}`);
    }

    if (mode === 'setup') {
      const configPath = configPathFrom(overrides, process.env);
      await writeNewConfigFile(configPath, buildSetupConfig(scan.directory, scan.resource));
      console.log(`Wrote ${configPath}: ${scan.directory.length} directory and ${scan.resource.length} resource role(s)`);
      return 0;
    }

    for (const role of scan.directory) {
      console.log(`${role.roleName}\tdirectory\t${role.directoryScopeId}`);
    }
    for (const role of scan.resource) {
      console.log(`${role.roleName}\t${role.scopeType}\t${role.scope}`);
    }
    console.log(`${scan.directory.length} directory and ${scan.resource.length} resource role(s)`);
    return 0;
  }

  if (mode !== 'run' && mode !== 'list' && mode !== 'serve' && mode !== 'token') {
    console.error(USAGE);
    return 2;
  }

  const config = await loadConfig(overrides, process.env);

  if (mode === 'token') {
    if (!config.internalSecret) throw new ConfigError('INTERNAL_SECRET is not set');
    const scope = arg ?? 'run';
    if (!isTokenScope(scope)) throw new ConfigError(`token scope must be read or run, not ${scope}`);
    console.log(generateInternalToken(config.internalSecret, scope));
    return 0;
  }

  if (mode === 'serve' && !config.internalSecret) throw new ConfigError('INTERNAL_SECRET is not set');

  const session = await createSessionFromEnv(process.env);
  const db = openAuditDb(config.auditDbPath);
  const { orchestrator, persistence } = createRuntime(config, session, db);

  if (mode === 'run' || mode === 'list') {
    try {
      await orchestrator.run({ listOnly: mode === 'list' });
    } finally {
      db.close();
    }
    return 0;
  }

  const coordinator = new RunCoordinator((listOnly) => orchestrator.run({ listOnly }));
  const app = createStatusApp({ db, persistence, coordinator, secret: config.internalSecret });

  const scheduled = () => {
    coordinator.start()?.catch((err) => {
      console.error('Scheduled run failed:', errorMessage(err));
    });
  };
  setInterval(scheduled, config.runIntervalHours * HOUR_MS);
  scheduled();

  app.listen(config.port, '0.0.0.0', () => {
    console.log(`pim-autoactivate listening on port ${config.port}`);
  });
  return null;
}

main(process.argv.slice(2))
  .then((code) => {
    if (code !== null) process.exitCode = code;
  })
  .catch((err) => {
    console.error(`${err instanceof Error ? err.name : 'Error'}: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
