import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { parseScope } from '../azure/scope.js';
import { ConfigError } from '../shared/errors.js';
import type { Preferences, ResourceEligibleRole, RoleConfig } from '../shared/types.js';

export const DEFAULT_DIRECTORY_DURATION_HOURS = 8;
export const DEFAULT_RESOURCE_DURATION_HOURS = 8;
export const DEFAULT_JUSTIFICATION = 'Daily role activation';

const hours = z.number().int().min(1).max(24);

// Longer delays overflow the timer's 32-bit millisecond range.
export const MAX_RUN_INTERVAL_HOURS = 596;
const intervalHours = z.number().positive().max(MAX_RUN_INTERVAL_HOURS);

const scopeSchema = z.object({
  scope: z.string().min(1).refine((value) => {
    try {
      parseScope(value);
      return true;
    } catch {
      return false;
    }
  }, { message: 'not a subscription, resource group, resource or management group scope' }),
  roles: z.array(z.string().min(1)).optional(),
  maxDurationHours: hours.optional(),
});

const fileSchema = z.object({
  mode: z.enum(['all', 'named']).default('named'),
  directoryRoles: z.array(z.string().min(1)).default([]),
  resourceScopes: z.array(scopeSchema).default([]),
  justification: z.string().min(1).optional(),
  directoryDurationHours: hours.optional(),
  resourceDurationHours: hours.optional(),
  statePath: z.string().min(1).optional(),
  auditDbPath: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof fileSchema>;

export interface ConfigOverrides {
  configPath?: string;
  directoryDurationHours?: number;
  resourceDurationHours?: number;
  justification?: string;
}

export interface AppConfig {
  roles: RoleConfig;
  statePath: string;
  auditDbPath: string;
  port: number;
  internalSecret: string;
  runIntervalHours: number;
}

type Env = Record<string, string | undefined>;

function envHours(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = hours.safeParse(Number(raw));
  if (!parsed.success) throw new ConfigError(`${name} must be a whole number of hours between 1 and 24`);
  return parsed.data;
}

function envInterval(env: Env): number {
  const raw = env.RUN_INTERVAL_HOURS;
  if (raw === undefined || raw === '') return 24;
  const parsed = intervalHours.safeParse(Number(raw));
  if (!parsed.success) {
    throw new ConfigError(`RUN_INTERVAL_HOURS must be a number of hours above 0 and at most ${MAX_RUN_INTERVAL_HOURS}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseConfigFile(raw: unknown): ConfigFile {
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

/** Precedence: CLI overrides, then environment, then the config file, then built-in defaults. */
export function resolveConfig(file: ConfigFile, overrides: ConfigOverrides, env: Env): AppConfig {
  const roles: RoleConfig = Object.freeze({
    mode: file.mode,
    directoryRoles: Object.freeze([...file.directoryRoles]),
    resourceScopes: Object.freeze(file.resourceScopes.map((entry) => Object.freeze({
      scope: parseScope(entry.scope).scope,
      roles: entry.roles ? Object.freeze([...entry.roles]) : undefined,
      maxDurationHours: entry.maxDurationHours,
    }))),
    justification: overrides.justification
      ?? env.PIM_JUSTIFICATION
      ?? file.justification
      ?? DEFAULT_JUSTIFICATION,
    directoryDurationHours: overrides.directoryDurationHours
      ?? envHours(env, 'PIM_DIRECTORY_DURATION_HOURS')
      ?? file.directoryDurationHours
      ?? DEFAULT_DIRECTORY_DURATION_HOURS,
    resourceDurationHours: overrides.resourceDurationHours
      ?? envHours(env, 'PIM_RESOURCE_DURATION_HOURS')
      ?? file.resourceDurationHours
      ?? DEFAULT_RESOURCE_DURATION_HOURS,
  });

  return {
    roles,
    statePath: env.PIM_STATE_PATH ?? file.statePath ?? './pim-state.json',
    auditDbPath: env.PIM_AUDIT_DB_PATH ?? file.auditDbPath ?? './pim-audit.db',
    port: parseInt(env.PORT ?? '9010', 10),
    internalSecret: env.INTERNAL_SECRET ?? '',
    runIntervalHours: envInterval(env),
  };
}

export function configPathFrom(overrides: ConfigOverrides, env: Env): string {
  return overrides.configPath ?? env.PIM_CONFIG_PATH ?? './pim-config.json';
}

export async function loadConfig(overrides: ConfigOverrides, env: Env): Promise<AppConfig> {
  const configPath = configPathFrom(overrides, env);

  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read configuration ${configPath}: ${(err as Error).message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Configuration ${configPath} is not valid JSON: ${(err as Error).message}`);
  }

  return resolveConfig(parseConfigFile(raw), overrides, env);
}

export function preferencesOf(roles: RoleConfig): Preferences {
  return {
    defaultJustification: roles.justification,
    directoryDurationHours: roles.directoryDurationHours,
    resourceDurationHours: roles.resourceDurationHours,
  };
}

/** Named-mode config that activates everything currently eligible. */
export function buildSetupConfig(
  directoryRoles: readonly { roleName: string }[],
  resourceRoles: readonly ResourceEligibleRole[],
): ConfigFile {
  const rolesByScope = new Map<string, string[]>();
  for (const role of resourceRoles) {
    const names = rolesByScope.get(role.scope) ?? [];
    if (!names.includes(role.roleName)) names.push(role.roleName);
    rolesByScope.set(role.scope, names);
  }

  return {
    mode: 'named',
    directoryRoles: [...new Set(directoryRoles.map((role) => role.roleName))].sort(),
    resourceScopes: [...rolesByScope.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([scope, roles]) => ({ scope, roles: roles.sort() })),
  };
}

/** Refuses to replace an existing file. */
export async function writeNewConfigFile(configPath: string, file: ConfigFile): Promise<void> {
  try {
    await writeFile(configPath, JSON.stringify(file, null, 2) + '\n', { encoding: 'utf8', flag: 'wx' });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'EEXIST') {
      throw new ConfigError(`Configuration ${configPath} already exists`);
    }
    throw err;
  }
}
