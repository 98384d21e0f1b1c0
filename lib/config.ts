import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { LogLevel, parseLogLevel } from './logging';
import type { ConcurrencyPolicy } from './queue';

export interface Settings {
  port: number;
  dataPath: string;
  databaseFile: string;
  projectsFile: string;
  deploymentsRoot: string;
  concurrency: ConcurrencyPolicy;
  pruneImages: boolean;
  stepTimeoutMs: number;
  notifyTimeoutMs: number;
  remoteHashTtlMs: number;
  // 0 disables reloading the projects file
  configReloadMs: number;
  composeProjectPrefix: string;
  sopsAgeKeyFile?: string;
  logLevel: LogLevel;
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(raw.toLowerCase())) return false;
  throw new Error(`${key} must be a boolean, got "${raw}"`);
}

export function parseConcurrency(raw: string | undefined): ConcurrencyPolicy {
  if (raw === undefined || raw.trim() === '' || raw.trim().toLowerCase() === 'sequential') {
    return { mode: 'sequential' };
  }
  const maxWorkers = Number(raw);
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new Error(`DEPLOY_CONCURRENCY must be "sequential" or a positive integer, got "${raw}"`);
  }
  return maxWorkers === 1 ? { mode: 'sequential' } : { mode: 'parallel', maxWorkers };
}

/**
 * Reads settings from the environment (`.env` is loaded by the entry point).
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const dataPath = path.resolve(env.DATA_PATH || './data');
  return {
    port: readInt(env, 'PORT', 8080, 1),
    dataPath,
    databaseFile: path.join(dataPath, 'stackpilot.db'),
    projectsFile: path.resolve(env.PROJECTS_FILE || './config/projects.json'),
    deploymentsRoot: path.resolve(env.DEPLOYMENTS_ROOT || path.join(dataPath, 'deployments')),
    concurrency: parseConcurrency(env.DEPLOY_CONCURRENCY),
    pruneImages: readBool(env, 'ENABLE_IMAGE_PRUNE', false),
    stepTimeoutMs: readInt(env, 'STEP_TIMEOUT_SECONDS', 600, 1) * 1000,
    notifyTimeoutMs: readInt(env, 'NOTIFY_TIMEOUT_SECONDS', 15, 1) * 1000,
    remoteHashTtlMs: readInt(env, 'REMOTE_HASH_TTL_SECONDS', 5) * 1000,
    configReloadMs: readInt(env, 'CONFIG_RELOAD_SECONDS', 10) * 1000,
    composeProjectPrefix: env.COMPOSE_PROJECT_PREFIX || 'stackpilot_repo',
    sopsAgeKeyFile: env.SOPS_AGE_KEY_FILE || undefined,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

export interface HealthcheckConfig {
  url: string;
  timeoutSeconds: number;
  expectedStatus: number;
}

/**
 * A repository as handed over by the config collaborator: validated, with
 * `${ENV}` references and project-level defaults already resolved.
 */
export interface RepositoryConfig {
  name: string;
  url: string;
  branch: string;
  // Subdirectory holding the compose file, relative to localPath
  path: string;
  localPath: string;
  checkInterval: number;
  priority: number;
  // Names of repositories in the same project, or `project/name`
  dependsOn: string[];
  envFile: string | null;
  token: string | null;
  notifications: { success: string[]; failure: string[] };
  healthcheck: HealthcheckConfig | null;
}

export interface ProjectConfig {
  name: string;
  repositories: RepositoryConfig[];
}

const nameSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"');

const textSchema = z.string({ invalid_type_error: 'must be a string' }).min(1, 'must not be empty');

// Empty when it names an unset `${VAR}`
const tokenSchema = z.string({ invalid_type_error: 'must be a string' }).nullish();

const integerSchema = z.number({ invalid_type_error: 'must be an integer' }).int('must be an integer');

const stringListSchema = z.array(z.string({ invalid_type_error: 'must be a string' }), {
  invalid_type_error: 'must be a list of strings',
});

const notificationsSchema = z
  .object({
    success: stringListSchema.optional(),
    failure: stringListSchema.optional(),
  })
  .strict();

const healthcheckSchema = z
  .object({
    url: z.string({ required_error: 'is required' }).url('must be a URL'),
    timeoutSeconds: integerSchema.positive('must be a positive integer').default(60),
    expectedStatus: integerSchema.min(100, 'must be an HTTP status').max(599, 'must be an HTTP status').default(200),
  })
  .strict();

const repositorySchema = z
  .object({
    name: nameSchema,
    url: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }).min(1, 'is required'),
    branch: textSchema.default('main'),
    path: textSchema.default('.'),
    localPath: textSchema.nullish(),
    checkInterval: integerSchema.positive('must be a positive integer').default(300),
    priority: integerSchema.default(0),
    dependsOn: stringListSchema.default([]),
    envFile: textSchema.nullish(),
    token: tokenSchema,
    notifications: notificationsSchema.optional(),
    healthcheck: healthcheckSchema.nullish(),
  })
  .strict();

const projectSchema = z
  .object({
    name: nameSchema,
    // Defaults shared by every repository of the project
    token: tokenSchema,
    notifications: notificationsSchema.optional(),
    repositories: z.array(repositorySchema, {
      required_error: 'is required',
      invalid_type_error: 'must be a list',
    }),
  })
  .strict();

const projectListSchema = z.array(projectSchema, { invalid_type_error: 'must be a list of projects' });

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path
    .map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`))
    .join('');
  return `projects${location} ${issue.message}`;
}

// Repository targets first, then the project's, without repeats
function mergeUrls(own: string[] | undefined, shared: string[] | undefined): string[] {
  return [...new Set([...(own ?? []), ...(shared ?? [])])];
}

/**
 * Validates the resolved project document, `{ "projects": [...] }` or a bare
 * array, into typed configs. Repositories without `localPath` deploy under
 * `<deploymentsRoot>/<project>/<name>`. A project's `token` applies to
 * repositories without their own, and its notification targets are added to
 * every repository's.
 */
export function parseProjects(raw: unknown, deploymentsRoot: string): ProjectConfig[] {
  const document = typeof raw === 'object' && raw !== null && !Array.isArray(raw) && 'projects' in raw ? raw.projects : raw;
  const result = projectListSchema.safeParse(document);
  if (!result.success) {
    throw new Error(`Invalid project config: ${result.error.issues.map(formatIssue).join('; ')}`);
  }

  return result.data.map((project) => ({
    name: project.name,
    repositories: project.repositories.map(
      (repository): RepositoryConfig => ({
        name: repository.name,
        url: repository.url,
        branch: repository.branch,
        path: repository.path,
        localPath: repository.localPath ?? path.join(deploymentsRoot, project.name, repository.name),
        checkInterval: repository.checkInterval,
        priority: repository.priority,
        dependsOn: repository.dependsOn,
        envFile: repository.envFile ?? null,
        token: repository.token || project.token || null,
        notifications: {
          success: mergeUrls(repository.notifications?.success, project.notifications?.success),
          failure: mergeUrls(repository.notifications?.failure, project.notifications?.failure),
        },
        healthcheck: repository.healthcheck ?? null,
      }),
    ),
  }));
}

/**
 * Replaces `${NAME}` with the environment value, or nothing when unset.
 */
export function resolveEnvReferences(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{(\w+)\}/g, (_match, name: string) => env[name] ?? '');
}

export async function loadProjectsFile(
  file: string,
  deploymentsRoot: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ProjectConfig[]> {
  const text = await fs.readFile(file, 'utf-8');
  const raw: unknown = JSON.parse(resolveEnvReferences(text, env));
  return parseProjects(raw, deploymentsRoot);
}
