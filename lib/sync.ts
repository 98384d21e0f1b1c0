import path from 'path';
import type { ProjectConfig, RepositoryConfig } from './config';
import type { DbHelpers, RepositoryInput } from './db';
import { errorMessage } from './errors';
import { createLogger } from './logging';

const logger = createLogger('sync');

export interface SyncResult {
  created: number[];
  updated: number[];
  removed: number[];
  // Repositories whose URL or branch changed; their deployed hash was cleared
  hashResets: number[];
  // `project/name` of config entries that were not applied
  skipped: string[];
  removedProjects: string[];
}

interface Candidate {
  key: string;
  project: string;
  config: RepositoryConfig;
  localPath: string;
}

function escapesCheckout(localPath: string, subPath: string): boolean {
  const relative = path.relative(localPath, path.resolve(localPath, subPath));
  return relative.startsWith('..') || path.isAbsolute(relative);
}

/**
 * Applies the project config to the database. The database ends up holding
 * exactly the accepted entries: repositories missing from the config are
 * deleted (with their deployment history), and so are projects left empty.
 *
 * Entries are rejected with a warning when their compose path leaves the
 * checkout or their local path is already taken; repositories that already
 * exist claim their paths before new ones do.
 */
export function syncProjects(db: DbHelpers, projects: ProjectConfig[]): SyncResult {
  const result: SyncResult = {
    created: [],
    updated: [],
    removed: [],
    hashResets: [],
    skipped: [],
    removedProjects: [],
  };

  const existingKeys = new Set(db.getAllRepositories().map((repo) => `${repo.project_name}/${repo.name}`));
  const seen = new Set<string>();
  const all: Candidate[] = [];
  for (const project of projects) {
    for (const config of project.repositories) {
      const key = `${project.name}/${config.name}`;
      if (seen.has(key)) {
        logger.warn(`${key} is configured more than once, keeping the first entry`);
        continue;
      }
      seen.add(key);
      all.push({ key, project: project.name, config, localPath: path.resolve(config.localPath) });
    }
  }
  // Stable: existing repositories first
  const ordered = [
    ...all.filter((candidate) => existingKeys.has(candidate.key)),
    ...all.filter((candidate) => !existingKeys.has(candidate.key)),
  ];

  const accepted: Candidate[] = [];
  const pathOwners = new Map<string, string>();
  for (const candidate of ordered) {
    const owner = pathOwners.get(candidate.localPath);
    if (owner) {
      logger.warn(`Skipping ${candidate.key}: local path ${candidate.localPath} is already used by ${owner}`);
      result.skipped.push(candidate.key);
      continue;
    }
    if (escapesCheckout(candidate.localPath, candidate.config.path)) {
      logger.warn(`Skipping ${candidate.key}: path "${candidate.config.path}" leaves the checkout`);
      result.skipped.push(candidate.key);
      continue;
    }
    pathOwners.set(candidate.localPath, candidate.key);
    accepted.push(candidate);
  }

  // Remove first so that freed local paths can be reused below
  const acceptedKeys = new Set(accepted.map((candidate) => candidate.key));
  for (const repo of db.getAllRepositories()) {
    if (!acceptedKeys.has(`${repo.project_name}/${repo.name}`)) {
      db.deleteRepository(repo.id);
      result.removed.push(repo.id);
      logger.info(`Removed repository ${repo.project_name}/${repo.name}`);
    }
  }

  const ids = new Map<string, number>();
  for (const candidate of accepted) {
    const { config } = candidate;
    const projectId = db.getProjectByName(candidate.project)?.id ?? db.createProject(candidate.project);
    const input: RepositoryInput = {
      project_id: projectId,
      name: config.name,
      git_url: config.url,
      branch: config.branch,
      path: config.path,
      local_path: candidate.localPath,
      check_interval: config.checkInterval,
      priority: config.priority,
      env_file: config.envFile,
      token: config.token,
      notify_success: config.notifications.success,
      notify_failure: config.notifications.failure,
      healthcheck_url: config.healthcheck?.url ?? null,
      healthcheck_timeout: config.healthcheck?.timeoutSeconds ?? 60,
      healthcheck_expected_status: config.healthcheck?.expectedStatus ?? 200,
    };

    try {
      const existing = db.getProjectRepositories(projectId).find((row) => row.name === config.name);
      if (existing) {
        db.updateRepository(existing.id, input);
        if (existing.git_url !== config.url || existing.branch !== config.branch) {
          db.setLastCommitHash(existing.id, null);
          result.hashResets.push(existing.id);
          logger.info(`${candidate.key}: URL or branch changed, next poll redeploys`);
        }
        result.updated.push(existing.id);
        ids.set(candidate.key, existing.id);
      } else {
        const id = db.createRepository(input);
        result.created.push(id);
        ids.set(candidate.key, id);
        logger.info(`Added repository ${candidate.key}`);
      }
    } catch (error) {
      logger.warn(`Skipping ${candidate.key}:`, errorMessage(error));
      result.skipped.push(candidate.key);
    }
  }

  applyDependencies(db, accepted, ids);

  for (const project of db.getAllProjects()) {
    if (db.countProjectRepositories(project.id) === 0) {
      db.deleteProject(project.id);
      result.removedProjects.push(project.name);
      logger.info(`Removed empty project ${project.name}`);
    }
  }

  return result;
}

function applyDependencies(db: DbHelpers, accepted: Candidate[], ids: Map<string, number>) {
  const edges = new Map<number, number[]>();

  const reaches = (from: number, target: number): boolean => {
    const stack = [from];
    const visited = new Set<number>();
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      if (current === target) return true;
      visited.add(current);
      stack.push(...(edges.get(current) ?? []));
    }
    return false;
  };

  for (const candidate of accepted) {
    const id = ids.get(candidate.key);
    if (id === undefined) continue;

    const resolved: number[] = [];
    edges.set(id, resolved);
    for (const name of candidate.config.dependsOn) {
      const key = name.includes('/') ? name : `${candidate.project}/${name}`;
      const dependencyId = ids.get(key);
      if (dependencyId === undefined) {
        logger.warn(`${candidate.key}: unknown dependency "${name}" ignored`);
      } else if (dependencyId === id || reaches(dependencyId, id)) {
        logger.warn(`${candidate.key}: dependency on ${key} would form a cycle, ignored`);
      } else if (!resolved.includes(dependencyId)) {
        resolved.push(dependencyId);
      }
    }
  }

  for (const [id, dependsOn] of edges) {
    db.setRepositoryDependencies(id, dependsOn);
  }
}
