import Database from 'better-sqlite3';
import { promises as fs } from 'fs';
import path from 'path';
import type {
  Deployment,
  DeploymentStatus,
  Project,
  Repository,
  RepositoryRow,
  TriggerReason,
} from './models';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS projects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS repositories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_id INTEGER NOT NULL,
    name TEXT NOT NULL,
    git_url TEXT NOT NULL,
    branch TEXT NOT NULL DEFAULT 'main',
    path TEXT NOT NULL DEFAULT '.',
    local_path TEXT UNIQUE NOT NULL,
    check_interval INTEGER NOT NULL DEFAULT 300,
    priority INTEGER NOT NULL DEFAULT 0,
    env_file TEXT,
    token TEXT,
    last_commit_hash TEXT,
    notify_success TEXT NOT NULL DEFAULT '[]',
    notify_failure TEXT NOT NULL DEFAULT '[]',
    healthcheck_url TEXT,
    healthcheck_timeout INTEGER NOT NULL DEFAULT 60,
    healthcheck_expected_status INTEGER NOT NULL DEFAULT 200,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (project_id) REFERENCES projects (id) ON DELETE RESTRICT,
    UNIQUE(project_id, name)
  );

  CREATE TABLE IF NOT EXISTS repository_dependencies (
    repository_id INTEGER NOT NULL,
    depends_on_id INTEGER NOT NULL,
    PRIMARY KEY (repository_id, depends_on_id),
    FOREIGN KEY (repository_id) REFERENCES repositories (id) ON DELETE CASCADE,
    FOREIGN KEY (depends_on_id) REFERENCES repositories (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS deployments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    repository_id INTEGER NOT NULL,
    commit_hash TEXT,
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'running', 'success', 'failed')),
    reason TEXT NOT NULL DEFAULT 'manual' CHECK (reason IN ('poll', 'manual')),
    log TEXT NOT NULL DEFAULT '',
    started_at DATETIME,
    finished_at DATETIME,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (repository_id) REFERENCES repositories (id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_deployments_repository ON deployments (repository_id, id);
`;

/**
 * Opens (or creates) the SQLite database and applies the schema. Pass
 * `':memory:'` for a throwaway database.
 */
export async function openDatabase(filename: string): Promise<Database.Database> {
  if (filename !== ':memory:') {
    await fs.mkdir(path.dirname(filename), { recursive: true });
  }
  const db = new Database(filename);

  // Enable foreign keys
  db.pragma('foreign_keys = ON');
  if (filename !== ':memory:') {
    // Readers (socket handlers) must not block the deploying worker
    db.pragma('journal_mode = WAL');
  }

  db.exec(SCHEMA);
  return db;
}

type RepositoryJoinRow = RepositoryRow & { project_name: string };

export interface RepositoryInput {
  project_id: number;
  name: string;
  git_url: string;
  branch: string;
  path: string;
  local_path: string;
  check_interval: number;
  priority: number;
  env_file: string | null;
  token: string | null;
  notify_success: string[];
  notify_failure: string[];
  healthcheck_url: string | null;
  healthcheck_timeout: number;
  healthcheck_expected_status: number;
}

export function parseUrlList(text: string): string[] {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return [];
  }
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

const REPOSITORY_SELECT = `
  SELECT r.*, p.name AS project_name
  FROM repositories r
  JOIN projects p ON p.id = r.project_id
`;

// Helper functions for database operations
export function createDbHelpers(db: Database.Database) {
  const now = () => new Date().toISOString();

  const getRepositoryDependencies = (repositoryId: number): number[] =>
    db
      .prepare<[number], { depends_on_id: number }>(
        'SELECT depends_on_id FROM repository_dependencies WHERE repository_id = ? ORDER BY depends_on_id',
      )
      .all(repositoryId)
      .map((row) => row.depends_on_id);

  const toRepository = (row: RepositoryJoinRow): Repository => ({
    id: row.id,
    project_id: row.project_id,
    project_name: row.project_name,
    name: row.name,
    git_url: row.git_url,
    branch: row.branch,
    path: row.path,
    local_path: row.local_path,
    check_interval: row.check_interval,
    priority: row.priority,
    env_file: row.env_file,
    token: row.token,
    last_commit_hash: row.last_commit_hash,
    depends_on: getRepositoryDependencies(row.id),
    notifications: {
      success: parseUrlList(row.notify_success),
      failure: parseUrlList(row.notify_failure),
    },
    healthcheck_url: row.healthcheck_url,
    healthcheck_timeout: row.healthcheck_timeout,
    healthcheck_expected_status: row.healthcheck_expected_status,
  });

  const finishDeployment = (id: number, status: 'success' | 'failed') =>
    db
      .prepare<[DeploymentStatus, string, number]>(
        'UPDATE deployments SET status = ?, finished_at = ? WHERE id = ?',
      )
      .run(status, now(), id);

  const setLastCommitHash = (repositoryId: number, hash: string | null) =>
    db
      .prepare<[string | null, string, number]>(
        'UPDATE repositories SET last_commit_hash = ?, updated_at = ? WHERE id = ?',
      )
      .run(hash, now(), repositoryId);

  const setDeploymentCommit = (id: number, hash: string) =>
    db.prepare<[string, number]>('UPDATE deployments SET commit_hash = ? WHERE id = ?').run(hash, id);

  const completeSuccessfulDeployment = db.transaction(
    (id: number, repositoryId: number, hash: string) => {
      setDeploymentCommit(id, hash);
      finishDeployment(id, 'success');
      setLastCommitHash(repositoryId, hash);
    },
  );

  return {
    // Projects
    getAllProjects: () =>
      db.prepare<[], Project>('SELECT * FROM projects ORDER BY name').all(),

    getProjectByName: (name: string) =>
      db.prepare<[string], Project>('SELECT * FROM projects WHERE name = ?').get(name),

    createProject: (name: string): number =>
      Number(db.prepare<[string]>('INSERT INTO projects (name) VALUES (?)').run(name).lastInsertRowid),

    countProjectRepositories: (projectId: number): number =>
      db
        .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM repositories WHERE project_id = ?')
        .get(projectId)?.count ?? 0,

    deleteProject: (id: number) =>
      db.prepare<[number]>('DELETE FROM projects WHERE id = ?').run(id),

    // Repositories
    getRepository: (id: number): Repository | undefined => {
      const row = db.prepare<[number], RepositoryJoinRow>(`${REPOSITORY_SELECT} WHERE r.id = ?`).get(id);
      return row ? toRepository(row) : undefined;
    },

    getAllRepositories: (): Repository[] =>
      db
        .prepare<[], RepositoryJoinRow>(`${REPOSITORY_SELECT} ORDER BY p.name, r.name`)
        .all()
        .map(toRepository),

    getProjectRepositories: (projectId: number) =>
      db
        .prepare<[number], RepositoryRow>('SELECT * FROM repositories WHERE project_id = ? ORDER BY name')
        .all(projectId),

    createRepository: (input: RepositoryInput): number =>
      Number(
        db
          .prepare(
            `INSERT INTO repositories (
              project_id, name, git_url, branch, path, local_path, check_interval,
              priority, env_file, token, notify_success, notify_failure,
              healthcheck_url, healthcheck_timeout, healthcheck_expected_status
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            input.project_id,
            input.name,
            input.git_url,
            input.branch,
            input.path,
            input.local_path,
            input.check_interval,
            input.priority,
            input.env_file,
            input.token,
            JSON.stringify(input.notify_success),
            JSON.stringify(input.notify_failure),
            input.healthcheck_url,
            input.healthcheck_timeout,
            input.healthcheck_expected_status,
          ).lastInsertRowid,
      ),

    updateRepository: (id: number, input: Omit<RepositoryInput, 'project_id' | 'name'>) =>
      db
        .prepare(
          `UPDATE repositories SET
            git_url = ?, branch = ?, path = ?, local_path = ?, check_interval = ?, priority = ?,
            env_file = ?, token = ?, notify_success = ?, notify_failure = ?,
            healthcheck_url = ?, healthcheck_timeout = ?, healthcheck_expected_status = ?, updated_at = ?
          WHERE id = ?`,
        )
        .run(
          input.git_url,
          input.branch,
          input.path,
          input.local_path,
          input.check_interval,
          input.priority,
          input.env_file,
          input.token,
          JSON.stringify(input.notify_success),
          JSON.stringify(input.notify_failure),
          input.healthcheck_url,
          input.healthcheck_timeout,
          input.healthcheck_expected_status,
          now(),
          id,
        ),

    deleteRepository: (id: number) =>
      db.prepare<[number]>('DELETE FROM repositories WHERE id = ?').run(id),

    getRepositoryDependencies,

    setRepositoryDependencies: db.transaction((repositoryId: number, dependsOn: number[]) => {
      db.prepare<[number]>('DELETE FROM repository_dependencies WHERE repository_id = ?').run(repositoryId);
      const insert = db.prepare<[number, number]>(
        'INSERT OR IGNORE INTO repository_dependencies (repository_id, depends_on_id) VALUES (?, ?)',
      );
      for (const dependencyId of dependsOn) {
        insert.run(repositoryId, dependencyId);
      }
    }),

    setLastCommitHash,

    // Deployments
    createDeployment: (repositoryId: number, reason: TriggerReason): number =>
      Number(
        db
          .prepare<[number, TriggerReason]>('INSERT INTO deployments (repository_id, reason) VALUES (?, ?)')
          .run(repositoryId, reason).lastInsertRowid,
      ),

    markDeploymentRunning: (id: number) =>
      db
        .prepare<[string, number]>(
          "UPDATE deployments SET status = 'running', started_at = ? WHERE id = ? AND status = 'pending'",
        )
        .run(now(), id),

    setDeploymentCommit,

    // Append-only; readers may see the log grow while the deployment runs
    appendDeploymentLog: (id: number, text: string) =>
      db.prepare<[string, number]>('UPDATE deployments SET log = log || ? WHERE id = ?').run(text, id),

    finishDeployment,

    completeSuccessfulDeployment: (id: number, repositoryId: number, hash: string) =>
      completeSuccessfulDeployment(id, repositoryId, hash),

    getDeployment: (id: number) =>
      db.prepare<[number], Deployment>('SELECT * FROM deployments WHERE id = ?').get(id),

    getLatestDeployment: (repositoryId: number) =>
      db
        .prepare<[number], Deployment>(
          'SELECT * FROM deployments WHERE repository_id = ? ORDER BY id DESC LIMIT 1',
        )
        .get(repositoryId),

    getDeployments: (options: { repositoryId?: number; limit?: number } = {}) => {
      const limit = options.limit ?? 50;
      if (options.repositoryId !== undefined) {
        return db
          .prepare<[number, number], Deployment>(
            'SELECT * FROM deployments WHERE repository_id = ? ORDER BY id DESC LIMIT ?',
          )
          .all(options.repositoryId, limit);
      }
      return db.prepare<[number], Deployment>('SELECT * FROM deployments ORDER BY id DESC LIMIT ?').all(limit);
    },

    // Deployments left unfinished by a previous process can never complete
    failInterruptedDeployments: (): number =>
      db
        .prepare<[string, string]>(
          `UPDATE deployments
           SET status = 'failed', finished_at = ?, log = log || ?
           WHERE status IN ('pending', 'running')`,
        )
        .run(now(), 'Interrupted: the orchestrator restarted before this deployment finished\n').changes,
  };
}

export type DbHelpers = ReturnType<typeof createDbHelpers>;
