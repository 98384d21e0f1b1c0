import Database from 'better-sqlite3';
import { beforeEach, describe, expect, it } from 'vitest';
import { createDbHelpers, DbHelpers, openDatabase, parseUrlList } from '../lib/db';
import { seedRepository } from './fakes';

describe('database helpers', () => {
  let raw: Database.Database;
  let db: DbHelpers;

  beforeEach(async () => {
    raw = await openDatabase(':memory:');
    db = createDbHelpers(raw);
  });

  it('decodes repositories with their project, dependencies and notification targets', () => {
    const database = seedRepository(db, 'shop', 'database');
    const api = seedRepository(db, 'shop', 'api', {
      token: 'test-token',
      notify_success: ['generic://hooks.example.com/ok'],
    });
    db.setRepositoryDependencies(api, [database, database]);

    expect(db.getRepository(api)).toEqual({
      id: api,
      project_id: db.getProjectByName('shop')?.id,
      project_name: 'shop',
      name: 'api',
      git_url: 'https://git.example.com/shop/api.git',
      branch: 'main',
      path: '.',
      local_path: '/nonexistent/stackpilot-test/shop/api',
      check_interval: 60,
      priority: 0,
      env_file: null,
      token: 'test-token',
      last_commit_hash: null,
      depends_on: [database],
      notifications: { success: ['generic://hooks.example.com/ok'], failure: [] },
      healthcheck_url: null,
      healthcheck_timeout: 60,
      healthcheck_expected_status: 200,
    });
    expect(db.getAllRepositories().map((r) => r.name)).toEqual(['api', 'database']);
  });

  it('enforces unique local paths', () => {
    seedRepository(db, 'shop', 'api', { local_path: '/srv/shared' });
    expect(() => seedRepository(db, 'blog', 'site', { local_path: '/srv/shared' })).toThrow(/UNIQUE/);
  });

  it('walks a deployment from pending to success and advances the hash in one step', () => {
    const api = seedRepository(db, 'shop', 'api');
    const id = db.createDeployment(api, 'poll');
    expect(db.getDeployment(id)).toMatchObject({ status: 'pending', reason: 'poll', log: '', started_at: null });

    db.markDeploymentRunning(id);
    db.appendDeploymentLog(id, 'one\n');
    db.appendDeploymentLog(id, 'two\n');
    db.completeSuccessfulDeployment(id, api, 'abc123');

    const deployment = db.getDeployment(id);
    expect(deployment).toMatchObject({ status: 'success', commit_hash: 'abc123', log: 'one\ntwo\n' });
    expect(deployment?.started_at).not.toBeNull();
    expect(deployment?.finished_at).not.toBeNull();
    expect(db.getRepository(api)?.last_commit_hash).toBe('abc123');
  });

  it('only starts pending deployments', () => {
    const api = seedRepository(db, 'shop', 'api');
    const id = db.createDeployment(api, 'manual');
    db.finishDeployment(id, 'failed');

    expect(db.markDeploymentRunning(id).changes).toBe(0);
    expect(db.getDeployment(id)?.status).toBe('failed');
  });

  it('rejects statuses outside the lifecycle', () => {
    const api = seedRepository(db, 'shop', 'api');
    const id = db.createDeployment(api, 'manual');
    expect(() => raw.prepare("UPDATE deployments SET status = 'cancelled' WHERE id = ?").run(id)).toThrow(/CHECK/);
  });

  it('lists deployments newest first, per repository and limited', () => {
    const api = seedRepository(db, 'shop', 'api');
    const web = seedRepository(db, 'shop', 'web');
    const first = db.createDeployment(api, 'poll');
    const second = db.createDeployment(web, 'poll');
    const third = db.createDeployment(api, 'manual');

    expect(db.getDeployments().map((d) => d.id)).toEqual([third, second, first]);
    expect(db.getDeployments({ repositoryId: api }).map((d) => d.id)).toEqual([third, first]);
    expect(db.getDeployments({ limit: 1 }).map((d) => d.id)).toEqual([third]);
    expect(db.getLatestDeployment(api)?.id).toBe(third);
  });

  it('fails deployments left unfinished by a previous process', () => {
    const api = seedRepository(db, 'shop', 'api');
    const pending = db.createDeployment(api, 'poll');
    const running = db.createDeployment(api, 'poll');
    db.markDeploymentRunning(running);
    db.appendDeploymentLog(running, 'Starting containers in .\n');
    const done = db.createDeployment(api, 'poll');
    db.finishDeployment(done, 'success');

    expect(db.failInterruptedDeployments()).toBe(2);

    expect(db.getDeployment(pending)?.status).toBe('failed');
    expect(db.getDeployment(running)).toMatchObject({
      status: 'failed',
      log: 'Starting containers in .\nInterrupted: the orchestrator restarted before this deployment finished\n',
    });
    expect(db.getDeployment(done)?.status).toBe('success');
  });

  it('deletes deployment history with the repository', () => {
    const api = seedRepository(db, 'shop', 'api');
    db.createDeployment(api, 'poll');
    db.deleteRepository(api);

    expect(db.getDeployments()).toEqual([]);
    expect(db.countProjectRepositories(db.getProjectByName('shop')?.id ?? 0)).toBe(0);
  });
});

describe('parseUrlList', () => {
  it('keeps string entries of a JSON list', () => {
    expect(parseUrlList('["a://x", 3, "b://y"]')).toEqual(['a://x', 'b://y']);
    expect(parseUrlList('{"a": 1}')).toEqual([]);
    expect(parseUrlList('not json')).toEqual([]);
  });
});
