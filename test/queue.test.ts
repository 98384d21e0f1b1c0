import { beforeEach, describe, expect, it } from 'vitest';
import type { DbHelpers } from '../lib/db';
import { NotFoundError } from '../lib/errors';
import type { Deployment, DeploymentRequest } from '../lib/models';
import { DeploymentExecutor, DeploymentQueue } from '../lib/queue';
import { Gate, createTestDb, flush, seedRepository } from './fakes';

/**
 * Records deployments like the real runner, but finishes each one only when
 * its repository's gate opens.
 */
class ScriptedExecutor implements DeploymentExecutor {
  started: number[] = [];
  gates: Map<number, Gate> = new Map();
  outcomes: Map<number, 'success' | 'failed'> = new Map();
  throwFor: Set<number> = new Set();
  active = 0;
  maxActive = 0;

  constructor(private db: DbHelpers) {}

  hold(repositoryId: number): Gate {
    const gate = new Gate();
    this.gates.set(repositoryId, gate);
    return gate;
  }

  async run(request: DeploymentRequest): Promise<Deployment> {
    this.started.push(request.repositoryId);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.throwFor.has(request.repositoryId)) {
        throw new Error('executor crashed');
      }
      const id = this.db.createDeployment(request.repositoryId, request.reason);
      this.db.markDeploymentRunning(id);
      await this.gates.get(request.repositoryId)?.promise;
      this.db.finishDeployment(id, this.outcomes.get(request.repositoryId) ?? 'success');
      const deployment = this.db.getDeployment(id);
      if (!deployment) throw new Error(`deployment ${id} vanished`);
      return deployment;
    } finally {
      this.active--;
    }
  }
}

const request = (repositoryId: number, priority = 0): DeploymentRequest => ({
  repositoryId,
  reason: 'poll',
  priority,
  enqueuedAt: Date.now(),
});

describe('DeploymentQueue', () => {
  let db: DbHelpers;
  let executor: ScriptedExecutor;
  let queue: DeploymentQueue;

  beforeEach(async () => {
    db = await createTestDb();
    executor = new ScriptedExecutor(db);
    queue = new DeploymentQueue(db, executor);
  });

  it('never runs the same repository twice at once and keeps one request behind it', async () => {
    const api = seedRepository(db, 'shop', 'api');
    const gate = executor.hold(api);
    queue.start({ mode: 'parallel', maxWorkers: 4 });

    expect(queue.enqueue(request(api))).toEqual({ outcome: 'accepted' });
    expect(queue.isRunning(api)).toBe(true);

    expect(queue.enqueue(request(api))).toEqual({ outcome: 'accepted' });
    expect(queue.enqueue(request(api))).toEqual({ outcome: 'superseded' });
    expect(queue.isPending(api)).toBe(true);
    expect(executor.started).toEqual([api]);

    gate.open();
    await flush();
    await queue.whenIdle();

    expect(executor.started).toEqual([api, api]);
    expect(executor.maxActive).toBe(1);
    expect(queue.isPending(api)).toBe(false);
  });

  it('runs at most one deployment per project while other projects proceed', async () => {
    const web = seedRepository(db, 'alpha', 'web');
    const worker = seedRepository(db, 'alpha', 'worker');
    const site = seedRepository(db, 'beta', 'site');
    const webGate = executor.hold(web);
    const siteGate = executor.hold(site);
    queue.start({ mode: 'parallel', maxWorkers: 4 });

    queue.enqueue(request(web));
    queue.enqueue(request(worker));
    queue.enqueue(request(site));

    expect(executor.started).toEqual([web, site]);
    expect(queue.snapshot()).toEqual({
      pending: [
        {
          repositoryId: worker,
          projectId: db.getRepository(worker)?.project_id,
          reason: 'poll',
          priority: 0,
          enqueuedAt: expect.any(Number),
          ready: false,
        },
      ],
      running: [web, site],
    });

    webGate.open();
    await flush();
    expect(executor.started).toEqual([web, site, worker]);

    siteGate.open();
    await queue.whenIdle();
    expect(executor.maxActive).toBe(2);
  });

  it('admits a ready low-priority request ahead of a blocked high-priority one', async () => {
    const web = seedRepository(db, 'alpha', 'web');
    const worker = seedRepository(db, 'alpha', 'worker');
    const site = seedRepository(db, 'beta', 'site');
    const webGate = executor.hold(web);
    queue.start({ mode: 'parallel', maxWorkers: 2 });

    queue.enqueue(request(web));
    queue.enqueue(request(worker, 10));
    queue.enqueue(request(site, 0));

    expect(executor.started).toEqual([web, site]);
    expect(queue.isPending(worker)).toBe(true);

    webGate.open();
    await flush();
    await queue.whenIdle();
    expect(executor.started).toEqual([web, site, worker]);
  });

  it('orders ready requests by priority, then by arrival', async () => {
    const blocker = seedRepository(db, 'p0', 'blocker');
    const first = seedRepository(db, 'p1', 'first');
    const second = seedRepository(db, 'p2', 'second');
    const urgent = seedRepository(db, 'p3', 'urgent');
    const gate = executor.hold(blocker);
    queue.start({ mode: 'sequential' });

    queue.enqueue(request(blocker));
    queue.enqueue(request(first));
    queue.enqueue(request(second));
    queue.enqueue(request(urgent, 5));

    expect(queue.snapshot().pending.map((entry) => entry.repositoryId)).toEqual([urgent, first, second]);

    gate.open();
    await flush();
    await queue.whenIdle();
    expect(executor.started).toEqual([blocker, urgent, first, second]);
  });

  it('keeps the place in line of a superseded request and raises its priority', async () => {
    const blocker = seedRepository(db, 'p0', 'blocker');
    const a = seedRepository(db, 'p1', 'a');
    const b = seedRepository(db, 'p2', 'b');
    const c = seedRepository(db, 'p3', 'c');
    const gate = executor.hold(blocker);
    queue.start({ mode: 'sequential' });

    queue.enqueue(request(blocker));
    queue.enqueue(request(a));
    queue.enqueue(request(b));
    expect(queue.enqueue(request(a, 0))).toEqual({ outcome: 'superseded' });
    expect(queue.snapshot().pending.map((entry) => entry.repositoryId)).toEqual([a, b]);

    queue.enqueue(request(c, 5));
    expect(queue.enqueue(request(b, 9))).toEqual({ outcome: 'superseded' });
    expect(queue.enqueue(request(b, 1))).toEqual({ outcome: 'superseded' });
    expect(queue.snapshot().pending.map((entry) => [entry.repositoryId, entry.priority])).toEqual([
      [b, 9],
      [c, 5],
      [a, 0],
    ]);

    gate.open();
    await flush();
    await queue.whenIdle();
    expect(executor.started).toEqual([blocker, b, c, a]);
  });

  it('holds a dependent repository until its dependency last succeeded', async () => {
    const database = seedRepository(db, 'shop', 'database');
    const api = seedRepository(db, 'shop-api', 'api');
    db.setRepositoryDependencies(api, [database]);
    queue.start({ mode: 'parallel', maxWorkers: 2 });

    queue.enqueue(request(api));
    expect(executor.started).toEqual([]);
    expect(queue.snapshot().pending[0].ready).toBe(false);

    queue.enqueue(request(database));
    await flush();
    await queue.whenIdle();

    expect(executor.started).toEqual([database, api]);
  });

  it('keeps a dependent repository pending while its dependency fails', async () => {
    const database = seedRepository(db, 'shop', 'database');
    const api = seedRepository(db, 'shop-api', 'api');
    db.setRepositoryDependencies(api, [database]);
    executor.outcomes.set(database, 'failed');
    queue.start({ mode: 'sequential' });

    queue.enqueue(request(api));
    queue.enqueue(request(database));
    await flush();
    await queue.whenIdle();

    expect(executor.started).toEqual([database]);
    expect(queue.isPending(api)).toBe(true);
    expect(db.getLatestDeployment(database)?.status).toBe('failed');
  });

  it('waits for start before admitting anything', async () => {
    const api = seedRepository(db, 'shop', 'api');

    expect(queue.enqueue(request(api))).toEqual({ outcome: 'accepted' });
    expect(executor.started).toEqual([]);

    queue.start({ mode: 'sequential' });
    await queue.whenIdle();
    expect(executor.started).toEqual([api]);
  });

  it('releases the project lock when the executor throws', async () => {
    const web = seedRepository(db, 'alpha', 'web');
    const worker = seedRepository(db, 'alpha', 'worker');
    executor.throwFor.add(web);
    queue.start({ mode: 'parallel', maxWorkers: 2 });

    queue.enqueue(request(web));
    queue.enqueue(request(worker));
    await flush();
    await queue.whenIdle();

    expect(executor.started).toEqual([web, worker]);
    expect(queue.isRunning(web)).toBe(false);
  });

  it('drains running work on stop, drops pending requests and rejects new ones', async () => {
    const web = seedRepository(db, 'alpha', 'web');
    const site = seedRepository(db, 'beta', 'site');
    const gate = executor.hold(web);
    queue.start({ mode: 'sequential' });

    queue.enqueue(request(web));
    queue.enqueue(request(site));

    let stopped = false;
    const stopping = queue.stop().then(() => {
      stopped = true;
    });
    expect(queue.enqueue(request(site))).toEqual({ outcome: 'rejected', reason: 'stopped' });
    expect(queue.isPending(site)).toBe(false);

    await flush();
    expect(stopped).toBe(false);

    gate.open();
    await stopping;
    expect(executor.started).toEqual([web]);
    expect(db.getLatestDeployment(web)?.status).toBe('success');
  });

  it('rejects unknown repositories and invalid policies', () => {
    expect(() => queue.enqueue(request(404))).toThrow(NotFoundError);
    expect(() => queue.start({ mode: 'parallel', maxWorkers: 0 })).toThrow(
      'maxWorkers must be a positive integer, got 0',
    );

    queue.start({ mode: 'sequential' });
    expect(() => queue.start({ mode: 'sequential' })).toThrow('Queue cannot start from state running');
  });
});
