import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { DbHelpers } from '../lib/db';
import { GitError } from '../lib/errors';
import type { DeploymentRequest } from '../lib/models';
import type { EnqueueResult } from '../lib/queue';
import { RepositoryPoller, TaskScheduler } from '../lib/scheduler';
import { FakeGitAdapter, createTestDb, seedRepository } from './fakes';

describe('TaskScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs a task every interval until cancelled', () => {
    const scheduler = new TaskScheduler();
    const fn = vi.fn();

    scheduler.every('job', fn, 1000);
    vi.advanceTimersByTime(3500);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(scheduler.getTimeRemaining('job')).toBe(500);

    expect(scheduler.cancel('job')).toBe(true);
    vi.advanceTimersByTime(5000);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(scheduler.cancel('job')).toBe(false);
    expect(scheduler.getInterval('job')).toBeNull();
  });

  it('replaces a task scheduled under the same id', () => {
    const scheduler = new TaskScheduler();
    const first = vi.fn();
    const second = vi.fn();

    scheduler.every('job', first, 1000);
    scheduler.every('job', second, 2000);
    vi.advanceTimersByTime(2000);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(scheduler.getAllTasks().map(({ id, intervalMs }) => ({ id, intervalMs }))).toEqual([
      { id: 'job', intervalMs: 2000 },
    ]);

    scheduler.cancelAll();
    expect(scheduler.getAllTasks()).toEqual([]);
  });
});

// The poll tick awaits the remote hash before enqueueing
const settle = async () => {
  for (let i = 0; i < 5; i++) await Promise.resolve();
};

describe('RepositoryPoller', () => {
  let db: DbHelpers;
  let git: FakeGitAdapter;
  let scheduler: TaskScheduler;
  let enqueue: Mock<(request: DeploymentRequest) => EnqueueResult>;
  let poller: RepositoryPoller;

  beforeEach(async () => {
    db = await createTestDb();
    git = new FakeGitAdapter();
    scheduler = new TaskScheduler();
    enqueue = vi.fn<(request: DeploymentRequest) => EnqueueResult>(() => ({ outcome: 'accepted' }));
    poller = new RepositoryPoller({ git, enqueue, getRepository: (id) => db.getRepository(id), scheduler });
  });

  afterEach(() => {
    poller.stop();
    vi.useRealTimers();
  });

  it('enqueues a poll request with the repository priority', async () => {
    const id = seedRepository(db, 'shop', 'api', { priority: 3 });
    git.setRemote('https://git.example.com/shop/api.git', 'abc123');

    const result = await poller.tick(id);

    expect(result).toEqual({ outcome: 'accepted' });
    expect(enqueue).toHaveBeenCalledWith({
      repositoryId: id,
      reason: 'poll',
      priority: 3,
      enqueuedAt: expect.any(Number),
    });
  });

  it('still enqueues when the remote cannot be read', async () => {
    const id = seedRepository(db, 'shop', 'api');
    git.remoteError = new GitError('network', 'Could not resolve host');

    await poller.tick(id);

    expect(enqueue).toHaveBeenCalledTimes(1);
    expect(enqueue.mock.calls[0][0]).toMatchObject({ repositoryId: id, reason: 'poll' });
  });

  it('returns null when enqueueing throws', async () => {
    const id = seedRepository(db, 'shop', 'api');
    enqueue.mockImplementation(() => {
      throw new Error('database is locked');
    });

    await expect(poller.tick(id)).resolves.toBeNull();
  });

  it('returns null when the repository cannot be loaded', async () => {
    const failing = new RepositoryPoller({
      git,
      enqueue,
      getRepository: () => {
        throw new Error('database is locked');
      },
      scheduler,
    });

    await expect(failing.tick(7)).resolves.toBeNull();
    expect(enqueue).not.toHaveBeenCalled();
  });

  it('stops watching a repository that no longer exists', async () => {
    const id = seedRepository(db, 'shop', 'api');
    const repository = db.getRepository(id);
    if (!repository) throw new Error('seed failed');
    poller.watch(repository);
    db.deleteRepository(id);

    await expect(poller.tick(id)).resolves.toBeNull();
    expect(scheduler.getInterval(`repo_${id}`)).toBeNull();
    expect(enqueue).not.toHaveBeenCalled();
  });

  it('polls on the check interval and reschedules only when it changes', async () => {
    vi.useFakeTimers();
    const id = seedRepository(db, 'shop', 'api', { check_interval: 30 });
    git.setRemote('https://git.example.com/shop/api.git', 'abc123');
    const repository = db.getRepository(id);
    if (!repository) throw new Error('seed failed');

    poller.watch(repository);
    expect(scheduler.getInterval(`repo_${id}`)).toBe(30_000);

    await vi.advanceTimersByTimeAsync(20_000);
    poller.watch(repository);
    expect(scheduler.getTimeRemaining(`repo_${id}`)).toBe(10_000);

    await vi.advanceTimersByTimeAsync(10_000);
    await settle();
    expect(enqueue).toHaveBeenCalledTimes(1);

    poller.watch({ ...repository, check_interval: 5 });
    expect(scheduler.getInterval(`repo_${id}`)).toBe(5_000);

    expect(poller.unwatch(id)).toBe(true);
    await vi.advanceTimersByTimeAsync(60_000);
    await settle();
    expect(enqueue).toHaveBeenCalledTimes(1);
  });
});
