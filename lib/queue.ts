import type { DbHelpers } from './db';
import { NotFoundError, errorMessage } from './errors';
import { createLogger } from './logging';
import type { Deployment, DeploymentRequest } from './models';

const logger = createLogger('queue');

export type ConcurrencyPolicy = { mode: 'sequential' } | { mode: 'parallel'; maxWorkers: number };

export type EnqueueResult =
  | { outcome: 'accepted' }
  | { outcome: 'superseded' }
  | { outcome: 'rejected'; reason: 'stopped' };

/**
 * Executes one admitted request. `DeploymentRunner` is the production one.
 */
export interface DeploymentExecutor {
  run(request: DeploymentRequest): Promise<Deployment>;
}

interface Candidate {
  request: DeploymentRequest;
  projectId: number;
  // FIFO tie-breaker; kept when a newer request supersedes this one
  sequence: number;
}

export interface PendingEntry {
  repositoryId: number;
  projectId: number;
  reason: DeploymentRequest['reason'];
  priority: number;
  enqueuedAt: number;
  ready: boolean;
}

export interface QueueSnapshot {
  pending: PendingEntry[];
  running: number[];
}

type QueueState = 'idle' | 'running' | 'stopping' | 'stopped';

/**
 * Priority queue of deployment requests with per-project mutual exclusion and
 * dependency gating.
 *
 * A candidate is ready when no deployment runs in its project and every
 * repository it depends on last deployed successfully. Readiness comes first:
 * priority (then enqueue order) only ranks candidates that are ready at the same
 * time, so a blocked high-priority request never holds back a ready one.
 *
 * All admission decisions go through `pump()`, which runs on every enqueue,
 * start and completion.
 */
export class DeploymentQueue {
  private candidates: Map<number, Candidate> = new Map();
  private running: Map<number, number> = new Map(); // repositoryId -> projectId
  private lockedProjects: Set<number> = new Set();
  private inFlight: Set<Promise<void>> = new Set();
  private idleWaiters: Array<() => void> = [];
  private sequence = 0;
  private maxWorkers = 0;
  private state: QueueState = 'idle';

  constructor(
    private db: DbHelpers,
    private executor: DeploymentExecutor,
  ) {}

  /**
   * Adds a request. A request still pending for the same repository is
   * superseded: it keeps its place in line, takes the new reason and the
   * higher of the two priorities. While the repository is
   * deploying, one request may wait behind it.
   */
  enqueue(request: DeploymentRequest): EnqueueResult {
    if (this.state === 'stopping' || this.state === 'stopped') {
      logger.debug(`Rejected request for repository ${request.repositoryId}: queue stopped`);
      return { outcome: 'rejected', reason: 'stopped' };
    }

    const existing = this.candidates.get(request.repositoryId);
    if (existing) {
      existing.request = {
        ...request,
        priority: Math.max(existing.request.priority, request.priority),
      };
      logger.debug(`Request for repository ${request.repositoryId} superseded a pending one`);
      return { outcome: 'superseded' };
    }

    const repository = this.db.getRepository(request.repositoryId);
    if (!repository) {
      throw NotFoundError.repository(request.repositoryId);
    }

    this.candidates.set(request.repositoryId, {
      request,
      projectId: repository.project_id,
      sequence: this.sequence++,
    });
    logger.debug(
      `Enqueued repository ${repository.name} (${request.reason}, priority ${request.priority})`,
    );
    this.pump();
    return { outcome: 'accepted' };
  }

  start(policy: ConcurrencyPolicy): void {
    if (this.state !== 'idle') {
      throw new Error(`Queue cannot start from state ${this.state}`);
    }
    const workers = policy.mode === 'sequential' ? 1 : policy.maxWorkers;
    if (!Number.isInteger(workers) || workers < 1) {
      throw new Error(`maxWorkers must be a positive integer, got ${workers}`);
    }

    this.maxWorkers = workers;
    this.state = 'running';
    logger.info(`Deployment queue started (${policy.mode}, ${workers} worker${workers === 1 ? '' : 's'})`);
    this.pump();
  }

  /**
   * Stops admitting work and resolves once in-flight deployments finish.
   * Running steps are never interrupted; pending requests are dropped.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return;
    this.state = 'stopping';

    if (this.candidates.size > 0) {
      logger.info(`Dropping ${this.candidates.size} pending deployment request(s)`);
      this.candidates.clear();
    }
    if (this.inFlight.size > 0) {
      logger.info(`Waiting for ${this.inFlight.size} running deployment(s) to finish`);
      await Promise.all([...this.inFlight]);
    }

    this.state = 'stopped';
    logger.info('Deployment queue stopped');
  }

  /**
   * Resolves once nothing is running. Candidates blocked on a dependency may
   * still be pending.
   */
  whenIdle(): Promise<void> {
    if (this.inFlight.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  isRunning(repositoryId: number): boolean {
    return this.running.has(repositoryId);
  }

  isPending(repositoryId: number): boolean {
    return this.candidates.has(repositoryId);
  }

  snapshot(): QueueSnapshot {
    return {
      pending: this.ordered().map((candidate) => ({
        repositoryId: candidate.request.repositoryId,
        projectId: candidate.projectId,
        reason: candidate.request.reason,
        priority: candidate.request.priority,
        enqueuedAt: candidate.request.enqueuedAt,
        ready: this.isReady(candidate),
      })),
      running: [...this.running.keys()],
    };
  }

  private ordered(): Candidate[] {
    return [...this.candidates.values()].sort(
      (a, b) => b.request.priority - a.request.priority || a.sequence - b.sequence,
    );
  }

  private isReady(candidate: Candidate): boolean {
    if (this.lockedProjects.has(candidate.projectId)) {
      return false;
    }
    return this.db
      .getRepositoryDependencies(candidate.request.repositoryId)
      .every((dependencyId) => this.db.getLatestDeployment(dependencyId)?.status === 'success');
  }

  private pump(): void {
    if (this.state !== 'running') return;

    while (this.inFlight.size < this.maxWorkers) {
      const next = this.ordered().find((candidate) => this.isReady(candidate));
      if (!next) return;
      this.dispatch(next);
    }
  }

  private dispatch(candidate: Candidate): void {
    const { repositoryId } = candidate.request;
    this.candidates.delete(repositoryId);
    this.lockedProjects.add(candidate.projectId);
    this.running.set(repositoryId, candidate.projectId);

    const task: Promise<void> = this.execute(candidate).finally(() => {
      this.inFlight.delete(task);
      this.pump();
      if (this.inFlight.size === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    });
    this.inFlight.add(task);
  }

  private async execute(candidate: Candidate): Promise<void> {
    const { repositoryId } = candidate.request;
    try {
      await this.executor.run(candidate.request);
    } catch (error) {
      logger.error(`Deployment of repository ${repositoryId} aborted:`, errorMessage(error));
    } finally {
      // Released whatever the outcome
      this.running.delete(repositoryId);
      this.lockedProjects.delete(candidate.projectId);
    }
  }
}
