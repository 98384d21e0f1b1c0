import type { ProjectConfig } from './config';
import type { ContainerAdapter } from './containers';
import type { DbHelpers } from './db';
import { DeploymentListener, DeploymentRunner, RunnerOptions } from './deployment';
import { NotFoundError, errorMessage } from './errors';
import type { GitAdapter } from './git';
import type { HealthChecker } from './healthcheck';
import { createLogger } from './logging';
import type { Deployment, Repository, RepositoryState } from './models';
import type { NotificationTrigger } from './notifications';
import { ConcurrencyPolicy, DeploymentQueue, QueueSnapshot } from './queue';
import { RepositoryPoller, TaskScheduler } from './scheduler';
import type { SecretsAdapter } from './secrets';
import { SyncResult, syncProjects } from './sync';

const logger = createLogger('orchestrator');

const CONFIG_RELOAD_TASK = 'config_reloader';

export type TriggerResult = 'accepted' | 'already-pending' | 'stopped';

export interface OrchestratorDeps {
  db: DbHelpers;
  git: GitAdapter;
  secrets: SecretsAdapter;
  containers: ContainerAdapter;
  notifier: NotificationTrigger;
  options: RunnerOptions;
  health?: HealthChecker;
  scheduler?: TaskScheduler;
}

/**
 * Wires the queue, the deployment runner and the poller together and is the
 * only surface the socket layer talks to.
 */
export class Orchestrator {
  readonly queue: DeploymentQueue;
  private runner: DeploymentRunner;
  private poller: RepositoryPoller;
  private scheduler: TaskScheduler;
  private db: DbHelpers;
  private containers: ContainerAdapter;
  private reloading = false;

  constructor(deps: OrchestratorDeps) {
    this.db = deps.db;
    this.containers = deps.containers;
    this.scheduler = deps.scheduler ?? new TaskScheduler();
    this.runner = new DeploymentRunner(deps);
    this.queue = new DeploymentQueue(deps.db, this.runner);
    this.poller = new RepositoryPoller({
      git: deps.git,
      enqueue: (request) => this.queue.enqueue(request),
      getRepository: (id) => deps.db.getRepository(id),
      scheduler: this.scheduler,
    });
  }

  setListener(listener: DeploymentListener | undefined) {
    this.runner.setListener(listener);
  }

  /**
   * Applies project config and (re)schedules polling to match it.
   */
  sync(projects: ProjectConfig[]): SyncResult {
    const result = syncProjects(this.db, projects);
    for (const id of result.removed) {
      this.poller.unwatch(id);
    }
    for (const repository of this.db.getAllRepositories()) {
      this.poller.watch(repository);
    }
    logger.info(
      `Config synced: ${result.created.length} added, ${result.updated.length} updated, ` +
        `${result.removed.length} removed, ${result.skipped.length} skipped`,
    );
    return result;
  }

  /**
   * Loads and syncs the project config every `intervalMs`. A config that fails
   * to load or validate leaves the current one in place.
   */
  watchConfig(load: () => Promise<ProjectConfig[]>, intervalMs: number) {
    this.scheduler.every(CONFIG_RELOAD_TASK, () => void this.reloadConfig(load), intervalMs);
    logger.info(`Config auto-reload enabled (every ${intervalMs / 1000}s)`);
  }

  async reloadConfig(load: () => Promise<ProjectConfig[]>): Promise<SyncResult | null> {
    if (this.reloading) return null;
    this.reloading = true;
    try {
      return this.sync(await load());
    } catch (error) {
      logger.error('Config reload failed:', errorMessage(error));
      return null;
    } finally {
      this.reloading = false;
    }
  }

  start(policy: ConcurrencyPolicy) {
    const interrupted = this.db.failInterruptedDeployments();
    if (interrupted > 0) {
      logger.warn(`Marked ${interrupted} interrupted deployment(s) as failed`);
    }
    this.queue.start(policy);
  }

  /**
   * Stops polling and config reloads, drops pending requests and waits for
   * running deployments.
   */
  async stop(): Promise<void> {
    this.poller.stop();
    await this.queue.stop();
  }

  triggerDeploy(repositoryId: number, priority?: number): TriggerResult {
    const repository = this.requireRepository(repositoryId);
    const result = this.queue.enqueue({
      repositoryId,
      reason: 'manual',
      priority: priority ?? repository.priority,
      enqueuedAt: Date.now(),
    });
    switch (result.outcome) {
      case 'accepted':
        return 'accepted';
      case 'superseded':
        return 'already-pending';
      case 'rejected':
        return 'stopped';
    }
  }

  listDeployments(options: { repositoryId?: number; limit?: number } = {}): Deployment[] {
    if (options.repositoryId !== undefined) {
      this.requireRepository(options.repositoryId);
    }
    return this.db.getDeployments(options);
  }

  getDeployment(deploymentId: number): Deployment {
    const deployment = this.db.getDeployment(deploymentId);
    if (!deployment) {
      throw NotFoundError.deployment(deploymentId);
    }
    return deployment;
  }

  getRepositoryState(repositoryId: number): RepositoryState {
    return this.toState(this.requireRepository(repositoryId));
  }

  getRepositoryStates(): RepositoryState[] {
    return this.db.getAllRepositories().map((repository) => this.toState(repository));
  }

  tailContainerLogs(containerId: string, lines = 100): Promise<string> {
    return this.containers.tailLogs(containerId, lines);
  }

  snapshot(): QueueSnapshot {
    return this.queue.snapshot();
  }

  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  private requireRepository(repositoryId: number): Repository {
    const repository = this.db.getRepository(repositoryId);
    if (!repository) {
      throw NotFoundError.repository(repositoryId);
    }
    return repository;
  }

  private toState(repository: Repository): RepositoryState {
    return {
      repository_id: repository.id,
      name: repository.name,
      project: repository.project_name,
      branch: repository.branch,
      last_commit_hash: repository.last_commit_hash,
      running: this.queue.isRunning(repository.id),
      pending: this.queue.isPending(repository.id),
      latest_deployment: this.db.getLatestDeployment(repository.id) ?? null,
    };
  }
}
