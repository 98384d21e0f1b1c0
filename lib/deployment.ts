import { promises as fs } from 'fs';
import path from 'path';
import type { ContainerAdapter } from './containers';
import type { DbHelpers } from './db';
import {
  ContainerError,
  DeployError,
  GitError,
  NotFoundError,
  NotificationError,
  SecretsError,
  errorMessage,
} from './errors';
import type { GitAdapter } from './git';
import { HealthChecker, HttpHealthChecker, waitForHealthy } from './healthcheck';
import { createLogger } from './logging';
import type {
  Deployment,
  DeploymentRequest,
  DeploymentSummary,
  NotificationEvent,
  Repository,
} from './models';
import type { NotificationTrigger } from './notifications';
import type { SecretsAdapter } from './secrets';

const logger = createLogger('deployment');

export interface RunnerOptions {
  pruneImages: boolean;
  // Bound on each subprocess step: change check, clone/pull, decrypt, compose up
  stepTimeoutMs: number;
  notifyTimeoutMs: number;
  composeProjectPrefix: string;
  // Pause between healthcheck attempts, 2s when unset
  healthcheckIntervalMs?: number;
}

/**
 * Receives live progress, e.g. to stream logs to connected sockets.
 */
export interface DeploymentListener {
  onLog?(deploymentId: number, repositoryId: number, chunk: string): void;
  onStatus?(deployment: Deployment): void;
}

export interface DeploymentRunnerDeps {
  db: DbHelpers;
  git: GitAdapter;
  secrets: SecretsAdapter;
  containers: ContainerAdapter;
  notifier: NotificationTrigger;
  options: RunnerOptions;
  health?: HealthChecker;
  listener?: DeploymentListener;
}

interface Outcome {
  changed: boolean;
  commit: string;
}

function shortHash(hash: string | null): string {
  return hash ? hash.slice(0, 7) : 'none';
}

async function hasCheckout(localPath: string): Promise<boolean> {
  try {
    const entries = await fs.readdir(localPath);
    return entries.length > 0;
  } catch {
    return false;
  }
}

/**
 * Resolves with `promise` unless `timeoutMs` passes first, in which case it
 * rejects with `onTimeout()`.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Executes one deployment attempt for a repository:
 * change check → clone/pull → decrypt secrets → compose up → healthcheck → prune
 * → finalize → notify.
 *
 * Step failures end the attempt as `failed` and are never rethrown. Only a
 * repository that no longer exists makes `run` reject, before any record is
 * created.
 */
export class DeploymentRunner {
  private listener?: DeploymentListener;
  private health: HealthChecker;

  constructor(private deps: DeploymentRunnerDeps) {
    this.listener = deps.listener;
    this.health = deps.health ?? new HttpHealthChecker();
  }

  setListener(listener: DeploymentListener | undefined) {
    this.listener = listener;
  }

  async run(request: DeploymentRequest): Promise<Deployment> {
    const { db } = this.deps;
    const repository = db.getRepository(request.repositoryId);
    if (!repository) {
      throw NotFoundError.repository(request.repositoryId);
    }

    const deploymentId = db.createDeployment(repository.id, request.reason);
    db.markDeploymentRunning(deploymentId);
    this.emitStatus(deploymentId);
    logger.info(`Deployment ${deploymentId} started for ${repository.project_name}/${repository.name} (${request.reason})`);

    const log = (line: string) => this.appendLog(deploymentId, repository.id, `${line}\n`);

    let outcome: Outcome;
    try {
      outcome = await this.execute(repository, deploymentId, log);
    } catch (error) {
      const failure =
        error instanceof DeployError ? `[${error.tag}] ${error.message}` : `[internal] ${errorMessage(error)}`;
      log(`❌ Deployment failed ${failure}`);
      db.finishDeployment(deploymentId, 'failed');
      this.emitStatus(deploymentId);
      logger.warn(`Deployment ${deploymentId} for ${repository.name} failed ${failure}`);

      const failed = this.load(deploymentId);
      await this.notify(repository, failed, 'failure', failure);
      return failed;
    }

    if (!outcome.changed) {
      db.completeSuccessfulDeployment(deploymentId, repository.id, outcome.commit);
      this.emitStatus(deploymentId);
      logger.info(`Deployment ${deploymentId} for ${repository.name}: no changes`);
      return this.load(deploymentId);
    }

    log('✅ Deployment completed successfully');
    db.completeSuccessfulDeployment(deploymentId, repository.id, outcome.commit);
    this.emitStatus(deploymentId);
    logger.info(`Deployment ${deploymentId} for ${repository.name} succeeded at ${shortHash(outcome.commit)}`);

    const succeeded = this.load(deploymentId);
    await this.notify(repository, succeeded, 'success');
    return succeeded;
  }

  private async execute(repository: Repository, deploymentId: number, log: (line: string) => void): Promise<Outcome> {
    const { db, git, secrets, containers, options } = this.deps;

    // Change check
    log(`Checking ${repository.git_url} (${repository.branch}) for new commits`);
    const remoteHash = await this.runStep(
      () => new GitError('timeout', 'Timed out reading the remote branch'),
      (signal) => git.remoteHash(repository.git_url, repository.branch, repository.token, { signal }),
    );
    db.setDeploymentCommit(deploymentId, remoteHash);

    if (remoteHash === repository.last_commit_hash) {
      log(`No changes (${shortHash(remoteHash)}), nothing to deploy`);
      return { changed: false, commit: remoteHash };
    }
    log(`New commit ${shortHash(remoteHash)} (deployed: ${shortHash(repository.last_commit_hash)})`);

    // Pull
    let commit: string;
    if (await hasCheckout(repository.local_path)) {
      log(`Pulling ${repository.branch} into ${repository.local_path}`);
      commit = await this.runStep(
        () => new GitError('timeout', 'git pull timed out'),
        (signal) =>
          git.pull(repository.local_path, repository.branch, repository.git_url, repository.token, { signal }),
      );
    } else {
      log(`Cloning ${repository.git_url} into ${repository.local_path}`);
      commit = await this.runStep(
        () => new GitError('timeout', 'git clone timed out'),
        (signal) =>
          git.clone(repository.git_url, repository.branch, repository.local_path, repository.token, { signal }),
      );
    }
    db.setDeploymentCommit(deploymentId, commit);
    log(`Checked out ${shortHash(commit)}`);

    const workdir = path.resolve(repository.local_path, repository.path);

    // Secrets: containers must never start without the decrypted env file
    if (repository.env_file) {
      const encrypted = path.join(workdir, repository.env_file);
      log(`Decrypting ${repository.env_file} to .env`);
      if (!(await secrets.isEncrypted(encrypted))) {
        throw new SecretsError('malformed', `${repository.env_file} is missing or not SOPS-encrypted`);
      }
      await this.runStep(
        () => new SecretsError('timeout', 'Decryption timed out'),
        (signal) => secrets.decrypt(encrypted, path.join(workdir, '.env'), { signal }),
      );
      log('Secrets decrypted');
    }

    // Containers
    log(`Starting containers in ${repository.path}`);
    const { exitCode } = await this.runStep(
      () => new ContainerError('timeout', 'docker compose up timed out'),
      (signal) =>
        containers.bringUp(workdir, {
          projectName: `${options.composeProjectPrefix}_${repository.id}`,
          signal,
          onOutput: (chunk) => this.appendLog(deploymentId, repository.id, chunk),
        }),
    );
    if (exitCode !== 0) {
      throw new ContainerError('nonzero-exit', `docker compose exited with code ${exitCode}`, exitCode);
    }
    log('Containers are up');

    if (repository.healthcheck_url) {
      const url = repository.healthcheck_url;
      const expected = repository.healthcheck_expected_status;
      const timeout = repository.healthcheck_timeout;
      log(`Waiting for ${url} to return ${expected} (timeout: ${timeout}s)`);
      const healthy = await waitForHealthy(
        this.health,
        { url, expectedStatus: expected, timeoutMs: timeout * 1000 },
        options.healthcheckIntervalMs ?? 2000,
      );
      if (!healthy) {
        throw new ContainerError('unhealthy', `Healthcheck failed: ${url} did not return ${expected} within ${timeout}s`);
      }
      log(`Healthcheck passed: ${url} returned ${expected}`);
    }

    // Cleanup is best-effort
    if (options.pruneImages) {
      log('Pruning unused images');
      try {
        await containers.pruneImages();
        log('Unused images pruned');
      } catch (error) {
        log(`⚠️ Image prune failed: ${errorMessage(error)}`);
        logger.warn(`Image prune failed after deployment ${deploymentId}:`, errorMessage(error));
      }
    }

    return { changed: true, commit };
  }

  /**
   * Runs a subprocess-driving step. When the step outlives the timeout its
   * signal is aborted (killing the process) and the step fails with `onTimeout()`.
   */
  private async runStep<T>(onTimeout: () => DeployError, step: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    try {
      return await withTimeout(step(controller.signal), this.deps.options.stepTimeoutMs, () => {
        controller.abort();
        return onTimeout();
      });
    } catch (error) {
      // The aborted step may settle first with its own AbortError
      if (controller.signal.aborted) throw onTimeout();
      throw error;
    }
  }

  private async notify(repository: Repository, deployment: Deployment, event: NotificationEvent, error?: string) {
    const summary = this.summarize(repository, deployment, error);
    const controller = new AbortController();
    try {
      await withTimeout(
        this.deps.notifier.notify(repository.notifications[event], event, summary, { signal: controller.signal }),
        this.deps.options.notifyTimeoutMs,
        () => {
          controller.abort();
          return new NotificationError(`Notification for deployment ${deployment.id} timed out`);
        },
      );
    } catch (notifyError) {
      logger.warn(`Notification for deployment ${deployment.id} failed:`, errorMessage(notifyError));
    }
  }

  private summarize(repository: Repository, deployment: Deployment, error?: string): DeploymentSummary {
    const durationSeconds =
      deployment.started_at && deployment.finished_at
        ? (Date.parse(deployment.finished_at) - Date.parse(deployment.started_at)) / 1000
        : null;
    return {
      deploymentId: deployment.id,
      repositoryId: repository.id,
      repositoryName: repository.name,
      projectName: repository.project_name,
      status: deployment.status,
      commitHash: deployment.commit_hash,
      startedAt: deployment.started_at,
      finishedAt: deployment.finished_at,
      durationSeconds,
      error,
    };
  }

  private appendLog(deploymentId: number, repositoryId: number, chunk: string) {
    this.deps.db.appendDeploymentLog(deploymentId, chunk);
    try {
      this.listener?.onLog?.(deploymentId, repositoryId, chunk);
    } catch (error) {
      logger.warn('Deployment log listener failed:', errorMessage(error));
    }
  }

  private emitStatus(deploymentId: number) {
    if (!this.listener?.onStatus) return;
    try {
      this.listener.onStatus(this.load(deploymentId));
    } catch (error) {
      logger.warn('Deployment status listener failed:', errorMessage(error));
    }
  }

  private load(deploymentId: number): Deployment {
    const deployment = this.deps.db.getDeployment(deploymentId);
    if (!deployment) {
      throw NotFoundError.deployment(deploymentId);
    }
    return deployment;
  }
}
