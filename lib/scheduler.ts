import { errorMessage } from './errors';
import type { GitAdapter } from './git';
import { createLogger } from './logging';
import type { DeploymentRequest, Repository } from './models';
import type { EnqueueResult } from './queue';

const logger = createLogger('poller');

type Task = {
    id: string;
    fn: () => void;
    intervalMs: number;
    nextRunAt: number;
    timer: NodeJS.Timeout;
}

/**
 * Runs named tasks on a fixed interval. Scheduling an id again replaces the
 * previous task.
 */
export class TaskScheduler {
    private tasks: Map<string, Task> = new Map();

    every(id: string, fn: () => void, intervalMs: number): void {
        this.cancel(id);

        const timer = setInterval(() => {
            const task = this.tasks.get(id);
            if (task) task.nextRunAt = Date.now() + intervalMs;
            fn();
        }, intervalMs);
        // Pending polls alone must not keep the process alive
        timer.unref();

        this.tasks.set(id, {
            id,
            fn,
            intervalMs,
            nextRunAt: Date.now() + intervalMs,
            timer
        });
    }

    cancel(id: string): boolean {
        const task = this.tasks.get(id);
        if (task) {
            clearInterval(task.timer);
            this.tasks.delete(id);
            return true;
        }
        return false;
    }

    cancelAll(): void {
        for (const id of [...this.tasks.keys()]) {
            this.cancel(id);
        }
    }

    getInterval(id: string): number | null {
        return this.tasks.get(id)?.intervalMs ?? null;
    }

    getTimeRemaining(id: string): number | null {
        const task = this.tasks.get(id);
        if (task) {
            return Math.max(0, task.nextRunAt - Date.now());
        }
        return null;
    }

    getAllTasks(): Array<{ id: string; intervalMs: number; nextRunAt: number }> {
        return Array.from(this.tasks.values()).map(({ id, intervalMs, nextRunAt }) => ({
            id,
            intervalMs,
            nextRunAt
        }));
    }
}

export interface PollerDeps {
    git: GitAdapter;
    enqueue: (request: DeploymentRequest) => EnqueueResult;
    // Reads the repository fresh on every tick so config changes apply
    getRepository: (id: number) => Repository | undefined;
    scheduler?: TaskScheduler;
}

/**
 * One interval task per repository. Each tick reads the remote hash and
 * enqueues a poll request whatever it finds: whether to deploy is decided by the
 * deployment's own change check, and duplicate ticks collapse in the queue.
 */
export class RepositoryPoller {
    private scheduler: TaskScheduler;

    constructor(private deps: PollerDeps) {
        this.scheduler = deps.scheduler ?? new TaskScheduler();
    }

    private taskId(repositoryId: number): string {
        return `repo_${repositoryId}`;
    }

    /**
     * Starts polling `repository`, or re-times it when its interval changed.
     */
    watch(repository: Repository): void {
        const id = this.taskId(repository.id);
        const intervalMs = repository.check_interval * 1000;
        if (this.scheduler.getInterval(id) === intervalMs) {
            return;
        }
        this.scheduler.every(id, () => void this.tick(repository.id), intervalMs);
        logger.debug(`Polling ${repository.name} every ${repository.check_interval}s`);
    }

    unwatch(repositoryId: number): boolean {
        return this.scheduler.cancel(this.taskId(repositoryId));
    }

    stop(): void {
        this.scheduler.cancelAll();
    }

    async tick(repositoryId: number): Promise<EnqueueResult | null> {
        let repository: Repository | undefined;
        try {
            repository = this.deps.getRepository(repositoryId);
        } catch (error) {
            logger.error(`Repository ${repositoryId}: could not be loaded for polling:`, errorMessage(error));
            return null;
        }
        if (!repository) {
            this.unwatch(repositoryId);
            return null;
        }

        try {
            const remote = await this.deps.git.remoteHash(repository.git_url, repository.branch, repository.token);
            logger.debug(`${repository.name}: remote ${repository.branch} at ${remote}`);
        } catch (error) {
            logger.warn(`${repository.name}: could not read remote hash:`, errorMessage(error));
        }

        try {
            return this.deps.enqueue({
                repositoryId: repository.id,
                reason: 'poll',
                priority: repository.priority,
                enqueuedAt: Date.now(),
            });
        } catch (error) {
            logger.error(`${repository.name}: poll request failed:`, errorMessage(error));
            return null;
        }
    }
}
